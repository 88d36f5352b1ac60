/**
 * @fileoverview Logging utilities for namespaced console and log-file output
 *
 * Provides centralized logging with namespace support on top of a winston logger.
 * The sink selection (console, file or both) is configured once at startup; until
 * then everything goes to the console.
 */

import winston from 'winston';

export type LogType = 'console' | 'file' | 'both';

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

interface LogSinkOptions {
  /** Prefix for every line, normally the printer host */
  readonly prefix: string;
  readonly logType: LogType;
  /** Log file path, required when logType includes file */
  readonly filePath?: string;
  /** Append to an existing log file instead of truncating it */
  readonly append?: boolean;
}

let linePrefix = '';
let detachFile: (() => void) | null = null;

const consoleTransport = new winston.transports.Console({
  stderrLevels: ['error', 'warn'],
  format: winston.format.printf(({ message, namespace, extra }) => {
    const tag = linePrefix ? `${linePrefix} [${String(namespace)}]` : `[${String(namespace)}]`;
    return `${tag} ${String(message)}${String(extra)}`;
  })
});

const fileFormat = winston.format.printf(({ message, namespace, extra, timestamp }) => {
  const prefix = linePrefix ? `${linePrefix} - ` : '';
  return `${prefix}${String(timestamp)} - [${String(namespace)}] ${String(message)}${String(extra)}`;
});

const logger = winston.createLogger({
  level: 'debug',
  format: winston.format.timestamp(),
  transports: [consoleTransport]
});

logger.on('error', (error: Error) => {
  closeLogSink();
  consoleTransport.silent = false;
  console.error('[Logging] Log file unavailable, continuing on console:', error.message);
});

/**
 * Configure where log lines go
 */
export function configureLogSink(options: LogSinkOptions): void {
  closeLogSink();

  linePrefix = options.prefix;

  if (options.logType !== 'console' && options.filePath) {
    const file = new winston.transports.File({
      filename: options.filePath,
      format: fileFormat,
      options: { flags: options.append ? 'a' : 'w' }
    });
    logger.add(file);
    detachFile = () => {
      logger.remove(file);
    };
  }

  consoleTransport.silent = options.logType === 'file' && detachFile !== null;
}

/**
 * Detach the log file, if any; pending lines are still flushed to it
 */
export function closeLogSink(): void {
  if (detachFile) {
    detachFile();
    detachFile = null;
  }
}

function formatArgs(args: unknown[]): string {
  if (args.length === 0) {
    return '';
  }
  const text = args
    .map((arg) => {
      if (arg instanceof Error) {
        return arg.message;
      }
      return typeof arg === 'string' ? arg : JSON.stringify(arg);
    })
    .join(' ');
  return ` ${text}`;
}

function write(level: LogLevel, namespace: string, message: string, args: unknown[]): void {
  logger.log({ level, message, namespace, extra: formatArgs(args) });
}

/**
 * Log verbose debug message with namespace
 */
export function logVerbose(namespace: string, message: string, ...args: unknown[]): void {
  if (process.env.DEBUG || process.env.NODE_ENV === 'development') {
    write('debug', namespace, message, args);
  }
}

/**
 * Log info message with namespace
 */
export function logInfo(namespace: string, message: string, ...args: unknown[]): void {
  write('info', namespace, message, args);
}

/**
 * Log warning message with namespace
 */
export function logWarning(namespace: string, message: string, ...args: unknown[]): void {
  write('warn', namespace, message, args);
}

/**
 * Log error message with namespace
 */
export function logError(namespace: string, message: string, ...args: unknown[]): void {
  write('error', namespace, message, args);
}
