/**
 * @fileoverview Structured error handling for the time-lapse run with typed error codes,
 * contextual metadata, and operator-facing message generation. Every failure that leaves
 * a component is an AppError, so the entry point can map it onto an exit code and the
 * lifecycle loop can tell fatal printer failures from recoverable capture failures.
 *
 * Error Categories:
 * - General: UNKNOWN, VALIDATION, NETWORK, TIMEOUT
 * - Startup: PRECONDITION_FAILED, TOOL_MISSING, DUPLICATE_INSTANCE
 * - Printer: PRINTER_UNREACHABLE, PRINTER_COMMAND_FAILED, PRINTER_RESPONSE_INVALID
 * - Frames: CAPTURE_FAILED, ASSEMBLY_FAILED
 * - Configuration: CONFIG_INVALID, CONFIG_LOAD_FAILED
 *
 * Factory Functions:
 * - fromZodError(): Converts Zod validation errors with issue details
 * - networkError(), timeoutError(), printerError(), preconditionError(), toolMissingError()
 *
 * Utilities:
 * - isAppError(), toAppError(), createErrorResult()
 */

import { ZodError } from 'zod';

// ============================================================================
// ERROR TYPES
// ============================================================================

export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  VALIDATION = 'VALIDATION',
  NETWORK = 'NETWORK',
  TIMEOUT = 'TIMEOUT',

  // Startup errors
  PRECONDITION_FAILED = 'PRECONDITION_FAILED',
  TOOL_MISSING = 'TOOL_MISSING',
  DUPLICATE_INSTANCE = 'DUPLICATE_INSTANCE',

  // Printer errors
  PRINTER_UNREACHABLE = 'PRINTER_UNREACHABLE',
  PRINTER_COMMAND_FAILED = 'PRINTER_COMMAND_FAILED',
  PRINTER_RESPONSE_INVALID = 'PRINTER_RESPONSE_INVALID',

  // Frame errors
  CAPTURE_FAILED = 'CAPTURE_FAILED',
  ASSEMBLY_FAILED = 'ASSEMBLY_FAILED',

  // Configuration errors
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONFIG_LOAD_FAILED = 'CONFIG_LOAD_FAILED'
}

// ============================================================================
// CUSTOM ERROR CLASS
// ============================================================================

/**
 * Enhanced error class with structured context
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.originalError = originalError;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Convert to plain object for serialization
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError ? {
        name: this.originalError.name,
        message: this.originalError.message,
        stack: this.originalError.stack
      } : undefined
    };
  }

  /**
   * Get operator-facing error message
   */
  public getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.PRINTER_UNREACHABLE:
        return 'Printer did not respond. Check the address and that it runs RepRapFirmware 2 or 3';
      case ErrorCode.PRINTER_COMMAND_FAILED:
        return 'Printer rejected a command. Check the printer display before resuming';
      case ErrorCode.PRINTER_RESPONSE_INVALID:
        return 'Printer returned an unexpected response';
      case ErrorCode.TOOL_MISSING:
        return 'A required external program is not installed';
      case ErrorCode.DUPLICATE_INSTANCE:
        return 'Another time-lapse run is already active';
      case ErrorCode.CONFIG_INVALID:
        return 'Configuration is invalid. Please check your options';
      case ErrorCode.NETWORK:
        return 'Network error. Please check your connection';
      case ErrorCode.TIMEOUT:
        return 'Operation timed out';
      default:
        return this.message || 'An unexpected error occurred';
    }
  }
}

// ============================================================================
// ERROR FACTORIES
// ============================================================================

/**
 * Create error from Zod validation error
 */
export function fromZodError(error: ZodError, code: ErrorCode = ErrorCode.VALIDATION): AppError {
  const issues = error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code
  }));

  return new AppError(
    'Validation failed',
    code,
    { issues },
    error
  );
}

/**
 * Create network error
 */
export function networkError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCode.NETWORK, context);
}

/**
 * Create timeout error
 */
export function timeoutError(operation: string, timeoutMs: number): AppError {
  return new AppError(
    `Operation timed out after ${timeoutMs}ms`,
    ErrorCode.TIMEOUT,
    { operation, timeoutMs }
  );
}

/**
 * Create printer error
 */
export function printerError(
  message: string,
  code: ErrorCode = ErrorCode.PRINTER_COMMAND_FAILED,
  context?: Record<string, unknown>,
  originalError?: Error
): AppError {
  return new AppError(message, code, context, originalError);
}

/**
 * Create startup precondition error
 */
export function preconditionError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCode.PRECONDITION_FAILED, context);
}

/**
 * Create missing external tool error
 */
export function toolMissingError(tool: string, installHint: string): AppError {
  return new AppError(
    `Program '${tool}' is required. Obtain via '${installHint}'`,
    ErrorCode.TOOL_MISSING,
    { tool, installHint }
  );
}

// ============================================================================
// ERROR HANDLING UTILITIES
// ============================================================================

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown, defaultCode: ErrorCode = ErrorCode.UNKNOWN): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return fromZodError(error);
  }

  if (error instanceof Error) {
    return new AppError(
      error.message,
      defaultCode,
      undefined,
      error
    );
  }

  if (typeof error === 'string') {
    return new AppError(error, defaultCode);
  }

  return new AppError(
    'An unknown error occurred',
    defaultCode,
    { error }
  );
}

/**
 * Create error result for HTTP responses
 */
export function createErrorResult(error: unknown): { success: false; error: string } {
  const appError = toAppError(error);
  return {
    success: false,
    error: appError.getUserMessage()
  };
}
