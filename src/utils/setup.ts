/**
 * @fileoverview Directory setup for a time-lapse run
 *
 * The scratch directory holds the numbered frames of exactly one session, so it is
 * emptied before the first capture. The output directory receives the video and the
 * log file and is created when missing.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { RunConfig } from '../types/config';
import { InstanceLock, type ReleaseLock } from './InstanceLock';
import { configureLogSink, logInfo } from './logging';
import { preconditionError } from './error.utils';

export const LOG_FILE_NAME = 'PrintLapse.log';

/**
 * Take the instance lock, then open the session log in the output directory.
 * Under the single policy the log is truncated, which only the lock holder may do.
 *
 * @returns Function that releases the lock
 * @throws AppError DUPLICATE_INSTANCE before the log file is touched
 */
export function claimSessionOutput(
  config: Pick<RunConfig, 'duet' | 'instances' | 'baseDir' | 'logType'>,
  lock: InstanceLock = new InstanceLock()
): ReleaseLock {
  const release = lock.acquire(config.instances, config.duet);

  try {
    const baseDir = ensureOutputDirectory(config.baseDir);
    configureLogSink({
      prefix: config.duet,
      logType: config.logType,
      filePath: path.join(baseDir, LOG_FILE_NAME),
      append: config.instances !== 'single'
    });
  } catch (error) {
    release();
    throw error;
  }
  return release;
}

/**
 * Create the scratch directory, removing frames left by an earlier session
 *
 * @returns The scratch directory path
 * @throws AppError PRECONDITION_FAILED if the directory cannot be created or written
 */
export function prepareScratchDirectory(scratchDir: string): string {
  const directory = path.resolve(scratchDir);

  try {
    fs.rmSync(directory, { recursive: true, force: true });
    fs.mkdirSync(directory, { recursive: true });
  } catch (error) {
    throw preconditionError(
      `Cannot prepare frame directory ${directory}: ${error instanceof Error ? error.message : String(error)}`,
      { directory }
    );
  }

  assertWritable(directory);
  logInfo('Setup', `Frames will be stored in ${directory}`);
  return directory;
}

/**
 * Ensure the directory for the video and log file exists
 *
 * @returns The output directory path
 */
export function ensureOutputDirectory(baseDir: string): string {
  const directory = path.resolve(baseDir);

  if (!fs.existsSync(directory)) {
    logInfo('Setup', `Creating output directory: ${directory}`);
    try {
      fs.mkdirSync(directory, { recursive: true });
    } catch (error) {
      throw preconditionError(
        `Cannot create output directory ${directory}: ${error instanceof Error ? error.message : String(error)}`,
        { directory }
      );
    }
  }

  assertWritable(directory);
  return directory;
}

function assertWritable(directory: string): void {
  try {
    fs.accessSync(directory, fs.constants.W_OK);
  } catch {
    throw preconditionError(`Directory is not writable: ${directory}`, { directory });
  }
}
