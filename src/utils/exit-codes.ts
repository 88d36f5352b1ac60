/**
 * @fileoverview Process exit codes for a run
 *
 * - 0: print complete or stopped by the operator, video created (or no frames)
 * - 1: another instance holds the lock
 * - 2: invalid options or a failed startup precondition
 * - 3: the run ended on a printer error; captured frames were still assembled
 * - 4: the run ended normally but the video could not be created
 */

import type { RunOutcome } from '../types/lifecycle';
import { ErrorCode, isAppError } from './error.utils';

export const EXIT_CODES = {
  OK: 0,
  DUPLICATE_INSTANCE: 1,
  STARTUP_FAILED: 2,
  PRINTER_ERROR: 3,
  ASSEMBLY_FAILED: 4
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for a failure before the control loop started
 */
export function exitCodeForStartupError(error: unknown): ExitCode {
  if (isAppError(error) && error.code === ErrorCode.DUPLICATE_INSTANCE) {
    return EXIT_CODES.DUPLICATE_INSTANCE;
  }
  return EXIT_CODES.STARTUP_FAILED;
}

/**
 * Exit code for a finished run
 */
export function exitCodeForOutcome(outcome: RunOutcome): ExitCode {
  if (outcome.reason === 'printer-error') {
    return EXIT_CODES.PRINTER_ERROR;
  }
  if (outcome.error) {
    return EXIT_CODES.ASSEMBLY_FAILED;
  }
  return EXIT_CODES.OK;
}
