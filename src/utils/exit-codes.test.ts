/**
 * @fileoverview Tests for exit code mapping
 */

import { describe, it, expect } from '@jest/globals';
import { EXIT_CODES, exitCodeForOutcome, exitCodeForStartupError } from './exit-codes';
import { AppError, ErrorCode } from './error.utils';

describe('exitCodeForStartupError', () => {
  it('should use 1 for a duplicate instance', () => {
    expect(exitCodeForStartupError(new AppError('locked', ErrorCode.DUPLICATE_INSTANCE))).toBe(1);
  });

  it('should use 2 for everything else', () => {
    expect(exitCodeForStartupError(new AppError('bad', ErrorCode.CONFIG_INVALID))).toBe(2);
    expect(exitCodeForStartupError(new AppError('gone', ErrorCode.PRINTER_UNREACHABLE))).toBe(2);
    expect(exitCodeForStartupError(new Error('plain'))).toBe(2);
  });
});

describe('exitCodeForOutcome', () => {
  it('should use 0 for a completed or cancelled run', () => {
    expect(exitCodeForOutcome({ reason: 'print-complete', frameCount: 4, videoPath: '/v.mp4', error: null })).toBe(
      EXIT_CODES.OK
    );
    expect(exitCodeForOutcome({ reason: 'cancelled', frameCount: 0, videoPath: null, error: null })).toBe(EXIT_CODES.OK);
  });

  it('should use 3 for a printer error even when assembly also failed', () => {
    const error = new AppError('printer gone', ErrorCode.PRINTER_UNREACHABLE);
    expect(exitCodeForOutcome({ reason: 'printer-error', frameCount: 2, videoPath: null, error })).toBe(3);
  });

  it('should use 4 when only the video failed', () => {
    const error = new AppError('ffmpeg exited with code 1', ErrorCode.ASSEMBLY_FAILED);
    expect(exitCodeForOutcome({ reason: 'cancelled', frameCount: 2, videoPath: null, error })).toBe(4);
  });
});
