/**
 * @fileoverview Frame capture and video assembly port definitions
 *
 * Both ports wrap external programs (fswebcam, raspistill, ffmpeg) or an HTTP snapshot
 * fetch, so the trigger and pause logic can be exercised against in-process fakes.
 *
 * @module types/capture
 */

import * as path from 'path';

/**
 * Frame file name prefix and extension; the encoder pattern depends on both
 */
export const FRAME_FILE_PREFIX = 'IMG';
export const FRAME_FILE_EXTENSION = '.jpeg';
export const FRAME_NUMBER_WIDTH = 8;

/**
 * ffmpeg image2 input pattern matching frameFileName()
 */
export const FRAME_INPUT_PATTERN = `${FRAME_FILE_PREFIX}%0${FRAME_NUMBER_WIDTH}d${FRAME_FILE_EXTENSION}`;

/**
 * File name of a frame slot, e.g. IMG00000007.jpeg.
 * Lexicographic order of the names equals capture order.
 */
export function frameFileName(slot: number): string {
  return `${FRAME_FILE_PREFIX}${String(slot).padStart(FRAME_NUMBER_WIDTH, '0')}${FRAME_FILE_EXTENSION}`;
}

/**
 * Absolute path of a frame slot inside the scratch directory
 */
export function framePath(frameDirectory: string, slot: number): string {
  return path.join(frameDirectory, frameFileName(slot));
}

/**
 * Produces one still image into a numbered slot
 */
export interface CapturePort {
  /**
   * Capture one image into the slot.
   * Resolves false when the tool failed; never rejects for a camera failure.
   */
  capture(slot: number): Promise<boolean>;
}

/**
 * Input for one encoder run
 */
export interface AssemblyRequest {
  readonly frameDirectory: string;
  readonly frameCount: number;
  readonly outputPath: string;
  readonly encoderArgs: readonly string[];
  /** Seconds the last frame is held; 0 for a plain fixed-rate encode */
  readonly extraTime: number;
}

/**
 * Outcome of one encoder run
 */
export interface AssemblyResult {
  readonly videoPath: string | null;
  readonly frameCount: number;
}

/**
 * Turns the captured frame sequence into a video file
 */
export interface VideoAssembler {
  assemble(request: AssemblyRequest): Promise<AssemblyResult>;
}
