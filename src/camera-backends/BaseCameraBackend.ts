/**
 * @fileoverview Abstract base class for camera backends.
 *
 * A backend writes one image into a numbered frame slot. The base class owns the
 * success rule shared by every camera: the producer must finish without error AND leave
 * a non-empty file at the slot. Anything else counts as a skipped frame; the partial
 * file is removed so the slot can be reused by the next capture.
 */

import * as fs from 'fs';
import { getCameraMode, type CameraMode, type CameraType } from '../types/config';
import type { CapturePort } from '../types/capture';
import { framePath } from '../types/capture';
import { toAppError, ErrorCode } from '../utils/error.utils';
import { logVerbose, logWarning } from '../utils/logging';

export const CAMERA_LOG_NAMESPACE = 'Camera';

/**
 * Options shared by all camera backends
 */
export interface CameraBackendOptions {
  /** Scratch directory holding the frame sequence */
  readonly frameDirectory: string;
  /** Raw passthrough arguments for the capture tool */
  readonly cameraArgs: readonly string[];
}

export abstract class BaseCameraBackend implements CapturePort {
  public abstract readonly camera: Exclude<CameraType, 'dslr'>;

  protected readonly frameDirectory: string;
  protected readonly cameraArgs: readonly string[];

  constructor(options: CameraBackendOptions) {
    this.frameDirectory = options.frameDirectory;
    this.cameraArgs = options.cameraArgs;
  }

  public get mode(): CameraMode {
    return getCameraMode(this.camera);
  }

  /**
   * Write one image to the given file. Rejects when the image could not be produced.
   */
  protected abstract produce(file: string): Promise<void>;

  public async capture(slot: number): Promise<boolean> {
    const file = framePath(this.frameDirectory, slot);

    try {
      await this.produce(file);
    } catch (error) {
      const appError = toAppError(error, ErrorCode.CAPTURE_FAILED);
      logWarning(CAMERA_LOG_NAMESPACE, `Frame ${slot} skipped: ${appError.message}`);
      await this.discard(file);
      return false;
    }

    if (!(await this.hasImage(file))) {
      logWarning(CAMERA_LOG_NAMESPACE, `Frame ${slot} skipped: ${this.camera} camera produced no image`);
      await this.discard(file);
      return false;
    }

    logVerbose(CAMERA_LOG_NAMESPACE, `Frame ${slot} written to ${file}`);
    return true;
  }

  private async hasImage(file: string): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(file);
      return stats.isFile() && stats.size > 0;
    } catch {
      return false;
    }
  }

  private async discard(file: string): Promise<void> {
    try {
      await fs.promises.rm(file, { force: true });
    } catch (error) {
      logWarning(CAMERA_LOG_NAMESPACE, `Could not remove partial frame ${file}:`, error);
    }
  }
}
