/**
 * @fileoverview Camera backend factory
 */

import type { RunConfig } from '../types/config';
import type { ToolRunner } from '../utils/process.utils';
import { preconditionError } from '../utils/error.utils';
import type { BaseCameraBackend } from './BaseCameraBackend';
import { FswebcamBackend } from './FswebcamBackend';
import { RaspistillBackend } from './RaspistillBackend';
import { FfmpegStreamBackend } from './FfmpegStreamBackend';
import { WebSnapshotBackend } from './WebSnapshotBackend';

export { BaseCameraBackend } from './BaseCameraBackend';
export { ToolCameraBackend } from './ToolCameraBackend';

/**
 * Program each camera needs on the PATH, with the package that provides it.
 * The web camera needs none.
 */
export const CAMERA_TOOLS: Readonly<Record<'usb' | 'pi' | 'ffmpeg', { tool: string; installHint: string }>> = {
  usb: { tool: 'fswebcam', installHint: 'sudo apt install fswebcam' },
  pi: { tool: 'raspistill', installHint: 'sudo apt install libraspberrypi-bin' },
  ffmpeg: { tool: 'ffmpeg', installHint: 'sudo apt install ffmpeg' }
};

/**
 * Create the capture backend for the configured camera
 */
export function createCameraBackend(
  config: Pick<RunConfig, 'camera' | 'cameraArgs' | 'webUrl' | 'scratchDir'>,
  runner?: ToolRunner
): BaseCameraBackend {
  const base = { frameDirectory: config.scratchDir, cameraArgs: config.cameraArgs, runner };

  switch (config.camera) {
    case 'usb':
      return new FswebcamBackend(base);
    case 'pi':
      return new RaspistillBackend(base);
    case 'ffmpeg':
      return new FfmpegStreamBackend({ ...base, streamUrl: config.webUrl });
    case 'web':
      return new WebSnapshotBackend({ ...base, snapshotUrl: config.webUrl });
    case 'dslr':
      throw preconditionError('DSLR camera support is not yet available', { camera: config.camera });
  }
}
