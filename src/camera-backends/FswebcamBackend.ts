/**
 * @fileoverview USB webcam capture through fswebcam
 */

import { ToolCameraBackend } from './ToolCameraBackend';

export class FswebcamBackend extends ToolCameraBackend {
  public readonly camera = 'usb';
  public readonly tool = 'fswebcam';

  public buildArguments(file: string): string[] {
    if (this.cameraArgs.length > 0) {
      return [...this.cameraArgs, file];
    }
    return ['--quiet', '--no-banner', file];
  }
}
