/**
 * @fileoverview Raspberry Pi camera module capture through raspistill
 */

import { ToolCameraBackend } from './ToolCameraBackend';

export class RaspistillBackend extends ToolCameraBackend {
  public readonly camera = 'pi';
  public readonly tool = 'raspistill';

  public buildArguments(file: string): string[] {
    if (this.cameraArgs.length > 0) {
      return [...this.cameraArgs, '-o', file];
    }
    // Shortest timeout, sports exposure, matrix metering, no preview window
    return ['-t', '1', '-ex', 'sports', '-mm', 'matrix', '-n', '-o', file];
  }
}
