/**
 * @fileoverview Network stream capture: ffmpeg grabs a single frame from the stream URL
 */

import { ToolCameraBackend, type ToolCameraBackendOptions } from './ToolCameraBackend';

export interface FfmpegStreamBackendOptions extends ToolCameraBackendOptions {
  readonly streamUrl: string;
}

export class FfmpegStreamBackend extends ToolCameraBackend {
  public readonly camera = 'ffmpeg';
  public readonly tool = 'ffmpeg';

  private readonly streamUrl: string;

  constructor(options: FfmpegStreamBackendOptions) {
    super(options);
    this.streamUrl = options.streamUrl;
  }

  public buildArguments(file: string): string[] {
    if (this.cameraArgs.length > 0) {
      return [...this.cameraArgs, this.streamUrl, '-vframes', '1', file];
    }
    return ['-y', '-i', this.streamUrl, '-vframes', '1', file];
  }
}
