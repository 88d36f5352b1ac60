/**
 * @fileoverview Base for cameras driven by an external capture program
 * (fswebcam, raspistill, ffmpeg). Subclasses only build the argument vector.
 */

import { BaseCameraBackend, type CameraBackendOptions } from './BaseCameraBackend';
import { AppError, ErrorCode } from '../utils/error.utils';
import { runTool, type ToolRunner } from '../utils/process.utils';

export interface ToolCameraBackendOptions extends CameraBackendOptions {
  /** Program runner, replaced in tests */
  readonly runner?: ToolRunner;
}

export abstract class ToolCameraBackend extends BaseCameraBackend {
  /** Program name looked up on the PATH */
  public abstract readonly tool: string;

  private readonly runner: ToolRunner;

  constructor(options: ToolCameraBackendOptions) {
    super(options);
    this.runner = options.runner ?? runTool;
  }

  /**
   * Arguments for one capture into file
   */
  public abstract buildArguments(file: string): string[];

  protected async produce(file: string): Promise<void> {
    const result = await this.runner(this.tool, this.buildArguments(file));

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split('\n').pop() ?? '';
      throw new AppError(
        `${this.tool} exited with code ${String(result.exitCode)}${detail ? `: ${detail}` : ''}`,
        ErrorCode.CAPTURE_FAILED,
        { tool: this.tool, exitCode: result.exitCode }
      );
    }
  }
}
