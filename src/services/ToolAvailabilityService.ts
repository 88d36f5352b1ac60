/**
 * @fileoverview Startup check for the external programs a run depends on
 *
 * The capture program for the configured camera and ffmpeg for assembling the video must
 * be on the PATH before the run starts; a missing program is a startup precondition
 * failure naming the package that provides it.
 */

import type { RunConfig } from '../types/config';
import { CAMERA_TOOLS } from '../camera-backends';
import { commandExists } from '../utils/process.utils';
import { logInfo } from '../utils/logging';
import { toolMissingError } from '../utils/error.utils';

/**
 * Looks a program up on the PATH
 */
export type ToolProbe = (command: string) => Promise<boolean>;

interface RequiredTool {
  readonly tool: string;
  readonly installHint: string;
}

const ENCODER: RequiredTool = { tool: 'ffmpeg', installHint: 'sudo apt install ffmpeg' };

/**
 * Programs needed for the camera and for assembly, without duplicates
 */
export function requiredTools(camera: RunConfig['camera']): RequiredTool[] {
  const tools: RequiredTool[] = [];
  if (camera === 'usb' || camera === 'pi' || camera === 'ffmpeg') {
    tools.push(CAMERA_TOOLS[camera]);
  }
  if (!tools.some((entry) => entry.tool === ENCODER.tool)) {
    tools.push(ENCODER);
  }
  return tools;
}

export class ToolAvailabilityService {
  private readonly probe: ToolProbe;

  constructor(probe: ToolProbe = commandExists) {
    this.probe = probe;
  }

  /**
   * @throws AppError TOOL_MISSING for the first program that is not installed
   */
  public async verify(camera: RunConfig['camera']): Promise<void> {
    for (const { tool, installHint } of requiredTools(camera)) {
      if (!(await this.probe(tool))) {
        throw toolMissingError(tool, installHint);
      }
      logInfo('Tools', `${tool} found`);
    }
  }
}
