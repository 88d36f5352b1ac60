/**
 * @fileoverview Assembles the captured frame sequence into an MP4 with ffmpeg.
 *
 * The encoder runs once per session over the IMG%08d.jpeg sequence at a fixed frame
 * rate. When an extra hold time is configured the last frame is cloned with the tpad
 * filter instead of encoding at a plain fixed rate.
 */

import * as path from 'path';
import type { AssemblyRequest, AssemblyResult, VideoAssembler } from '../types/capture';
import { FRAME_INPUT_PATTERN } from '../types/capture';
import { VIDEO_FRAME_RATE } from '../types/config';
import { AppError, ErrorCode } from '../utils/error.utils';
import { logInfo, logWarning } from '../utils/logging';
import { runTool, type ToolRunner } from '../utils/process.utils';
import { formatTimestampToken } from '../utils/time.utils';

const ASSEMBLY_LOG_NAMESPACE = 'VideoAssembly';

/**
 * Above this many frames the encode is announced as slow
 */
const LONG_ENCODE_FRAME_COUNT = 250;

/**
 * Output video path for a session started at the given time
 */
export function buildOutputPath(baseDir: string, date: Date): string {
  return path.join(baseDir, `PrintLapse-${formatTimestampToken(date)}.mp4`);
}

/**
 * ffmpeg argument vector for one assembly request
 */
export function buildEncoderArguments(request: AssemblyRequest): string[] {
  const input = path.join(request.frameDirectory, FRAME_INPUT_PATTERN);
  const hold = request.extraTime > 0
    ? ['-c:v', 'libx264', '-vf', `tpad=stop_mode=clone:stop_duration=${request.extraTime},fps=${VIDEO_FRAME_RATE}`]
    : [];

  if (request.encoderArgs.length > 0) {
    return [...request.encoderArgs, '-i', input, ...hold, request.outputPath];
  }

  if (hold.length > 0) {
    return ['-r', String(VIDEO_FRAME_RATE), '-i', input, ...hold, request.outputPath];
  }

  return ['-r', String(VIDEO_FRAME_RATE), '-i', input, '-vcodec', 'libx264', '-y', '-v', '8', request.outputPath];
}

export class VideoAssemblyService implements VideoAssembler {
  constructor(private readonly runner: ToolRunner = runTool) {}

  public async assemble(request: AssemblyRequest): Promise<AssemblyResult> {
    if (request.frameCount === 0) {
      logWarning(ASSEMBLY_LOG_NAMESPACE, 'No frames were captured, skipping video creation');
      return { videoPath: null, frameCount: 0 };
    }

    logInfo(ASSEMBLY_LOG_NAMESPACE, `Creating video from ${request.frameCount} frames`);
    if (request.frameCount > LONG_ENCODE_FRAME_COUNT) {
      logInfo(ASSEMBLY_LOG_NAMESPACE, 'This can take a while...');
    }

    const result = await this.runner('ffmpeg', buildEncoderArguments(request));

    if (result.exitCode !== 0) {
      throw new AppError(
        `ffmpeg exited with code ${String(result.exitCode)} while creating ${request.outputPath}`,
        ErrorCode.ASSEMBLY_FAILED,
        { outputPath: request.outputPath, stderr: result.stderr.trim() }
      );
    }

    logInfo(ASSEMBLY_LOG_NAMESPACE, `Video processing complete: ${request.outputPath}`);
    return { videoPath: request.outputPath, frameCount: request.frameCount };
  }
}
