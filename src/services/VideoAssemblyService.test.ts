/**
 * @fileoverview Tests for VideoAssemblyService
 */

import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import { VideoAssemblyService, buildEncoderArguments, buildOutputPath } from './VideoAssemblyService';
import type { AssemblyRequest } from '../types/capture';
import type { ToolRunner } from '../utils/process.utils';
import { AppError, ErrorCode } from '../utils/error.utils';

const frameDirectory = '/tmp/printlapse';
const pattern = path.join(frameDirectory, 'IMG%08d.jpeg');
const outputPath = '/home/maker/PrintLapse-20240305-090703.mp4';

function request(overrides: Partial<AssemblyRequest> = {}): AssemblyRequest {
  return { frameDirectory, frameCount: 12, outputPath, encoderArgs: [], extraTime: 0, ...overrides };
}

function recordingRunner(exitCode: number | null = 0) {
  const calls: Array<{ command: string; args: readonly string[] }> = [];
  const runner: ToolRunner = async (command, args) => {
    calls.push({ command, args });
    return { exitCode, stdout: '', stderr: exitCode === 0 ? '' : 'Invalid data found when processing input' };
  };
  return { runner, calls };
}

describe('buildEncoderArguments', () => {
  it('should encode at a fixed rate by default', () => {
    expect(buildEncoderArguments(request())).toEqual([
      '-r', '10', '-i', pattern, '-vcodec', 'libx264', '-y', '-v', '8', outputPath
    ]);
  });

  it('should hold the last frame when extra time is set', () => {
    expect(buildEncoderArguments(request({ extraTime: 5 }))).toEqual([
      '-r', '10', '-i', pattern, '-c:v', 'libx264', '-vf', 'tpad=stop_mode=clone:stop_duration=5,fps=10', outputPath
    ]);
  });

  it('should put passthrough arguments before the input', () => {
    expect(buildEncoderArguments(request({ encoderArgs: ['-r', '24', '-y'] }))).toEqual([
      '-r', '24', '-y', '-i', pattern, outputPath
    ]);
    expect(buildEncoderArguments(request({ encoderArgs: ['-r', '24'], extraTime: 2.5 }))).toEqual([
      '-r', '24', '-i', pattern, '-c:v', 'libx264', '-vf', 'tpad=stop_mode=clone:stop_duration=2.5,fps=10', outputPath
    ]);
  });
});

describe('buildOutputPath', () => {
  it('should name the video after the session start', () => {
    expect(buildOutputPath('/home/maker', new Date(2024, 2, 5, 9, 7, 3))).toBe(
      path.join('/home/maker', 'PrintLapse-20240305-090703.mp4')
    );
  });
});

describe('VideoAssemblyService', () => {
  it('should run ffmpeg once and report the video', async () => {
    const { runner, calls } = recordingRunner();
    const service = new VideoAssemblyService(runner);

    const result = await service.assemble(request());

    expect(result).toEqual({ videoPath: outputPath, frameCount: 12 });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.command).toBe('ffmpeg');
  });

  it('should not start the encoder without frames', async () => {
    const { runner, calls } = recordingRunner();
    const service = new VideoAssemblyService(runner);

    const result = await service.assemble(request({ frameCount: 0 }));

    expect(result).toEqual({ videoPath: null, frameCount: 0 });
    expect(calls).toHaveLength(0);
  });

  it('should report an encoder failure', async () => {
    const { runner } = recordingRunner(1);
    const service = new VideoAssemblyService(runner);

    const error = await service.assemble(request()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AppError);
    expect(error instanceof AppError && error.code).toBe(ErrorCode.ASSEMBLY_FAILED);
  });
});
