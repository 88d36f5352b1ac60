/**
 * @fileoverview Run configuration type definitions for the time-lapse capture loop
 *
 * The configuration is assembled once at startup (defaults < JSON file < CLI flags),
 * validated, frozen, and then only read by the lifecycle loop, the trigger evaluator,
 * the pause coordinator, and the capture and assembly backends.
 *
 * Key Features:
 * - RunConfig interface with readonly properties for immutability
 * - DEFAULT_RUN_CONFIG with type-safe constant values
 * - RunConfigSchema (zod) for field types and ranges
 * - Camera type to camera mode mapping
 * - Tick period and encoder frame rate constants
 *
 * @module types/config
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import type { LogType } from '../utils/logging';

/**
 * Capture tool selection on the command line
 */
export type CameraType = 'usb' | 'pi' | 'ffmpeg' | 'web' | 'dslr';

/**
 * How the camera is reached
 */
export type CameraMode = 'direct-device' | 'network-stream' | 'network-still';

/**
 * Which printer event produces a photo
 */
export type TriggerMode = 'layer' | 'pause' | 'none';

/**
 * Single-instance guard policy
 */
export type InstancePolicy = 'single' | 'oneip' | 'many';

/**
 * Head parking position used while the printer is paused for a photo
 */
export interface HeadPosition {
  readonly x: number;
  readonly y: number;
}

/**
 * Run configuration
 * All properties are readonly to enforce immutability
 */
export interface RunConfig {
  // Printer
  readonly duet: string;

  // Camera
  readonly camera: CameraType;
  readonly webUrl: string;
  readonly cameraArgs: readonly string[];

  // Triggers
  readonly detect: TriggerMode;
  readonly seconds: number;
  readonly pause: boolean;
  readonly moveHead: HeadPosition | null;
  readonly dontWait: boolean;

  // Output
  readonly baseDir: string;
  readonly scratchDir: string;
  readonly extraTime: number;
  readonly videoArgs: readonly string[];

  // Process
  readonly instances: InstancePolicy;
  readonly logType: LogType;
  readonly controlPort: number | null;
}

/**
 * Delay between ticks of the control loop.
 * Not a divisor of one second so ticks drift against the printer's own status updates.
 */
export const TICK_INTERVAL_MS = 770;

/**
 * Frame rate of the assembled video
 */
export const VIDEO_FRAME_RATE = 10;

/**
 * Host address reduced to characters that are safe in a file name
 */
export function hostSlug(host: string): string {
  return host.replace(/[^A-Za-z0-9.-]/g, '_');
}

/**
 * Frame directory used when none is configured. Sessions that may run side by side
 * each get their own.
 */
export function defaultScratchDir(instances: InstancePolicy, duet: string, pid: number = process.pid): string {
  switch (instances) {
    case 'single':
      return path.join(os.tmpdir(), 'printlapse');
    case 'oneip':
      return path.join(os.tmpdir(), `printlapse-${hostSlug(duet)}`);
    case 'many':
      return path.join(os.tmpdir(), `printlapse-${pid}`);
  }
}

/**
 * Default run configuration
 */
export const DEFAULT_RUN_CONFIG: RunConfig = {
  duet: 'localhost',

  camera: 'usb',
  webUrl: '',
  cameraArgs: [],

  detect: 'layer',
  seconds: 0,
  pause: false,
  moveHead: null,
  dontWait: false,

  baseDir: os.homedir(),
  scratchDir: defaultScratchDir('single', 'localhost'),
  extraTime: 0,
  videoArgs: [],

  instances: 'single',
  logType: 'both',
  controlPort: null
};

/**
 * Field-level schema; combination rules live in ConfigManager
 */
export const RunConfigSchema = z.object({
  duet: z.string().min(1, 'Printer address is required'),
  camera: z.enum(['usb', 'pi', 'ffmpeg', 'web', 'dslr']),
  webUrl: z.string(),
  cameraArgs: z.array(z.string()),
  detect: z.enum(['layer', 'pause', 'none']),
  seconds: z.number().finite().min(0, 'Interval must not be negative'),
  pause: z.boolean(),
  moveHead: z.object({ x: z.number().finite(), y: z.number().finite() }).nullable(),
  dontWait: z.boolean(),
  baseDir: z.string().min(1),
  scratchDir: z.string().min(1),
  extraTime: z.number().finite().min(0, 'Extra time must not be negative'),
  videoArgs: z.array(z.string()),
  instances: z.enum(['single', 'oneip', 'many']),
  logType: z.enum(['console', 'file', 'both']),
  controlPort: z.number().int().min(1).max(65535).nullable()
});

/**
 * Partial configuration as read from a JSON config file
 */
export const RunConfigFileSchema = RunConfigSchema.partial().strict();

/**
 * Map the capture tool onto how the camera is reached
 */
export function getCameraMode(camera: Exclude<CameraType, 'dslr'>): CameraMode {
  switch (camera) {
    case 'usb':
    case 'pi':
      return 'direct-device';
    case 'ffmpeg':
      return 'network-stream';
    case 'web':
      return 'network-still';
  }
}
