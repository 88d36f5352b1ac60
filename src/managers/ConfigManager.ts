/**
 * @fileoverview Builds the immutable run configuration.
 *
 * Sources are layered defaults < JSON config file < command line. The merged result
 * is validated field by field with RunConfigSchema, then against the combination
 * rules between trigger, pause and camera options. Rule violations are
 * CONFIG_INVALID errors (exit 2); questionable but valid combinations become warnings.
 * The resolved configuration is frozen and shared read-only by every component.
 */

import * as fs from 'fs';
import { ZodError } from 'zod';
import {
  DEFAULT_RUN_CONFIG,
  RunConfigFileSchema,
  RunConfigSchema,
  defaultScratchDir,
  type RunConfig
} from '../types/config';
import { AppError, ErrorCode } from '../utils/error.utils';
import { formatValidationErrors, validate } from '../utils/validation.utils';

/**
 * Resolved configuration plus the advisory messages to log at startup
 */
export interface ResolvedConfig {
  readonly config: Readonly<RunConfig>;
  readonly warnings: readonly string[];
  readonly notes: readonly string[];
}

function describeIssues(result: { error: AppError }): string {
  const original = result.error.originalError;
  return original instanceof ZodError ? formatValidationErrors(original) : result.error.message;
}

/**
 * Check the rules that involve more than one option
 *
 * @returns error messages; empty when the combination is valid
 */
export function checkCombination(config: RunConfig): string[] {
  const errors: string[] = [];

  if (config.camera === 'dslr') {
    errors.push('Camera type dslr is not yet supported');
  }

  if (config.moveHead && !config.pause && config.detect !== 'pause') {
    errors.push(
      `--movehead=${config.moveHead.x.toFixed(2)},${config.moveHead.y.toFixed(2)} requires either --pause=yes or --detect=pause`
    );
  }

  if (config.pause && config.detect === 'pause') {
    errors.push(
      '--pause=yes pauses the printer when other events are detected, and --detect=pause requires the ' +
      'G-code to contain its own pauses. These cannot be combined'
    );
  }

  if ((config.camera === 'ffmpeg' || config.camera === 'web') && !config.webUrl) {
    errors.push(`--weburl is required for camera ${config.camera}`);
  }

  return errors;
}

/**
 * Valid combinations that probably do not do what the user intended
 */
export function collectWarnings(config: RunConfig): string[] {
  const warnings: string[] = [];

  if (config.seconds > 0 && config.detect !== 'none') {
    warnings.push(`--seconds=${config.seconds} and --detect=${config.detect} will trigger on both`);
    warnings.push('Specify --detect=none with --seconds to trigger on seconds alone');
  }

  if (config.seconds === 0 && config.detect === 'none') {
    warnings.push('No trigger is configured; no frames will be captured');
  }

  if (config.camera === 'web' && config.cameraArgs.length > 0) {
    warnings.push('--camparms is ignored for the web camera');
  }

  return warnings;
}

/**
 * Explanations of the pause modes, logged when one is active
 */
export function collectNotes(config: RunConfig): string[] {
  if (config.detect === 'pause') {
    return [
      '--detect=pause means the G-code on the printer already contains pauses;',
      'each one is detected, photographed and resumed.',
      'Head position during those pauses comes from the pause.g macro or --movehead.',
      'To have the printer paused for every photo instead, use --pause=yes with',
      '--detect=layer or --seconds.'
    ];
  }

  if (config.pause) {
    return [
      '--pause=yes means the printer is paused whenever --detect or --seconds triggers.',
      'To photograph pauses that are already in the G-code, use --detect=pause instead.'
    ];
  }

  return [];
}

export class ConfigManager {
  private static instance: ConfigManager | null = null;

  private resolved: ResolvedConfig | null = null;

  /**
   * Gets the singleton instance of ConfigManager
   */
  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Read and validate a JSON config file. Keys are RunConfig field names.
   */
  public loadFile(filePath: string): Record<string, unknown> {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new AppError(
        `Failed to read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.CONFIG_LOAD_FAILED,
        { filePath },
        error instanceof Error ? error : undefined
      );
    }

    const result = validate(RunConfigFileSchema, raw, ErrorCode.CONFIG_INVALID);
    if (!result.success) {
      throw new AppError(
        `Invalid config file ${filePath}:\n${describeIssues(result)}`,
        ErrorCode.CONFIG_INVALID,
        { filePath, issues: result.issues }
      );
    }
    return result.data;
  }

  /**
   * Merge defaults, file values and command-line values, validate and freeze.
   *
   * @throws AppError CONFIG_INVALID listing every problem found
   */
  public resolve(cliValues: Record<string, unknown>, fileValues: Record<string, unknown> = {}): ResolvedConfig {
    const merged = { ...DEFAULT_RUN_CONFIG, ...fileValues, ...cliValues };

    const result = validate(RunConfigSchema, merged, ErrorCode.CONFIG_INVALID);
    if (!result.success) {
      throw new AppError(`Invalid options:\n${describeIssues(result)}`, ErrorCode.CONFIG_INVALID, {
        issues: result.issues
      });
    }

    // A configured frame directory is used as given
    const config: RunConfig =
      cliValues.scratchDir === undefined && fileValues.scratchDir === undefined
        ? { ...result.data, scratchDir: defaultScratchDir(result.data.instances, result.data.duet) }
        : result.data;
    const problems = checkCombination(config);
    if (problems.length > 0) {
      throw new AppError(`Invalid combination of options:\n${problems.join('\n')}`, ErrorCode.CONFIG_INVALID, {
        problems
      });
    }

    this.resolved = Object.freeze({
      config: Object.freeze({
        ...config,
        moveHead: config.moveHead ? Object.freeze({ ...config.moveHead }) : null,
        cameraArgs: Object.freeze([...config.cameraArgs]),
        videoArgs: Object.freeze([...config.videoArgs])
      }),
      warnings: Object.freeze(collectWarnings(config)),
      notes: Object.freeze(collectNotes(config))
    });
    return this.resolved;
  }

  /**
   * Gets the resolved configuration (readonly)
   *
   * @throws Error if resolve() has not run yet
   */
  public getConfig(): Readonly<RunConfig> {
    if (!this.resolved) {
      throw new AppError('Configuration has not been resolved yet', ErrorCode.UNKNOWN);
    }
    return this.resolved.config;
  }
}

/**
 * Get the global ConfigManager instance
 */
export function getConfigManager(): ConfigManager {
  return ConfigManager.getInstance();
}
