/**
 * @fileoverview Tests for ConfigManager
 * Tests layering of defaults, config file and command line, validation and freezing
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, getConfigManager, checkCombination, collectNotes, collectWarnings } from './ConfigManager';
import { DEFAULT_RUN_CONFIG, type RunConfig } from '../types/config';
import { AppError, ErrorCode } from '../utils/error.utils';

function resolveError(manager: ConfigManager, cli: Record<string, unknown>, file?: Record<string, unknown>): AppError {
  try {
    manager.resolve(cli, file);
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected resolve() to fail');
}

function config(overrides: Partial<RunConfig>): RunConfig {
  return { ...DEFAULT_RUN_CONFIG, ...overrides };
}

describe('ConfigManager', () => {
  let manager: ConfigManager;

  beforeEach(() => {
    manager = new ConfigManager();
  });

  describe('Singleton Pattern', () => {
    it('should return the same instance from getConfigManager', () => {
      expect(getConfigManager()).toBe(getConfigManager());
    });
  });

  describe('Layering', () => {
    it('should use defaults when nothing is given', () => {
      const { config: resolved, warnings } = manager.resolve({});

      expect(resolved).toEqual(DEFAULT_RUN_CONFIG);
      expect(warnings).toEqual([]);
    });

    it('should let the command line override the file', () => {
      const { config: resolved } = manager.resolve(
        { duet: 'printer.local', seconds: 10 },
        { duet: '10.0.0.2', detect: 'none', logType: 'console' }
      );

      expect(resolved.duet).toBe('printer.local');
      expect(resolved.detect).toBe('none');
      expect(resolved.logType).toBe('console');
      expect(resolved.seconds).toBe(10);
    });

    it('should expose the last resolved configuration', () => {
      manager.resolve({ duet: 'printer.local' });

      expect(manager.getConfig().duet).toBe('printer.local');
    });

    it('should refuse access before resolving', () => {
      expect(() => manager.getConfig()).toThrow('Configuration has not been resolved yet');
    });
  });

  describe('Frame directory', () => {
    it('should give each printer its own directory under oneip', () => {
      const { config: resolved } = manager.resolve({ duet: 'duet.local:8080', instances: 'oneip' });

      expect(resolved.scratchDir).toBe(path.join(os.tmpdir(), 'printlapse-duet.local_8080'));
    });

    it('should give each process its own directory under many', () => {
      const { config: resolved } = manager.resolve({ duet: '10.0.0.2' }, { instances: 'many' });

      expect(resolved.scratchDir).toBe(path.join(os.tmpdir(), `printlapse-${process.pid}`));
    });

    it('should keep a configured directory whatever the policy', () => {
      const { config: resolved } = manager.resolve(
        { instances: 'many' },
        { scratchDir: '/var/tmp/frames' }
      );

      expect(resolved.scratchDir).toBe('/var/tmp/frames');
    });
  });

  describe('Immutability', () => {
    it('should freeze the configuration and its nested values', () => {
      const { config: resolved } = manager.resolve({ pause: true, moveHead: { x: 1, y: 2 }, cameraArgs: ['-r', '640x480'] });

      expect(Object.isFrozen(resolved)).toBe(true);
      expect(Object.isFrozen(resolved.moveHead)).toBe(true);
      expect(Object.isFrozen(resolved.cameraArgs)).toBe(true);
    });
  });

  describe('Validation', () => {
    it('should reject values of the wrong type or range', () => {
      const error = resolveError(manager, { seconds: -1, camera: 'gopro' });

      expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
      expect(error.message).toContain('seconds: Interval must not be negative');
      expect(error.message).toContain('camera: ');
    });

    it('should reject an invalid combination', () => {
      const error = resolveError(manager, { pause: true, detect: 'pause' });

      expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
      expect(error.context).toEqual({ problems: checkCombination(config({ pause: true, detect: 'pause' })) });
    });
  });

  describe('Config file', () => {
    let directory: string;

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'printlapse-config-'));
    });

    afterEach(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    it('should read known fields', () => {
      const file = path.join(directory, 'printlapse.json');
      fs.writeFileSync(file, JSON.stringify({ duet: 'printer.local', seconds: 30, detect: 'none' }));

      expect(manager.loadFile(file)).toEqual({ duet: 'printer.local', seconds: 30, detect: 'none' });
    });

    it('should reject unknown fields', () => {
      const file = path.join(directory, 'printlapse.json');
      fs.writeFileSync(file, JSON.stringify({ duet: 'printer.local', camra: 'usb' }));

      let caught: unknown;
      try {
        manager.loadFile(file);
      } catch (error) {
        caught = error;
      }

      expect(caught instanceof AppError && caught.code).toBe(ErrorCode.CONFIG_INVALID);
    });

    it('should report unreadable files', () => {
      const file = path.join(directory, 'missing.json');

      let caught: unknown;
      try {
        manager.loadFile(file);
      } catch (error) {
        caught = error;
      }

      expect(caught instanceof AppError && caught.code).toBe(ErrorCode.CONFIG_LOAD_FAILED);
    });
  });
});

describe('checkCombination', () => {
  it('should accept the defaults', () => {
    expect(checkCombination(DEFAULT_RUN_CONFIG)).toEqual([]);
  });

  it('should require a pause mode for a head move', () => {
    expect(checkCombination(config({ moveHead: { x: 10, y: 20 } }))).toEqual([
      '--movehead=10.00,20.00 requires either --pause=yes or --detect=pause'
    ]);
    expect(checkCombination(config({ moveHead: { x: 10, y: 20 }, pause: true }))).toEqual([]);
    expect(checkCombination(config({ moveHead: { x: 10, y: 20 }, detect: 'pause' }))).toEqual([]);
  });

  it('should reject forced pauses with pause detection', () => {
    expect(checkCombination(config({ pause: true, detect: 'pause' }))).toHaveLength(1);
  });

  it('should reject dslr', () => {
    expect(checkCombination(config({ camera: 'dslr' }))).toEqual(['Camera type dslr is not yet supported']);
  });

  it('should require a URL for network cameras', () => {
    expect(checkCombination(config({ camera: 'web' }))).toEqual(['--weburl is required for camera web']);
    expect(checkCombination(config({ camera: 'ffmpeg', webUrl: 'rtsp://camera.local/live' }))).toEqual([]);
  });
});

describe('collectWarnings', () => {
  it('should warn when seconds and detect both trigger', () => {
    expect(collectWarnings(config({ seconds: 20 }))).toEqual([
      '--seconds=20 and --detect=layer will trigger on both',
      'Specify --detect=none with --seconds to trigger on seconds alone'
    ]);
  });

  it('should warn when nothing triggers', () => {
    expect(collectWarnings(config({ detect: 'none' }))).toEqual(['No trigger is configured; no frames will be captured']);
  });

  it('should warn about camera arguments for the web camera', () => {
    expect(collectWarnings(config({ camera: 'web', webUrl: 'http://camera.local/snap', cameraArgs: ['-q'] }))).toEqual([
      '--camparms is ignored for the web camera'
    ]);
  });
});

describe('collectNotes', () => {
  it('should explain the active pause mode', () => {
    expect(collectNotes(config({ detect: 'pause' }))).toHaveLength(5);
    expect(collectNotes(config({ pause: true }))).toHaveLength(2);
    expect(collectNotes(DEFAULT_RUN_CONFIG)).toEqual([]);
  });
});
