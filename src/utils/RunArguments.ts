/**
 * @fileoverview CLI argument parser for a time-lapse run
 *
 * Arguments use the --flag=value form. Values are converted to the types of RunConfig
 * where the flag implies one (numbers, yes/no, X,Y pairs, passthrough argument lists);
 * range and enum checks are left to the config schema so file and CLI values are
 * validated the same way.
 *
 * Examples:
 *   printlapse --duet=192.168.1.50 --camera=usb --detect=layer
 *   printlapse --duet=printer.local --detect=none --seconds=20 --pause=yes --movehead=10,200
 *   printlapse --camera=ffmpeg --weburl=rtsp://camera.local/stream --vidparms="-r 24 -y"
 */

import * as path from 'path';
import { coerceToNumber } from './validation.utils';
import { splitArguments } from './process.utils';

/**
 * Result of parsing the command line
 */
export interface RunArguments {
  /** RunConfig fields given on the command line, not yet validated */
  values: Record<string, unknown>;
  /** Path of a JSON config file given with --config */
  configFile?: string;
  help: boolean;
  errors: string[];
}

type FlagParser = (value: string, flag: string, errors: string[]) => unknown;

const asString: FlagParser = (value) => value;

const asPath: FlagParser = (value) => path.resolve(value);

const asNumber: FlagParser = (value, flag, errors) => {
  const parsed = coerceToNumber(value);
  if (parsed === null) {
    errors.push(`${flag} expects a number, got '${value}'`);
    return undefined;
  }
  return parsed;
};

const asYesNo: FlagParser = (value, flag, errors) => {
  if (value === 'yes' || value === 'no') {
    return value === 'yes';
  }
  errors.push(`${flag} expects yes or no, got '${value}'`);
  return undefined;
};

const asArgumentList: FlagParser = (value) => splitArguments(value);

/**
 * --movehead=X,Y; 0,0 disables the move
 */
const asHeadPosition: FlagParser = (value, flag, errors) => {
  const parts = value.split(',').map((part) => coerceToNumber(part.trim()));
  const [x, y] = parts;
  if (parts.length !== 2 || x === null || y === null || x === undefined || y === undefined) {
    errors.push(`${flag} expects X,Y coordinates, got '${value}'`);
    return undefined;
  }
  return x === 0 && y === 0 ? null : { x, y };
};

interface ValueFlag {
  readonly field: string;
  readonly parse: FlagParser;
}

/**
 * Value flags and the RunConfig field each one sets
 */
const VALUE_FLAGS: ReadonlyMap<string, ValueFlag> = new Map<string, ValueFlag>([
  ['--duet', { field: 'duet', parse: asString }],
  ['--camera', { field: 'camera', parse: asString }],
  ['--seconds', { field: 'seconds', parse: asNumber }],
  ['--detect', { field: 'detect', parse: asString }],
  ['--pause', { field: 'pause', parse: asYesNo }],
  ['--movehead', { field: 'moveHead', parse: asHeadPosition }],
  ['--weburl', { field: 'webUrl', parse: asString }],
  ['--basedir', { field: 'baseDir', parse: asPath }],
  ['--extratime', { field: 'extraTime', parse: asNumber }],
  ['--instances', { field: 'instances', parse: asString }],
  ['--logtype', { field: 'logType', parse: asString }],
  ['--camparms', { field: 'cameraArgs', parse: asArgumentList }],
  ['--vidparms', { field: 'videoArgs', parse: asArgumentList }],
  ['--control-port', { field: 'controlPort', parse: asNumber }],
  ['--scratch-dir', { field: 'scratchDir', parse: asPath }]
]);

export const USAGE = `Usage: printlapse [options]

  --duet=HOST              Printer host name or IP address (default localhost)
  --camera=TYPE            usb | pi | ffmpeg | web (default usb)
  --weburl=URL             Stream or snapshot URL for the ffmpeg and web cameras
  --detect=MODE            layer | pause | none (default layer)
  --seconds=N              Also capture every N seconds (default 0, off)
  --pause=yes|no           Pause the printer around each capture (default no)
  --movehead=X,Y           Park the head here while paused (default 0,0, off)
  --dontwait               Start capturing before the print starts
  --basedir=DIR            Directory for the video and log file (default home)
  --extratime=N            Hold the last frame for N seconds
  --camparms="ARGS"        Arguments passed to the capture program
  --vidparms="ARGS"        Arguments passed to ffmpeg when creating the video
  --instances=POLICY       single | oneip | many (default single)
  --logtype=TYPE           console | file | both (default both)
  --control-port=PORT      Serve status and stop endpoints on this port
  --scratch-dir=DIR        Directory for captured frames
  --config=FILE            Read options from a JSON file; flags override it
  --help                   Show this help`;

/**
 * Remove one pair of surrounding quotes
 */
function unquote(value: string): string {
  return value.replace(/^["']|["']$/g, '');
}

/**
 * Parse command-line arguments
 *
 * @param args Arguments after the program name
 */
export function parseRunArguments(args: readonly string[] = process.argv.slice(2)): RunArguments {
  const result: RunArguments = { values: {}, help: false, errors: [] };

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      result.help = true;
      continue;
    }
    if (arg === '--dontwait') {
      result.values.dontWait = true;
      continue;
    }

    const separator = arg.indexOf('=');
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    const value = separator === -1 ? undefined : unquote(arg.slice(separator + 1));

    if (flag === '--config') {
      if (value) {
        result.configFile = path.resolve(value);
      } else {
        result.errors.push('--config expects a file path');
      }
      continue;
    }

    const entry = VALUE_FLAGS.get(flag);
    if (!entry) {
      result.errors.push(`Unknown option '${arg}'`);
      continue;
    }
    if (value === undefined) {
      result.errors.push(`${flag} expects a value (${flag}=...)`);
      continue;
    }

    const parsed = entry.parse(value, flag, result.errors);
    if (parsed !== undefined) {
      result.values[entry.field] = parsed;
    }
  }

  return result;
}
