/**
 * @fileoverview Helpers for running the external capture and encoder programs.
 *
 * Capture tools and ffmpeg are started with an argument vector (never through a shell),
 * so passthrough arguments from the command line are split here with simple quoting rules.
 */

import { exec, spawn } from 'child_process';
import { promisify } from 'util';
import { logVerbose } from './logging';

const execAsync = promisify(exec);

const PROCESS_LOG_NAMESPACE = 'Process';

/**
 * Exit status and collected output of one program run
 */
export interface ToolResult {
  /** null when the program was terminated by a signal */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Starts a program and waits for it to exit.
 * Rejects only when the program could not be started at all.
 */
export type ToolRunner = (command: string, args: readonly string[]) => Promise<ToolResult>;

export const runTool: ToolRunner = (command, args) => {
  logVerbose(PROCESS_LOG_NAMESPACE, `${command} ${args.join(' ')}`);

  return new Promise<ToolResult>((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', reject);
    child.on('close', (exitCode) => {
      resolve({ exitCode, stdout, stderr });
    });
  });
};

/**
 * Check whether a program is on the PATH
 */
export async function commandExists(command: string): Promise<boolean> {
  try {
    const { stdout } = await execAsync(`command -v ${command}`);
    return stdout.trim().length > 0;
  } catch (error) {
    logVerbose(PROCESS_LOG_NAMESPACE, `${command} not found:`, error);
    return false;
  }
}

/**
 * Split a passthrough argument string into an argument vector.
 * Whitespace separates arguments; single or double quotes group them.
 *
 * @example
 * splitArguments('-r 640x480 --title "my printer"') // ['-r', '640x480', '--title', 'my printer']
 */
export function splitArguments(input: string): string[] {
  const args: string[] = [];
  let current = '';
  let inArgument = false;
  let quote: '"' | "'" | null = null;

  for (const char of input) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inArgument = true;
    } else if (/\s/.test(char)) {
      if (inArgument) {
        args.push(current);
        current = '';
        inArgument = false;
      }
    } else {
      current += char;
      inArgument = true;
    }
  }

  if (inArgument) {
    args.push(current);
  }

  return args;
}
