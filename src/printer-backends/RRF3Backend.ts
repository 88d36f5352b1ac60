/**
 * @fileoverview Backend for RepRapFirmware 3 boards attached to a single-board computer
 * running Duet Software Framework (/machine HTTP API).
 *
 * POST /machine/code returns only after the code has been executed, so M400 through it
 * already blocks until the motion queue is empty.
 */

import { z } from 'zod';
import type { Coordinates, MachineStatus } from '../types/printer';
import { BaseDuetBackend } from './BaseDuetBackend';
import { ErrorCode, printerError } from '../utils/error.utils';

const AxisSchema = z.object({
  letter: z.string(),
  machinePosition: z.number().nullable().optional(),
  userPosition: z.number().nullable().optional()
});

const ObjectModelSchema = z.object({
  state: z.object({
    status: z.string()
  }),
  job: z.object({
    layer: z.number().int().nullable().optional()
  }).optional(),
  move: z.object({
    axes: z.array(AxisSchema)
  }).optional()
});

type ObjectModel = z.infer<typeof ObjectModelSchema>;

/**
 * Map a DSF state.status value onto the machine status the trigger logic works with
 */
export function mapObjectModelStatus(status: string): MachineStatus {
  switch (status) {
    case 'idle':
      return 'idle';
    case 'processing':
      return 'processing';
    case 'paused':
      return 'paused';
    default:
      return 'other';
  }
}

export class RRF3Backend extends BaseDuetBackend {
  public readonly generation = 3;

  public async probe(): Promise<boolean> {
    try {
      await this.getObjectModel();
      return true;
    } catch {
      return false;
    }
  }

  public async getStatus(): Promise<MachineStatus> {
    const model = await this.getObjectModel();
    return mapObjectModelStatus(model.state.status);
  }

  public async getLayer(): Promise<number> {
    const model = await this.getObjectModel();
    return model.job?.layer ?? 0;
  }

  public async getCoordinates(): Promise<Coordinates> {
    const model = await this.getObjectModel();
    const axes = model.move?.axes ?? [];
    const position = (letter: string): number => {
      const axis = axes.find((candidate) => candidate.letter === letter);
      return axis?.machinePosition ?? axis?.userPosition ?? 0;
    };
    return { X: position('X'), Y: position('Y'), Z: position('Z') };
  }

  public async sendCommand(code: string): Promise<void> {
    const response = await this.request('/machine/code', {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: code
    });

    const reply = (await response.text()).trim();
    if (reply.startsWith('Error')) {
      throw printerError(`Printer rejected '${code}': ${reply}`, ErrorCode.PRINTER_COMMAND_FAILED, { code, reply });
    }
  }

  private async getObjectModel(): Promise<ObjectModel> {
    const response = await this.request('/machine/status', {
      headers: { Accept: 'application/json' }
    });

    let body: unknown;
    try {
      body = JSON.parse(await response.text());
    } catch (error) {
      throw printerError(
        'Printer returned malformed JSON for /machine/status',
        ErrorCode.PRINTER_RESPONSE_INVALID,
        { path: '/machine/status' },
        error instanceof Error ? error : undefined
      );
    }

    // Some DSF versions wrap the object model in { result: ... }
    if (typeof body === 'object' && body !== null && 'result' in body) {
      body = body.result;
    }

    return this.parseBody('/machine/status', ObjectModelSchema, body);
  }
}
