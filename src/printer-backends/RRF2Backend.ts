/**
 * @fileoverview Backend for RepRapFirmware 2 boards served through the rr_* HTTP API.
 *
 * rr_gcode only queues a command, so the M400 synchronization additionally polls
 * rr_status until the board leaves its transitional states (pausing, resuming, busy)
 * and rr_gcode until the queued M400 has left the G-code buffer. The board reports S
 * for the whole pause, park move included, so the status alone is not enough.
 */

import { z } from 'zod';
import type { Coordinates, MachineStatus } from '../types/printer';
import { GCODE } from '../types/printer';
import { BaseDuetBackend, type DuetBackendOptions } from './BaseDuetBackend';
import { ErrorCode, printerError } from '../utils/error.utils';
import { delay } from '../utils/time.utils';

const StatusResponseSchema = z.object({
  status: z.string().min(1)
});

const CoordinatesResponseSchema = z.object({
  coords: z.object({
    xyz: z.array(z.number()).min(3)
  })
});

const LayerResponseSchema = z.object({
  currentLayer: z.number().int()
});

const GCodeResponseSchema = z.object({
  buff: z.number().optional()
});

/**
 * Status letters that mean the board is still carrying out a state change
 */
const TRANSITIONAL_STATUS_LETTERS = new Set(['D', 'R', 'B']);

export interface RRF2BackendOptions extends DuetBackendOptions {
  /** Delay between rr_status polls while waiting for motion to settle */
  readonly settlePollMs?: number;
  /** Give up waiting for motion to settle after this long */
  readonly settleTimeoutMs?: number;
}

/**
 * Map an rr_status letter onto the machine status the trigger logic works with
 */
export function mapStatusLetter(letter: string): MachineStatus {
  switch (letter) {
    case 'I':
      return 'idle';
    case 'P':
      return 'processing';
    case 'S':
    case 'A':
      return 'paused';
    default:
      return 'other';
  }
}

export class RRF2Backend extends BaseDuetBackend {
  public readonly generation = 2;

  private readonly settlePollMs: number;
  private readonly settleTimeoutMs: number;
  /** Largest free G-code buffer space reported; stands for an empty buffer */
  private idleBufferSpace = 0;

  constructor(host: string, options: RRF2BackendOptions = {}) {
    super(host, options);
    this.settlePollMs = options.settlePollMs ?? 250;
    this.settleTimeoutMs = options.settleTimeoutMs ?? 120000;
  }

  public async probe(): Promise<boolean> {
    try {
      await this.requestJson('/rr_status?type=1', StatusResponseSchema.merge(CoordinatesResponseSchema));
      return true;
    } catch {
      return false;
    }
  }

  public async getStatus(): Promise<MachineStatus> {
    return mapStatusLetter(await this.getStatusLetter());
  }

  public async getLayer(): Promise<number> {
    const body = await this.requestJson('/rr_status?type=3', LayerResponseSchema);
    return body.currentLayer;
  }

  public async getCoordinates(): Promise<Coordinates> {
    const body = await this.requestJson('/rr_status?type=2', CoordinatesResponseSchema);
    const [X, Y, Z] = body.coords.xyz;
    return { X, Y, Z };
  }

  public async sendCommand(code: string): Promise<void> {
    await this.queueGCode(code);
  }

  public override async waitForMotion(): Promise<void> {
    await this.readBufferSpace();
    await this.sendCommand(GCODE.WAIT_FOR_MOTION);

    const deadline = Date.now() + this.settleTimeoutMs;
    for (;;) {
      const letter = await this.getStatusLetter();
      if (!TRANSITIONAL_STATUS_LETTERS.has(letter)) {
        const space = await this.readBufferSpace();
        if (space === null || space >= this.idleBufferSpace) {
          return;
        }
      }
      if (Date.now() >= deadline) {
        throw printerError(
          `Printer did not settle within ${this.settleTimeoutMs}ms (status ${letter})`,
          ErrorCode.PRINTER_COMMAND_FAILED,
          { status: letter }
        );
      }
      await delay(this.settlePollMs);
    }
  }

  /**
   * Free space in the G-code buffer; an empty command queues nothing
   */
  private async readBufferSpace(): Promise<number | null> {
    return this.queueGCode('');
  }

  private async queueGCode(code: string): Promise<number | null> {
    const body = await this.requestJson(`/rr_gcode?gcode=${encodeURIComponent(code)}`, GCodeResponseSchema);
    if (body.buff === undefined) {
      return null;
    }
    this.idleBufferSpace = Math.max(this.idleBufferSpace, body.buff);
    return body.buff;
  }

  private async getStatusLetter(): Promise<string> {
    const body = await this.requestJson('/rr_status?type=1', StatusResponseSchema);
    return body.status;
  }
}
