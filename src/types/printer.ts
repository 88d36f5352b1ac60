/**
 * @fileoverview Printer-facing types consumed by the time-lapse core
 *
 * The core never talks HTTP itself; it depends on PrinterStatusPort, which the Duet
 * backends implement for RepRapFirmware 2 (rr_* API) and 3 (DSF /machine API).
 *
 * @module types/printer
 */

/**
 * Machine state as seen by the trigger logic
 */
export type MachineStatus = 'idle' | 'processing' | 'paused' | 'other';

/**
 * Tool head position in millimetres
 */
export interface Coordinates {
  readonly X: number;
  readonly Y: number;
  readonly Z: number;
}

/**
 * RepRapFirmware generation behind the HTTP API
 */
export type FirmwareGeneration = 2 | 3;

/**
 * G-codes the core issues
 */
export const GCODE = {
  PAUSE: 'M25',
  RESUME: 'M24',
  /** Blocks until all queued moves have finished */
  WAIT_FOR_MOTION: 'M400'
} as const;

/**
 * Build the head reposition move for a pause
 */
export function buildMoveCommand(x: number, y: number): string {
  return `G1 X${x.toFixed(2)} Y${y.toFixed(2)}`;
}

/**
 * Status and control capability of the printer.
 * Every call may reject with an AppError carrying a printer error code.
 */
export interface PrinterStatusPort {
  getStatus(): Promise<MachineStatus>;
  getLayer(): Promise<number>;
  getCoordinates(): Promise<Coordinates>;
  sendCommand(code: string): Promise<void>;
  /** Issue M400 and return once the printer has drained its motion queue */
  waitForMotion(): Promise<void>;
}
