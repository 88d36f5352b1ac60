/**
 * @fileoverview Sequences a capture around an optional self-initiated pause.
 *
 * Forced capture order: M25, M400, [G1 X Y, M400], capture, and M24 at the end of the
 * tick through resumeIfPaused(). No photo is taken before the M400 that follows M25
 * returns. Printer failures propagate unchanged; the lifecycle treats them as fatal.
 *
 * A failed capture leaves the frame counter untouched, so the next capture reuses the
 * slot and the sequence on disk never has gaps.
 */

import type { HeadPosition } from '../types/config';
import type { CapturePort } from '../types/capture';
import type { Clock, FrameCounter, TriggerMemory, TriggerReason } from '../types/lifecycle';
import type { MachineStatus, PrinterStatusPort } from '../types/printer';
import { GCODE, buildMoveCommand } from '../types/printer';
import { logInfo } from '../utils/logging';

const PAUSE_LOG_NAMESPACE = 'PauseCoordinator';

/**
 * State and collaborators owned by the control loop, shared with the trigger evaluator
 */
export interface CaptureSession {
  readonly printer: PrinterStatusPort;
  readonly camera: CapturePort;
  readonly frames: FrameCounter;
  readonly memory: TriggerMemory;
  readonly clock: Clock;
}

export interface PauseCoordinatorOptions {
  /** Pause the printer around every triggered capture */
  readonly forcePause: boolean;
  /** Where to park the head while paused; null leaves it in place */
  readonly moveHead: HeadPosition | null;
  /** Called after each successful capture with the frame number */
  readonly onFrameCaptured?: (frame: number, reason: TriggerReason) => void;
}

export class PauseCoordinator {
  constructor(
    private readonly session: CaptureSession,
    private readonly options: PauseCoordinatorOptions
  ) {}

  /**
   * Capture one frame for a layer or interval trigger, pausing first when configured.
   * A printer that is already paused by its own job is captured as it stands and left
   * paused.
   *
   * @param status - status read at the top of the current tick
   * @returns whether the frame was captured
   */
  public async captureWithOptionalForcedPause(reason: TriggerReason, status: MachineStatus): Promise<boolean> {
    const { printer, memory } = this.session;

    if (this.options.forcePause && !memory.selfPaused) {
      if (status === 'paused') {
        logInfo(PAUSE_LOG_NAMESPACE, 'Printer is already paused by the job, capturing without M25');
      } else {
        logInfo(PAUSE_LOG_NAMESPACE, 'Requesting pause via M25');
        await printer.sendCommand(GCODE.PAUSE);
        await printer.waitForMotion();
        memory.selfPaused = true;
        await this.moveHeadIfConfigured();
      }
    }

    return this.captureFrame(reason);
  }

  /**
   * Park the head at the configured position and wait for the move to finish
   */
  public async moveHeadIfConfigured(): Promise<void> {
    const target = this.options.moveHead;
    if (!target) {
      return;
    }

    logInfo(PAUSE_LOG_NAMESPACE, `Moving print head to X${target.x.toFixed(2)} Y${target.y.toFixed(2)}`);
    await this.session.printer.sendCommand(buildMoveCommand(target.x, target.y));
    await this.session.printer.waitForMotion();
  }

  /**
   * Capture exactly once into the next slot. Updates the counter on success and the
   * last photo time on every attempt.
   */
  public async captureFrame(reason: TriggerReason): Promise<boolean> {
    const { camera, frames, memory, clock } = this.session;
    const slot = frames.nextSlot;

    logInfo(PAUSE_LOG_NAMESPACE, await this.describeCapture(slot, reason));

    const captured = await camera.capture(slot);
    memory.lastPhotoAt = clock.now();

    if (captured) {
      frames.increment();
      this.options.onFrameCaptured?.(slot, reason);
    }
    return captured;
  }

  /**
   * Resume a pause this program requested. Pauses embedded in the print job are
   * resumed by the pause-detected trigger, or left to the operator.
   */
  public async resumeIfPaused(): Promise<void> {
    if (!this.session.memory.selfPaused) {
      return;
    }

    logInfo(PAUSE_LOG_NAMESPACE, 'Requesting un pause via M24');
    await this.session.printer.sendCommand(GCODE.RESUME);
    this.session.memory.selfPaused = false;
  }

  private async describeCapture(slot: number, reason: TriggerReason): Promise<string> {
    switch (reason.kind) {
      case 'layer': {
        const { X, Y, Z } = await this.session.printer.getCoordinates();
        return `Capturing frame ${slot} at X${X.toFixed(2)} Y${Y.toFixed(2)} Z${Z.toFixed(2)} Layer ${reason.layer}`;
      }
      case 'interval':
        return `Capturing frame ${slot} after ${reason.elapsedSeconds.toFixed(2)} seconds elapsed`;
      case 'pause-detected':
        return `Pause detected, capturing frame ${slot}`;
    }
  }
}
