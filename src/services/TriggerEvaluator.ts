/**
 * @fileoverview Per-tick trigger evaluation.
 *
 * Layer, interval and pause-detected conditions are evaluated independently; every
 * branch that fires captures its own frame, so one tick can produce several frames.
 * The status passed in is the one read at the top of the tick.
 */

import type { TriggerMode } from '../types/config';
import type { MachineStatus } from '../types/printer';
import { GCODE } from '../types/printer';
import type { CaptureSession, PauseCoordinator } from './PauseCoordinator';
import { logInfo } from '../utils/logging';

const TRIGGER_LOG_NAMESPACE = 'TriggerEvaluator';

export interface TriggerEvaluatorOptions {
  readonly detect: TriggerMode;
  /** Interval trigger period; 0 disables it */
  readonly seconds: number;
}

export class TriggerEvaluator {
  constructor(
    private readonly session: CaptureSession,
    private readonly coordinator: PauseCoordinator,
    private readonly options: TriggerEvaluatorOptions
  ) {}

  /**
   * Run all trigger branches for one tick
   */
  public async evaluate(status: MachineStatus): Promise<void> {
    // Taken before any branch updates lastPhotoAt
    const { memory, clock } = this.session;
    const elapsedSeconds = (clock.now() - memory.lastPhotoAt) / 1000;

    if (this.options.detect === 'layer') {
      await this.evaluateLayer(status);
    }

    if (this.options.seconds > 0 && elapsedSeconds >= this.options.seconds) {
      await this.coordinator.captureWithOptionalForcedPause({ kind: 'interval', elapsedSeconds }, status);
    }

    if (this.options.detect === 'pause') {
      await this.evaluatePauseDetected(status);
    }

    await this.coordinator.resumeIfPaused();

    // Re-arm once the job's own pause has cleared
    if (memory.alreadyPaused && status !== 'paused') {
      memory.alreadyPaused = false;
    }
  }

  private async evaluateLayer(status: MachineStatus): Promise<void> {
    const { printer, memory } = this.session;
    const layer = await printer.getLayer();

    if (layer !== memory.lastLayer) {
      await this.coordinator.captureWithOptionalForcedPause({ kind: 'layer', layer }, status);
    }
    memory.lastLayer = layer;
  }

  private async evaluatePauseDetected(status: MachineStatus): Promise<void> {
    const { printer, memory } = this.session;
    if (status !== 'paused' || memory.alreadyPaused) {
      return;
    }

    memory.alreadyPaused = true;
    await this.coordinator.moveHeadIfConfigured();
    await this.coordinator.captureFrame({ kind: 'pause-detected' });

    logInfo(TRIGGER_LOG_NAMESPACE, 'Requesting un pause via M24');
    await printer.sendCommand(GCODE.RESUME);
  }
}
