/**
 * @fileoverview Top-level control loop for one time-lapse session.
 *
 * Phases move forward only: awaiting-print -> printing -> finished. Each tick sleeps
 * for TICK_INTERVAL_MS, reads the printer status once and dispatches on the phase.
 * Every terminal path (print complete, cancellation, fatal printer error) runs the
 * video assembler exactly once over the frames captured so far.
 *
 * Cancellation only sets a flag and interrupts the sleep. A tick that is already
 * running, including a pause -> move -> capture -> resume sequence, always completes
 * before the flag is observed.
 *
 * Events:
 * - 'phase-changed': (phase) after every transition
 * - 'frame-captured': (frame, reason) after every successful capture
 * - 'finished': (outcome) after assembly
 */

import type { RunConfig } from '../types/config';
import { TICK_INTERVAL_MS } from '../types/config';
import type { CapturePort, VideoAssembler } from '../types/capture';
import type {
  Clock,
  FinishReason,
  LifecyclePhase,
  LifecycleSnapshot,
  RunOutcome,
  TriggerMemory,
  TriggerReason
} from '../types/lifecycle';
import { FrameCounter, systemClock } from '../types/lifecycle';
import type { MachineStatus, PrinterStatusPort } from '../types/printer';
import { EventEmitter } from '../utils/EventEmitter';
import { AppError, ErrorCode, toAppError } from '../utils/error.utils';
import { logError, logInfo, logWarning } from '../utils/logging';
import { delay, formatDuration } from '../utils/time.utils';
import { PauseCoordinator, type CaptureSession } from './PauseCoordinator';
import { TriggerEvaluator } from './TriggerEvaluator';
import { buildOutputPath } from './VideoAssemblyService';

const LIFECYCLE_LOG_NAMESPACE = 'Lifecycle';

/**
 * Interruptible sleep; resolves false when the signal aborted it
 */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<boolean>;

export interface LifecycleDependencies {
  readonly printer: PrinterStatusPort;
  readonly camera: CapturePort;
  readonly assembler: VideoAssembler;
  readonly clock?: Clock;
  readonly sleep?: Sleep;
}

export type LifecycleOptions = Pick<
  RunConfig,
  'detect' | 'seconds' | 'pause' | 'moveHead' | 'dontWait' | 'baseDir' | 'scratchDir' | 'extraTime' | 'videoArgs'
>;

export type LifecycleEventMap = {
  'phase-changed': [phase: LifecyclePhase];
  'frame-captured': [frame: number, reason: TriggerReason];
  'finished': [outcome: RunOutcome];
};

export class LifecycleStateMachine extends EventEmitter<LifecycleEventMap> {
  private readonly printer: PrinterStatusPort;
  private readonly assembler: VideoAssembler;
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  private readonly frames = new FrameCounter();
  private readonly memory: TriggerMemory = {
    lastLayer: null,
    lastPhotoAt: 0,
    alreadyPaused: false,
    selfPaused: false
  };
  private readonly evaluator: TriggerEvaluator;
  private readonly cancellation = new AbortController();

  private phase: LifecyclePhase = { kind: 'awaiting-print' };
  private lastStatus: MachineStatus | null = null;
  private printStartedAt: Date | null = null;
  private running = false;

  constructor(
    dependencies: LifecycleDependencies,
    private readonly options: LifecycleOptions
  ) {
    super();
    this.printer = dependencies.printer;
    this.assembler = dependencies.assembler;
    this.clock = dependencies.clock ?? systemClock;
    this.sleep = dependencies.sleep ?? delay;

    const session: CaptureSession = {
      printer: dependencies.printer,
      camera: dependencies.camera,
      frames: this.frames,
      memory: this.memory,
      clock: this.clock
    };
    const coordinator = new PauseCoordinator(session, {
      forcePause: options.pause,
      moveHead: options.moveHead,
      onFrameCaptured: (frame, reason) => this.emit('frame-captured', frame, reason)
    });
    this.evaluator = new TriggerEvaluator(session, coordinator, {
      detect: options.detect,
      seconds: options.seconds
    });
  }

  /**
   * Run the session until the print completes, cancellation or a fatal printer error,
   * then assemble the video. Never rejects for printer or encoder failures; they are
   * reported in the outcome.
   */
  public async run(): Promise<RunOutcome> {
    if (this.running || this.phase.kind === 'finished') {
      throw new AppError('Session has already been started', ErrorCode.UNKNOWN);
    }
    this.running = true;
    this.memory.lastPhotoAt = this.clock.now();

    const { reason, error } = await this.loop();
    return this.finish(reason, error);
  }

  /**
   * Ask the loop to stop and assemble what it has. Returns false once finished.
   */
  public requestCancel(): boolean {
    if (this.phase.kind === 'finished') {
      return false;
    }
    if (!this.cancellation.signal.aborted) {
      logInfo(LIFECYCLE_LOG_NAMESPACE, 'Stop requested, finishing the current step before creating the video');
      this.cancellation.abort();
    }
    return true;
  }

  public getSnapshot(): LifecycleSnapshot {
    return {
      phase: this.phase.kind,
      finishReason: this.phase.kind === 'finished' ? this.phase.reason : null,
      frameCount: this.frames.value,
      lastLayer: this.memory.lastLayer,
      lastStatus: this.lastStatus,
      startedAt: this.printStartedAt,
      cancelRequested: this.cancellation.signal.aborted
    };
  }

  private async loop(): Promise<{ reason: FinishReason; error: AppError | null }> {
    for (;;) {
      await this.sleep(TICK_INTERVAL_MS, this.cancellation.signal);

      if (this.cancellation.signal.aborted) {
        return { reason: 'cancelled', error: null };
      }

      try {
        if (await this.tick()) {
          return { reason: 'print-complete', error: null };
        }
      } catch (caught) {
        const error = toAppError(caught, ErrorCode.PRINTER_COMMAND_FAILED);
        logError(LIFECYCLE_LOG_NAMESPACE, `Stopping capture after printer error: ${error.message}`);
        return { reason: 'printer-error', error };
      }
    }
  }

  /**
   * One status read and phase dispatch
   *
   * @returns true when the print has completed
   */
  private async tick(): Promise<boolean> {
    const status = await this.printer.getStatus();
    this.lastStatus = status;

    switch (this.phase.kind) {
      case 'awaiting-print':
        if (this.options.dontWait) {
          await this.evaluator.evaluate(status);
        }
        if (status === 'processing') {
          logInfo(LIFECYCLE_LOG_NAMESPACE, 'Print start sensed');
          logInfo(LIFECYCLE_LOG_NAMESPACE, 'End of print will be sensed, and frames will be converted into video');
          this.printStartedAt = new Date(this.clock.now());
          this.transition({ kind: 'printing', startedAt: this.printStartedAt });
        }
        return false;

      case 'printing':
        await this.evaluator.evaluate(status);
        return status === 'idle';

      case 'finished':
        return true;
    }
  }

  private async finish(reason: FinishReason, loopError: AppError | null): Promise<RunOutcome> {
    const finishedAt = new Date(this.clock.now());
    this.transition({ kind: 'finished', reason, finishedAt });

    switch (reason) {
      case 'print-complete':
        logInfo(LIFECYCLE_LOG_NAMESPACE, 'Print end sensed');
        break;
      case 'cancelled':
        logInfo(LIFECYCLE_LOG_NAMESPACE, 'Stopped by request');
        break;
      case 'printer-error':
        logWarning(LIFECYCLE_LOG_NAMESPACE, 'Creating a video from the frames captured so far');
        break;
    }
    if (this.printStartedAt) {
      const seconds = (finishedAt.getTime() - this.printStartedAt.getTime()) / 1000;
      logInfo(LIFECYCLE_LOG_NAMESPACE, `Printed for ${formatDuration(seconds)}, ${this.frames.value} frames captured`);
    }

    let videoPath: string | null = null;
    let error: AppError | null = loopError;
    try {
      const result = await this.assembler.assemble({
        frameDirectory: this.options.scratchDir,
        frameCount: this.frames.value,
        outputPath: buildOutputPath(this.options.baseDir, finishedAt),
        encoderArgs: this.options.videoArgs,
        extraTime: this.options.extraTime
      });
      videoPath = result.videoPath;
    } catch (caught) {
      const assemblyError = toAppError(caught, ErrorCode.ASSEMBLY_FAILED);
      logError(LIFECYCLE_LOG_NAMESPACE, `Video creation failed: ${assemblyError.message}`);
      error = error ?? assemblyError;
    }

    const outcome: RunOutcome = { reason, frameCount: this.frames.value, videoPath, error };
    this.emit('finished', outcome);
    return outcome;
  }

  private transition(next: LifecyclePhase): void {
    logInfo(LIFECYCLE_LOG_NAMESPACE, `${this.phase.kind} -> ${next.kind}`);
    this.phase = next;
    this.emit('phase-changed', next);
  }
}
