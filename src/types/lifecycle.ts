/**
 * @fileoverview State owned by the single control loop: lifecycle phase, trigger memory
 * and the frame counter.
 *
 * @module types/lifecycle
 */

import type { MachineStatus } from './printer';

/**
 * Why the run reached its terminal phase
 */
export type FinishReason = 'print-complete' | 'cancelled' | 'printer-error';

/**
 * Lifecycle phase. Transitions only move forward; finished is terminal.
 */
export type LifecyclePhase =
  | { readonly kind: 'awaiting-print' }
  | { readonly kind: 'printing'; readonly startedAt: Date }
  | { readonly kind: 'finished'; readonly reason: FinishReason; readonly finishedAt: Date };

export type LifecyclePhaseKind = LifecyclePhase['kind'];

/**
 * What made a frame worth capturing
 */
export type TriggerReason =
  | { readonly kind: 'layer'; readonly layer: number }
  | { readonly kind: 'interval'; readonly elapsedSeconds: number }
  | { readonly kind: 'pause-detected' };

/**
 * Memory carried between ticks by the trigger evaluator and pause coordinator
 */
export interface TriggerMemory {
  /** Last observed layer; null until the first reading */
  lastLayer: number | null;
  /** Wall-clock time of the last capture attempt in ms */
  lastPhotoAt: number;
  /** Whether the current pause episode has been acted upon */
  alreadyPaused: boolean;
  /** Whether the printer is held by a pause this program requested with M25 */
  selfPaused: boolean;
}

/**
 * Monotonic count of successful captures. The next capture goes into slot count + 1.
 */
export class FrameCounter {
  private count = 0;

  public get value(): number {
    return this.count;
  }

  public get nextSlot(): number {
    return this.count + 1;
  }

  public increment(): number {
    this.count += 1;
    return this.count;
  }
}

/**
 * Time source, replaceable in tests
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

/**
 * Read-only view of a running session
 */
export interface LifecycleSnapshot {
  readonly phase: LifecyclePhaseKind;
  readonly finishReason: FinishReason | null;
  readonly frameCount: number;
  readonly lastLayer: number | null;
  readonly lastStatus: MachineStatus | null;
  readonly startedAt: Date | null;
  readonly cancelRequested: boolean;
}

/**
 * Result of a completed run
 */
export interface RunOutcome {
  readonly reason: FinishReason;
  readonly frameCount: number;
  readonly videoPath: string | null;
  readonly error: Error | null;
}
