/**
 * @fileoverview Tests for PauseCoordinator command sequencing
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { PauseCoordinator, type CaptureSession, type PauseCoordinatorOptions } from './PauseCoordinator';
import { FrameCounter, type TriggerMemory } from '../types/lifecycle';
import { FakeCamera, FakeClock, FakePrinter } from '../__tests__/fakes';
import { AppError, ErrorCode } from '../utils/error.utils';

describe('PauseCoordinator', () => {
  let journal: string[];
  let printer: FakePrinter;
  let camera: FakeCamera;
  let clock: FakeClock;
  let memory: TriggerMemory;
  let session: CaptureSession;

  beforeEach(() => {
    journal = [];
    printer = new FakePrinter(journal);
    camera = new FakeCamera(journal);
    clock = new FakeClock(1000);
    memory = { lastLayer: null, lastPhotoAt: 0, alreadyPaused: false, selfPaused: false };
    session = { printer, camera, frames: new FrameCounter(), memory, clock };
  });

  function coordinator(options: Partial<PauseCoordinatorOptions> = {}): PauseCoordinator {
    return new PauseCoordinator(session, { forcePause: false, moveHead: null, ...options });
  }

  it('should capture directly without force pause', async () => {
    const captured = await coordinator().captureWithOptionalForcedPause({ kind: 'layer', layer: 1 }, 'processing');

    expect(captured).toBe(true);
    expect(journal).toEqual(['capture:1']);
    expect(session.frames.value).toBe(1);
    expect(memory.lastPhotoAt).toBe(1000);
  });

  it('should pause and sync before capturing, and resume afterwards', async () => {
    const subject = coordinator({ forcePause: true });

    await subject.captureWithOptionalForcedPause({ kind: 'interval', elapsedSeconds: 30 }, 'processing');
    expect(memory.selfPaused).toBe(true);
    await subject.resumeIfPaused();

    expect(journal).toEqual(['M25', 'M400', 'capture:1', 'M24']);
    expect(memory.selfPaused).toBe(false);
  });

  it('should park the head between pause and capture', async () => {
    const subject = coordinator({ forcePause: true, moveHead: { x: 10, y: 200.5 } });

    await subject.captureWithOptionalForcedPause({ kind: 'layer', layer: 4 }, 'processing');
    await subject.resumeIfPaused();

    expect(journal).toEqual(['M25', 'M400', 'G1 X10.00 Y200.50', 'M400', 'capture:1', 'M24']);
  });

  it('should not pause twice within one episode', async () => {
    const subject = coordinator({ forcePause: true });

    await subject.captureWithOptionalForcedPause({ kind: 'layer', layer: 2 }, 'processing');
    await subject.captureWithOptionalForcedPause({ kind: 'interval', elapsedSeconds: 10 }, 'paused');
    await subject.resumeIfPaused();

    expect(journal).toEqual(['M25', 'M400', 'capture:1', 'capture:2', 'M24']);
  });

  it('should not resume a pause it did not initiate', async () => {
    memory.alreadyPaused = true;

    await coordinator({ forcePause: true }).resumeIfPaused();

    expect(journal).toEqual([]);
    expect(memory.alreadyPaused).toBe(true);
  });

  it('should capture a pause started by the job without pausing or resuming it', async () => {
    const subject = coordinator({ forcePause: true, moveHead: { x: 10, y: 10 } });

    const captured = await subject.captureWithOptionalForcedPause({ kind: 'interval', elapsedSeconds: 6 }, 'paused');
    await subject.resumeIfPaused();

    expect(captured).toBe(true);
    expect(journal).toEqual(['capture:1']);
    expect(memory.selfPaused).toBe(false);
  });

  it('should reuse the slot after a failed capture', async () => {
    camera.results = [true, false, true];
    const subject = coordinator();

    await subject.captureFrame({ kind: 'pause-detected' });
    clock.advance(500);
    const second = await subject.captureFrame({ kind: 'pause-detected' });
    await subject.captureFrame({ kind: 'pause-detected' });

    expect(second).toBe(false);
    expect(memory.lastPhotoAt).toBe(1500);
    expect(camera.slots).toEqual([1, 2, 2]);
    expect(session.frames.value).toBe(2);
  });

  it('should report each captured frame', async () => {
    const frames: number[] = [];
    const subject = coordinator({ onFrameCaptured: (frame) => frames.push(frame) });
    camera.results = [true, false, true];

    await subject.captureFrame({ kind: 'layer', layer: 1 });
    await subject.captureFrame({ kind: 'layer', layer: 2 });
    await subject.captureFrame({ kind: 'layer', layer: 3 });

    expect(frames).toEqual([1, 2]);
  });

  it('should propagate a failed pause without capturing', async () => {
    printer.failingCommand = 'M25';

    const error = await coordinator({ forcePause: true })
      .captureWithOptionalForcedPause({ kind: 'layer', layer: 1 }, 'processing')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AppError);
    expect(error instanceof AppError && error.code).toBe(ErrorCode.PRINTER_COMMAND_FAILED);
    expect(journal).toEqual(['M25']);
  });
});
