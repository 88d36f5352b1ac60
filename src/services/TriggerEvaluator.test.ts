/**
 * @fileoverview Tests for TriggerEvaluator branches and their interaction
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { TriggerEvaluator, type TriggerEvaluatorOptions } from './TriggerEvaluator';
import { PauseCoordinator, type CaptureSession, type PauseCoordinatorOptions } from './PauseCoordinator';
import { FrameCounter } from '../types/lifecycle';
import type { MachineStatus } from '../types/printer';
import { FakeCamera, FakeClock, FakePrinter } from '../__tests__/fakes';

describe('TriggerEvaluator', () => {
  let journal: string[];
  let printer: FakePrinter;
  let camera: FakeCamera;
  let clock: FakeClock;
  let session: CaptureSession;

  beforeEach(() => {
    journal = [];
    printer = new FakePrinter(journal);
    camera = new FakeCamera(journal);
    clock = new FakeClock(0);
    session = {
      printer,
      camera,
      frames: new FrameCounter(),
      memory: { lastLayer: null, lastPhotoAt: 0, alreadyPaused: false, selfPaused: false },
      clock
    };
  });

  function evaluator(
    options: Partial<TriggerEvaluatorOptions>,
    pauseOptions: Partial<PauseCoordinatorOptions> = {}
  ): TriggerEvaluator {
    const coordinator = new PauseCoordinator(session, { forcePause: false, moveHead: null, ...pauseOptions });
    return new TriggerEvaluator(session, coordinator, { detect: 'none', seconds: 0, ...options });
  }

  async function runTicks(subject: TriggerEvaluator, statuses: MachineStatus[], tickMs = 770): Promise<void> {
    for (const status of statuses) {
      clock.advance(tickMs);
      await subject.evaluate(status);
    }
  }

  describe('layer trigger', () => {
    it('should capture once per distinct reading', async () => {
      printer.layers = [1, 1, 2, 2, 3];
      const subject = evaluator({ detect: 'layer' });

      await runTicks(subject, Array<MachineStatus>(5).fill('processing'));

      expect(camera.slots).toEqual([1, 2, 3]);
      expect(session.memory.lastLayer).toBe(3);
    });

    it('should capture when the layer goes down', async () => {
      printer.layers = [5, 4, 4, 5];
      const subject = evaluator({ detect: 'layer' });

      await runTicks(subject, Array<MachineStatus>(4).fill('processing'));

      expect(camera.slots).toEqual([1, 2, 3]);
    });

    it('should pause, capture and resume within the tick when forcing pauses', async () => {
      printer.layers = [1, 1];
      const subject = evaluator({ detect: 'layer' }, { forcePause: true, moveHead: { x: 0, y: 220 } });

      await runTicks(subject, ['processing', 'processing']);

      expect(journal).toEqual(['M25', 'M400', 'G1 X0.00 Y220.00', 'M400', 'capture:1', 'M24']);
      expect(session.memory.selfPaused).toBe(false);
    });
  });

  describe('interval trigger', () => {
    it('should capture once in 12 ticks with a 5 second interval', async () => {
      const subject = evaluator({ seconds: 5 });

      await runTicks(subject, Array<MachineStatus>(12).fill('processing'));

      expect(camera.slots).toEqual([1]);
      expect(session.memory.lastPhotoAt).toBe(7 * 770);
    });

    it('should keep captures at least the interval apart', async () => {
      const captureTimes: number[] = [];
      const subject = evaluator({ seconds: 2 }, { onFrameCaptured: () => captureTimes.push(clock.now()) });

      await runTicks(subject, Array<MachineStatus>(20).fill('processing'));

      expect(captureTimes).toEqual([2310, 4620, 6930, 9240, 11550, 13860]);
    });

    it('should capture at exactly the interval', async () => {
      const subject = evaluator({ seconds: 1 });

      await runTicks(subject, ['processing'], 1000);

      expect(camera.slots).toEqual([1]);
    });

    it('should combine with the layer trigger in the same tick', async () => {
      printer.layers = [7];
      const subject = evaluator({ detect: 'layer', seconds: 5 });

      await runTicks(subject, ['processing'], 6000);

      expect(camera.slots).toEqual([1, 2]);
    });
  });

  describe('forced pause', () => {
    it('should leave a pause started by the job to the job', async () => {
      const subject = evaluator({ seconds: 5 }, { forcePause: true });

      await runTicks(subject, ['paused'], 6000);

      expect(journal).toEqual(['capture:1']);
      expect(session.memory.selfPaused).toBe(false);
    });

    it('should pause again once the job has resumed', async () => {
      const subject = evaluator({ seconds: 5 }, { forcePause: true });

      await runTicks(subject, ['paused', 'processing'], 6000);

      expect(journal).toEqual(['capture:1', 'M25', 'M400', 'capture:2', 'M24']);
    });
  });

  describe('pause-detected trigger', () => {
    it('should capture and resume once per pause episode', async () => {
      const subject = evaluator({ detect: 'pause' });

      await runTicks(subject, ['processing', 'paused', 'paused', 'paused', 'processing']);

      expect(journal).toEqual(['capture:1', 'M24']);
      expect(session.memory.alreadyPaused).toBe(false);
    });

    it('should re-arm for the next episode', async () => {
      const subject = evaluator({ detect: 'pause' });

      await runTicks(subject, ['paused', 'processing', 'paused', 'other', 'idle']);

      expect(journal).toEqual(['capture:1', 'M24', 'capture:2', 'M24']);
    });

    it('should park the head before capturing', async () => {
      const subject = evaluator({ detect: 'pause' }, { moveHead: { x: 5, y: 5 } });

      await runTicks(subject, ['paused']);

      expect(journal).toEqual(['G1 X5.00 Y5.00', 'M400', 'capture:1', 'M24']);
    });

    it('should not re-query the status', async () => {
      const subject = evaluator({ detect: 'pause' });

      await runTicks(subject, ['paused', 'idle']);

      expect(printer.statusReads).toBe(0);
    });
  });
});
