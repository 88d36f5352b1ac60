/**
 * @fileoverview Tests for the typed EventEmitter
 */

import { describe, it, expect } from '@jest/globals';
import { EventEmitter } from './EventEmitter';

type TestEvents = {
  'frame': [slot: number];
  'done': [];
};

describe('EventEmitter', () => {
  it('should deliver arguments to every listener in order', () => {
    const emitter = new EventEmitter<TestEvents>();
    const received: string[] = [];
    emitter.on('frame', (slot) => received.push(`a${slot}`));
    emitter.on('frame', (slot) => received.push(`b${slot}`));

    expect(emitter.emit('frame', 3)).toBe(true);
    expect(received).toEqual(['a3', 'b3']);
  });

  it('should report events without listeners', () => {
    expect(new EventEmitter<TestEvents>().emit('done')).toBe(false);
  });

  it('should call once listeners a single time', () => {
    const emitter = new EventEmitter<TestEvents>();
    let calls = 0;
    emitter.once('done', () => {
      calls += 1;
    });

    emitter.emit('done');
    emitter.emit('done');

    expect(calls).toBe(1);
    expect(emitter.listenerCount('done')).toBe(0);
  });

  it('should keep notifying after a listener throws', () => {
    const emitter = new EventEmitter<TestEvents>();
    const received: number[] = [];
    emitter.on('frame', () => {
      throw new Error('listener failed');
    });
    emitter.on('frame', (slot) => received.push(slot));

    emitter.emit('frame', 9);

    expect(received).toEqual([9]);
  });

  it('should remove listeners', () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = (): void => undefined;
    emitter.on('done', listener);
    emitter.on('frame', () => undefined);

    emitter.off('done', listener);
    expect(emitter.listenerCount('done')).toBe(0);
    expect(emitter.listenerCount('frame')).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount('frame')).toBe(0);
  });
});
