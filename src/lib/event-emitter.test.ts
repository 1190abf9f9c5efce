import { describe, expect, it, vi } from 'vitest';
import { EventEmitter } from './event-emitter';

type TestEvents = {
  tick: { count: number };
  done: undefined;
};

class TestEmitter extends EventEmitter<TestEvents> {
  tick(count: number): void {
    this.dispatchEvent('tick', { count });
  }

  done(): void {
    this.dispatchEvent('done', undefined);
  }
}

describe('EventEmitter', () => {
  it('should deliver payloads wrapped in detail', () => {
    const emitter = new TestEmitter();
    const listener = vi.fn();
    emitter.addEventListener('tick', listener);

    emitter.tick(3);

    expect(listener).toHaveBeenCalledWith({ detail: { count: 3 } });
  });

  it('should unsubscribe through the returned function', () => {
    const emitter = new TestEmitter();
    const listener = vi.fn();
    const unsubscribe = emitter.addEventListener('tick', listener);

    unsubscribe();
    emitter.tick(1);

    expect(listener).not.toHaveBeenCalled();
    expect(emitter.hasListeners('tick')).toBe(false);
  });

  it('should call once listeners a single time', () => {
    const emitter = new TestEmitter();
    const listener = vi.fn();
    emitter.once('done', listener);

    emitter.done();
    emitter.done();

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should keep dispatching when a listener throws', () => {
    const emitter = new TestEmitter();
    const after = vi.fn();
    emitter.addEventListener('tick', () => {
      throw new Error('listener failed');
    });
    emitter.addEventListener('tick', after);

    emitter.tick(2);

    expect(after).toHaveBeenCalledTimes(1);
  });

  it('should let a listener unsubscribe while being called', () => {
    const emitter = new TestEmitter();
    const second = vi.fn();
    const unsubscribe = emitter.addEventListener('tick', () => unsubscribe());
    emitter.addEventListener('tick', second);

    emitter.tick(1);
    emitter.tick(2);

    expect(second).toHaveBeenCalledTimes(2);
    expect(emitter.listenerCount('tick')).toBe(1);
  });

  it('should remove every listener', () => {
    const emitter = new TestEmitter();
    emitter.addEventListener('tick', vi.fn());
    emitter.addEventListener('done', vi.fn());

    emitter.removeAllListeners();

    expect(emitter.listenerCount('tick')).toBe(0);
    expect(emitter.listenerCount('done')).toBe(0);
  });
});
