import { describe, it, expect, vi } from 'vitest';
import { TypedEventEmitter } from '@/utils/event-emitter';

type TestEvents = {
  ping: { count: number };
  done: undefined;
};

describe('TypedEventEmitter', () => {
  it('should deliver emitted data to handlers', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const handler = vi.fn();

    emitter.on('ping', handler);
    emitter.emit('ping', { count: 3 });

    expect(handler).toHaveBeenCalledWith({ count: 3 });
  });

  it('should stop delivering after the returned unsubscribe runs', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const handler = vi.fn();

    const unsubscribe = emitter.on('ping', handler);
    unsubscribe();
    emitter.emit('ping', { count: 1 });

    expect(handler).not.toHaveBeenCalled();
    expect(emitter.listenerCount('ping')).toBe(0);
  });

  it('should call once handlers a single time', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const handler = vi.fn();

    emitter.once('done', handler);
    emitter.emit('done', undefined);
    emitter.emit('done', undefined);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should let a handler unsubscribe itself during emit', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const second = vi.fn();

    const unsubscribe = emitter.on('ping', () => unsubscribe());
    emitter.on('ping', second);
    emitter.emit('ping', { count: 1 });

    expect(second).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount('ping')).toBe(1);
  });

  it('should remove listeners per event or all at once', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    emitter.on('ping', () => {});
    emitter.on('done', () => {});

    emitter.removeAllListeners('ping');
    expect(emitter.listenerCount('ping')).toBe(0);
    expect(emitter.listenerCount('done')).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount('done')).toBe(0);
  });
});
