import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventBus } from '../../src/core/EventBus';

interface TestEvents {
  'ping': { n: number };
  'pong': { label: string };
}

describe('EventBus', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers payloads to subscribers of that event only', () => {
    const bus = new EventBus<TestEvents>();
    const pings: number[] = [];
    const pongs: string[] = [];
    bus.on('ping', ({ n }) => pings.push(n));
    bus.on('pong', ({ label }) => pongs.push(label));

    bus.emit('ping', { n: 1 });
    bus.emit('ping', { n: 2 });

    expect(pings).toEqual([1, 2]);
    expect(pongs).toEqual([]);
  });

  it('unsubscribe function and off both stop delivery', () => {
    const bus = new EventBus<TestEvents>();
    const a = vi.fn();
    const b = vi.fn();
    const unsubscribe = bus.on('ping', a);
    bus.on('ping', b);

    unsubscribe();
    bus.off('ping', b);
    bus.emit('ping', { n: 1 });

    expect(a).not.toHaveBeenCalled();
    expect(b).not.toHaveBeenCalled();
  });

  it('logs a throwing handler and keeps calling the rest', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const bus = new EventBus<TestEvents>();
    const after = vi.fn();
    bus.on('ping', () => {
      throw new Error('boom');
    });
    bus.on('ping', after);

    bus.emit('ping', { n: 3 });

    expect(after).toHaveBeenCalledWith({ n: 3 });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe("Error in event handler for 'ping':");
  });

  it('emitting an event with no subscribers is a no-op', () => {
    const bus = new EventBus<TestEvents>();
    expect(() => bus.emit('pong', { label: 'x' })).not.toThrow();
  });
});
