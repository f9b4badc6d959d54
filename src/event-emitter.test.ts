import { describe, expect, it, vi } from 'vitest';
import { createEventEmitter } from './event-emitter';

type TestEvents = {
  coin: number;
  status: string;
  session: { price: number; coinsRequired: number };
};

describe('createEventEmitter', () => {
  describe('on/emit', () => {
    it('emits events to subscribers', () => {
      const emitter = createEventEmitter<TestEvents>();
      const callback = vi.fn();

      emitter.on('status', callback);
      emitter.emit('status', 'connected');

      expect(callback).toHaveBeenCalledWith('connected');
    });

    it('keeps event types apart', () => {
      const emitter = createEventEmitter<TestEvents>();
      const coinCallback = vi.fn();
      const statusCallback = vi.fn();

      emitter.on('coin', coinCallback);
      emitter.on('status', statusCallback);
      emitter.emit('coin', 2);

      expect(coinCallback).toHaveBeenCalledWith(2);
      expect(statusCallback).not.toHaveBeenCalled();
    });

    it('delivers in subscription order', () => {
      const emitter = createEventEmitter<TestEvents>();
      const order: string[] = [];

      emitter.on('coin', () => order.push('first'));
      emitter.on('coin', () => order.push('second'));
      emitter.emit('coin', 1);

      expect(order).toEqual(['first', 'second']);
    });

    it('returns unsubscribe function', () => {
      const emitter = createEventEmitter<TestEvents>();
      const callback = vi.fn();

      const unsubscribe = emitter.on('coin', callback);
      emitter.emit('coin', 1);
      unsubscribe();
      emitter.emit('coin', 1);

      expect(callback).toHaveBeenCalledTimes(1);
    });

    it('passes object payloads through unchanged', () => {
      const emitter = createEventEmitter<TestEvents>();
      const callback = vi.fn();
      const payload = { price: 45, coinsRequired: 9 };

      emitter.on('session', callback);
      emitter.emit('session', payload);

      expect(callback).toHaveBeenCalledWith(payload);
    });

    it('does nothing for events with no listeners', () => {
      const emitter = createEventEmitter<TestEvents>();
      expect(() => emitter.emit('status', 'idle')).not.toThrow();
    });
  });

  describe('once', () => {
    it('fires callback only once', () => {
      const emitter = createEventEmitter<TestEvents>();
      const callback = vi.fn();

      emitter.once('status', callback);
      emitter.emit('status', 'first');
      emitter.emit('status', 'second');

      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith('first');
    });

    it('can be cancelled before it fires', () => {
      const emitter = createEventEmitter<TestEvents>();
      const callback = vi.fn();

      const unsubscribe = emitter.once('status', callback);
      unsubscribe();
      emitter.emit('status', 'connected');

      expect(callback).not.toHaveBeenCalled();
    });

    it('does not skip the listener after it', () => {
      const emitter = createEventEmitter<TestEvents>();
      const after = vi.fn();

      emitter.once('coin', () => {});
      emitter.on('coin', after);
      emitter.emit('coin', 1);

      expect(after).toHaveBeenCalledTimes(1);
    });
  });

  describe('off / removeAllListeners', () => {
    it('removes a specific callback', () => {
      const emitter = createEventEmitter<TestEvents>();
      const removed = vi.fn();
      const kept = vi.fn();

      emitter.on('status', removed);
      emitter.on('status', kept);
      emitter.off('status', removed);
      emitter.emit('status', 'connected');

      expect(removed).not.toHaveBeenCalled();
      expect(kept).toHaveBeenCalledWith('connected');
    });

    it('ignores callbacks that were never added', () => {
      const emitter = createEventEmitter<TestEvents>();
      expect(() => emitter.off('status', vi.fn())).not.toThrow();
    });

    it('removes all listeners of one event', () => {
      const emitter = createEventEmitter<TestEvents>();
      const statusCallback = vi.fn();
      const coinCallback = vi.fn();

      emitter.on('status', statusCallback);
      emitter.on('coin', coinCallback);
      emitter.removeAllListeners('status');
      emitter.emit('status', 'connected');
      emitter.emit('coin', 1);

      expect(statusCallback).not.toHaveBeenCalled();
      expect(coinCallback).toHaveBeenCalledWith(1);
    });

    it('removes every listener when no event is given', () => {
      const emitter = createEventEmitter<TestEvents>();
      emitter.on('status', vi.fn());
      emitter.on('coin', vi.fn());

      emitter.removeAllListeners();

      expect(emitter.listenerCount('status')).toBe(0);
      expect(emitter.listenerCount('coin')).toBe(0);
    });
  });

  describe('listenerCount', () => {
    it('tracks additions and removals', () => {
      const emitter = createEventEmitter<TestEvents>();
      const callback = vi.fn();

      expect(emitter.listenerCount('coin')).toBe(0);
      emitter.on('coin', callback);
      emitter.on('coin', () => {});
      expect(emitter.listenerCount('coin')).toBe(2);
      emitter.off('coin', callback);
      expect(emitter.listenerCount('coin')).toBe(1);
    });
  });

  describe('error handling', () => {
    it('keeps delivering after a listener throws', () => {
      const mockLogger = { error: vi.fn() };
      const emitter = createEventEmitter<TestEvents>({ logger: mockLogger });
      const failing = vi.fn(() => {
        throw new Error('Callback error');
      });
      const normal = vi.fn();

      emitter.on('coin', failing);
      emitter.on('coin', normal);

      expect(() => emitter.emit('coin', 1)).not.toThrow();
      expect(failing).toHaveBeenCalled();
      expect(normal).toHaveBeenCalledWith(1);
    });

    it('reports listener errors through the logger', async () => {
      const mockLogger = { error: vi.fn() };
      const emitter = createEventEmitter<TestEvents>({ logger: mockLogger });
      const error = new Error('Test error');

      emitter.on('coin', () => {
        throw error;
      });
      emitter.emit('coin', 1);

      expect(mockLogger.error).not.toHaveBeenCalled();
      await new Promise<void>((resolve) => queueMicrotask(resolve));

      expect(mockLogger.error).toHaveBeenCalledWith(
        '[EventEmitter] Listener threw an error:',
        error,
      );
    });
  });
});
