import { getLogger, type Logger } from './logger';

export type EventMap = { [key: string]: unknown };

export type Listener<T> = (data: T) => void;

export interface TypedEventEmitter<T extends EventMap> {
  on<K extends keyof T>(event: K, callback: Listener<T[K]>): () => void;
  once<K extends keyof T>(event: K, callback: Listener<T[K]>): () => void;
  off<K extends keyof T>(event: K, callback: Listener<T[K]>): void;
  removeAllListeners<K extends keyof T>(event?: K): void;
  emit<K extends keyof T>(event: K, data: T[K]): void;
  listenerCount<K extends keyof T>(event: K): number;
}

export interface EventEmitterOptions {
  /** Logger for listener failures. Defaults to the global logger. */
  logger?: Pick<Logger, 'error'>;
}

/**
 * Creates a typed, synchronous event emitter.
 * A listener that throws does not stop delivery to the others; the error
 * is reported on the next microtask.
 */
export function createEventEmitter<T extends EventMap>(
  options: EventEmitterOptions = {},
): TypedEventEmitter<T> {
  const listeners = new Map<keyof T, Set<Listener<unknown>>>();

  function reportListenerError(err: unknown): void {
    const logger = options.logger ?? getLogger();
    queueMicrotask(() => {
      logger.error('[EventEmitter] Listener threw an error:', err);
    });
  }

  function on<K extends keyof T>(
    event: K,
    callback: Listener<T[K]>,
  ): () => void {
    let set = listeners.get(event);
    if (!set) {
      set = new Set();
      listeners.set(event, set);
    }
    set.add(callback as Listener<unknown>);
    return () => off(event, callback);
  }

  function once<K extends keyof T>(
    event: K,
    callback: Listener<T[K]>,
  ): () => void {
    const wrapper: Listener<T[K]> = (data) => {
      off(event, wrapper);
      callback(data);
    };
    return on(event, wrapper);
  }

  function off<K extends keyof T>(event: K, callback: Listener<T[K]>): void {
    listeners.get(event)?.delete(callback as Listener<unknown>);
  }

  function removeAllListeners<K extends keyof T>(event?: K): void {
    if (event !== undefined) {
      listeners.delete(event);
    } else {
      listeners.clear();
    }
  }

  function emit<K extends keyof T>(event: K, data: T[K]): void {
    const set = listeners.get(event);
    if (!set) return;
    // Snapshot so once() wrappers can unsubscribe mid-iteration
    for (const cb of [...set]) {
      try {
        cb(data);
      } catch (err) {
        reportListenerError(err);
      }
    }
  }

  function listenerCount<K extends keyof T>(event: K): number {
    return listeners.get(event)?.size ?? 0;
  }

  return {
    on,
    once,
    off,
    removeAllListeners,
    emit,
    listenerCount,
  };
}
