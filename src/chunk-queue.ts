/**
 * Single-producer, single-consumer queue of inbound byte chunks.
 *
 * The transport pushes chunks as they arrive; exactly one consumer pulls
 * them through `for await`. Chunks are delivered one at a time, in arrival
 * order, so the consumer never handles two chunks concurrently.
 */
export interface ChunkQueue extends AsyncIterable<Uint8Array> {
  /** Enqueues a chunk. Ignored once the queue has ended or been aborted. */
  push(chunk: Uint8Array): void;
  /** Finishes the stream after the consumer drains what is queued. */
  end(): void;
  /** Drops undelivered chunks and finishes the stream immediately. */
  abort(): void;
}

type Waiter = (result: IteratorResult<Uint8Array>) => void;

export function createChunkQueue(): ChunkQueue {
  const pending: Uint8Array[] = [];
  let waiter: Waiter | null = null;
  let closed = false;
  let iterated = false;

  function settle(result: IteratorResult<Uint8Array>): void {
    const w = waiter;
    waiter = null;
    w?.(result);
  }

  function push(chunk: Uint8Array): void {
    if (closed || chunk.byteLength === 0) return;
    if (waiter) {
      settle({ value: chunk, done: false });
    } else {
      pending.push(chunk);
    }
  }

  function end(): void {
    if (closed) return;
    closed = true;
    if (pending.length === 0) {
      settle({ value: undefined, done: true });
    }
  }

  function abort(): void {
    pending.length = 0;
    closed = true;
    settle({ value: undefined, done: true });
  }

  function next(): Promise<IteratorResult<Uint8Array>> {
    const chunk = pending.shift();
    if (chunk) {
      return Promise.resolve({ value: chunk, done: false });
    }
    if (closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (waiter) {
      return Promise.reject(new Error('Chunk queue supports a single reader'));
    }
    return new Promise((resolve) => {
      waiter = resolve;
    });
  }

  return {
    push,
    end,
    abort,
    [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
      if (iterated) {
        throw new Error('Inbound stream cannot be restarted');
      }
      iterated = true;
      return {
        next,
        return(): Promise<IteratorResult<Uint8Array>> {
          abort();
          return Promise.resolve({ value: undefined, done: true });
        },
      };
    },
  };
}
