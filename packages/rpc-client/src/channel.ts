// Unbounded async channel used as the transport's outbound queue.

/**
 * Multi-producer single-consumer async channel.
 *
 * Values are received in the order they were sent. After `close()` the
 * consumer drains what is buffered and then sees the end of iteration.
 */
export interface Channel<T> extends AsyncIterable<T> {
  /** Returns false if the channel is closed */
  send(value: T): boolean;
  close(): void;
  isClosed(): boolean;
  /** Number of buffered values not yet received */
  size(): number;
}

interface ChannelState<T> {
  // Boxed so an empty buffer is distinguishable from a buffered undefined
  buffer: Array<{ value: T }>;
  closed: boolean;
  waiters: Array<(result: IteratorResult<T, undefined>) => void>;
}

export function createChannel<T>(): Channel<T> {
  const state: ChannelState<T> = {
    buffer: [],
    closed: false,
    waiters: [],
  };

  async function recv(): Promise<IteratorResult<T, undefined>> {
    const next = state.buffer.shift();
    if (next) {
      return { done: false, value: next.value };
    }
    if (state.closed) {
      return { done: true, value: undefined };
    }
    return new Promise<IteratorResult<T, undefined>>((resolve) => {
      state.waiters.push(resolve);
    });
  }

  return {
    send(value: T): boolean {
      if (state.closed) {
        return false;
      }

      // If there's a waiter, deliver directly
      const waiter = state.waiters.shift();
      if (waiter) {
        waiter({ done: false, value });
        return true;
      }

      state.buffer.push({ value });
      return true;
    },

    close(): void {
      if (state.closed) return;
      state.closed = true;
      // Only a consumer with an empty buffer can be waiting
      for (const waiter of state.waiters) {
        waiter({ done: true, value: undefined });
      }
      state.waiters.length = 0;
    },

    isClosed(): boolean {
      return state.closed;
    },

    size(): number {
      return state.buffer.length;
    },

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
      return { next: recv };
    },
  };
}
