// Simple async channel.

/**
 * An unbounded multi-producer single-consumer async queue.
 *
 * `recv` resolves to null once the channel is closed and drained.
 */
export interface Channel<T> {
  send(value: T): boolean;
  recv(): Promise<T | null>;
  close(): void;
  isClosed(): boolean;
}

interface ChannelState<T> {
  buffer: T[];
  closed: boolean;
  waiters: Array<(value: T | null) => void>;
}

export function createChannel<T>(): Channel<T> {
  const state: ChannelState<T> = {
    buffer: [],
    closed: false,
    waiters: [],
  };

  return {
    send(value: T): boolean {
      if (state.closed) {
        return false;
      }

      // If there's a waiter, deliver directly
      const waiter = state.waiters.shift();
      if (waiter) {
        waiter(value);
        return true;
      }

      state.buffer.push(value);
      return true;
    },

    async recv(): Promise<T | null> {
      if (state.buffer.length > 0) {
        return state.buffer.shift() ?? null;
      }

      // Channel closed and empty
      if (state.closed) {
        return null;
      }

      return new Promise((resolve) => {
        state.waiters.push(resolve);
      });
    },

    close(): void {
      if (state.closed) return;
      state.closed = true;
      // Wake all waiters with null
      for (const waiter of state.waiters) {
        waiter(null);
      }
      state.waiters.length = 0;
    },

    isClosed(): boolean {
      return state.closed;
    },
  };
}
