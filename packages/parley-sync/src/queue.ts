// Async FIFO queue with bounded or unbounded capacity.

import { SyncError } from "./errors.ts";

/** Result of a queue send; on failure the value is handed back. */
export type QueueSendResult<T> = { ok: true } | { ok: false; value: T };

export interface QueueOptions<T> {
  /**
   * Maximum number of buffered values. Senders suspend once it is reached.
   * Omit for an unbounded queue.
   */
  capacity?: number;

  /**
   * Called for each value still buffered when the receiver closes.
   */
  onDiscard?: (value: T) => void;
}

/** A sender suspended on a full queue. */
interface Parked<T> {
  value: T;
  settle: (result: QueueSendResult<T>) => void;
}

interface QueueState<T> {
  capacity: number;
  buffer: Array<{ value: T }>;
  parked: Parked<T>[];
  waiters: Array<(value: T | null) => void>;
  /** Live sender handles. */
  senders: number;
  receiverClosed: boolean;
  onDiscard: ((value: T) => void) | undefined;
}

/**
 * Sending half of a queue. Clone it to share the queue between producers;
 * the receiver sees end-of-stream once every handle is closed.
 */
export class QueueSender<T> {
  private released = false;

  constructor(private state: QueueState<T>) {}

  /**
   * Send a value.
   *
   * Hands the value to a waiting receiver, buffers it, or suspends until a
   * `recv` frees space. Resolves `{ ok: false, value }` if the receiver is
   * closed before the value gets in. Aborting `signal` while suspended takes
   * the value back out and rejects with the signal's reason.
   */
  async send(value: T, signal?: AbortSignal): Promise<QueueSendResult<T>> {
    if (this.released) {
      throw SyncError.released("QueueSender");
    }
    signal?.throwIfAborted();

    const state = this.state;
    if (state.receiverClosed) {
      return { ok: false, value };
    }

    const waiter = state.waiters.shift();
    if (waiter) {
      waiter(value);
      return { ok: true };
    }

    if (state.buffer.length < state.capacity) {
      state.buffer.push({ value });
      return { ok: true };
    }

    return new Promise<QueueSendResult<T>>((resolve, reject) => {
      const entry: Parked<T> = { value, settle: resolve };

      if (signal) {
        const abortSignal = signal;
        const onAbort = () => {
          const index = state.parked.indexOf(entry);
          if (index === -1) return;
          state.parked.splice(index, 1);
          reject(abortSignal.reason);
        };
        entry.settle = (result) => {
          abortSignal.removeEventListener("abort", onAbort);
          resolve(result);
        };
        abortSignal.addEventListener("abort", onAbort, { once: true });
      }

      state.parked.push(entry);
    });
  }

  /** Another handle on the same queue. */
  clone(): QueueSender<T> {
    if (this.released) {
      throw SyncError.released("QueueSender");
    }
    this.state.senders++;
    return new QueueSender(this.state);
  }

  /** Release this handle. */
  close(): void {
    if (this.released) return;
    this.released = true;

    const state = this.state;
    state.senders--;
    if (state.senders > 0) return;

    // Waiters only exist while the buffer is empty.
    for (const waiter of state.waiters) {
      waiter(null);
    }
    state.waiters.length = 0;
  }

  /** Whether the receiver has gone away. */
  isClosed(): boolean {
    return this.state.receiverClosed;
  }
}

/**
 * Receiving half of a queue.
 *
 * Usually owned by one consumer loop. Concurrent `recv` calls are served in
 * the order they were made.
 */
export class QueueReceiver<T> {
  constructor(private state: QueueState<T>) {}

  /** Number of buffered values. */
  get length(): number {
    return this.state.buffer.length;
  }

  /** Configured capacity (`Infinity` when unbounded). */
  get capacity(): number {
    return this.state.capacity;
  }

  /**
   * Receive the next value.
   *
   * Returns null once every sender handle is closed and the buffer is empty.
   */
  async recv(): Promise<T | null> {
    const state = this.state;
    if (state.receiverClosed) {
      throw SyncError.released("QueueReceiver");
    }

    const head = state.buffer.shift();
    if (head) {
      const parked = state.parked.shift();
      if (parked) {
        state.buffer.push({ value: parked.value });
        parked.settle({ ok: true });
      }
      return head.value;
    }

    if (state.senders === 0) {
      return null;
    }

    return new Promise<T | null>((resolve) => {
      state.waiters.push(resolve);
    });
  }

  /**
   * Drop the receive side.
   *
   * Pending `recv` calls resolve null, suspended senders get their values
   * back, and buffered values go to `onDiscard`.
   */
  close(): void {
    const state = this.state;
    if (state.receiverClosed) return;
    state.receiverClosed = true;

    for (const waiter of state.waiters) {
      waiter(null);
    }
    state.waiters.length = 0;

    const parked = state.parked.splice(0);
    for (const entry of parked) {
      entry.settle({ ok: false, value: entry.value });
    }

    const discarded = state.buffer.splice(0);
    for (const entry of discarded) {
      state.onDiscard?.(entry.value);
    }
  }

  /** Whether every sender handle has been closed. */
  isClosed(): boolean {
    return this.state.senders === 0;
  }

  /**
   * Iterate over received values until end-of-stream, or until the receiver
   * is closed.
   */
  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (!this.state.receiverClosed) {
      const value = await this.recv();
      if (value === null) {
        return;
      }
      yield value;
    }
  }
}

/**
 * Create a sender/receiver pair over a new queue.
 *
 * ```typescript
 * const [tx, rx] = createQueue<string>({ capacity: 1 });
 * await tx.send("a");
 * const pending = tx.send("b"); // suspends until "a" is received
 * await rx.recv(); // "a"
 * ```
 */
export function createQueue<T>(options: QueueOptions<T> = {}): [QueueSender<T>, QueueReceiver<T>] {
  const capacity = options.capacity ?? Infinity;
  if (capacity !== Infinity && (!Number.isInteger(capacity) || capacity < 1)) {
    throw SyncError.capacity(capacity);
  }

  const state: QueueState<T> = {
    capacity,
    buffer: [],
    parked: [],
    waiters: [],
    senders: 1,
    receiverClosed: false,
    onDiscard: options.onDiscard,
  };
  return [new QueueSender(state), new QueueReceiver(state)];
}
