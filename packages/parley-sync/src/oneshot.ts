// Single-use slot carrying one value from a sender to a receiver.

import { SyncError } from "./errors.ts";

/** Result of a one-shot send; on failure the value is handed back. */
export type SlotSendResult<T> = { ok: true } | { ok: false; value: T };

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: SyncError) => void;
}

interface SlotState<T> {
  stored: { value: T } | null;
  /** Sender has sent or closed. */
  senderDone: boolean;
  receiverClosed: boolean;
  receiverTaken: boolean;
  waiter: Waiter<T> | null;
}

/**
 * Sending half of a one-shot slot.
 *
 * `send` may be called once. If the receiver is already closed, the value
 * comes back in the result rather than being dropped.
 */
export class OneshotSender<T> {
  constructor(private state: SlotState<T>) {}

  send(value: T): SlotSendResult<T> {
    const state = this.state;
    if (state.senderDone) {
      throw SyncError.consumed("OneshotSender");
    }
    state.senderDone = true;

    if (state.receiverClosed) {
      return { ok: false, value };
    }

    const waiter = state.waiter;
    if (waiter) {
      state.waiter = null;
      waiter.resolve(value);
    } else {
      state.stored = { value };
    }
    return { ok: true };
  }

  /** Drop without sending. The receiver observes `canceled`. */
  close(): void {
    const state = this.state;
    if (state.senderDone) return;
    state.senderDone = true;

    const waiter = state.waiter;
    if (waiter) {
      state.waiter = null;
      waiter.reject(SyncError.canceled());
    }
  }

  /** Whether the receiver has gone away. */
  isClosed(): boolean {
    return this.state.receiverClosed;
  }
}

/** Receiving half of a one-shot slot. */
export class OneshotReceiver<T> {
  constructor(private state: SlotState<T>) {}

  /**
   * Wait for the value.
   *
   * Rejects with `canceled` if the sender closed without sending.
   */
  async recv(): Promise<T> {
    const state = this.state;
    if (state.receiverClosed) {
      throw SyncError.released("OneshotReceiver");
    }
    if (state.receiverTaken) {
      throw SyncError.consumed("OneshotReceiver");
    }
    state.receiverTaken = true;

    if (state.stored !== null) {
      const { value } = state.stored;
      state.stored = null;
      return value;
    }
    if (state.senderDone) {
      throw SyncError.canceled();
    }

    return new Promise<T>((resolve, reject) => {
      state.waiter = { resolve, reject };
    });
  }

  /** Drop the receiver. A pending `recv` rejects with `released`. */
  close(): void {
    const state = this.state;
    if (state.receiverClosed) return;
    state.receiverClosed = true;
    state.stored = null;

    const waiter = state.waiter;
    if (waiter) {
      state.waiter = null;
      waiter.reject(SyncError.released("OneshotReceiver"));
    }
  }
}

/**
 * Create a one-shot slot.
 *
 * ```typescript
 * const [tx, rx] = oneshot<number>();
 * tx.send(5);
 * await rx.recv(); // 5
 * ```
 */
export function oneshot<T>(): [OneshotSender<T>, OneshotReceiver<T>] {
  const state: SlotState<T> = {
    stored: null,
    senderDone: false,
    receiverClosed: false,
    receiverTaken: false,
    waiter: null,
  };
  return [new OneshotSender(state), new OneshotReceiver(state)];
}
