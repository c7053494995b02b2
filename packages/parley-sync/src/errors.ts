// Error types for the queue and one-shot primitives.

/** What went wrong with a primitive operation. */
export type SyncErrorKind = "capacity" | "released" | "consumed" | "canceled";

/** Error raised by queue and one-shot handles. */
export class SyncError extends Error {
  constructor(
    public readonly kind: SyncErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "SyncError";
  }

  /** Queue capacity was not a positive integer. */
  static capacity(capacity: number): SyncError {
    return new SyncError("capacity", `capacity must be a positive integer, got ${capacity}`);
  }

  /** A handle was used after it was closed. */
  static released(handle: string): SyncError {
    return new SyncError("released", `${handle} used after close`);
  }

  /** A single-use operation was attempted twice. */
  static consumed(handle: string): SyncError {
    return new SyncError("consumed", `${handle} already consumed`);
  }

  /** The one-shot sender went away without sending. */
  static canceled(): SyncError {
    return new SyncError("canceled", "sender closed without sending");
  }
}
