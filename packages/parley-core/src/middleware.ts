// Requester-side middleware types.
//
// Middleware wraps every send on a requester, enabling patterns like
// request rewriting, admission checks, tracing, and logging.

/**
 * Extensions provide type-safe, symbol-keyed storage for middleware state.
 *
 * Each middleware can define a unique symbol and store/retrieve typed data
 * without conflicts with other middleware.
 *
 * @example
 * ```typescript
 * const TRACE_KEY = Symbol("trace");
 * ctx.extensions.set(TRACE_KEY, { spanId: "abc" });
 * const trace = ctx.extensions.get<{ spanId: string }>(TRACE_KEY);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  /**
   * Store a value under a symbol key.
   */
  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  /**
   * Look up a value by symbol key.
   */
  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }

  /**
   * Whether a value is stored under the key.
   */
  has(key: symbol): boolean {
    return this.data.has(key);
  }

  /**
   * Remove the value stored under the key.
   */
  delete(key: symbol): boolean {
    return this.data.delete(key);
  }
}

/**
 * Context shared by the pre and post hooks of a single send.
 */
export interface SendContext {
  /**
   * Per-send storage for middleware state.
   */
  extensions: Extensions;
}

/**
 * An outgoing request as seen by middleware.
 *
 * `pre` hooks may replace `request`; the final value is what gets enqueued.
 */
export interface OutgoingRequest<Q> {
  request: Q;
}

/**
 * Outcome of a send, as seen by `post` hooks.
 */
export type SendOutcome<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Rejection codes for middleware rejections.
 */
export type RejectionCode =
  | "permission-denied"
  | "rate-limited"
  | "invalid-request"
  | "internal"
  | string;

/**
 * Rejection returned by middleware to stop a request before it is enqueued.
 */
export interface Rejection {
  code: RejectionCode;
  message: string;
}

/**
 * Error thrown by `send` when middleware rejects a request.
 */
export class RejectionError extends Error {
  public readonly code: RejectionCode;

  constructor(rejection: Rejection) {
    super(rejection.message);
    this.name = "RejectionError";
    this.code = rejection.code;
  }

  static from(rejection: Rejection): RejectionError {
    return new RejectionError(rejection);
  }
}

/**
 * Requester middleware.
 *
 * Hooks run in the order middleware was added on `pre`, and in reverse
 * order on `post` (onion model).
 *
 * @example
 * ```typescript
 * const trimming: RequesterMiddleware<string, number> = {
 *   pre(ctx, outgoing) {
 *     outgoing.request = outgoing.request.trim();
 *   },
 * };
 * const trimmed = requester.with(trimming);
 * ```
 */
export interface RequesterMiddleware<Q, R> {
  /**
   * Called before the request is enqueued.
   *
   * @returns void to continue, Rejection to abort
   */
  pre?(ctx: SendContext, outgoing: OutgoingRequest<Q>): Promise<Rejection | void> | Rejection | void;

  /**
   * Called once the send has settled, whichever way.
   */
  post?(ctx: SendContext, outgoing: OutgoingRequest<Q>, outcome: SendOutcome<R>): Promise<void> | void;
}
