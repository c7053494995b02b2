// Requester handle - submits requests and awaits their replies.

import {
  oneshot,
  SyncError,
  type OneshotReceiver,
  type QueueSender,
  type QueueSendResult,
} from "@parley/sync";
import { ChannelError, SendError } from "./errors.ts";
import {
  Extensions,
  RejectionError,
  type OutgoingRequest,
  type RequesterMiddleware,
  type SendContext,
  type SendOutcome,
} from "./middleware.ts";
import { ReplyObligation } from "./obligation.ts";
import { ReceivedRequest } from "./received.ts";

export interface SendOptions {
  /**
   * Stop waiting, either for queue capacity or for the reply.
   * `send` then rejects with the signal's reason.
   */
  signal?: AbortSignal;
}

/**
 * The requesting end of a channel.
 *
 * Every `send` resolves exactly once: with the reply, or by rejecting with
 * `SendError` kind `closed` (nobody listening, request handed back) or kind
 * `ignored` (delivered, never answered).
 */
export class Requester<Q, R> {
  constructor(
    private outgoing: QueueSender<ReceivedRequest<Q, R>>,
    private readonly cloneable: boolean,
    private readonly middlewares: ReadonlyArray<RequesterMiddleware<Q, R>> = [],
  ) {}

  /**
   * Send a request and wait for its reply.
   *
   * Suspends while the channel is at capacity.
   *
   * @throws SendError when the responder is gone or the request is ignored
   * @throws RejectionError when middleware rejects the request
   */
  async send(request: Q, options: SendOptions = {}): Promise<R> {
    if (this.middlewares.length === 0) {
      return this.dispatch(request, options);
    }

    const ctx: SendContext = { extensions: new Extensions() };
    const outgoing: OutgoingRequest<Q> = { request };

    for (const mw of this.middlewares) {
      if (!mw.pre) continue;
      const rejection = await mw.pre(ctx, outgoing);
      if (rejection) {
        const error = RejectionError.from(rejection);
        await this.runPostHooks(ctx, outgoing, { ok: false, error });
        throw error;
      }
    }

    let outcome: SendOutcome<R>;
    try {
      outcome = { ok: true, value: await this.dispatch(outgoing.request, options) };
    } catch (error) {
      outcome = { ok: false, error };
    }

    await this.runPostHooks(ctx, outgoing, outcome);

    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  private async dispatch(request: Q, { signal }: SendOptions): Promise<R> {
    signal?.throwIfAborted();

    const reply = await this.enqueue(request, signal);

    if (signal?.aborted) {
      reply.close();
      throw signal.reason;
    }

    const onAbort = () => reply.close();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      return await reply.recv();
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      if (error instanceof SyncError && error.kind === "canceled") {
        throw SendError.ignored<Q>();
      }
      throw error;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  // Once enqueued, the obligation belongs to the responder: nothing that waits
  // for the reply may keep it reachable.
  private async enqueue(request: Q, signal: AbortSignal | undefined): Promise<OneshotReceiver<R>> {
    const [slot, reply] = oneshot<R>();
    const received = new ReceivedRequest(request, new ReplyObligation(slot));

    let sent: QueueSendResult<ReceivedRequest<Q, R>>;
    try {
      sent = await this.outgoing.send(received, signal);
    } catch (error) {
      received.ignore();
      throw error;
    }
    if (!sent.ok) {
      sent.value.ignore();
      throw SendError.closed(sent.value.request);
    }
    return reply;
  }

  // Post hooks run in reverse order (onion model). Every hook runs; the first
  // hook error is rethrown afterwards.
  private async runPostHooks(
    ctx: SendContext,
    outgoing: OutgoingRequest<Q>,
    outcome: SendOutcome<R>,
  ): Promise<void> {
    let failure: { error: unknown } | undefined;
    for (const mw of [...this.middlewares].reverse()) {
      try {
        await mw.post?.(ctx, outgoing, outcome);
      } catch (error) {
        failure ??= { error };
      }
    }
    if (failure) {
      throw failure.error;
    }
  }

  /**
   * Another requester on the same channel.
   *
   * @throws ChannelError unless the channel was created with `cloneable: true`
   */
  clone(): Requester<Q, R> {
    if (!this.cloneable) {
      throw ChannelError.notCloneable();
    }
    return new Requester(this.outgoing.clone(), this.cloneable, this.middlewares);
  }

  /**
   * A requester that runs `middleware` around every send.
   *
   * It shares this requester's handle: closing either closes both.
   */
  with(middleware: RequesterMiddleware<Q, R>): Requester<Q, R> {
    return new Requester(this.outgoing, this.cloneable, [...this.middlewares, middleware]);
  }

  /**
   * Release this handle. The responder sees end-of-stream once every
   * requester is closed and the queue is drained.
   */
  close(): void {
    this.outgoing.close();
  }

  /** Whether the responder has gone away. */
  isClosed(): boolean {
    return this.outgoing.isClosed();
  }
}
