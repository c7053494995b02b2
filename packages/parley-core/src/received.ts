// A request as seen by the responder side.

import type { ReplyObligation } from "./obligation.ts";

/**
 * Result of {@link ReceivedRequest.respond}. Both paths hand the request back;
 * the failure path also returns the reply nobody will observe.
 */
export type RespondResult<Q, R> =
  | { ok: true; request: Q }
  | { ok: false; request: Q; reply: R };

/**
 * A request paired with the obligation to answer it.
 *
 * `request` is the value the requester sent and may be read or modified
 * freely. Answer with `respond`, or give up with `ignore`.
 *
 * @example
 * ```typescript
 * const received = await responder.recv();
 * if (received) {
 *   received.respond(received.request.length);
 * }
 * ```
 */
export class ReceivedRequest<Q, R> {
  constructor(
    public request: Q,
    public readonly obligation: ReplyObligation<R>,
  ) {}

  respond(reply: R): RespondResult<Q, R> {
    const outcome = this.obligation.respond(reply);
    if (outcome.ok) {
      return { ok: true, request: this.request };
    }
    return { ok: false, request: this.request, reply: outcome.reply };
  }

  ignore(): void {
    this.obligation.ignore();
  }
}
