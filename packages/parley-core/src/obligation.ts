// The obligation to reply to one request.

import type { OneshotSender } from "@parley/sync";
import { ChannelError } from "./errors.ts";

/** Result of discharging an obligation; on failure the reply comes back. */
export type Discharge<R> = { ok: true } | { ok: false; reply: R };

type ObligationState = "pending" | "responded" | "ignored";

// An obligation collected while still pending counts as ignored.
const unanswered = new FinalizationRegistry<{ close(): void }>((slot) => {
  slot.close();
});

/**
 * A reply that is still owed to a waiting requester.
 *
 * Only the requester side creates these; the responder receives them inside a
 * {@link ReceivedRequest}. Exactly one of `respond` or `ignore` settles it:
 *
 * - `respond(reply)` delivers the reply. If the requester has already gone
 *   away, the reply is handed back in `{ ok: false, reply }`.
 * - `ignore()` drops it; the requester's `send` rejects with `SendError`
 *   kind `ignored`.
 *
 * Responding twice throws `ChannelError` kind `alreadyDischarged`.
 */
export class ReplyObligation<R> {
  private state: ObligationState = "pending";

  constructor(private slot: OneshotSender<R>) {
    unanswered.register(this, slot, this);
  }

  respond(reply: R): Discharge<R> {
    if (this.state !== "pending") {
      throw ChannelError.alreadyDischarged();
    }
    this.state = "responded";
    unanswered.unregister(this);

    const sent = this.slot.send(reply);
    return sent.ok ? { ok: true } : { ok: false, reply: sent.value };
  }

  /** Same as {@link respond}. */
  discharge(reply: R): Discharge<R> {
    return this.respond(reply);
  }

  /** Drop without replying. No-op once settled. */
  ignore(): void {
    if (this.state !== "pending") return;
    this.state = "ignored";
    unanswered.unregister(this);
    this.slot.close();
  }

  /** Whether a reply is still owed. */
  isPending(): boolean {
    return this.state === "pending";
  }

  /** Whether the requester has stopped waiting. */
  isCanceled(): boolean {
    return this.slot.isClosed();
  }
}
