// Error taxonomy for request/response channels.

/** Why a `send` failed. */
export type SendErrorKind = "closed" | "ignored";

/**
 * Failure of `Requester.send`.
 *
 * - `closed`: the responder side is gone; the request was never enqueued and
 *   comes back in `request`.
 * - `ignored`: the request was delivered (or buffered) but its reply
 *   obligation was dropped without a reply.
 *
 * Callers usually treat these differently: `closed` means nobody is listening,
 * `ignored` means somebody received the request and never answered.
 */
export class SendError<Q> extends Error {
  private constructor(
    public readonly kind: SendErrorKind,
    public readonly request: Q | undefined,
    message: string,
  ) {
    super(message);
    this.name = "SendError";
  }

  static closed<Q>(request: Q): SendError<Q> {
    return new SendError<Q>("closed", request, "the Responder was closed before the request was sent");
  }

  static ignored<Q>(): SendError<Q> {
    return new SendError<Q>("ignored", undefined, "the request was dropped without a reply");
  }

  /** Check if the responder was gone; narrows `request` to the original value. */
  isClosed(): this is SendError<Q> & { kind: "closed"; request: Q } {
    return this.kind === "closed";
  }

  /** Check if the request went unanswered */
  isIgnored(): boolean {
    return this.kind === "ignored";
  }
}

/** Misuse of a channel handle. */
export class ChannelError extends Error {
  constructor(
    public kind: "alreadyDischarged" | "notCloneable",
    message: string,
  ) {
    super(message);
    this.name = "ChannelError";
  }

  static alreadyDischarged(): ChannelError {
    return new ChannelError("alreadyDischarged", "reply obligation already discharged");
  }

  static notCloneable(): ChannelError {
    return new ChannelError(
      "notCloneable",
      "this Requester was created without `cloneable: true`",
    );
  }
}
