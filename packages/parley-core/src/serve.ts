// Servicing loop for the responder side.

import type { Responder } from "./responder.ts";

/** Computes the reply for one request. */
export type Handler<Q, R> = (request: Q) => R | Promise<R>;

export interface ServeOptions<Q, R> {
  /**
   * Called when the handler throws. The request is ignored either way; with
   * this set the loop carries on, without it the loop rejects with the error.
   */
  onError?: (error: unknown, request: Q) => void;

  /**
   * Called with replies whose requester stopped waiting.
   */
  onUndelivered?: (reply: R, request: Q) => void;
}

/**
 * Answer every request on `responder` with `handler`, one at a time and in
 * arrival order.
 *
 * Resolves once every requester is closed and the queue is drained.
 *
 * @example
 * ```typescript
 * const [requester, responder] = bounded<string, number>(8);
 * const serving = serve(responder, (text) => text.length);
 *
 * await requester.send("hello"); // 5
 * requester.close();
 * await serving;
 * ```
 */
export async function serve<Q, R>(
  responder: Responder<Q, R>,
  handler: Handler<Q, R>,
  options: ServeOptions<Q, R> = {},
): Promise<void> {
  for await (const received of responder) {
    let reply: R;
    try {
      reply = await handler(received.request);
    } catch (error) {
      received.ignore();
      if (!options.onError) {
        throw error;
      }
      options.onError(error, received.request);
      continue;
    }

    const result = received.respond(reply);
    if (!result.ok) {
      options.onUndelivered?.(result.reply, result.request);
    }
  }
}
