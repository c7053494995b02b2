// Requester/Responder pair creation.

import { createQueue, SyncError } from "@parley/sync";
import type { ReceivedRequest } from "./received.ts";
import { Requester } from "./requester.ts";
import type { Responder } from "./responder.ts";

export interface ChannelOptions {
  /**
   * Allow `Requester.clone()` so several callers can share the channel.
   * Defaults to false.
   */
  cloneable?: boolean;
}

/**
 * Create a bounded Requester/Responder pair.
 *
 * Once `capacity` requests are waiting in the queue, further sends suspend
 * until the responder receives one.
 *
 * Usage:
 * ```typescript
 * const [requester, responder] = bounded<string, number>(1);
 *
 * const reply = requester.send("hello");
 *
 * const received = await responder.recv();
 * if (received) {
 *   received.respond(received.request.length);
 * }
 *
 * await reply; // 5
 * ```
 *
 * @throws SyncError if capacity is not a positive integer
 */
export function bounded<Q, R>(
  capacity: number,
  options: ChannelOptions = {},
): [Requester<Q, R>, Responder<Q, R>] {
  if (!Number.isFinite(capacity)) {
    throw SyncError.capacity(capacity);
  }
  return pair(capacity, options);
}

/**
 * Create an unbounded Requester/Responder pair. Sends never wait for
 * capacity, only for the reply.
 */
export function unbounded<Q, R>(options: ChannelOptions = {}): [Requester<Q, R>, Responder<Q, R>] {
  return pair(undefined, options);
}

function pair<Q, R>(
  capacity: number | undefined,
  options: ChannelOptions,
): [Requester<Q, R>, Responder<Q, R>] {
  const [sender, receiver] = createQueue<ReceivedRequest<Q, R>>({
    capacity,
    onDiscard: (received) => received.ignore(),
  });
  return [new Requester(sender, options.cloneable ?? false), receiver];
}
