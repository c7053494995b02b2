// Responder handle - the receive side of a request/response channel.

import type { QueueReceiver } from "@parley/sync";
import type { ReceivedRequest } from "./received.ts";

/**
 * The responding end of a channel: a queue of {@link ReceivedRequest}s.
 *
 * `recv()` yields requests in the order they were enqueued and returns null
 * once every requester is closed and the queue is drained. It can also be
 * iterated with `for await`.
 *
 * `close()` shuts the channel: requests already enqueued are ignored and
 * requesters still waiting for capacity get `SendError` kind `closed`.
 */
export type Responder<Q, R> = QueueReceiver<ReceivedRequest<Q, R>>;
