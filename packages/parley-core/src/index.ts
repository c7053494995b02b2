// @parley/core - request/response channels with single-use reply obligations

// Pair constructors
export { bounded, unbounded, type ChannelOptions } from "./pair.ts";

// Handles. Obligations and received requests are only created by the
// channel itself, so their classes are exported as types.
export type { Requester, SendOptions } from "./requester.ts";
export type { Responder } from "./responder.ts";
export type { ReceivedRequest, RespondResult } from "./received.ts";
export type { ReplyObligation, Discharge } from "./obligation.ts";

// Errors
export { SendError, ChannelError, type SendErrorKind } from "./errors.ts";
export { SyncError, type SyncErrorKind } from "@parley/sync";

// Servicing loop
export { serve, type Handler, type ServeOptions } from "./serve.ts";

// Middleware and logging
export {
  Extensions,
  RejectionError,
  type Rejection,
  type RejectionCode,
  type RequesterMiddleware,
  type SendContext,
  type OutgoingRequest,
  type SendOutcome,
} from "./middleware.ts";
export { loggingMiddleware, type LoggingOptions } from "./logging.ts";
