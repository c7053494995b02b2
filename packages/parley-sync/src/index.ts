// @parley/sync - queue and one-shot primitives

export { SyncError, type SyncErrorKind } from "./errors.ts";
export { oneshot, OneshotSender, OneshotReceiver, type SlotSendResult } from "./oneshot.ts";
export {
  createQueue,
  QueueSender,
  QueueReceiver,
  type QueueOptions,
  type QueueSendResult,
} from "./queue.ts";
