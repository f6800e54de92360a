export { NotifyClient, DEFAULTS } from "./notify-client.js";
export { EventBuilder } from "./event-builder.js";
export { OfflineQueue, OFFLINE_QUEUE_DEFAULTS } from "./queue/offline-queue.js";
export { QueueStore } from "./queue/queue-store.js";
export { getDefaultQueueDirectory } from "./queue/paths.js";
export { RealtimeClient, toHubUrl } from "./realtime/realtime-client.js";
export { computeBackoff, DEFAULT_RECONNECT_POLICY } from "./realtime/reconnect.js";
export { createConsoleLogger, silentLogger } from "./log.js";
export { NotifyEventRequestSchema, SeveritySchema, ServerMessageSchema } from "./schemas/index.js";
export type {
  EventResult,
  NotifyClientConfig,
  NotifyOptions,
  Severity,
  EventAction,
  NotifyEventRequest,
  NotifyEventInput,
} from "./types.js";
export type { OfflineQueueOptions, SendCapability } from "./queue/offline-queue.js";
export type { QueuedItem, QueueStoreOptions, PayloadSchema } from "./queue/queue-store.js";
export type {
  ConnectionState,
  RealtimeClientConfig,
  RealtimeEvents,
  RealtimeListener,
} from "./realtime/realtime-client.js";
export type { BackoffPolicy } from "./realtime/reconnect.js";
export type { RealtimeNotification, RealtimeAction, ServerMessage } from "./schemas/index.js";
export type { Logger } from "./log.js";
