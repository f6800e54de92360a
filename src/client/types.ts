import type { Logger } from "./log.js";
import type { Severity } from "./schemas/events.js";

export type {
  Severity,
  EventAction,
  NotifyEventRequest,
  NotifyEventInput,
} from "./schemas/events.js";

// ---------------------------------------------------------------------------
// Client Types
// ---------------------------------------------------------------------------

/** Outcome of a notify() call. Failures are reported here, never thrown. */
export interface EventResult {
  success: boolean;
  eventId?: string;
  status?: string;
  error?: string;
  /** True when the request was put on the offline queue for a later retry. */
  queued: boolean;
}

/** Options for creating a NotifyClient. */
export interface NotifyClientConfig {
  /** API key sent as a Bearer token. Required. */
  apiKey: string;
  /** Service URL. Defaults to "https://notify.example.com". */
  baseUrl?: string;
  /** App slug used when a request names none. */
  defaultAppSlug?: string;
  /** Source used when a request names none. */
  defaultSource?: string;
  /** Per-request timeout. Defaults to 30s. */
  timeoutMs?: number;
  /** Queue failed sends on disk and retry them. Defaults to true. */
  enableOfflineQueue?: boolean;
  /** Directory for the queue file. Defaults to the per-user app data folder. */
  offlineQueueDirectory?: string;
  /** Maximum queued requests; the oldest are dropped first. Defaults to 500. */
  maxOfflineQueueSize?: number;
  /** Run timed drains of the offline queue. Defaults to true. */
  autoRetry?: boolean;
  /** Delay before the first timed drain. Defaults to 30s. */
  retryInitialDelayMs?: number;
  /** Delay between timed drains. Defaults to 60s. */
  retryIntervalMs?: number;
  logger?: Logger;
}

/** Optional fields for the short notify(eventType, title, options) form. */
export interface NotifyOptions {
  severity?: Severity;
  message?: string;
  metadata?: Record<string, unknown>;
}
