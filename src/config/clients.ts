import type { Logger } from "../client/log.js";
import type { RealtimeClientConfig } from "../client/realtime/realtime-client.js";
import type { NotifyClientConfig } from "../client/types.js";
import type { NotifyConfig } from "./schema.js";

// ---------------------------------------------------------------------------
// Stored config -> SDK config
// ---------------------------------------------------------------------------

export function toNotifyClientConfig(
  config: NotifyConfig,
  overrides: Partial<NotifyClientConfig> = {},
): NotifyClientConfig {
  return {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    defaultAppSlug: config.defaultAppSlug,
    defaultSource: config.defaultSource,
    timeoutMs: config.timeoutMs,
    enableOfflineQueue: config.offlineQueue.enabled,
    offlineQueueDirectory: config.offlineQueue.directory,
    maxOfflineQueueSize: config.offlineQueue.maxSize,
    ...overrides,
  };
}

export function toRealtimeClientConfig(config: NotifyConfig, logger?: Logger): RealtimeClientConfig {
  return {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    userId: config.realtime.userId,
    maxReconnectAttempts: config.realtime.maxReconnectAttempts,
    logger,
  };
}
