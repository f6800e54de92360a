import { ConfigSchema, type NotifyConfig } from "./schema.js";
import { saveConfig, getBaseUrl, CONFIG_FILE } from "./store.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProgrammaticSetupOptions {
  /** API key for the notification service. */
  apiKey: string;

  /** Service URL override. Falls back to NOTIFY_BASE_URL or the default URL. */
  baseUrl?: string;

  /** App slug applied to requests that name none. */
  defaultAppSlug?: string;

  /** Source applied to requests that name none. */
  defaultSource?: string;

  /** Request timeout in ms. */
  timeoutMs?: number;

  /** Keep failed sends on disk for retry. Defaults to true. */
  offlineQueueEnabled?: boolean;

  /** Queue directory. Defaults to the per-user app data folder. */
  offlineQueueDirectory?: string;

  /** Queue capacity. Defaults to 500. */
  offlineQueueMaxSize?: number;

  /** User to subscribe to when listening. */
  userId?: string;

  /** Reconnect attempts before the live connection gives up. Defaults to 5. */
  maxReconnectAttempts?: number;

  /** Config file to write. Defaults to ~/.notify/config.json. */
  file?: string;
}

export interface ProgrammaticSetupResult {
  file: string;
  config: NotifyConfig;
}

// ---------------------------------------------------------------------------
// Programmatic Setup
// ---------------------------------------------------------------------------

/**
 * Validate the options against the config schema and write them. Throws a
 * ZodError when a value is invalid; nothing is written in that case.
 */
export async function setupProgrammatic(
  options: ProgrammaticSetupOptions,
): Promise<ProgrammaticSetupResult> {
  const config = ConfigSchema.parse({
    version: 1,
    apiKey: options.apiKey,
    baseUrl: options.baseUrl ?? getBaseUrl(),
    defaultAppSlug: options.defaultAppSlug,
    defaultSource: options.defaultSource,
    timeoutMs: options.timeoutMs,
    offlineQueue: {
      enabled: options.offlineQueueEnabled,
      directory: options.offlineQueueDirectory,
      maxSize: options.offlineQueueMaxSize,
    },
    realtime: {
      userId: options.userId,
      maxReconnectAttempts: options.maxReconnectAttempts,
    },
  });

  const file = options.file ?? CONFIG_FILE;
  await saveConfig(config, file);
  return { file, config };
}
