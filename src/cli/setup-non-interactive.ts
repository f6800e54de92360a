import { setupProgrammatic, type ProgrammaticSetupOptions } from "../config/setup-programmatic.js";

// ---------------------------------------------------------------------------
// Non-Interactive Setup (reads from env vars)
// ---------------------------------------------------------------------------

/**
 * Write the CLI config without interactive prompts.
 *
 * Required env vars:
 *   NOTIFY_API_KEY               — API key
 *
 * Optional env vars:
 *   NOTIFY_BASE_URL              — Service URL (default: https://notify.example.com)
 *   NOTIFY_APP_SLUG              — Default app slug
 *   NOTIFY_SOURCE                — Default source
 *   NOTIFY_TIMEOUT_MS            — Request timeout
 *   NOTIFY_QUEUE_ENABLED         — "false" disables the offline queue
 *   NOTIFY_QUEUE_DIR             — Offline queue directory
 *   NOTIFY_QUEUE_MAX_SIZE        — Offline queue capacity (default: 500)
 *   NOTIFY_USER_ID               — User followed by `notify listen`
 *   NOTIFY_MAX_RECONNECT_ATTEMPTS — Live connection retries (default: 5)
 */
export async function runSetupNonInteractive(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const options = readSetupEnv(env);

  try {
    const result = await setupProgrammatic(options);
    console.log(`Notify CLI configured successfully.`);
    console.log(`  Config:  ${result.file}`);
    console.log(`  Server:  ${result.config.baseUrl}`);
    console.log(
      `  Queue:   ${result.config.offlineQueue.enabled ? `enabled (max ${result.config.offlineQueue.maxSize})` : "disabled"}`,
    );
  } catch (err) {
    console.error(`Setup failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

export function readSetupEnv(env: NodeJS.ProcessEnv): ProgrammaticSetupOptions {
  const apiKey = env.NOTIFY_API_KEY;
  if (!apiKey) {
    console.error("Missing required env var: NOTIFY_API_KEY");
    process.exit(1);
  }

  return {
    apiKey,
    baseUrl: env.NOTIFY_BASE_URL,
    defaultAppSlug: env.NOTIFY_APP_SLUG,
    defaultSource: env.NOTIFY_SOURCE,
    timeoutMs: toNumber(env.NOTIFY_TIMEOUT_MS),
    offlineQueueEnabled: env.NOTIFY_QUEUE_ENABLED === undefined ? undefined : env.NOTIFY_QUEUE_ENABLED !== "false",
    offlineQueueDirectory: env.NOTIFY_QUEUE_DIR,
    offlineQueueMaxSize: toNumber(env.NOTIFY_QUEUE_MAX_SIZE),
    userId: env.NOTIFY_USER_ID,
    maxReconnectAttempts: toNumber(env.NOTIFY_MAX_RECONNECT_ATTEMPTS),
  };
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined || value === "" ? undefined : Number(value);
}
