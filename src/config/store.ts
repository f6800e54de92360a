import { readFile, writeFile, mkdir, chmod } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { ConfigSchema, type NotifyConfig } from "./schema.js";

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export const CONFIG_DIR = join(homedir(), ".notify");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

// ---------------------------------------------------------------------------
// Base URL
// ---------------------------------------------------------------------------

export const DEFAULT_BASE_URL = "https://notify.example.com";

export function getBaseUrl(): string {
  return process.env.NOTIFY_BASE_URL ?? DEFAULT_BASE_URL;
}

// ---------------------------------------------------------------------------
// Config I/O
// ---------------------------------------------------------------------------

/**
 * Persist CLI config to ~/.notify/config.json with 0600 perms.
 */
export async function saveConfig(config: NotifyConfig, file = CONFIG_FILE): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, JSON.stringify(config, null, 2), "utf-8");
  await chmod(file, 0o600);
}

/**
 * Load and validate stored config. Returns null if missing or invalid.
 * NOTIFY_API_KEY and NOTIFY_BASE_URL override the stored values.
 */
export async function loadConfig(file = CONFIG_FILE): Promise<NotifyConfig | null> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(file, "utf-8"));
  } catch {
    return null;
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) return null;

  return {
    ...result.data,
    apiKey: process.env.NOTIFY_API_KEY ?? result.data.apiKey,
    baseUrl: process.env.NOTIFY_BASE_URL ?? result.data.baseUrl,
  };
}
