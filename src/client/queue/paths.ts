import { homedir } from "node:os";
import { join } from "node:path";

export const PRODUCT_DIR = "NotifyClient";
export const QUEUE_DIR = "Queue";
export const QUEUE_FILE = "notify_queue.json";

/**
 * Per-user application data root for the current platform.
 */
export function getAppDataRoot(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (platform === "win32") {
    return env.LOCALAPPDATA ?? join(homedir(), "AppData", "Local");
  }
  if (platform === "darwin") {
    return join(homedir(), "Library", "Application Support");
  }
  return env.XDG_DATA_HOME ?? join(homedir(), ".local", "share");
}

export function getDefaultQueueDirectory(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return join(getAppDataRoot(platform, env), PRODUCT_DIR, QUEUE_DIR);
}
