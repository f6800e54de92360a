import { loadConfig } from "../config/store.js";
import type { NotifyConfig } from "../config/schema.js";

/**
 * Load stored config or exit with a hint to run setup.
 */
export async function requireConfig(): Promise<NotifyConfig> {
  const config = await loadConfig();
  if (!config) {
    console.error("No configuration found. Run 'notify setup' first.");
    process.exit(1);
  }
  return config;
}
