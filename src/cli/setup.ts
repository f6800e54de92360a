import {
  intro,
  outro,
  text,
  password,
  confirm,
  cancel,
  isCancel,
  log,
} from "@clack/prompts";
import { getBaseUrl, loadConfig } from "../config/store.js";
import { setupProgrammatic } from "../config/setup-programmatic.js";
import { getDefaultQueueDirectory } from "../client/queue/paths.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function handleCancel<T>(value: T | symbol): asserts value is T {
  if (isCancel(value)) {
    cancel("Setup cancelled.");
    process.exit(0);
  }
}

function isUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

function optional(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

// ---------------------------------------------------------------------------
// Setup Wizard
// ---------------------------------------------------------------------------

export async function runSetup(): Promise<void> {
  intro("Notify Setup");

  // Check for existing config
  const existing = await loadConfig();
  if (existing) {
    const overwrite = await confirm({
      message: "Existing configuration found. Overwrite?",
    });
    handleCancel(overwrite);
    if (!overwrite) {
      cancel("Setup cancelled.");
      process.exit(0);
    }
  }

  // -------------------------------------------------------------------------
  // Service
  // -------------------------------------------------------------------------

  const apiKey = await password({
    message: "API key:",
    validate: (v) => (!v ? "API key is required" : undefined),
  });
  handleCancel(apiKey);

  const baseUrl = await text({
    message: "Service URL:",
    initialValue: existing?.baseUrl ?? getBaseUrl(),
    validate: (v) => (isUrl(v) ? undefined : "Enter a full URL, e.g. https://notify.example.com"),
  });
  handleCancel(baseUrl);

  const appSlug = await text({
    message: "Default app slug (optional):",
    initialValue: existing?.defaultAppSlug ?? "",
  });
  handleCancel(appSlug);

  const source = await text({
    message: "Default source (optional):",
    initialValue: existing?.defaultSource ?? "",
  });
  handleCancel(source);

  // -------------------------------------------------------------------------
  // Offline queue
  // -------------------------------------------------------------------------

  const queueEnabled = await confirm({
    message: `Keep failed sends on disk and retry them? (${getDefaultQueueDirectory()})`,
    initialValue: existing?.offlineQueue.enabled ?? true,
  });
  handleCancel(queueEnabled);

  let maxSize: number | undefined;
  if (queueEnabled) {
    const size = await text({
      message: "Maximum queued notifications:",
      initialValue: String(existing?.offlineQueue.maxSize ?? 500),
      validate: (v) => (/^[1-9]\d*$/.test(v) ? undefined : "Enter a positive whole number"),
    });
    handleCancel(size);
    maxSize = Number(size);
  }

  // -------------------------------------------------------------------------
  // Live notifications
  // -------------------------------------------------------------------------

  const userId = await text({
    message: "User ID to follow with `notify listen` (optional):",
    initialValue: existing?.realtime.userId ?? "",
  });
  handleCancel(userId);

  try {
    const result = await setupProgrammatic({
      apiKey,
      baseUrl,
      defaultAppSlug: optional(appSlug),
      defaultSource: optional(source),
      offlineQueueEnabled: queueEnabled,
      offlineQueueDirectory: existing?.offlineQueue.directory,
      offlineQueueMaxSize: maxSize,
      userId: optional(userId),
    });
    log.success(`Config written to ${result.file}`);
  } catch (err) {
    log.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  outro("Setup complete. Try: notify send test.ping \"Hello\"");
}
