import { parseArgs } from "node:util";
import { createConsoleLogger } from "../client/log.js";
import { RealtimeClient } from "../client/realtime/realtime-client.js";
import { createStatusDisplay } from "../client/realtime/display.js";
import { toRealtimeClientConfig } from "../config/clients.js";
import { requireConfig } from "./shared.js";

// ---------------------------------------------------------------------------
// Listen Command
// ---------------------------------------------------------------------------

/**
 * Stream live notifications until interrupted. The configured user (or
 * --user) is re-subscribed automatically after each reconnect.
 */
export async function runListen(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      user: { type: "string" },
      app: { type: "string", multiple: true },
    },
  });

  const config = await requireConfig();
  const display = createStatusDisplay();
  const client = new RealtimeClient({
    ...toRealtimeClientConfig(config, createConsoleLogger("notify")),
    userId: values.user ?? config.realtime.userId,
  });

  client.on("stateChanged", ({ state, error }) => {
    display.state(state, error);
    if (state === "disconnected" && error !== undefined) {
      process.exit(1);
    }
  });
  client.on("notification", (n) => display.notification(n));
  client.on("unreadCount", (count) => display.log(`Unread: ${count}`));
  client.on("notificationRead", ({ eventId }) => display.log(`Read: ${eventId}`));
  client.on("eventStatusChanged", ({ eventId, status }) => display.log(`Status of ${eventId}: ${status}`));

  await client.connect();
  for (const appId of values.app ?? []) {
    await client.subscribeToApp(appId);
    display.log(`Subscribed to app ${appId}`);
  }

  const shutdown = () => {
    display.log("Shutting down...");
    client
      .disconnect()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
