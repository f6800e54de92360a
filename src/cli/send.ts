import { parseArgs } from "node:util";
import { NotifyClient } from "../client/notify-client.js";
import { SeveritySchema } from "../client/schemas/events.js";
import { toNotifyClientConfig } from "../config/clients.js";
import { requireConfig } from "./shared.js";

// ---------------------------------------------------------------------------
// Send Command
// ---------------------------------------------------------------------------

export async function runSend(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      severity: { type: "string", short: "s" },
      message: { type: "string", short: "m" },
      source: { type: "string" },
      app: { type: "string" },
      entity: { type: "string" },
    },
  });

  const [eventType, title] = positionals;
  if (!eventType || !title) {
    console.error("Usage: notify send <eventType> <title> [--severity S] [--message M] [--source S] [--app SLUG] [--entity ID]");
    process.exit(1);
  }

  const severity = SeveritySchema.safeParse(values.severity ?? "Info");
  if (!severity.success) {
    console.error(`Invalid severity "${values.severity}". Use one of: ${SeveritySchema.options.join(", ")}`);
    process.exit(1);
  }

  const config = await requireConfig();
  const client = new NotifyClient(toNotifyClientConfig(config, { autoRetry: false }));

  const builder = client.event(eventType).withTitle(title).withSeverity(severity.data);
  if (values.message) builder.withMessage(values.message);
  if (values.source) builder.withSource(values.source);
  if (values.app) builder.withApp(values.app);
  if (values.entity) builder.withEntityId(values.entity);

  const result = await builder.send();
  client.close();

  if (result.success) {
    console.log(`Sent ${eventType} (id: ${result.eventId ?? "?"}, status: ${result.status ?? "?"})`);
  } else if (result.queued) {
    console.log(`Send failed: ${result.error ?? "unknown error"}. Queued for retry.`);
  } else {
    console.error(`Send failed: ${result.error ?? "unknown error"}`);
    process.exit(1);
  }
}
