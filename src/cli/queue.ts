import { NotifyClient } from "../client/notify-client.js";
import type { OfflineQueue } from "../client/queue/offline-queue.js";
import type { QueuedItem } from "../client/queue/queue-store.js";
import type { NotifyEventRequest } from "../client/types.js";
import { toNotifyClientConfig } from "../config/clients.js";
import { requireConfig } from "./shared.js";

// ---------------------------------------------------------------------------
// Queue Command
// ---------------------------------------------------------------------------

export async function runQueue(argv: string[]): Promise<void> {
  const sub = argv[0] ?? "list";
  if (!["list", "count", "clear", "retry"].includes(sub)) {
    console.error("Usage: notify queue list|count|clear|retry");
    process.exit(1);
  }

  const config = await requireConfig();
  const client = new NotifyClient(toNotifyClientConfig(config, { autoRetry: false }));
  const queue = client.offlineQueue;
  if (!queue) {
    console.error("The offline queue is disabled in the configuration.");
    process.exit(1);
  }

  try {
    await runQueueCommand(sub, queue);
  } finally {
    client.close();
  }
}

async function runQueueCommand(sub: string, queue: OfflineQueue<NotifyEventRequest>): Promise<void> {
  switch (sub) {
    case "count":
      console.log(String(await queue.count()));
      break;

    case "clear":
      await queue.clear();
      console.log(`Cleared ${queue.filePath}`);
      break;

    case "retry": {
      const delivered = await queue.retryNow();
      const remaining = await queue.count();
      console.log(`Delivered ${delivered}, ${remaining} still queued`);
      break;
    }

    default: {
      const items = await queue.list();
      if (items.length === 0) {
        console.log("Offline queue is empty.");
        break;
      }
      items.forEach((item, i) => console.log(formatQueuedItem(item, i)));
    }
  }
}

// ---------------------------------------------------------------------------
// Format helpers (exported for testability)
// ---------------------------------------------------------------------------

export function formatQueuedItem(item: QueuedItem<NotifyEventRequest>, index: number): string {
  const { request } = item;
  return `${index + 1}. ${item.queuedAt} ${request.severity} ${request.eventType} — ${request.title}`;
}
