import type { RealtimeNotification } from "../schemas/realtime.js";
import type { ConnectionState } from "./realtime-client.js";

// ---------------------------------------------------------------------------
// StatusDisplay
// ---------------------------------------------------------------------------

export interface StatusDisplay {
  state(state: ConnectionState, error?: string): void;
  notification(notification: RealtimeNotification): void;
  log(message: string): void;
}

export function createStatusDisplay(prefix = "notify"): StatusDisplay {
  return {
    state(state, error) {
      console.log(`[${prefix}] ${formatState(state, error)}`);
    },
    notification(notification) {
      console.log(`[${prefix}] ${formatNotification(notification)}`);
    },
    log(message) {
      console.log(`[${prefix}] ${message}`);
    },
  };
}

// ---------------------------------------------------------------------------
// Format helpers (exported for testability)
// ---------------------------------------------------------------------------

export function formatState(state: ConnectionState, error?: string): string {
  switch (state) {
    case "connecting":
      return "Connecting to notification hub...";
    case "connected":
      return "Connected. Waiting for notifications";
    case "reconnecting":
      return error ? `Connection lost (${error}). Reconnecting...` : "Connection lost. Reconnecting...";
    case "disconnected":
      return error ? `Disconnected: ${error}` : "Disconnected";
  }
}

export function formatNotification(n: RealtimeNotification): string {
  const app = n.appName ?? n.appSlug ?? n.appId;
  const head = `${n.severity.toUpperCase()} ${n.eventType} [${app}] ${n.title}`;
  return n.message ? `${head}: ${n.message}` : head;
}
