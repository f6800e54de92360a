import { randomUUID } from "node:crypto";
import WebSocket from "ws";
import { createConsoleLogger, errorMessage, type Logger } from "../log.js";
import {
  ServerMessageSchema,
  type ClientMessage,
  type HubMethod,
  type RealtimeNotification,
} from "../schemas/realtime.js";
import { rawDataToString } from "./raw-data.js";
import { computeBackoff, DEFAULT_RECONNECT_POLICY, type BackoffPolicy } from "./reconnect.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConnectionState = "disconnected" | "connecting" | "connected" | "reconnecting";

export interface RealtimeClientConfig {
  apiKey: string;
  baseUrl?: string; // http(s) service URL; the hub is reached over ws(s)
  userId?: string; // subscribed on every (re)connect
  reconnectPolicy?: BackoffPolicy; // defaults to DEFAULT_RECONNECT_POLICY
  maxReconnectAttempts?: number; // overrides reconnectPolicy.maxAttempts
  invokeTimeoutMs?: number; // default 15_000
  logger?: Logger;
}

/** Payload delivered to listeners of each event. */
export interface RealtimeEvents {
  notification: RealtimeNotification;
  unreadCount: number;
  notificationRead: { eventId: string; readAt: string };
  eventStatusChanged: { eventId: string; status: string; updatedAt: string };
  stateChanged: { state: ConnectionState; error?: string };
}

export type RealtimeListener<K extends keyof RealtimeEvents> = (payload: RealtimeEvents[K]) => void;

type ListenerMap = { [K in keyof RealtimeEvents]: Set<RealtimeListener<K>> };

interface PendingInvocation {
  method: HubMethod;
  resolve: () => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

interface Settle {
  resolve: () => void;
  reject: (err: Error) => void;
}

export const HUB_PATH = "/hubs/notifications";
export const UNAUTHORIZED_CLOSE_CODE = 4401;
const SERVICE_RESTART_CLOSE_CODE = 1012;

// ---------------------------------------------------------------------------
// RealtimeClient
// ---------------------------------------------------------------------------

/**
 * Live notification feed over a WebSocket.
 *
 * After an unplanned disconnect the client reconnects on the backoff policy,
 * gives up once `maxAttempts` retries have failed, and re-subscribes the
 * current user when a reconnect succeeds. The first connect() is not retried.
 */
export class RealtimeClient {
  private ws: WebSocket | null = null;
  private state: ConnectionState = "disconnected";
  private closed = true; // true = intentional shutdown, no reconnect
  private retries = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private pendingConnect: Promise<void> | null = null;
  private userId: string | undefined;

  private readonly hubUrl: string;
  private readonly policy: BackoffPolicy;
  private readonly invokeTimeoutMs: number;
  private readonly logger: Logger;
  private readonly pending = new Map<string, PendingInvocation>();
  private readonly listeners: ListenerMap = {
    notification: new Set(),
    unreadCount: new Set(),
    notificationRead: new Set(),
    eventStatusChanged: new Set(),
    stateChanged: new Set(),
  };

  constructor(private readonly config: RealtimeClientConfig) {
    if (!config.apiKey || typeof config.apiKey !== "string") {
      throw new Error("API key is required");
    }
    this.hubUrl = toHubUrl(config.baseUrl ?? "https://notify.example.com");
    const policy = config.reconnectPolicy ?? DEFAULT_RECONNECT_POLICY;
    this.policy =
      config.maxReconnectAttempts === undefined ? policy : { ...policy, maxAttempts: config.maxReconnectAttempts };
    this.invokeTimeoutMs = config.invokeTimeoutMs ?? 15_000;
    this.logger = config.logger ?? createConsoleLogger();
    this.userId = config.userId;
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === "connected";
  }

  /** Register a listener. Returns a function that removes it. */
  on<K extends keyof RealtimeEvents>(event: K, listener: RealtimeListener<K>): () => void {
    this.listeners[event].add(listener);
    return () => {
      this.listeners[event].delete(listener);
    };
  }

  /**
   * Open the connection. Rejects if it cannot be established; the initial
   * connect is not retried.
   */
  connect(): Promise<void> {
    if (this.state === "connected") return Promise.resolve();
    if (this.pendingConnect) return this.pendingConnect;
    if (this.state === "reconnecting") {
      return Promise.reject(new Error("Connection lost; reconnect in progress"));
    }

    this.closed = false;
    this.retries = 0;
    this.pendingConnect = new Promise<void>((resolve, reject) => {
      this.openSocket(false, { resolve, reject });
    }).finally(() => {
      this.pendingConnect = null;
    });
    return this.pendingConnect;
  }

  /** Close the connection without reconnecting. */
  async disconnect(): Promise<void> {
    this.closed = true;
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    const ws = this.ws;
    this.ws = null;
    if (ws && ws.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        ws.once("close", () => resolve());
        ws.close(1000, "client disconnect");
      });
    }
    this.setState("disconnected");
  }

  async subscribeToUser(userId: string): Promise<void> {
    await this.invoke("SubscribeToUser", [userId]);
    this.userId = userId;
  }

  async unsubscribeFromUser(userId: string): Promise<void> {
    await this.invoke("UnsubscribeFromUser", [userId]);
    if (this.userId === userId) {
      this.userId = undefined;
    }
  }

  subscribeToApp(appId: string): Promise<void> {
    return this.invoke("SubscribeToApp", [appId]);
  }

  unsubscribeFromApp(appId: string): Promise<void> {
    return this.invoke("UnsubscribeFromApp", [appId]);
  }

  /** Mark a notification read; the server broadcasts it to the user's other clients. */
  markAsRead(userId: string, eventId: string): Promise<void> {
    return this.invoke("MarkAsRead", [userId, eventId]);
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private openSocket(isReconnect: boolean, settle?: Settle): void {
    if (!isReconnect) {
      this.setState("connecting");
    }

    const ws = new WebSocket(this.hubUrl, {
      headers: { Authorization: `Bearer ${this.config.apiKey}` },
    });
    this.ws = ws;
    let opened = false;
    let lastError: string | undefined;

    ws.on("open", () => {
      opened = true;
      this.retries = 0;
      this.setState("connected");
      settle?.resolve();
      if (this.userId !== undefined) {
        this.restoreSubscription(this.userId);
      }
    });

    ws.on("message", (data) => {
      this.handleMessage(rawDataToString(data));
    });

    ws.on("close", (code, reason) => {
      if (this.ws === ws) {
        this.ws = null;
      }
      this.rejectPending(new Error(`Connection closed (code ${code})`));
      const error = lastError ?? (reason.length > 0 ? reason.toString() : `code ${code}`);

      if (!opened) {
        settle?.reject(new Error(`Could not connect to ${this.hubUrl}: ${error}`));
      }
      if (this.closed) {
        this.setState("disconnected");
        return;
      }
      if (!opened && !isReconnect) {
        this.closed = true;
        this.setState("disconnected", error);
        return;
      }
      if (code === UNAUTHORIZED_CLOSE_CODE) {
        this.closed = true; // Do NOT reconnect — the key was rejected
        this.setState("disconnected", "unauthorized");
        return;
      }
      if (code === SERVICE_RESTART_CLOSE_CODE) {
        this.retries = 0;
      }
      this.scheduleReconnect(error);
    });

    ws.on("error", (err) => {
      lastError = err.message;
      this.logger.error(`Connection error: ${err.message}`);
      // error is always followed by close, so no reconnect here
    });
  }

  private scheduleReconnect(error: string): void {
    const delayMs = computeBackoff(this.policy, this.retries);
    if (delayMs === null) {
      this.closed = true;
      this.setState("disconnected", `gave up after ${this.retries} reconnect attempts`);
      return;
    }

    this.retries++;
    this.setState("reconnecting", error);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.closed) {
        this.openSocket(true);
      }
    }, delayMs);
    this.logger.info(`Reconnecting in ${delayMs}ms (attempt ${this.retries})`);
  }

  private restoreSubscription(userId: string): void {
    this.invoke("SubscribeToUser", [userId]).catch((err) => {
      this.logger.warn(`Could not subscribe to user ${userId}: ${errorMessage(err)}`);
    });
  }

  private async invoke(method: HubMethod, args: string[]): Promise<void> {
    if (this.state !== "connected") {
      await this.connect();
    }
    const ws = this.ws;
    if (ws?.readyState !== WebSocket.OPEN) {
      throw new Error(`Cannot call ${method}: not connected`);
    }

    const id = randomUUID();
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`${method} timed out after ${this.invokeTimeoutMs}ms`));
      }, this.invokeTimeoutMs);
      this.pending.set(id, { method, resolve, reject, timer });
      this.sendMessage(ws, { type: "invoke", id, method, args });
    });
  }

  private handleMessage(raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn(`Ignoring non-JSON message: ${raw.slice(0, 100)}`);
      return;
    }

    const result = ServerMessageSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(`Ignoring unrecognised message: ${raw.slice(0, 100)}`);
      return;
    }

    const msg = result.data;
    switch (msg.type) {
      case "notification_received":
        this.emit("notification", msg.notification);
        break;

      case "unread_count_changed":
        this.emit("unreadCount", msg.count);
        break;

      case "notification_read":
        this.emit("notificationRead", { eventId: msg.eventId, readAt: msg.readAt });
        break;

      case "event_status_changed":
        this.emit("eventStatusChanged", {
          eventId: msg.eventId,
          status: msg.status,
          updatedAt: msg.updatedAt,
        });
        break;

      case "completion": {
        const call = this.pending.get(msg.id);
        if (!call) break;
        this.pending.delete(msg.id);
        clearTimeout(call.timer);
        if (msg.error !== undefined) {
          call.reject(new Error(`${call.method} failed: ${msg.error}`));
        } else {
          call.resolve();
        }
        break;
      }

      case "ping":
        if (this.ws) {
          this.sendMessage(this.ws, { type: "pong", ts: msg.ts });
        }
        break;
    }
  }

  private rejectPending(err: Error): void {
    for (const call of this.pending.values()) {
      clearTimeout(call.timer);
      call.reject(err);
    }
    this.pending.clear();
  }

  private emit<K extends keyof RealtimeEvents>(event: K, payload: RealtimeEvents[K]): void {
    for (const listener of this.listeners[event]) {
      try {
        listener(payload);
      } catch (err) {
        this.logger.error(`Listener for "${event}" threw: ${errorMessage(err)}`);
      }
    }
  }

  private setState(state: ConnectionState, error?: string): void {
    if (this.state === state && error === undefined) return;
    this.state = state;
    this.emit("stateChanged", error === undefined ? { state } : { state, error });
  }

  private sendMessage(ws: WebSocket, msg: ClientMessage): void {
    if (ws.readyState !== WebSocket.OPEN) return;
    try {
      ws.send(JSON.stringify(msg));
    } catch (err) {
      this.logger.error(`Failed to send message: ${errorMessage(err)}`);
    }
  }
}

/** https://host/base -> wss://host/base/hubs/notifications */
export function toHubUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, "");
  return trimmed.replace(/^https?/, (m) => (m === "https" ? "wss" : "ws")) + HUB_PATH;
}
