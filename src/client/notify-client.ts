import { EventBuilder } from "./event-builder.js";
import { createConsoleLogger, errorMessage, type Logger } from "./log.js";
import { OfflineQueue, OFFLINE_QUEUE_DEFAULTS } from "./queue/offline-queue.js";
import type { QueuedItem } from "./queue/queue-store.js";
import { EventResponseSchema, NotifyEventRequestSchema } from "./schemas/events.js";
import type {
  EventResult,
  NotifyClientConfig,
  NotifyEventInput,
  NotifyEventRequest,
  NotifyOptions,
} from "./types.js";

/** Default configuration values */
export const DEFAULTS = {
  baseUrl: "https://notify.example.com",
  timeoutMs: 30_000,
  enableOfflineQueue: true,
  maxOfflineQueueSize: OFFLINE_QUEUE_DEFAULTS.maxSize,
  retryInitialDelayMs: OFFLINE_QUEUE_DEFAULTS.initialDelayMs,
  retryIntervalMs: OFFLINE_QUEUE_DEFAULTS.intervalMs,
} as const;

// ---------------------------------------------------------------------------
// NotifyClient
// ---------------------------------------------------------------------------

/**
 * HTTP client for submitting event notifications.
 *
 * A send that fails (non-2xx, network error or timeout) resolves with
 * `success: false` and, when the offline queue is enabled, is written to disk
 * and retried by the queue's timer. Callers never see an exception from the
 * send path.
 *
 * Usage:
 * ```ts
 * import { NotifyClient } from "notify-client";
 *
 * const client = new NotifyClient({ apiKey: "test-key", defaultAppSlug: "billing" });
 *
 * const result = await client.notify("invoice.overdue", "Invoice 1042 is overdue", {
 *   severity: "Warning",
 * });
 * if (!result.success && result.queued) {
 *   // delivered later by the offline queue
 * }
 *
 * client.close();
 * ```
 */
export class NotifyClient {
  private readonly baseUrl: string;
  private readonly config: NotifyClientConfig;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly queue: OfflineQueue<NotifyEventRequest> | null;

  constructor(config: NotifyClientConfig) {
    if (!config.apiKey || typeof config.apiKey !== "string") {
      throw new Error("API key is required");
    }
    this.config = config;
    this.baseUrl = (config.baseUrl ?? DEFAULTS.baseUrl).replace(/\/+$/, "");
    if (!this.baseUrl) {
      throw new Error("baseUrl must be a non-empty string");
    }
    this.timeoutMs = config.timeoutMs ?? DEFAULTS.timeoutMs;
    this.logger = config.logger ?? createConsoleLogger();

    this.queue =
      (config.enableOfflineQueue ?? DEFAULTS.enableOfflineQueue)
        ? new OfflineQueue({
            send: (item) => this.sendQueued(item),
            payloadSchema: NotifyEventRequestSchema,
            directory: config.offlineQueueDirectory,
            maxSize: config.maxOfflineQueueSize ?? DEFAULTS.maxOfflineQueueSize,
            autoRetry: config.autoRetry ?? true,
            initialDelayMs: config.retryInitialDelayMs ?? DEFAULTS.retryInitialDelayMs,
            intervalMs: config.retryIntervalMs ?? DEFAULTS.retryIntervalMs,
            logger: this.logger,
          })
        : null;
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  /** The offline queue, or null when disabled. */
  get offlineQueue(): OfflineQueue<NotifyEventRequest> | null {
    return this.queue;
  }

  /**
   * Send an event notification.
   */
  notify(request: NotifyEventInput): Promise<EventResult>;
  notify(eventType: string, title: string, options?: NotifyOptions): Promise<EventResult>;
  notify(requestOrType: NotifyEventInput | string, title = "", options: NotifyOptions = {}): Promise<EventResult> {
    const input: NotifyEventInput =
      typeof requestOrType === "string" ? { eventType: requestOrType, title, ...options } : requestOrType;

    const parsed = NotifyEventRequestSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return Promise.resolve({
        success: false,
        error: `Invalid request: ${where}${issue?.message ?? "validation failed"}`,
        queued: false,
      });
    }
    return this.send(parsed.data, false);
  }

  /** Start a fluent request for `eventType`. */
  event(eventType: string): EventBuilder {
    return new EventBuilder(this, eventType);
  }

  /** Drain the offline queue now. Resolves with the number of requests delivered. */
  async retryQueued(): Promise<number> {
    return this.queue ? this.queue.retryNow() : 0;
  }

  /** Stop the offline queue's timer. A drain already in flight is left to finish. */
  close(): void {
    this.queue?.stop();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async sendQueued(item: QueuedItem<NotifyEventRequest>): Promise<boolean> {
    const result = await this.send(item.request, true);
    return result.success;
  }

  private async send(request: NotifyEventRequest, skipQueue: boolean): Promise<EventResult> {
    const queue = skipQueue ? null : this.queue;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(`${this.baseUrl}/api/v1/events`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          Accept: "application/json",
          "Content-Type": "application/json",
        },
        body: JSON.stringify(this.toApiBody(request)),
        signal: controller.signal,
      });

      if (res.ok) {
        const body = EventResponseSchema.safeParse(await res.json().catch(() => null));
        return {
          success: true,
          eventId: body.success ? body.data.id : undefined,
          status: body.success ? body.data.status : undefined,
          queued: false,
        };
      }

      const text = await res.text().catch(() => "");
      return await this.fail(request, text || `HTTP ${res.status}`, queue);
    } catch (err) {
      const message =
        err instanceof Error && err.name === "AbortError"
          ? `Request timeout after ${this.timeoutMs}ms`
          : errorMessage(err);
      return await this.fail(request, message, queue);
    } finally {
      clearTimeout(timeout);
    }
  }

  private async fail(
    request: NotifyEventRequest,
    error: string,
    queue: OfflineQueue<NotifyEventRequest> | null,
  ): Promise<EventResult> {
    if (queue) {
      await queue.enqueue(request);
      this.logger.warn(`Send of "${request.eventType}" failed, queued for retry: ${error}`);
    }
    return { success: false, error, queued: queue !== null };
  }

  private toApiBody(request: NotifyEventRequest): Record<string, unknown> {
    return {
      appSlug: request.appSlug ?? this.config.defaultAppSlug,
      appId: request.appId,
      eventType: request.eventType,
      severity: request.severity,
      source: request.source ?? this.config.defaultSource,
      title: request.title,
      message: request.message,
      entityId: request.entityId,
      metadata: request.metadata,
      actions: request.actions?.map((a) => ({
        actionId: a.actionId,
        label: a.label,
        webhookUrl: a.webhookUrl,
      })),
    };
  }
}
