import { errorMessage, silentLogger, type Logger } from "../log.js";
import { getDefaultQueueDirectory } from "./paths.js";
import { QueueStore, type PayloadSchema, type QueuedItem } from "./queue-store.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Attempt to deliver one queued item. Resolve `true` only when the remote
 * side accepted it; `false` and rejections both leave the item queued.
 */
export type SendCapability<T> = (item: QueuedItem<T>) => Promise<boolean>;

export interface OfflineQueueOptions<T> {
  send: SendCapability<T>;
  payloadSchema: PayloadSchema<T>;
  /** Directory holding the queue file. Defaults to the per-user app data folder. */
  directory?: string;
  /** Oldest items are dropped beyond this many. Default 500. */
  maxSize?: number;
  /** Start the retry timer on construction. Default true. */
  autoRetry?: boolean;
  /** Delay before the first timed drain. Default 30s. */
  initialDelayMs?: number;
  /** Delay between timed drains. Default 60s. */
  intervalMs?: number;
  logger?: Logger;
}

interface DrainPass {
  delivered: number;
  remaining: number;
}

export const OFFLINE_QUEUE_DEFAULTS = {
  maxSize: 500,
  initialDelayMs: 30_000,
  intervalMs: 60_000,
} as const;

// ---------------------------------------------------------------------------
// OfflineQueue
// ---------------------------------------------------------------------------

/**
 * Durable holding area for requests that could not be delivered, drained on
 * a fixed timer and on demand.
 *
 * Only one drain runs at a time; a drain requested while another is in flight
 * returns 0 without touching the queue. Items are sent one by one in arrival
 * order and the ones that still fail are written back in the same order.
 */
export class OfflineQueue<T> {
  private readonly store: QueueStore<T>;
  private readonly send: SendCapability<T>;
  private readonly logger: Logger;
  private readonly initialDelayMs: number;
  private readonly intervalMs: number;

  private draining = false;
  private streak = 0;
  private initialTimer: ReturnType<typeof setTimeout> | null = null;
  private intervalTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: OfflineQueueOptions<T>) {
    this.send = options.send;
    this.logger = options.logger ?? silentLogger;
    this.initialDelayMs = options.initialDelayMs ?? OFFLINE_QUEUE_DEFAULTS.initialDelayMs;
    this.intervalMs = options.intervalMs ?? OFFLINE_QUEUE_DEFAULTS.intervalMs;
    this.store = new QueueStore({
      directory: options.directory ?? getDefaultQueueDirectory(),
      maxSize: options.maxSize ?? OFFLINE_QUEUE_DEFAULTS.maxSize,
      payloadSchema: options.payloadSchema,
      logger: this.logger,
    });

    if (options.autoRetry ?? true) {
      this.start();
    }
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  get filePath(): string {
    return this.store.filePath;
  }

  /** Consecutive drains that ended with items still queued. Informational only. */
  get failureStreak(): number {
    return this.streak;
  }

  get isDraining(): boolean {
    return this.draining;
  }

  get isRunning(): boolean {
    return this.initialTimer !== null || this.intervalTimer !== null;
  }

  enqueue(request: T): Promise<void> {
    return this.store.enqueue(request);
  }

  list(): Promise<QueuedItem<T>[]> {
    return this.store.list();
  }

  count(): Promise<number> {
    return this.store.count();
  }

  clear(): Promise<void> {
    return this.store.clear();
  }

  /**
   * Run one drain pass now. Resolves with the number of items delivered;
   * 0 when the queue is empty, another drain is already running or the pass
   * faulted before it could commit.
   */
  async retryNow(): Promise<number> {
    if (this.draining) {
      return 0;
    }
    this.draining = true;

    let pass: DrainPass;
    try {
      pass = await this.drain();
    } catch (err) {
      this.store.release();
      this.streak++;
      this.log("warn", `Offline queue drain failed: ${errorMessage(err)}`);
      return 0;
    } finally {
      this.draining = false;
    }

    this.streak = pass.remaining === 0 ? 0 : this.streak + 1;
    if (pass.delivered + pass.remaining > 0) {
      this.log("info", `Offline queue drained: ${pass.delivered} sent, ${pass.remaining} still queued`);
    }
    return pass.delivered;
  }

  /** Start the retry timer. No-op when already running. */
  start(): void {
    if (this.isRunning) return;

    this.initialTimer = setTimeout(() => {
      this.initialTimer = null;
      this.intervalTimer = setInterval(() => this.runScheduled(), this.intervalMs);
      this.intervalTimer.unref();
      this.runScheduled();
    }, this.initialDelayMs);
    this.initialTimer.unref();
  }

  /** Stop the retry timer. A drain already in flight is left to finish. */
  stop(): void {
    if (this.initialTimer !== null) {
      clearTimeout(this.initialTimer);
      this.initialTimer = null;
    }
    if (this.intervalTimer !== null) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  /** Snapshot, send each item in order, commit the failures. */
  private async drain(): Promise<DrainPass> {
    const items = await this.store.snapshot();
    if (items.length === 0) {
      this.store.release();
      return { delivered: 0, remaining: 0 };
    }

    let delivered = 0;
    const remaining: QueuedItem<T>[] = [];
    for (const item of items) {
      if (await this.deliver(item)) {
        delivered++;
      } else {
        remaining.push(item);
      }
    }

    await this.store.commit(remaining);
    return { delivered, remaining: remaining.length };
  }

  private async deliver(item: QueuedItem<T>): Promise<boolean> {
    try {
      return await this.send(item);
    } catch (err) {
      this.log("warn", `Queued send failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // A throwing logger must not turn a committed drain into a fault.
  private log(level: "info" | "warn", message: string): void {
    try {
      this.logger[level](message);
    } catch (err) {
      console.error(`[notify-client] ${message} (logger failed: ${errorMessage(err)})`);
    }
  }

  private runScheduled(): void {
    this.retryNow().catch((err) => {
      this.logger.error(`Scheduled drain error: ${errorMessage(err)}`);
    });
  }
}
