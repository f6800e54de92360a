import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { z } from "zod";
import { QueueFileSchema, QueuedRecordSchema } from "../schemas/events.js";
import { errorMessage, silentLogger, type Logger } from "../log.js";
import { Mutex } from "./mutex.js";
import { QUEUE_FILE } from "./paths.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueuedItem<T> {
  queuedAt: string; // ISO 8601
  retryCount: number;
  request: T;
}

/** Validates a payload read back from disk into the owner's request type. */
export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface QueueStoreOptions<T> {
  directory: string;
  maxSize: number;
  payloadSchema: PayloadSchema<T>;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// QueueStore
// ---------------------------------------------------------------------------

/**
 * Bounded FIFO of pending requests persisted as one JSON file.
 *
 * Every operation loads, mutates and saves the whole file inside a single
 * store-wide lock. Reads that fail yield an empty queue, records that fail
 * validation are skipped, and writes that fail are logged and dropped.
 * Requests that fail `payloadSchema` are never written.
 *
 * Saves overwrite the file in place. A crash between load and save can lose
 * the items written in that cycle.
 */
export class QueueStore<T> {
  readonly directory: string;
  readonly filePath: string;
  readonly maxSize: number;

  private readonly payloadSchema: PayloadSchema<T>;
  private readonly logger: Logger;
  private readonly lock = new Mutex();

  // Set between snapshot() and commit(): items enqueued while a drain runs.
  private arrivals: QueuedItem<T>[] | null = null;
  private superseded = false;

  constructor(options: QueueStoreOptions<T>) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new Error("maxSize must be a positive integer");
    }
    this.directory = options.directory;
    this.filePath = join(options.directory, QUEUE_FILE);
    this.maxSize = options.maxSize;
    this.payloadSchema = options.payloadSchema;
    this.logger = options.logger ?? silentLogger;
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  /**
   * Append a request, dropping the oldest items once the queue exceeds
   * `maxSize`.
   */
  enqueue(request: T): Promise<void> {
    return this.lock.runExclusive(async () => {
      const parsed = this.payloadSchema.safeParse(request);
      if (!parsed.success) {
        // Would be skipped on every later load; never write it.
        this.logger.warn(`Dropping request that fails validation: ${describeIssue(parsed.error)}`);
        return;
      }

      const items = await this.load();
      const item: QueuedItem<T> = {
        queuedAt: new Date().toISOString(),
        retryCount: 0,
        request: parsed.data,
      };
      items.push(item);
      this.arrivals?.push(item);
      await this.save(this.trim(items));
    });
  }

  list(): Promise<QueuedItem<T>[]> {
    return this.lock.runExclusive(() => this.load());
  }

  async count(): Promise<number> {
    const items = await this.list();
    return items.length;
  }

  /** Overwrite the persisted queue with exactly `items`. */
  replace(items: QueuedItem<T>[]): Promise<void> {
    return this.lock.runExclusive(async () => {
      if (this.arrivals !== null) {
        // A drain in progress must not resurrect what this call discards.
        this.arrivals = [];
        this.superseded = true;
      }
      await this.save(items);
    });
  }

  clear(): Promise<void> {
    return this.replace([]);
  }

  // -------------------------------------------------------------------------
  // Drain brackets
  // -------------------------------------------------------------------------

  /**
   * Read the queue for a drain pass and start recording arrivals, so that
   * commit() keeps anything enqueued while sends are in flight.
   */
  snapshot(): Promise<QueuedItem<T>[]> {
    return this.lock.runExclusive(async () => {
      const items = await this.load();
      this.arrivals = [];
      this.superseded = false;
      return items;
    });
  }

  /**
   * Finish a drain pass: persist the items that failed, followed by anything
   * enqueued since snapshot(), trimmed to `maxSize`.
   */
  commit(remaining: QueuedItem<T>[]): Promise<void> {
    return this.lock.runExclusive(async () => {
      const arrivals = this.arrivals ?? [];
      const next = this.superseded ? arrivals : [...remaining, ...arrivals];
      this.arrivals = null;
      this.superseded = false;
      await this.save(this.trim(next));
    });
  }

  /** Stop recording arrivals without writing, for a drain that found nothing. */
  release(): void {
    this.arrivals = null;
    this.superseded = false;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private trim(items: QueuedItem<T>[]): QueuedItem<T>[] {
    return items.length > this.maxSize ? items.slice(items.length - this.maxSize) : items;
  }

  private async load(): Promise<QueuedItem<T>[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (!isMissingFile(err)) {
        this.logger.warn(`Could not read offline queue, treating as empty: ${errorMessage(err)}`);
      }
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger.warn(`Offline queue file is not valid JSON, treating as empty: ${this.filePath}`);
      return [];
    }

    const file = QueueFileSchema.safeParse(json);
    if (!file.success) {
      this.logger.warn(`Offline queue file is not an array, treating as empty: ${this.filePath}`);
      return [];
    }

    const items: QueuedItem<T>[] = [];
    let skipped = 0;
    for (const entry of file.data) {
      const record = QueuedRecordSchema.safeParse(entry);
      if (!record.success) {
        skipped++;
        continue;
      }
      const request = this.payloadSchema.safeParse(record.data.request);
      if (!request.success) {
        skipped++;
        continue;
      }
      items.push({ queuedAt: record.data.queuedAt, retryCount: record.data.retryCount, request: request.data });
    }
    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} invalid record(s) in offline queue: ${this.filePath}`);
    }
    return items;
  }

  private async save(items: QueuedItem<T>[]): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(this.filePath, JSON.stringify(items), "utf-8");
    } catch (err) {
      this.logger.warn(`Failed to persist offline queue (${items.length} items): ${errorMessage(err)}`);
    }
  }
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "validation failed";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
