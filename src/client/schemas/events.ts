import { z } from "zod";

// ---------------------------------------------------------------------------
// Notification request
// ---------------------------------------------------------------------------

export const SeveritySchema = z.enum(["Info", "Warning", "High", "Critical"]);

export const EventActionSchema = z.object({
  actionId: z.string(),
  label: z.string(),
  webhookUrl: z.string().optional(),
});

export const NotifyEventRequestSchema = z.object({
  appId: z.string().uuid().optional(),
  appSlug: z.string().optional(),
  eventType: z.string(),
  severity: SeveritySchema.default("Info"),
  source: z.string().optional(),
  title: z.string(),
  message: z.string().optional(),
  entityId: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
  actions: z.array(EventActionSchema).optional(),
});

export type Severity = z.infer<typeof SeveritySchema>;
export type EventAction = z.infer<typeof EventActionSchema>;
export type NotifyEventRequest = z.infer<typeof NotifyEventRequestSchema>;
/** Request shape accepted from callers, before defaults are applied. */
export type NotifyEventInput = z.input<typeof NotifyEventRequestSchema>;

// ---------------------------------------------------------------------------
// Offline queue file
// ---------------------------------------------------------------------------

/**
 * One record of the queue file. The payload stays `unknown` here: the store's
 * owner validates it with its own schema.
 */
export const QueuedRecordSchema = z.object({
  queuedAt: z.string().datetime(),
  retryCount: z.number().int().nonnegative().default(0),
  request: z.unknown(),
});

/** The file is an array; each record is checked on its own. */
export const QueueFileSchema = z.array(z.unknown());

// ---------------------------------------------------------------------------
// API responses
// ---------------------------------------------------------------------------

export const EventResponseSchema = z.object({
  id: z.string(),
  status: z.string(),
});
