import { z } from "zod";

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

export const RealtimeActionSchema = z.object({
  id: z.string(),
  label: z.string(),
  url: z.string().optional(),
  isPrimary: z.boolean().default(false),
});

export const RealtimeNotificationSchema = z.object({
  eventId: z.string(),
  deliveryId: z.string(),
  eventType: z.string(),
  severity: z.string(),
  title: z.string(),
  message: z.string().optional(),
  createdAt: z.string(),
  appId: z.string(),
  appName: z.string().optional(),
  appSlug: z.string().optional(),
  data: z.record(z.unknown()).optional(),
  actions: z.array(RealtimeActionSchema).optional(),
});

export type RealtimeAction = z.infer<typeof RealtimeActionSchema>;
export type RealtimeNotification = z.infer<typeof RealtimeNotificationSchema>;

// ---------------------------------------------------------------------------
// Server -> Client Messages
// ---------------------------------------------------------------------------

export const ServerNotificationMessageSchema = z.strictObject({
  type: z.literal("notification_received"),
  notification: RealtimeNotificationSchema,
});

export const ServerUnreadCountMessageSchema = z.strictObject({
  type: z.literal("unread_count_changed"),
  count: z.number().int().nonnegative(),
});

export const ServerNotificationReadMessageSchema = z.strictObject({
  type: z.literal("notification_read"),
  eventId: z.string(),
  readAt: z.string(),
});

export const ServerEventStatusMessageSchema = z.strictObject({
  type: z.literal("event_status_changed"),
  eventId: z.string(),
  status: z.string(),
  updatedAt: z.string(),
});

export const ServerCompletionMessageSchema = z.strictObject({
  type: z.literal("completion"),
  id: z.string().min(1),
  error: z.string().optional(),
});

export const ServerPingMessageSchema = z.strictObject({
  type: z.literal("ping"),
  ts: z.number().int(),
});

export const ServerMessageSchema = z.discriminatedUnion("type", [
  ServerNotificationMessageSchema,
  ServerUnreadCountMessageSchema,
  ServerNotificationReadMessageSchema,
  ServerEventStatusMessageSchema,
  ServerCompletionMessageSchema,
  ServerPingMessageSchema,
]);

export type ServerMessage = z.infer<typeof ServerMessageSchema>;

// ---------------------------------------------------------------------------
// Client -> Server Messages
// ---------------------------------------------------------------------------

export const HubMethodSchema = z.enum([
  "SubscribeToUser",
  "UnsubscribeFromUser",
  "SubscribeToApp",
  "UnsubscribeFromApp",
  "MarkAsRead",
]);

export const ClientInvokeMessageSchema = z.strictObject({
  type: z.literal("invoke"),
  id: z.string().min(1),
  method: HubMethodSchema,
  args: z.array(z.string()),
});

export const ClientPongMessageSchema = z.strictObject({
  type: z.literal("pong"),
  ts: z.number().int(),
});

export const ClientMessageSchema = z.discriminatedUnion("type", [
  ClientInvokeMessageSchema,
  ClientPongMessageSchema,
]);

export type HubMethod = z.infer<typeof HubMethodSchema>;
export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type ClientInvokeMessage = z.infer<typeof ClientInvokeMessageSchema>;
