import { z } from "zod";

export const ConfigSchema = z.object({
  version: z.literal(1),
  apiKey: z.string().min(1),

  // Service URL (env var override at load time)
  baseUrl: z.string().url(),

  defaultAppSlug: z.string().optional(),
  defaultSource: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),

  offlineQueue: z
    .object({
      enabled: z.boolean().default(true),
      directory: z.string().optional(),
      maxSize: z.number().int().positive().default(500),
    })
    .default({}),

  realtime: z
    .object({
      userId: z.string().uuid().optional(),
      maxReconnectAttempts: z.number().int().nonnegative().default(5),
    })
    .default({}),
});

export type NotifyConfig = z.infer<typeof ConfigSchema>;
export type NotifyConfigInput = z.input<typeof ConfigSchema>;
