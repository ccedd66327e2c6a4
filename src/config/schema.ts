import { z } from "zod";

export const DEFAULT_USER_AGENT = "PodFetch/1.0";

const scalarSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

// A string is "user:password" basic auth, a mapping is query-string auth.
export const feedAuthSchema = z.union([
  z.string().min(1),
  z.record(z.string(), scalarSchema),
]);

export const feedConfigSchema = z.object({
  url: z.string().url(),
  output: z.string().min(1),
  auth: feedAuthSchema.optional(),
  whitelist: z.array(z.string()).optional(),
});

export const pushbulletConfigSchema = z.object({
  token: z.string().min(1),
  device: z.string().min(1).optional(),
});

export const mailgunConfigSchema = z.object({
  apiKey: z.string().min(1),
  domain: z.string().min(1),
  recipient: z.string().email(),
});

// Feeds and notifiers are validated one at a time so that a single bad entry
// only disables itself.
export const appConfigSchema = z.object({
  history: z.string().min(1).optional(),
  schedule: z.string().min(1).optional(),
  http: z
    .object({
      timeoutMs: z.number().int().positive().default(30000),
      userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
      atomicDownloads: z.boolean().default(true),
    })
    .default({}),
  feeds: z.record(z.string(), z.unknown()),
  notifiers: z.record(z.string(), z.unknown()).default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type HttpSettings = AppConfig["http"];
export type RawFeedConfig = z.infer<typeof feedConfigSchema>;
export type PushbulletConfig = z.infer<typeof pushbulletConfigSchema>;
export type MailgunConfig = z.infer<typeof mailgunConfigSchema>;
