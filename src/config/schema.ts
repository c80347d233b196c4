import cron from "node-cron";
import { z } from "zod";

const feedConfigSchema = z.object({
  title: z.string().min(1),
  url: z.string().url(),
});

const telegramConfigSchema = z.object({
  chatId: z.union([z.string().min(1), z.number().int()]).transform(String),
  apiBaseUrl: z.string().url().default("https://api.telegram.org"),
  openButtonLabel: z.string().min(1).default("Open"),
  pollTimeoutSeconds: z.number().int().positive().max(50).default(25),
  requestTimeoutMs: z.number().int().positive().default(15000),
  proxyUrl: z.string().url().optional(),
});

const scheduleConfigSchema = z
  .object({
    cron: z
      .string()
      .min(1)
      .refine((expression) => cron.validate(expression), "invalid cron expression")
      .optional(),
    firstUpdateAtHour: z.number().int().min(0).max(23).default(2),
    updateEveryHours: z.number().int().min(1).max(24).default(8),
    timezone: z.string().min(1).optional(),
  })
  .default({});

const publishConfigSchema = z
  .object({
    maxEntriesPerCycle: z.number().int().positive().default(1),
    minIntervalMinutes: z.number().nonnegative().default(0),
    reactions: z.boolean().default(true),
  })
  .default({});

const blacklistConfigSchema = z
  .object({
    words: z.array(z.string().min(1)).default([]),
    urlPrefixes: z.array(z.string().min(1)).default([]),
  })
  .default({});

export const appConfigSchema = z.object({
  feed: feedConfigSchema,
  telegram: telegramConfigSchema,
  schedule: scheduleConfigSchema,
  publish: publishConfigSchema,
  blacklist: blacklistConfigSchema,
  store: z
    .object({
      keyPrefix: z
        .string()
        .min(1)
        .regex(/^[^:]+$/, "must not contain ':'")
        .default("rssbot"),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ScheduleConfig = AppConfig["schedule"];
export type BlacklistConfig = AppConfig["blacklist"];
