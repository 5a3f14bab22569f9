import { z } from "zod";

// Node timers fire after 1ms when asked to wait longer than this.
const MAX_TIMER_MS = 2_147_483_647;

const resourceSchema = z
  .string()
  .regex(/^[A-Za-z0-9-]+\/[A-Za-z0-9._-]+$/, "must be in owner/repo format");

export const appConfigSchema = z.object({
  github: z
    .object({
      apiUrl: z.string().url().default("https://api.github.com"),
      userAgent: z.string().min(1).default("feedwatch"),
      perPage: z.number().int().min(1).max(100).default(30),
    })
    .default({}),
  polling: z
    .object({
      baseIntervalSeconds: z.number().positive().max(MAX_TIMER_MS / 1000).default(60),
      maxPages: z.number().int().positive().default(3),
      requestTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(10000),
      lowBudgetFloor: z.number().int().nonnegative().default(50),
      lowBudgetMultiplier: z.number().min(1).default(4),
    })
    .default({}),
  backoff: z
    .object({
      transientBaseMs: z.number().int().positive().max(MAX_TIMER_MS).default(2000),
      transientMaxRetries: z.number().int().nonnegative().default(5),
      rateLimitMinDelayMs: z.number().int().positive().max(MAX_TIMER_MS).default(60000),
      maxDelayMs: z.number().int().positive().max(MAX_TIMER_MS).default(3600000),
    })
    .default({}),
  seed: z
    .object({
      concurrency: z.number().int().positive().default(4),
    })
    .default({}),
  state: z
    .object({
      databasePath: z.string().min(1).optional(),
    })
    .default({}),
  resources: z.array(resourceSchema).default([]),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
