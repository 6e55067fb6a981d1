import cron from "node-cron";
import { z } from "zod";

const sourceBaseSchema = z.object({
  id: z
    .string()
    .min(1)
    .regex(/^[a-z0-9][a-z0-9_-]*$/, "must be a lowercase slug"),
  name: z.string().min(1),
  url: z.string().url(),
  enabled: z.boolean().default(true),
});

const rssSourceSchema = sourceBaseSchema.extend({
  kind: z.literal("rss"),
});

const htmlSourceSchema = sourceBaseSchema.extend({
  kind: z.literal("html"),
  itemSelector: z.string().min(1),
  titleSelector: z.string().min(1),
  linkSelector: z.string().min(1),
  excerptSelector: z.string().min(1).optional(),
});

export const sourceConfigSchema = z.discriminatedUnion("kind", [
  rssSourceSchema,
  htmlSourceSchema,
]);

const retryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().int().nonnegative().default(2000),
  maxDelayMs: z.number().int().nonnegative().default(60000),
});

export const appConfigSchema = z.object({
  llm: z.object({
    provider: z.enum([
      "anthropic",
      "openai",
      "gemini",
      "mistral",
      "ollama",
      "lmstudio",
    ]),
    model: z.string().min(1),
    timeoutMs: z.number().int().positive().default(60000),
    maxOutputChars: z.number().int().positive().default(3500),
    systemPrompt: z.string().min(1).optional(),
  }),
  sources: z
    .array(sourceConfigSchema)
    .min(1)
    .refine(
      (sources) => new Set(sources.map((s) => s.id)).size === sources.length,
      "source ids must be unique",
    ),
  channel: z.object({
    chatId: z.string().min(1),
    disableWebPagePreview: z.boolean().default(true),
    timeoutMs: z.number().int().positive().default(15000),
  }),
  schedule: z.object({
    poll: z
      .string()
      .min(1)
      .refine((expression) => cron.validate(expression), "must be a valid cron expression"),
    runOnStart: z.boolean().default(true),
  }),
  fetch: z
    .object({
      maxConcurrency: z.number().int().positive().default(4),
      timeoutMs: z.number().int().positive().default(15000),
    })
    .default({}),
  batch: z
    .object({
      maxItems: z.number().int().positive().default(10),
      maxChars: z.number().int().positive().default(12000),
    })
    .default({}),
  retry: z
    .object({
      llm: retryConfigSchema.default({}),
      channel: retryConfigSchema.default({}),
    })
    .default({}),
  items: z
    .object({
      maxAttempts: z.number().int().positive().default(5),
    })
    .default({}),
  filter: z
    .object({
      keywords: z.array(z.string().min(1)).default([]),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type RetryConfig = z.infer<typeof retryConfigSchema>;
