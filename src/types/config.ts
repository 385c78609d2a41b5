import { z } from "zod";

export const StackExchangeConfigSchema = z.object({
  baseUrl: z.string().url().default("https://api.stackexchange.com/2.2/"),
  site: z.string().min(1).default("stackoverflow"),
  // Optional application key; anonymous requests get a smaller daily quota
  key: z.string().optional(),
});

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().nonnegative().default(3),
  baseDelayMs: z.number().int().positive().default(1000),
  maxDelayMs: z.number().int().positive().default(30000),
});

export const AggregationConfigSchema = z.object({
  // Quarters between the most recent one and the end of the trailing year
  offset: z.number().int().nonnegative().default(1),
  // Refuse to aggregate when fewer than 4 + offset quarters are stored
  strict: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  dataDir: z.string().default("~/.quarterly-metrics"),
  verbose: z.boolean().default(false),
  stackExchange: StackExchangeConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  aggregation: AggregationConfigSchema.default({}),
});

export type StackExchangeConfig = z.infer<typeof StackExchangeConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type AggregationConfig = z.infer<typeof AggregationConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
