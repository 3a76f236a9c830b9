/**
 * Pipeline configuration schema definition.
 *
 * The configuration is validated once when a run starts and then treated
 * as read-only: every stage of a run (fetch, extraction, scoring,
 * supplemental passes) must operate under identical limits, and the
 * summary artifact records the threshold and floor it was gated with.
 * Changing a value requires a new run.
 */

import { z } from "zod";

/**
 * Fetch concurrency and timeouts.
 */
export const FetchSettingsSchema = z
  .object({
    /** Maximum number of fetches in flight across all hosts */
    concurrency: z
      .number()
      .int()
      .min(1)
      .max(64)
      .describe("Bounded worker pool size for fetches"),

    /** Maximum number of concurrent requests to a single host */
    perHostLimit: z
      .number()
      .int()
      .min(1)
      .describe("Concurrent requests allowed per documentation host"),

    /** Timeout for a single HTTP attempt */
    timeoutMs: z
      .number()
      .int()
      .min(1)
      .describe("Per-attempt HTTP timeout in milliseconds"),

    /** Responses larger than this are recorded as errors */
    maxBodyBytes: z
      .number()
      .int()
      .min(1)
      .describe("Upper bound on a response body in bytes"),

    /** User-Agent header sent with every request */
    userAgent: z.string().min(1).describe("User-Agent header for fetches"),
  })
  .strict();

export type FetchSettings = z.infer<typeof FetchSettingsSchema>;

/**
 * Retry policy for transient failures (timeouts, 5xx, 429, connection errors).
 */
export const RetrySettingsSchema = z
  .object({
    /** Total attempts per target, the first one included */
    maxAttempts: z.number().int().min(1).max(10),

    /** Delay before the first retry */
    baseDelayMs: z.number().int().min(0),

    /** Multiplier applied to the delay after every attempt */
    factor: z.number().min(1),

    /** Upper bound of the random jitter added to each delay */
    jitterMs: z.number().int().min(0),

    /** Cap on any single delay, Retry-After included */
    maxDelayMs: z.number().int().min(0),
  })
  .strict();

export type RetrySettings = z.infer<typeof RetrySettingsSchema>;

/**
 * URL content cache.
 */
export const CacheSettingsSchema = z
  .object({
    /** Disable to always hit the network */
    enabled: z.boolean(),

    /** Directory holding one JSON entry per URL */
    directory: z.string().min(1),

    /** Entries older than this are ignored */
    ttlMs: z.number().int().min(0),
  })
  .strict();

export type CacheSettings = z.infer<typeof CacheSettingsSchema>;

/**
 * Completeness gate and supplemental pass bounds.
 */
export const CoverageSettingsSchema = z
  .object({
    /** Minimum weighted overall score for status=complete */
    completenessThreshold: z.number().min(0).max(1),

    /** Minimum score every critical category must reach on its own */
    criticalFloor: z.number().min(0).max(1),

    /** Upper bound on supplemental resolve-fetch-extract passes */
    maxSupplementalPasses: z.number().int().min(0).max(10),

    /** New targets requested per under-covered category per pass */
    supplementalBatchSize: z.number().int().min(1),
  })
  .strict();

export type CoverageSettings = z.infer<typeof CoverageSettingsSchema>;

/**
 * Complete pipeline configuration.
 */
export const PipelineConfigSchema = z
  .object({
    fetch: FetchSettingsSchema,
    retry: RetrySettingsSchema,
    cache: CacheSettingsSchema,
    coverage: CoverageSettingsSchema,

    /** Overall wall-clock budget for one run */
    runTimeoutMs: z
      .number()
      .int()
      .min(1)
      .describe("Run is cancelled after this many milliseconds"),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
