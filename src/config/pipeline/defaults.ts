/**
 * Default pipeline configuration.
 *
 * Limits are chosen to stay polite towards documentation hosts: eight
 * fetches in flight overall, never more than two against one host, and
 * a bounded number of retries with exponential backoff.
 */

import type { PipelineConfig } from "./schema.js";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  fetch: {
    concurrency: 8,
    perHostLimit: 2,
    timeoutMs: 10_000,
    maxBodyBytes: 5 * 1024 * 1024,
    userAgent: "doc-research-pipeline/0.1 (+reference documentation crawler)",
  },

  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    factor: 2,
    jitterMs: 250,
    maxDelayMs: 8_000,
  },

  cache: {
    enabled: true,
    directory: ".cache/docs",
    ttlMs: 24 * 60 * 60 * 1000,
  },

  coverage: {
    completenessThreshold: 0.85,
    criticalFloor: 0.6,
    maxSupplementalPasses: 2,
    supplementalBatchSize: 3,
  },

  runTimeoutMs: 5 * 60 * 1000,
};
