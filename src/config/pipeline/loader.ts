/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Overlaying RESEARCH_* environment variables on the defaults
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import type { ZodIssue } from "zod";
import { ConfigError, optionalEnv, optionalEnvBool, optionalEnvInt, optionalEnvNumber } from "../env.js";
import {
  PipelineConfigSchema,
  type CacheSettings,
  type CoverageSettings,
  type FetchSettings,
  type PipelineConfig,
  type RetrySettings,
} from "./schema.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for pipeline configuration.
 */
export class PipelineConfigError extends ConfigError {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Pipeline configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Partial configuration accepted from callers (CLI flags, tests).
 * Each section is shallow-merged over the base configuration.
 */
export interface PipelineConfigOverrides {
  fetch?: Partial<FetchSettings>;
  retry?: Partial<RetrySettings>;
  cache?: Partial<CacheSettings>;
  coverage?: Partial<CoverageSettings>;
  runTimeoutMs?: number;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load pipeline configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen PipelineConfig
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(input: unknown): Readonly<PipelineConfig> {
  const result = PipelineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  const config = result.data;
  if (config.coverage.criticalFloor > config.coverage.completenessThreshold) {
    throw new PipelineConfigError("Invalid pipeline configuration: 1 validation error(s)", [
      {
        path: ["coverage", "criticalFloor"],
        message: "criticalFloor must not exceed completenessThreshold",
        code: "custom",
      },
    ]);
  }

  return deepFreeze(config);
}

/**
 * Merge overrides section by section over a base configuration.
 * The result is not validated; pass it through loadPipelineConfig.
 */
export function mergePipelineConfig(
  base: PipelineConfig,
  overrides: PipelineConfigOverrides
): PipelineConfig {
  return {
    fetch: { ...base.fetch, ...overrides.fetch },
    retry: { ...base.retry, ...overrides.retry },
    cache: { ...base.cache, ...overrides.cache },
    coverage: { ...base.coverage, ...overrides.coverage },
    runTimeoutMs: overrides.runTimeoutMs ?? base.runTimeoutMs,
  };
}

/**
 * Build the pipeline configuration from RESEARCH_* environment variables,
 * falling back to DEFAULT_PIPELINE_CONFIG for anything unset.
 *
 * @throws ConfigError on malformed variables, PipelineConfigError on out-of-range values
 */
export function pipelineConfigFromEnv(
  overrides: PipelineConfigOverrides = {}
): Readonly<PipelineConfig> {
  const d = DEFAULT_PIPELINE_CONFIG;
  const fromEnv: PipelineConfig = {
    fetch: {
      concurrency: optionalEnvInt("RESEARCH_CONCURRENCY", d.fetch.concurrency),
      perHostLimit: optionalEnvInt("RESEARCH_PER_HOST_LIMIT", d.fetch.perHostLimit),
      timeoutMs: optionalEnvInt("RESEARCH_FETCH_TIMEOUT_MS", d.fetch.timeoutMs),
      maxBodyBytes: optionalEnvInt("RESEARCH_MAX_BODY_BYTES", d.fetch.maxBodyBytes),
      userAgent: optionalEnv("RESEARCH_USER_AGENT", d.fetch.userAgent),
    },
    retry: {
      maxAttempts: optionalEnvInt("RESEARCH_MAX_ATTEMPTS", d.retry.maxAttempts),
      baseDelayMs: optionalEnvInt("RESEARCH_BACKOFF_BASE_MS", d.retry.baseDelayMs),
      factor: optionalEnvNumber("RESEARCH_BACKOFF_FACTOR", d.retry.factor),
      jitterMs: optionalEnvInt("RESEARCH_BACKOFF_JITTER_MS", d.retry.jitterMs),
      maxDelayMs: optionalEnvInt("RESEARCH_BACKOFF_MAX_MS", d.retry.maxDelayMs),
    },
    cache: {
      enabled: optionalEnvBool("RESEARCH_CACHE_ENABLED", d.cache.enabled),
      directory: optionalEnv("RESEARCH_CACHE_DIR", d.cache.directory),
      ttlMs: optionalEnvInt("RESEARCH_CACHE_TTL_MS", d.cache.ttlMs),
    },
    coverage: {
      completenessThreshold: optionalEnvNumber(
        "RESEARCH_COMPLETENESS_THRESHOLD",
        d.coverage.completenessThreshold
      ),
      criticalFloor: optionalEnvNumber("RESEARCH_CRITICAL_FLOOR", d.coverage.criticalFloor),
      maxSupplementalPasses: optionalEnvInt(
        "RESEARCH_MAX_SUPPLEMENTAL_PASSES",
        d.coverage.maxSupplementalPasses
      ),
      supplementalBatchSize: optionalEnvInt(
        "RESEARCH_SUPPLEMENTAL_BATCH_SIZE",
        d.coverage.supplementalBatchSize
      ),
    },
    runTimeoutMs: optionalEnvInt("RESEARCH_RUN_TIMEOUT_MS", d.runTimeoutMs),
  };

  return loadPipelineConfig(mergePipelineConfig(fromEnv, overrides));
}
