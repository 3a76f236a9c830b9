/**
 * Pipeline Configuration Tests
 *
 * Run: node --import tsx --test src/config/pipeline/loader.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { ConfigError } from "../env.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
import {
  PipelineConfigError,
  deepFreeze,
  loadPipelineConfig,
  mergePipelineConfig,
  pipelineConfigFromEnv,
} from "./loader.js";

/** Set environment variables for the duration of fn, then restore them. */
function withEnv(vars: Record<string, string>, fn: () => void): void {
  const saved = new Map<string, string | undefined>();
  for (const [key, value] of Object.entries(vars)) {
    saved.set(key, process.env[key]);
    process.env[key] = value;
  }
  try {
    fn();
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

test("the defaults validate and come back frozen", () => {
  const config = loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);
  assert.deepEqual(config, DEFAULT_PIPELINE_CONFIG);
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.coverage));
});

test("invalid values are reported with their paths", () => {
  const input = mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, {
    fetch: { concurrency: 0 },
    retry: { maxAttempts: 11 },
  });

  assert.throws(
    () => loadPipelineConfig(input),
    (err: unknown) =>
      err instanceof PipelineConfigError &&
      err.message === "Invalid pipeline configuration: 2 validation error(s)" &&
      err.issues.map((i) => i.path.join(".")).join(",") === "fetch.concurrency,retry.maxAttempts"
  );
});

test("unknown keys are rejected", () => {
  assert.throws(
    () => loadPipelineConfig({ ...DEFAULT_PIPELINE_CONFIG, verbose: true }),
    (err: unknown) => err instanceof PipelineConfigError && err.issues[0]?.code === "unrecognized_keys"
  );
});

test("a critical floor above the completeness threshold is rejected", () => {
  const input = mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, {
    coverage: { completenessThreshold: 0.5, criticalFloor: 0.7 },
  });

  assert.throws(
    () => loadPipelineConfig(input),
    (err: unknown) =>
      err instanceof PipelineConfigError &&
      err.format() ===
        "Pipeline configuration validation failed:\n" +
          "  - coverage.criticalFloor: criticalFloor must not exceed completenessThreshold"
  );
});

test("mergePipelineConfig overlays one section without touching the others", () => {
  const merged = mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, { retry: { maxAttempts: 5 } });
  assert.equal(merged.retry.maxAttempts, 5);
  assert.equal(merged.retry.baseDelayMs, DEFAULT_PIPELINE_CONFIG.retry.baseDelayMs);
  assert.deepEqual(merged.fetch, DEFAULT_PIPELINE_CONFIG.fetch);
  assert.equal(merged.runTimeoutMs, DEFAULT_PIPELINE_CONFIG.runTimeoutMs);
});

test("RESEARCH_* variables override the defaults and explicit overrides win", () => {
  withEnv(
    {
      RESEARCH_CONCURRENCY: "4",
      RESEARCH_COMPLETENESS_THRESHOLD: "0.9",
      RESEARCH_CACHE_ENABLED: "no",
      RESEARCH_MAX_SUPPLEMENTAL_PASSES: "1",
    },
    () => {
      const config = pipelineConfigFromEnv({ coverage: { maxSupplementalPasses: 3 } });
      assert.equal(config.fetch.concurrency, 4);
      assert.equal(config.coverage.completenessThreshold, 0.9);
      assert.equal(config.cache.enabled, false);
      assert.equal(config.coverage.maxSupplementalPasses, 3);
      assert.equal(config.fetch.perHostLimit, DEFAULT_PIPELINE_CONFIG.fetch.perHostLimit);
    }
  );
});

test("a malformed integer variable is a ConfigError", () => {
  withEnv({ RESEARCH_MAX_ATTEMPTS: "three" }, () => {
    assert.throws(
      () => pipelineConfigFromEnv(),
      (err: unknown) =>
        err instanceof ConfigError &&
        err.message === "Environment variable RESEARCH_MAX_ATTEMPTS must be a valid integer, got: three"
    );
  });
});

test("an out-of-range variable is a PipelineConfigError", () => {
  withEnv({ RESEARCH_CRITICAL_FLOOR: "1.5" }, () => {
    assert.throws(() => pipelineConfigFromEnv(), PipelineConfigError);
  });
});

test("deepFreeze freezes nested objects and arrays and returns the same object", () => {
  const value = { outer: { inner: { n: 1 } }, list: [{ n: 2 }] };
  const frozen = deepFreeze(value);
  assert.equal(frozen, value);
  assert.ok(Object.isFrozen(value));
  assert.ok(Object.isFrozen(value.outer));
  assert.ok(Object.isFrozen(value.outer.inner));
  assert.ok(Object.isFrozen(value.list));
  assert.ok(Object.isFrozen(value.list[0]));
});
