/**
 * Bundle Writer Tests
 *
 * Run: node --import tsx --test src/bundle/writer.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AggregatedFragments } from "../aggregate/aggregator.js";
import { validateCoverage } from "../coverage/validator.js";
import { FatalConfigError } from "../pipeline/errors.js";
import type { ResearchBundle } from "../types/bundle.js";
import type { ExtractedPattern, Gotcha } from "../types/extraction.js";
import type { FetchResult } from "../types/fetch.js";
import type { FetchTarget } from "../types/target.js";
import { codeFence, ensureWritableDirectory, writeBundle } from "./writer.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const THRESHOLDS = { completenessThreshold: 0.85, criticalFloor: 0.6 };
const ORIGIN = { domain: "fitness-tracker", pattern: "social_platform", pass: 0 } as const;

const DATA: FetchTarget = {
  url: "https://docs.example.test/data/",
  category: "core-framework",
  priority: "critical",
  area: "data",
  origin: ORIGIN,
};
const REALTIME: FetchTarget = {
  url: "https://docs.example.test/realtime/",
  category: "integration",
  priority: "important",
  area: "realtime",
  origin: ORIGIN,
};
const AUTH: FetchTarget = {
  url: "https://docs.example.test/auth/",
  category: "core-framework",
  priority: "critical",
  area: "auth",
  origin: ORIGIN,
};

function fetched(target: FetchTarget, error: string | null = null): FetchResult {
  return {
    target,
    status: error ? "error" : "ok",
    content: error ? null : "body",
    contentType: "text/html",
    httpStatus: error ? 404 : 200,
    fetchedAt: "2026-03-01T09:59:00.000Z",
    attempts: 1,
    error,
    fromCache: false,
  };
}

const SCHEMA_PATTERN: ExtractedPattern = {
  sourceUrl: DATA.url,
  codeText: "const schema = a.schema({\n  Todo: a.model({}),\n});",
  language: "ts",
  description: "Define the schema:",
  category: "core-framework",
  area: "data",
  kind: "example",
};

const FENCED_PATTERN: ExtractedPattern = {
  sourceUrl: REALTIME.url,
  codeText: 'const fence = "```";\nconst inner = fence + "x";',
  language: "ts",
  description: "",
  category: "integration",
  area: "realtime",
  kind: "pattern",
};

const POLICY_GOTCHA: Gotcha = {
  sourceUrl: DATA.url,
  warningText: "Warning: policy must be attached to user, not group.",
  nearbyContext: "Groups are optional.",
  indicator: "warning:",
  category: "core-framework",
  area: "data",
};

function makeBundle(): ResearchBundle {
  const targets = [DATA, REALTIME, AUTH];
  const fragments: AggregatedFragments = {
    patterns: { "core-framework": [SCHEMA_PATTERN], integration: [FENCED_PATTERN], "pattern-specific": [] },
    gotchas: { "core-framework": [POLICY_GOTCHA], integration: [], "pattern-specific": [] },
    dropped: 0,
  };
  const coverage = validateCoverage(targets, fragments, THRESHOLDS);

  return {
    runId: "20260301-abc123",
    request: { domain: "fitness-tracker", pattern: "social_platform", requestedPattern: "social" },
    createdAt: "2026-03-01T10:00:00.000Z",
    targets,
    fetchResults: [fetched(DATA), fetched(REALTIME), fetched(AUTH, "HTTP 404: Not Found")],
    patterns: fragments.patterns,
    gotchas: fragments.gotchas,
    coverage,
    overallScore: coverage.overallScore,
    status: coverage.status,
    passes: [
      {
        pass: 0,
        targetsAdded: 3,
        overallScore: coverage.overallScore,
        categoryScores: { "core-framework": 0.3333, integration: 0.5, "pattern-specific": 0 },
      },
    ],
    exhaustion: { passes: 2, missingCategories: ["core-framework", "integration"], reason: "bound" },
    cancelled: false,
  };
}

function withTempDir(fn: (dir: string) => void): void {
  const dir = mkdtempSync(join(tmpdir(), "bundle-writer-"));
  try {
    fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

function readTree(dir: string): Record<string, string> {
  const files: Record<string, string> = {};
  for (const name of readdirSync(dir, { recursive: true, encoding: "utf-8" }).sort()) {
    const path = join(dir, name);
    if (name.endsWith(".md") || name.endsWith(".json")) {
      files[name] = readFileSync(path, "utf-8");
    }
  }
  return files;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONTENT
// ═══════════════════════════════════════════════════════════════════════════

test("summary.md starts with the header block and names what is missing", () => {
  withTempDir((dir) => {
    const artifacts = writeBundle(makeBundle(), dir, THRESHOLDS);
    const lines = readFileSync(artifacts.summary, "utf-8").split("\n");

    assert.deepEqual(lines.slice(0, 7), [
      "runId: 20260301-abc123",
      "generatedAt: 2026-03-01T10:00:00.000Z",
      "status: incomplete",
      "overallScore: 0.4",
      "domain: fitness-tracker",
      "pattern: social_platform",
      "---",
    ]);
    for (const expected of [
      "| core-framework | critical | 0.3333 | 1 | 1 |",
      "| integration | important | 0.5 | 1 | 0 |",
      "- Critical category core-framework scored 0.3333, below the critical floor 0.6",
      "- core-framework: has-pattern (auth), has-example (auth), has-pattern (storage), has-example (storage)",
      "- integration: has-example",
      "| 0 | 3 | 0.4 |",
      "Stopped after 2 supplemental pass(es) because the supplemental pass limit was reached; still under threshold: core-framework, integration.",
      "- https://docs.example.test/auth/ (core-framework, error): HTTP 404: Not Found",
    ]) {
      assert.ok(lines.includes(expected), `missing line: ${expected}`);
    }
  });
});

test("coverage.json carries the gate result without run identity", () => {
  withTempDir((dir) => {
    const artifacts = writeBundle(makeBundle(), dir, THRESHOLDS);
    const parsed: unknown = JSON.parse(readFileSync(artifacts.coverage, "utf-8"));

    assert.deepEqual(parsed, {
      status: "incomplete",
      overallScore: 0.4,
      threshold: 0.85,
      criticalFloor: 0.6,
      categories: { "core-framework": 0.3333, integration: 0.5 },
      missing: {
        "core-framework": [
          "has-pattern (auth)",
          "has-example (auth)",
          "has-pattern (storage)",
          "has-example (storage)",
        ],
        integration: ["has-example"],
      },
      reasons: [
        "Overall score 0.4 is below the completeness threshold 0.85",
        "Critical category core-framework scored 0.3333, below the critical floor 0.6",
        "core-framework is missing has-pattern (auth), has-example (auth), has-pattern (storage), has-example (storage)",
        "integration is missing has-example",
      ],
    });
  });
});

test("category files list patterns and gotchas with their sources", () => {
  withTempDir((dir) => {
    writeBundle(makeBundle(), dir, THRESHOLDS);

    assert.equal(
      readFileSync(join(dir, "categories", "core-framework.md"), "utf-8"),
      [
        "# core-framework",
        "",
        "- priority: critical",
        "- score: 0.3333",
        "",
        "## Patterns",
        "",
        "### 1. Define the schema:",
        "",
        "- source: https://docs.example.test/data/",
        "- area: data",
        "- kind: example",
        "",
        "```ts",
        "const schema = a.schema({",
        "  Todo: a.model({}),",
        "});",
        "```",
        "",
        "## Gotchas",
        "",
        "### 1. warning:",
        "",
        "> Warning: policy must be attached to user, not group.",
        "",
        "Context: Groups are optional.",
        "",
        "- source: https://docs.example.test/data/",
        "- area: data",
        "",
      ].join("\n")
    );

    const integration = readFileSync(join(dir, "categories", "integration.md"), "utf-8").split("\n");
    assert.ok(integration.includes("### 1. (no description)"));
    assert.ok(integration.includes("````ts"));
    assert.ok(integration.includes("````"));
  });
});

test("codeFence outgrows the longest backtick run", () => {
  assert.equal(codeFence("plain"), "```");
  assert.equal(codeFence("a ```` b"), "`````");
});

// ═══════════════════════════════════════════════════════════════════════════
// IDEMPOTENCE AND LAYOUT
// ═══════════════════════════════════════════════════════════════════════════

test("rewriting the same bundle changes only the runId and generatedAt lines", () => {
  withTempDir((dir) => {
    const first = join(dir, "first");
    const second = join(dir, "second");
    writeBundle(makeBundle(), first, THRESHOLDS);
    writeBundle(
      { ...makeBundle(), runId: "20260302-def456", createdAt: "2026-03-02T11:00:00.000Z" },
      second,
      THRESHOLDS
    );

    const a = readTree(first);
    const b = readTree(second);
    assert.deepEqual(Object.keys(a), Object.keys(b));
    for (const name of Object.keys(a)) {
      const left = a[name] ?? "";
      const right = b[name] ?? "";
      if (name === "summary.md") {
        assert.notEqual(left, right);
        assert.equal(left.split("\n").slice(2).join("\n"), right.split("\n").slice(2).join("\n"));
      } else {
        assert.equal(left, right, `${name} differs`);
      }
    }
  });
});

test("stale category files from an earlier write are removed", () => {
  withTempDir((dir) => {
    mkdirSync(join(dir, "categories"), { recursive: true });
    writeFileSync(join(dir, "categories", "pattern-specific.md"), "# stale\n");

    writeBundle(makeBundle(), dir, THRESHOLDS);

    assert.deepEqual(readdirSync(join(dir, "categories")).sort(), [
      "core-framework.md",
      "integration.md",
    ]);
  });
});

test("an output path that cannot be created is fatal", () => {
  withTempDir((dir) => {
    const file = join(dir, "not-a-directory");
    writeFileSync(file, "x");
    assert.throws(() => ensureWritableDirectory(join(file, "bundle")), FatalConfigError);
  });
});
