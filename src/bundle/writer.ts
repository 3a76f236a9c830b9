/**
 * Research bundle writer.
 *
 * Layout of an output directory:
 *
 *   summary.md                  header block, "---", deterministic body
 *   coverage.json               machine-readable gate result
 *   categories/<category>.md    patterns and gotchas with their sources
 *
 * Only the `runId` and `generatedAt` header lines depend on the run;
 * writing the same bundle content twice produces otherwise identical
 * files. The categories directory is replaced on every write so stale
 * categories from an earlier run never survive.
 */

import { accessSync, constants, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Category } from "../config/pipeline/enums.js";
import type { CoverageSettings } from "../config/pipeline/schema.js";
import { formatSignal } from "../coverage/requirements.js";
import { FatalConfigError } from "../pipeline/errors.js";
import type { ResearchBundle } from "../types/bundle.js";
import type { ExtractedPattern, Gotcha } from "../types/extraction.js";

export const SUMMARY_FILE = "summary.md";
export const COVERAGE_FILE = "coverage.json";
export const CATEGORIES_DIR = "categories";
export const HEADER_SEPARATOR = "---";

type Thresholds = Pick<CoverageSettings, "completenessThreshold" | "criticalFloor">;

export interface BundleArtifacts {
  readonly directory: string;
  readonly summary: string;
  readonly coverage: string;
  readonly categories: readonly string[];
}

/**
 * Create the output directory if needed and check it is writable.
 *
 * @throws FatalConfigError when it cannot be created or written
 */
export function ensureWritableDirectory(directory: string): void {
  try {
    mkdirSync(directory, { recursive: true });
    accessSync(directory, constants.W_OK);
  } catch (err) {
    throw new FatalConfigError(
      `Output directory ${directory} is not writable: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/** Fence long enough that no backtick run inside the code can close it. */
export function codeFence(codeText: string): string {
  const longest = Math.max(0, ...(codeText.match(/`+/g) ?? []).map((run) => run.length));
  return "`".repeat(Math.max(3, longest + 1));
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

export function renderSummary(bundle: ResearchBundle, thresholds: Thresholds): string {
  const { coverage } = bundle;
  const lines: string[] = [
    `runId: ${bundle.runId}`,
    `generatedAt: ${bundle.createdAt}`,
    `status: ${bundle.status}`,
    `overallScore: ${bundle.overallScore}`,
    `domain: ${bundle.request.domain}`,
    `pattern: ${bundle.request.pattern}`,
    HEADER_SEPARATOR,
    "",
    `# Research bundle: ${bundle.request.domain} (${bundle.request.pattern})`,
    "",
    "## Coverage",
    "",
    "| Category | Priority | Score | Patterns | Gotchas |",
    "| --- | --- | --- | --- | --- |",
  ];

  for (const c of coverage.categories) {
    lines.push(
      `| ${c.category} | ${c.priority} | ${c.score} | ${bundle.patterns[c.category].length} | ${bundle.gotchas[c.category].length} |`
    );
  }

  lines.push(
    "",
    "## Gate",
    "",
    `- completenessThreshold: ${thresholds.completenessThreshold}`,
    `- criticalFloor: ${thresholds.criticalFloor}`
  );
  if (bundle.cancelled) {
    lines.push("- run cancelled before all passes finished");
  }
  lines.push("");
  if (coverage.reasons.length === 0) {
    lines.push("All gates passed.");
  } else {
    for (const reason of coverage.reasons) {
      lines.push(`- ${reason}`);
    }
  }

  lines.push("", "## Missing", "");
  const missing = coverage.categories.filter((c) => c.missingSignals.length > 0);
  if (missing.length === 0) {
    lines.push("None.");
  } else {
    for (const c of missing) {
      lines.push(`- ${c.category}: ${c.missingSignals.map(formatSignal).join(", ")}`);
    }
  }

  lines.push("", "## Passes", "", "| Pass | Targets added | Overall score |", "| --- | --- | --- |");
  for (const pass of bundle.passes) {
    lines.push(`| ${pass.pass} | ${pass.targetsAdded} | ${pass.overallScore} |`);
  }
  if (bundle.exhaustion) {
    const reason =
      bundle.exhaustion.reason === "bound"
        ? "the supplemental pass limit was reached"
        : "the catalog had no further targets";
    lines.push(
      "",
      `Stopped after ${bundle.exhaustion.passes} supplemental pass(es) because ${reason}; ` +
        `still under threshold: ${bundle.exhaustion.missingCategories.join(", ")}.`
    );
  }

  const counts = { ok: 0, error: 0, timeout: 0 };
  for (const result of bundle.fetchResults) {
    counts[result.status]++;
  }
  lines.push(
    "",
    "## Fetches",
    "",
    `- targets: ${bundle.targets.length}`,
    `- ok: ${counts.ok}`,
    `- error: ${counts.error}`,
    `- timeout: ${counts.timeout}`,
    "",
    "### Failed fetches",
    ""
  );
  const failed = bundle.fetchResults.filter((r) => r.status !== "ok");
  if (failed.length === 0) {
    lines.push("None.");
  } else {
    for (const r of failed) {
      lines.push(`- ${r.target.url} (${r.target.category}, ${r.status}): ${r.error ?? "unknown error"}`);
    }
  }

  return lines.join("\n") + "\n";
}

// ═══════════════════════════════════════════════════════════════════════════
// COVERAGE JSON
// ═══════════════════════════════════════════════════════════════════════════

export function renderCoverageJson(bundle: ResearchBundle, thresholds: Thresholds): string {
  const categories: Partial<Record<Category, number>> = {};
  const missing: Partial<Record<Category, string[]>> = {};
  for (const c of bundle.coverage.categories) {
    categories[c.category] = c.score;
    if (c.missingSignals.length > 0) {
      missing[c.category] = c.missingSignals.map(formatSignal);
    }
  }

  const document = {
    status: bundle.status,
    overallScore: bundle.overallScore,
    threshold: thresholds.completenessThreshold,
    criticalFloor: thresholds.criticalFloor,
    categories,
    missing,
    reasons: bundle.coverage.reasons,
  };
  return JSON.stringify(document, null, 2) + "\n";
}

// ═══════════════════════════════════════════════════════════════════════════
// CATEGORY FILES
// ═══════════════════════════════════════════════════════════════════════════

function renderPattern(pattern: ExtractedPattern, index: number): string[] {
  const fence = codeFence(pattern.codeText);
  const title = pattern.description ? oneLine(pattern.description) : "(no description)";
  return [
    `### ${index + 1}. ${title}`,
    "",
    `- source: ${pattern.sourceUrl}`,
    `- area: ${pattern.area}`,
    `- kind: ${pattern.kind}`,
    "",
    `${fence}${pattern.language ?? ""}`,
    pattern.codeText,
    fence,
    "",
  ];
}

function renderGotcha(gotcha: Gotcha, index: number): string[] {
  const lines = [
    `### ${index + 1}. ${gotcha.indicator}`,
    "",
    `> ${oneLine(gotcha.warningText)}`,
    "",
  ];
  if (gotcha.nearbyContext) {
    lines.push(`Context: ${oneLine(gotcha.nearbyContext)}`, "");
  }
  lines.push(`- source: ${gotcha.sourceUrl}`, `- area: ${gotcha.area}`, "");
  return lines;
}

export function renderCategory(bundle: ResearchBundle, category: Category): string {
  const coverage = bundle.coverage.categories.find((c) => c.category === category);
  const patterns = bundle.patterns[category];
  const gotchas = bundle.gotchas[category];

  const lines = [
    `# ${category}`,
    "",
    `- priority: ${coverage?.priority ?? "n/a"}`,
    `- score: ${coverage?.score ?? 0}`,
    "",
    "## Patterns",
    "",
  ];
  if (patterns.length === 0) {
    lines.push("None.", "");
  }
  patterns.forEach((p, i) => lines.push(...renderPattern(p, i)));

  lines.push("## Gotchas", "");
  if (gotchas.length === 0) {
    lines.push("None.", "");
  }
  gotchas.forEach((g, i) => lines.push(...renderGotcha(g, i)));

  return lines.join("\n").replace(/\n+$/, "") + "\n";
}

// ═══════════════════════════════════════════════════════════════════════════
// WRITE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Write the bundle's artifacts into a directory.
 *
 * @returns paths of every file written
 */
export function writeBundle(
  bundle: ResearchBundle,
  directory: string,
  thresholds: Thresholds
): BundleArtifacts {
  ensureWritableDirectory(directory);
  rmSync(join(directory, SUMMARY_FILE), { force: true });

  const categoriesDir = join(directory, CATEGORIES_DIR);
  rmSync(categoriesDir, { recursive: true, force: true });
  mkdirSync(categoriesDir, { recursive: true });

  const categories: string[] = [];
  for (const c of bundle.coverage.categories) {
    const path = join(categoriesDir, `${c.category}.md`);
    writeFileSync(path, renderCategory(bundle, c.category), "utf-8");
    categories.push(path);
  }

  const coverage = join(directory, COVERAGE_FILE);
  writeFileSync(coverage, renderCoverageJson(bundle, thresholds), "utf-8");

  // Summary last: its presence marks a finished bundle
  const summary = join(directory, SUMMARY_FILE);
  writeFileSync(summary, renderSummary(bundle, thresholds), "utf-8");

  return { directory, summary, coverage, categories };
}
