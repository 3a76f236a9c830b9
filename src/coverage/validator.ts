/**
 * Completeness Validator.
 *
 * Scores each category present in the target set by the share of its
 * required signals that the aggregated fragments satisfy, then combines
 * them into a priority-weighted overall score. A bundle is complete only
 * when the overall score reaches the threshold AND every critical
 * category reaches the critical floor on its own.
 *
 * Signals are category-scoped: a fragment counts only toward the
 * category of the target it came from. Adding fragments can therefore
 * never lower any score.
 */

import {
  Category,
  PRIORITY_RANK,
  PRIORITY_WEIGHT,
  type Priority,
} from "../config/pipeline/enums.js";
import type { CoverageSettings } from "../config/pipeline/schema.js";
import type { AggregatedFragments } from "../aggregate/aggregator.js";
import type {
  BundleStatus,
  CategoryCoverage,
  CoverageReport,
  CoverageSignal,
} from "../types/coverage.js";
import type { FetchTarget } from "../types/target.js";
import { REQUIRED_SIGNALS, formatSignal } from "./requirements.js";

type Thresholds = Pick<CoverageSettings, "completenessThreshold" | "criticalFloor">;

export function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function isObserved(
  signal: CoverageSignal,
  category: Category,
  fragments: AggregatedFragments
): boolean {
  const inArea = (area: string): boolean => signal.area === null || signal.area === area;
  switch (signal.kind) {
    case "has-pattern":
      return fragments.patterns[category].some((p) => inArea(p.area));
    case "has-example":
      return fragments.patterns[category].some((p) => p.kind === "example" && inArea(p.area));
    case "has-gotcha":
      return fragments.gotchas[category].some((g) => inArea(g.area));
  }
}

/**
 * Highest priority among the targets of each category present.
 */
export function categoryPriorities(targets: readonly FetchTarget[]): Map<Category, Priority> {
  const priorities = new Map<Category, Priority>();
  for (const target of targets) {
    const current = priorities.get(target.category);
    if (current === undefined || PRIORITY_RANK[target.priority] < PRIORITY_RANK[current]) {
      priorities.set(target.category, target.priority);
    }
  }
  return priorities;
}

export function scoreCategory(
  category: Category,
  priority: Priority,
  fragments: AggregatedFragments
): CategoryCoverage {
  const requiredSignals = REQUIRED_SIGNALS[category];
  const observedSignals = requiredSignals.filter((s) => isObserved(s, category, fragments));
  const missingSignals = requiredSignals.filter((s) => !isObserved(s, category, fragments));
  const score =
    requiredSignals.length === 0
      ? 1
      : roundScore(Math.min(1, observedSignals.length / requiredSignals.length));

  return { category, priority, requiredSignals, observedSignals, missingSignals, score };
}

/** Weighted mean of category scores (critical 3, important 2, supplementary 1). */
export function weightedOverall(categories: readonly CategoryCoverage[]): number {
  let weighted = 0;
  let weights = 0;
  for (const c of categories) {
    weighted += PRIORITY_WEIGHT[c.priority] * c.score;
    weights += PRIORITY_WEIGHT[c.priority];
  }
  return weights === 0 ? 0 : roundScore(weighted / weights);
}

export interface StatusDecision {
  readonly status: BundleStatus;
  readonly criticalFailures: readonly Category[];
  readonly reasons: readonly string[];
}

/**
 * Gate decision. `complete` needs overall ≥ threshold and every critical
 * category ≥ floor; otherwise the reasons say which condition failed and
 * which signals are missing.
 */
export function determineStatus(
  overallScore: number,
  categories: readonly CategoryCoverage[],
  thresholds: Thresholds
): StatusDecision {
  const criticalFailures = categories
    .filter((c) => c.priority === "critical" && c.score < thresholds.criticalFloor)
    .map((c) => c.category);
  const belowThreshold = overallScore < thresholds.completenessThreshold;

  if (!belowThreshold && criticalFailures.length === 0) {
    return { status: "complete", criticalFailures, reasons: [] };
  }

  const reasons: string[] = [];
  if (belowThreshold) {
    reasons.push(
      `Overall score ${overallScore} is below the completeness threshold ${thresholds.completenessThreshold}`
    );
  }
  for (const category of criticalFailures) {
    const score = categories.find((c) => c.category === category)?.score ?? 0;
    reasons.push(
      `Critical category ${category} scored ${score}, below the critical floor ${thresholds.criticalFloor}`
    );
  }
  for (const c of categories) {
    if (c.missingSignals.length > 0) {
      reasons.push(`${c.category} is missing ${c.missingSignals.map(formatSignal).join(", ")}`);
    }
  }

  return { status: "incomplete", criticalFailures, reasons };
}

/**
 * Score the aggregated fragments of a run against the categories its
 * targets cover.
 */
export function validateCoverage(
  targets: readonly FetchTarget[],
  fragments: AggregatedFragments,
  thresholds: Thresholds
): CoverageReport {
  const priorities = categoryPriorities(targets);
  const categories: CategoryCoverage[] = [];
  for (const category of Category.options) {
    const priority = priorities.get(category);
    if (priority !== undefined) {
      categories.push(scoreCategory(category, priority, fragments));
    }
  }

  const overallScore = weightedOverall(categories);
  const decision = determineStatus(overallScore, categories, thresholds);

  return {
    categories,
    overallScore,
    status: decision.status,
    underCovered: categories
      .filter((c) => c.score < thresholds.completenessThreshold)
      .map((c) => c.category),
    criticalFailures: decision.criticalFailures,
    reasons: decision.reasons,
  };
}
