/**
 * Coverage and completeness definitions.
 */

import type { Category, DocArea, Priority, SignalKind } from "../config/pipeline/enums.js";

/**
 * One required piece of evidence. Area-scoped signals (core-framework)
 * carry the sub-area; category-wide ones carry null.
 */
export interface CoverageSignal {
  readonly kind: SignalKind;
  readonly area: DocArea | null;
}

export interface CategoryCoverage {
  readonly category: Category;
  readonly priority: Priority;
  readonly requiredSignals: readonly CoverageSignal[];
  readonly observedSignals: readonly CoverageSignal[];
  readonly missingSignals: readonly CoverageSignal[];
  /** observed / required, capped at 1 */
  readonly score: number;
}

export type BundleStatus = "complete" | "incomplete";

export interface CoverageReport {
  readonly categories: readonly CategoryCoverage[];
  readonly overallScore: number;
  readonly status: BundleStatus;
  /** Categories below the completeness threshold, for supplemental passes */
  readonly underCovered: readonly Category[];
  /** Critical categories below the critical floor */
  readonly criticalFailures: readonly Category[];
  /** Human-readable explanation of an incomplete status */
  readonly reasons: readonly string[];
}
