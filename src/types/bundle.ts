/**
 * Research bundle definitions.
 */

import type { Category } from "../config/pipeline/enums.js";
import type { BundleStatus, CoverageReport } from "./coverage.js";
import type { ExtractedPattern, Gotcha } from "./extraction.js";
import type { FetchResult } from "./fetch.js";
import type { FetchTarget, ResearchRequest } from "./target.js";

export interface PassRecord {
  /** 0 = initial pass */
  readonly pass: number;
  readonly targetsAdded: number;
  readonly overallScore: number;
  readonly categoryScores: Readonly<Record<Category, number>>;
}

/**
 * Supplemental passes stopped while categories were still under threshold.
 */
export interface ResolverExhaustion {
  readonly passes: number;
  readonly missingCategories: readonly Category[];
  /** "bound" when the pass limit was hit, "no-targets" when the catalog ran dry */
  readonly reason: "bound" | "no-targets";
}

export interface ResearchBundle {
  readonly runId: string;
  readonly request: ResearchRequest;
  readonly createdAt: string;
  readonly targets: readonly FetchTarget[];
  readonly fetchResults: readonly FetchResult[];
  readonly patterns: Readonly<Record<Category, readonly ExtractedPattern[]>>;
  readonly gotchas: Readonly<Record<Category, readonly Gotcha[]>>;
  readonly coverage: CoverageReport;
  readonly overallScore: number;
  readonly status: BundleStatus;
  readonly passes: readonly PassRecord[];
  readonly exhaustion: ResolverExhaustion | null;
  readonly cancelled: boolean;
}
