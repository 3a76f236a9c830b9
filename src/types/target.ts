/**
 * Research request and fetch target definitions.
 */

import type {
  ArchitecturePattern,
  Category,
  DocArea,
  Priority,
} from "../config/pipeline/enums.js";

export interface ResearchRequest {
  /** Free-text project domain (e.g. "contact-manager") */
  readonly domain: string;
  /** Parsed architecture pattern */
  readonly pattern: ArchitecturePattern;
  /** Pattern exactly as the caller gave it */
  readonly requestedPattern: string;
}

export interface TargetOrigin {
  readonly domain: string;
  readonly pattern: ArchitecturePattern;
  /** 0 for the initial resolution, n for the n-th supplemental pass */
  readonly pass: number;
}

/**
 * One URL scheduled for fetching. Identity is the URL.
 */
export interface FetchTarget {
  readonly url: string;
  readonly category: Category;
  readonly priority: Priority;
  readonly area: DocArea;
  readonly origin: TargetOrigin;
}
