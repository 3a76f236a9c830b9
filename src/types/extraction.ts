/**
 * Fragments extracted from fetched documents.
 */

import type { Category, DocArea } from "../config/pipeline/enums.js";

/**
 * pattern → reusable configuration or program logic
 * example → the same, presented as a usage example
 */
export type PatternKind = "pattern" | "example";

export interface ExtractedPattern {
  readonly sourceUrl: string;
  readonly codeText: string;
  /** Fence language tag or pre/code class, when the page declares one */
  readonly language: string | null;
  /** Text of the block immediately preceding the code */
  readonly description: string;
  readonly category: Category;
  readonly area: DocArea;
  readonly kind: PatternKind;
}

export interface Gotcha {
  readonly sourceUrl: string;
  readonly warningText: string;
  /** The paragraph following the warning, empty when there is none */
  readonly nearbyContext: string;
  /** Lexicon entry that triggered detection */
  readonly indicator: string;
  readonly category: Category;
  readonly area: DocArea;
}

export interface DocumentExtraction {
  readonly sourceUrl: string;
  readonly patterns: readonly ExtractedPattern[];
  readonly gotchas: readonly Gotcha[];
  /** Why the document yielded nothing, when it was skipped */
  readonly skipped: string | null;
}
