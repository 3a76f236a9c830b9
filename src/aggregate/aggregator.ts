/**
 * Aggregator.
 *
 * Groups extracted fragments by category. Fragments are visited in
 * target resolution order, never in fetch completion order, so the same
 * inputs always aggregate identically. Fragments whose source is not an
 * `ok` fetch result are dropped. Patterns are deduplicated on (category,
 * whitespace-normalized code), first occurrence wins. Gotchas are all
 * kept, each with its own source.
 */

import { Category } from "../config/pipeline/enums.js";
import type { DocumentExtraction, ExtractedPattern, Gotcha } from "../types/extraction.js";
import type { FetchResult } from "../types/fetch.js";
import type { FetchTarget } from "../types/target.js";

export interface AggregatedFragments {
  readonly patterns: Readonly<Record<Category, readonly ExtractedPattern[]>>;
  readonly gotchas: Readonly<Record<Category, readonly Gotcha[]>>;
  /** Duplicate patterns plus fragments from non-ok or unknown sources */
  readonly dropped: number;
}

export function normalizeCode(codeText: string): string {
  return codeText.replace(/\s+/g, " ").trim();
}

function emptyByCategory<T>(): Record<Category, T[]> {
  return {
    "core-framework": [],
    integration: [],
    "pattern-specific": [],
  };
}

export function aggregateFragments(
  targets: readonly FetchTarget[],
  results: readonly FetchResult[],
  extractions: readonly DocumentExtraction[]
): AggregatedFragments {
  const okUrls = new Set(results.filter((r) => r.status === "ok").map((r) => r.target.url));
  const byUrl = new Map<string, DocumentExtraction[]>();
  for (const extraction of extractions) {
    const list = byUrl.get(extraction.sourceUrl) ?? [];
    list.push(extraction);
    byUrl.set(extraction.sourceUrl, list);
  }

  const patterns = emptyByCategory<ExtractedPattern>();
  const gotchas = emptyByCategory<Gotcha>();
  const seenPatterns = new Set<string>();
  let dropped = 0;

  const visited = new Set<string>();
  for (const target of targets) {
    if (visited.has(target.url)) {
      continue;
    }
    visited.add(target.url);

    for (const extraction of byUrl.get(target.url) ?? []) {
      if (!okUrls.has(target.url)) {
        dropped += extraction.patterns.length + extraction.gotchas.length;
        continue;
      }

      for (const pattern of extraction.patterns) {
        const key = `${pattern.category}\u0000${normalizeCode(pattern.codeText)}`;
        if (seenPatterns.has(key)) {
          dropped++;
          continue;
        }
        seenPatterns.add(key);
        patterns[pattern.category].push(pattern);
      }

      for (const gotcha of extraction.gotchas) {
        gotchas[gotcha.category].push(gotcha);
      }
    }
  }

  // Extractions for URLs outside the target list have no resolvable source
  for (const [url, list] of byUrl) {
    if (!visited.has(url)) {
      dropped += list.reduce((n, e) => n + e.patterns.length + e.gotchas.length, 0);
    }
  }

  return { patterns, gotchas, dropped };
}

/** Fragment counts per category, in enum order. */
export function countFragments(fragments: AggregatedFragments): Record<Category, number> {
  const result: Record<Category, number> = {
    "core-framework": 0,
    integration: 0,
    "pattern-specific": 0,
  };
  for (const category of Category.options) {
    result[category] = fragments.patterns[category].length + fragments.gotchas[category].length;
  }
  return result;
}
