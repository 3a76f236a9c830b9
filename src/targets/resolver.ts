/**
 * Target Resolver.
 *
 * Maps a (domain, pattern) request to an ordered, URL-deduplicated list of
 * fetch targets, and on supplemental passes to the NEW targets that may
 * fill under-covered categories.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * PRIORITY TABLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Priorities are assigned by PATTERN_PRIORITIES, keyed on the pattern. A
 * category missing from a pattern's row is not resolved at all, which is
 * how "simple_crud" and "unknown" end up with core-framework targets only:
 *
 *   pattern              core-framework  integration    pattern-specific
 *   social_platform      critical        important      critical
 *   e_commerce           critical        critical       important
 *   content_management   critical        supplementary  important
 *   dashboard_analytics  critical        important      important
 *   simple_crud          critical        -              -
 *   unknown              critical        -              -
 *
 * "unknown" is the degraded mode for unrecognized patterns, not a failure.
 * Only a catalog without core-framework entries is fatal.
 */

import {
  ArchitecturePattern,
  PRIORITY_RANK,
  type Category,
  type DocArea,
  type Priority,
} from "../config/pipeline/enums.js";
import { FatalConfigError } from "../pipeline/errors.js";
import type { FetchTarget, ResearchRequest } from "../types/target.js";
import type { TargetCatalog } from "./catalog.js";

export const PATTERN_PRIORITIES: Readonly<
  Record<ArchitecturePattern, Readonly<Partial<Record<Category, Priority>>>>
> = {
  social_platform: {
    "core-framework": "critical",
    integration: "important",
    "pattern-specific": "critical",
  },
  e_commerce: {
    "core-framework": "critical",
    integration: "critical",
    "pattern-specific": "important",
  },
  content_management: {
    "core-framework": "critical",
    integration: "supplementary",
    "pattern-specific": "important",
  },
  dashboard_analytics: {
    "core-framework": "critical",
    integration: "important",
    "pattern-specific": "important",
  },
  simple_crud: { "core-framework": "critical" },
  unknown: { "core-framework": "critical" },
};

/** Shorthands accepted in addition to the canonical enum names. */
const PATTERN_ALIASES: Readonly<Record<string, ArchitecturePattern>> = {
  social: "social_platform",
  ecommerce: "e_commerce",
  shop: "e_commerce",
  cms: "content_management",
  content: "content_management",
  dashboard: "dashboard_analytics",
  analytics: "dashboard_analytics",
  crud: "simple_crud",
};

/**
 * Parse a free-text pattern name. Case, spaces and dashes are ignored;
 * anything unrecognized becomes "unknown".
 */
export function parsePattern(input: string): ArchitecturePattern {
  const normalized = input.trim().toLowerCase().replace(/[\s-]+/g, "_");
  const parsed = ArchitecturePattern.safeParse(normalized);
  if (parsed.success) {
    return parsed.data;
  }
  return PATTERN_ALIASES[normalized] ?? "unknown";
}

/**
 * Build a research request from raw inputs.
 *
 * @throws FatalConfigError if the domain is blank
 */
export function createResearchRequest(domain: string, pattern: string): ResearchRequest {
  const trimmed = domain.trim();
  if (trimmed === "") {
    throw new FatalConfigError("Research domain must not be blank");
  }
  return Object.freeze({
    domain: trimmed,
    pattern: parsePattern(pattern),
    requestedPattern: pattern,
  });
}

/**
 * Canonical form used as target identity: parsed URL without fragment.
 */
export function canonicalUrl(url: string): string {
  const parsed = new URL(url);
  parsed.hash = "";
  return parsed.toString();
}

function makeTarget(
  request: ResearchRequest,
  url: string,
  category: Category,
  area: DocArea,
  priority: Priority,
  pass: number
): FetchTarget {
  return Object.freeze({
    url: canonicalUrl(url),
    category,
    priority,
    area,
    origin: Object.freeze({ domain: request.domain, pattern: request.pattern, pass }),
  });
}

/**
 * Resolve the initial target list for a request.
 *
 * Core-framework entries come first in catalog order, then the pattern's
 * entries; duplicates keep their first occurrence. The result is sorted
 * by priority tier (stable, so catalog order holds within a tier).
 *
 * @throws FatalConfigError when the catalog has no core-framework fallback
 */
export function resolveTargets(request: ResearchRequest, catalog: TargetCatalog): FetchTarget[] {
  const priorities = PATTERN_PRIORITIES[request.pattern];
  const corePriority = priorities["core-framework"];
  if (corePriority === undefined || catalog.core.length === 0) {
    throw new FatalConfigError(
      `No core-framework target set resolvable for pattern "${request.requestedPattern}"`
    );
  }

  const targets: FetchTarget[] = [];
  const seen = new Set<string>();
  const add = (target: FetchTarget): void => {
    if (!seen.has(target.url)) {
      seen.add(target.url);
      targets.push(target);
    }
  };

  for (const entry of catalog.core) {
    add(makeTarget(request, entry.url, "core-framework", entry.area, corePriority, 0));
  }

  for (const entry of catalog.patterns[request.pattern] ?? []) {
    const priority = priorities[entry.category];
    if (priority === undefined) {
      continue;
    }
    add(makeTarget(request, entry.url, entry.category, entry.area, priority, 0));
  }

  return targets.sort((a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]);
}

export interface SupplementalRequest {
  /** Categories the validator reported under threshold */
  underCovered: readonly Category[];
  /** Every URL already resolved in this run */
  resolvedUrls: ReadonlySet<string>;
  /** 1-based supplemental pass number */
  pass: number;
  /** Maximum new targets per category */
  batchSize: number;
}

/**
 * Resolve additional targets for under-covered categories.
 *
 * Returns only URLs not resolved yet, only for the listed categories that
 * the request's pattern resolves at all, at most batchSize per category.
 * Supplemental targets sit in the supplementary tier. An empty result
 * means the catalog has nothing left to offer.
 */
export function resolveSupplementalTargets(
  request: ResearchRequest,
  catalog: TargetCatalog,
  supplemental: SupplementalRequest
): FetchTarget[] {
  const priorities = PATTERN_PRIORITIES[request.pattern];
  const wanted = new Set(
    supplemental.underCovered.filter((category) => priorities[category] !== undefined)
  );
  const perCategory = new Map<Category, number>();
  const seen = new Set<string>();
  const targets: FetchTarget[] = [];

  for (const entry of catalog.supplemental) {
    if (!wanted.has(entry.category)) {
      continue;
    }
    if (entry.patterns && !entry.patterns.includes(request.pattern)) {
      continue;
    }
    const taken = perCategory.get(entry.category) ?? 0;
    if (taken >= supplemental.batchSize) {
      continue;
    }
    const url = canonicalUrl(entry.url);
    if (supplemental.resolvedUrls.has(url) || seen.has(url)) {
      continue;
    }

    seen.add(url);
    perCategory.set(entry.category, taken + 1);
    targets.push(
      makeTarget(request, url, entry.category, entry.area, "supplementary", supplemental.pass)
    );
  }

  return targets;
}
