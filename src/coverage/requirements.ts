/**
 * Required coverage signals per category.
 *
 *   core-framework   → a pattern and an example for each of data, auth, storage
 *   integration      → a pattern and an example
 *   pattern-specific → a gotcha and a pattern
 *
 * Signals with an area are satisfied only by fragments from targets of
 * that area; area-less signals by any fragment of the category.
 */

import { CORE_AREAS, type Category } from "../config/pipeline/enums.js";
import type { CoverageSignal } from "../types/coverage.js";

export const REQUIRED_SIGNALS: Readonly<Record<Category, readonly CoverageSignal[]>> = {
  "core-framework": CORE_AREAS.flatMap((area): CoverageSignal[] => [
    { kind: "has-pattern", area },
    { kind: "has-example", area },
  ]),
  integration: [
    { kind: "has-pattern", area: null },
    { kind: "has-example", area: null },
  ],
  "pattern-specific": [
    { kind: "has-gotcha", area: null },
    { kind: "has-pattern", area: null },
  ],
};

export function formatSignal(signal: CoverageSignal): string {
  return signal.area === null ? signal.kind : `${signal.kind} (${signal.area})`;
}
