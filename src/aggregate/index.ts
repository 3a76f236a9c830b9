/**
 * Fragment aggregation.
 */

export {
  aggregateFragments,
  countFragments,
  normalizeCode,
  type AggregatedFragments,
} from "./aggregator.js";
