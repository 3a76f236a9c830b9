/**
 * Target catalog and resolver.
 */

export {
  loadTargetCatalog,
  parseTargetCatalog,
  CatalogError,
  DEFAULT_CATALOG_PATH,
  TargetCatalogSchema,
  type TargetCatalog,
  type CoreEntry,
  type PatternEntry,
  type SupplementalEntry,
} from "./catalog.js";

export {
  resolveTargets,
  resolveSupplementalTargets,
  createResearchRequest,
  parsePattern,
  canonicalUrl,
  PATTERN_PRIORITIES,
  type SupplementalRequest,
} from "./resolver.js";
