/**
 * Research bundle output and the downstream gate.
 */

export {
  writeBundle,
  renderSummary,
  renderCoverageJson,
  renderCategory,
  ensureWritableDirectory,
  codeFence,
  SUMMARY_FILE,
  COVERAGE_FILE,
  CATEGORIES_DIR,
  type BundleArtifacts,
} from "./writer.js";

export {
  readBundleSummary,
  parseSummaryHeader,
  assertBundleReady,
  BundleGateError,
  BundleSummaryHeaderSchema,
  type BundleSummaryHeader,
  type GateOptions,
} from "./gate.js";
