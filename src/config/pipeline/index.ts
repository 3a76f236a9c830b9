/**
 * Pipeline configuration module.
 *
 * Provides schema-validated, immutable configuration for research runs.
 *
 * Usage:
 *   import { loadPipelineConfig, DEFAULT_PIPELINE_CONFIG } from "./config/pipeline/index.js";
 *
 *   // Defaults overlaid with RESEARCH_* environment variables
 *   const config = pipelineConfigFromEnv();
 *
 *   // Explicit overrides
 *   const strict = loadPipelineConfig(
 *     mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, { coverage: { completenessThreshold: 0.95 } })
 *   );
 */

// Domain enums
export {
  ArchitecturePattern,
  Category,
  Priority,
  DocArea,
  SignalKind,
  CORE_AREAS,
  PRIORITY_RANK,
  PRIORITY_WEIGHT,
} from "./enums.js";

// Schema types
export type {
  PipelineConfig,
  FetchSettings,
  RetrySettings,
  CacheSettings,
  CoverageSettings,
} from "./schema.js";

export { PipelineConfigSchema } from "./schema.js";

// Loader and validation
export {
  loadPipelineConfig,
  mergePipelineConfig,
  pipelineConfigFromEnv,
  PipelineConfigError,
  type PipelineConfigOverrides,
  type ConfigValidationIssue,
} from "./loader.js";

// Defaults
export { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
