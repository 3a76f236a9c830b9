/**
 * Research run orchestration and the pipeline error taxonomy.
 */

export {
  runResearch,
  createFetcher,
  type RunResearchOptions,
  type ResearchOutcome,
  type RunExitCode,
} from "./run.js";

export { FatalConfigError, FetchFailure, ExtractionSkip, type FailureKind } from "./errors.js";
