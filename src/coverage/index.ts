/**
 * Coverage scoring and the completeness gate.
 */

export { REQUIRED_SIGNALS, formatSignal } from "./requirements.js";
export {
  validateCoverage,
  determineStatus,
  scoreCategory,
  weightedOverall,
  categoryPriorities,
  roundScore,
  type StatusDecision,
} from "./validator.js";
