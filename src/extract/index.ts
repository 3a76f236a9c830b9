/**
 * Fragment extraction from fetched documentation.
 */

export { extractDocument, extractAll } from "./extractor.js";
export { parseDocument, type DocumentBlock, type BlockKind } from "./document.js";
export {
  detectCodePatterns,
  hasStructuralMarker,
  isCodePattern,
  isShellCommandList,
} from "./code-patterns.js";
export {
  detectGotchas,
  findIndicator,
  splitSentences,
  GOTCHA_LEXICON,
  type FragmentSource,
} from "./gotchas.js";
