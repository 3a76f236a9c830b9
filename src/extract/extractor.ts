/**
 * Extractor.
 *
 * Runs the parser and both detectors over one fetch result. Never throws:
 * a document that cannot be parsed is logged and yields no fragments,
 * recorded as `skipped` on the extraction.
 */

import { createSilentLogger, type Logger } from "../logging/index.js";
import { ExtractionSkip } from "../pipeline/errors.js";
import type { DocumentExtraction } from "../types/extraction.js";
import type { FetchResult } from "../types/fetch.js";
import { detectCodePatterns } from "./code-patterns.js";
import { parseDocument } from "./document.js";
import { detectGotchas, type FragmentSource } from "./gotchas.js";

function skipped(sourceUrl: string, reason: string): DocumentExtraction {
  return Object.freeze({ sourceUrl, patterns: [], gotchas: [], skipped: reason });
}

export function extractDocument(
  result: FetchResult,
  logger: Logger = createSilentLogger()
): DocumentExtraction {
  const sourceUrl = result.target.url;

  if (result.status !== "ok" || result.content === null) {
    return skipped(sourceUrl, `Fetch status ${result.status}`);
  }

  const source: FragmentSource = {
    sourceUrl,
    category: result.target.category,
    area: result.target.area,
  };

  try {
    const blocks = parseDocument(result.content, result.contentType);
    const extraction: DocumentExtraction = {
      sourceUrl,
      patterns: detectCodePatterns(blocks, source),
      gotchas: detectGotchas(blocks, source),
      skipped: null,
    };
    logger.debug("Extracted document", {
      url: sourceUrl,
      blocks: blocks.length,
      patterns: extraction.patterns.length,
      gotchas: extraction.gotchas.length,
    });
    return Object.freeze(extraction);
  } catch (err) {
    if (err instanceof ExtractionSkip) {
      logger.warn("Document skipped", { url: sourceUrl, reason: err.message });
      return skipped(sourceUrl, err.message);
    }
    const reason = err instanceof Error ? err.message : String(err);
    logger.error("Extraction failed", { url: sourceUrl, error: reason });
    return skipped(sourceUrl, `Extraction failed: ${reason}`);
  }
}

/** Extract every result, in the order given. */
export function extractAll(
  results: readonly FetchResult[],
  logger?: Logger
): DocumentExtraction[] {
  return results.map((result) => extractDocument(result, logger));
}
