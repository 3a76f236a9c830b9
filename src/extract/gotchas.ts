/**
 * Gotcha detection.
 *
 * A paragraph containing a lexicon indicator becomes a gotcha: the span
 * from its first to its last indicator sentence is the warning text and
 * the following paragraph is the context. A heading containing an
 * indicator ("Troubleshooting", "Common mistakes") turns the first
 * paragraph under it into a gotcha as a whole, even past code blocks.
 * Admonitions reach here already led by their kind ("Warning: ...").
 */

import type { Category, DocArea } from "../config/pipeline/enums.js";
import type { Gotcha } from "../types/extraction.js";
import type { DocumentBlock } from "./document.js";

/** Where extracted fragments come from. */
export interface FragmentSource {
  readonly sourceUrl: string;
  readonly category: Category;
  readonly area: DocArea;
}

interface Indicator {
  readonly label: string;
  readonly pattern: RegExp;
}

/** Checked in order; the first match names the gotcha's indicator. */
export const GOTCHA_LEXICON: readonly Indicator[] = [
  { label: "warning:", pattern: /\bwarning:/i },
  { label: "caution:", pattern: /\bcaution:/i },
  { label: "important:", pattern: /\bimportant:/i },
  { label: "note:", pattern: /\bnote:/i },
  { label: "make sure", pattern: /\bmake sure\b/i },
  { label: "avoid", pattern: /\bavoid(?:s|ed|ing)?\b/i },
  { label: "common mistake", pattern: /\bcommon mistakes?\b/i },
  { label: "troubleshooting", pattern: /\btroubleshoot(?:ing)?\b/i },
  { label: "pitfall", pattern: /\bpitfalls?\b/i },
  { label: "gotcha", pattern: /\bgotchas?\b/i },
  { label: "known issue", pattern: /\bknown issues?\b/i },
  { label: "be careful", pattern: /\bbe careful\b/i },
  { label: "deprecated", pattern: /\bdeprecated\b/i },
];

const SENTENCE_BREAK = /(?<=[.!?])\s+(?=[A-Z0-9"'`([])/;

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_BREAK)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence !== "");
}

export function findIndicator(text: string): string | null {
  return GOTCHA_LEXICON.find((entry) => entry.pattern.test(text))?.label ?? null;
}

/** Text of the next paragraph before any heading, or "". */
function followingParagraph(blocks: readonly DocumentBlock[], index: number): string {
  for (let i = index + 1; i < blocks.length; i++) {
    const block = blocks[i];
    if (!block || block.kind === "heading") {
      return "";
    }
    if (block.kind === "paragraph") {
      return block.text;
    }
  }
  return "";
}

function indicatorSpan(text: string): { warningText: string; indicator: string } | null {
  const sentences = splitSentences(text);
  let first = -1;
  let last = -1;
  let indicator: string | null = null;

  for (let i = 0; i < sentences.length; i++) {
    const found = findIndicator(sentences[i] ?? "");
    if (found === null) {
      continue;
    }
    if (indicator === null) {
      first = i;
      indicator = found;
    }
    last = i;
  }

  if (indicator === null) {
    return null;
  }
  return { warningText: sentences.slice(first, last + 1).join(" "), indicator };
}

export function detectGotchas(blocks: readonly DocumentBlock[], source: FragmentSource): Gotcha[] {
  const gotchas: Gotcha[] = [];
  let headingIndicator: string | null = null;

  blocks.forEach((block, index) => {
    if (block.kind === "heading") {
      headingIndicator = findIndicator(block.text);
      return;
    }
    if (block.kind !== "paragraph") {
      return;
    }

    const pending = headingIndicator;
    headingIndicator = null;

    const span = indicatorSpan(block.text);
    const detected = span ?? (pending ? { warningText: block.text, indicator: pending } : null);
    if (!detected) {
      return;
    }

    gotchas.push(
      Object.freeze({
        sourceUrl: source.sourceUrl,
        warningText: detected.warningText,
        nearbyContext: followingParagraph(blocks, index),
        indicator: detected.indicator,
        category: source.category,
        area: source.area,
      })
    );
  });

  return gotchas;
}
