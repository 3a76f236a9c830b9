/**
 * Code pattern detection.
 *
 * A code block counts as a reusable pattern when it has at least two
 * non-blank lines, is not just a list of shell commands, and carries a
 * structural marker (declaration, assignment or block). Its description
 * is the block right before it; a code block right before it means no
 * description.
 */

import type { ExtractedPattern } from "../types/extraction.js";
import type { DocumentBlock } from "./document.js";
import type { FragmentSource } from "./gotchas.js";

const SHELL_LANGUAGES = new Set([
  "sh",
  "bash",
  "zsh",
  "shell",
  "console",
  "shell-session",
  "powershell",
  "ps1",
  "cmd",
  "bat",
  "terminal",
]);

const COMMAND_LINE =
  /^\s*(?:[$%>]\s+\S|(?:npm|npx|yarn|pnpm|git|cd|mkdir|curl|wget|brew|pip|docker|ampx|amplify|sudo)\s)/;

const SHELL_COMMENT = /^\s*#/;

const STRUCTURAL_MARKERS: readonly RegExp[] = [
  // declaration
  /\b(?:const|let|var|function|class|interface|type|enum|def|fn|import|export)\s/,
  // assignment, incl. object / YAML keys
  /[\w$\])]\s*[-+*/]?=(?![=>])/,
  /^\s*["']?[\w-]+["']?\s*:\s*\S/m,
  // block
  /[{}]|=>|:\s*$/m,
];

const EXAMPLE_CONTEXT = /\b(?:examples?|usage|for instance|samples?|demo|quick ?start)\b|\be\.g\./i;

function nonBlankLines(text: string): string[] {
  return text.split("\n").filter((line) => line.trim() !== "");
}

/**
 * Every non-blank line is a command or a shell comment. Shell-tagged
 * blocks without a structural block marker count too.
 */
export function isShellCommandList(text: string, language: string | null): boolean {
  const lines = nonBlankLines(text);
  if (language !== null && SHELL_LANGUAGES.has(language) && !/[{}]/.test(text)) {
    return true;
  }
  const commands = lines.filter((line) => COMMAND_LINE.test(line));
  return commands.length > 0 && lines.every((line) => COMMAND_LINE.test(line) || SHELL_COMMENT.test(line));
}

export function hasStructuralMarker(text: string): boolean {
  return STRUCTURAL_MARKERS.some((marker) => marker.test(text));
}

export function isCodePattern(block: DocumentBlock): boolean {
  return (
    block.kind === "code" &&
    nonBlankLines(block.text).length >= 2 &&
    !isShellCommandList(block.text, block.language) &&
    hasStructuralMarker(block.text)
  );
}

export function detectCodePatterns(
  blocks: readonly DocumentBlock[],
  source: FragmentSource
): ExtractedPattern[] {
  const patterns: ExtractedPattern[] = [];
  let currentHeading = "";

  blocks.forEach((block, index) => {
    if (block.kind === "heading") {
      currentHeading = block.text;
      return;
    }
    if (!isCodePattern(block)) {
      return;
    }

    const previous = index > 0 ? blocks[index - 1] : undefined;
    const description = previous && previous.kind !== "code" ? previous.text : "";
    const isExample = EXAMPLE_CONTEXT.test(description) || EXAMPLE_CONTEXT.test(currentHeading);

    patterns.push(
      Object.freeze({
        sourceUrl: source.sourceUrl,
        codeText: block.text,
        language: block.language,
        description,
        category: source.category,
        area: source.area,
        kind: isExample ? "example" : "pattern",
      })
    );
  });

  return patterns;
}
