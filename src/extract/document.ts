/**
 * Document parsing.
 *
 * Turns a fetched body into an ordered list of blocks (heading, paragraph,
 * code) that the pattern and gotcha detectors walk. HTML goes through
 * cheerio; everything else is read as Markdown / plain text.
 *
 * Admonitions (HTML callout or admonition containers, `> [!WARNING]`
 * alerts, `!!! warning` blocks) become one paragraph led by their kind,
 * e.g. "Warning: ...", so the gotcha lexicon sees them as indicators.
 */

import * as cheerio from "cheerio";
import { ExtractionSkip } from "../pipeline/errors.js";

export type BlockKind = "heading" | "paragraph" | "code";

export interface DocumentBlock {
  readonly kind: BlockKind;
  readonly text: string;
  /** Code language tag, null for non-code blocks or untagged code */
  readonly language: string | null;
  /** Heading level 1-6, 0 for non-headings */
  readonly level: number;
}

const BINARY_CONTENT_TYPE =
  /^(?:image|audio|video|font)\/|^application\/(?:octet-stream|pdf|zip|gzip|x-tar|wasm)/i;

/** Control characters other than tab, newline, carriage return, plus U+FFFD. */
const SUSPECT_CHAR = /[\u0001-\u0008\u000B\u000C\u000E-\u001F\uFFFD]/g;

const MAX_SUSPECT_RATIO = 0.05;

/** Elements whose text becomes a block, in document order. */
const TEXT_SELECTOR = [
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "p",
  "li",
  "dd",
  "blockquote",
  ".callout",
  ".admonition",
  "[role=note]",
  "[role=alert]",
].join(",");

const ADMONITION_SELECTOR = ".callout,.admonition,[role=note],[role=alert]";

const ADMONITION_TITLE = ".admonition-title,.callout-title";

/** Admonition kind (class name, title or marker) to the label it is led by. */
const ADMONITION_LABELS: Readonly<Record<string, string>> = {
  note: "Note",
  info: "Note",
  tip: "Tip",
  hint: "Tip",
  important: "Important",
  warning: "Warning",
  danger: "Warning",
  error: "Warning",
  caution: "Caution",
  attention: "Caution",
};

const ROLE_LABELS: Readonly<Record<string, string>> = {
  alert: "Warning",
  note: "Note",
};

const STRIPPED_SELECTOR = "script,style,noscript,template,svg,nav,header,footer,aside.sidebar";

const LANGUAGE_CLASS = /(?:^|\s)(?:language|lang)-([\w+#.-]+)/;

function paragraph(text: string): DocumentBlock {
  return { kind: "paragraph", text, language: null, level: 0 };
}

function heading(text: string, level: number): DocumentBlock {
  return { kind: "heading", text, language: null, level };
}

function code(text: string, language: string | null): DocumentBlock {
  return { kind: "code", text, language, level: 0 };
}

function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function admonitionLabel(kind: string): string | null {
  const name = kind.toLowerCase().replace(/^(?:callout|admonition|alert)-/, "").replace(/:$/, "");
  return ADMONITION_LABELS[name] ?? null;
}

/**
 * Text of an admonition, led by "<Label>:" unless it already is. A title
 * that only names the kind is dropped.
 */
export function admonitionText(label: string | null, title: string, body: string): string {
  if (label === null) {
    return normalizeText(`${title} ${body}`);
  }
  const keepTitle = title !== "" && admonitionLabel(title) === null;
  const text = normalizeText(`${keepTitle ? title : ""} ${body}`);
  if (text === "" || text.toLowerCase().startsWith(`${label.toLowerCase()}:`)) {
    return text;
  }
  return `${label}: ${text}`;
}

/** Drop blank lines around a code body, keep its indentation. */
function trimCode(text: string): string {
  return text.replace(/^(?:[ \t]*\r?\n)+/, "").replace(/\s+$/, "");
}

function assertTextual(content: string, contentType: string | null): void {
  if (contentType && BINARY_CONTENT_TYPE.test(contentType)) {
    throw new ExtractionSkip(`Binary content type: ${contentType}`);
  }
  if (content.includes("\u0000")) {
    throw new ExtractionSkip("Binary content: NUL byte in body");
  }
  const suspect = content.match(SUSPECT_CHAR)?.length ?? 0;
  if (content.length > 0 && suspect / content.length > MAX_SUSPECT_RATIO) {
    throw new ExtractionSkip(
      `Binary content: ${suspect} control or replacement characters in ${content.length}`
    );
  }
  if (content.trim() === "") {
    throw new ExtractionSkip("Empty document");
  }
}

function looksLikeHtml(content: string, contentType: string | null): boolean {
  if (contentType) {
    const type = contentType.toLowerCase();
    if (type.includes("html") || type.includes("xml")) {
      return true;
    }
    if (type.includes("markdown")) {
      return false;
    }
  }
  return /^\s*<(?:!doctype|html|head|body|main|article|div|section|h[1-6]|p)[\s>]/i.test(content);
}

// ═══════════════════════════════════════════════════════════════════════════
// HTML
// ═══════════════════════════════════════════════════════════════════════════

function parseHtml(content: string): DocumentBlock[] {
  const $ = cheerio.load(content);
  $(STRIPPED_SELECTOR).remove();

  const main = $("main, article").first();
  const root = main.length > 0 ? main : $("body");
  const blocks: DocumentBlock[] = [];

  root.find(`${TEXT_SELECTOR},pre`).each((_, el) => {
    const node = $(el);

    if (node.is("pre")) {
      if (node.parents("pre").length > 0) {
        return;
      }
      const classes = [node.attr("class"), node.find("code").first().attr("class")].join(" ");
      const language =
        node.attr("data-language") ?? LANGUAGE_CLASS.exec(classes)?.[1] ?? null;
      const text = trimCode(node.text());
      if (text !== "") {
        blocks.push(code(text, language ? language.toLowerCase() : null));
      }
      return;
    }

    // Text of a container already emitted by an ancestor, or of code
    if (node.parents(`${TEXT_SELECTOR},pre`).length > 0) {
      return;
    }

    const clone = node.clone();
    clone.find("pre").remove();
    let text: string;
    if (node.is(ADMONITION_SELECTOR)) {
      const titleNode = clone.find(ADMONITION_TITLE).first();
      const title = normalizeText(titleNode.text());
      titleNode.remove();
      const classes = (node.attr("class") ?? "").split(/\s+/);
      const label =
        [...classes, title].map(admonitionLabel).find((l) => l !== null) ??
        ROLE_LABELS[node.attr("role") ?? ""] ??
        null;
      text = admonitionText(label, title, clone.text());
    } else {
      text = normalizeText(clone.text());
    }
    if (text === "") {
      return;
    }

    const level = /^h([1-6])$/i.exec(el.tagName)?.[1];
    blocks.push(level ? heading(text, Number(level)) : paragraph(text));
  });

  return blocks;
}

// ═══════════════════════════════════════════════════════════════════════════
// MARKDOWN / PLAIN TEXT
// ═══════════════════════════════════════════════════════════════════════════

const FENCE_OPEN = /^\s{0,3}(`{3,}|~{3,})\s*([\w+#.-]*)/;
const ATX_HEADING = /^\s{0,3}(#{1,6})\s+(.*?)\s*#*\s*$/;
const LIST_ITEM = /^\s*(?:[-*+]|\d+[.)])\s+/;
const QUOTE_MARKER = /^\s*>\s?/;
const ALERT_MARKER = /^\s*\[!(\w+)\]\s*(.*)$/;
const MKDOCS_ADMONITION = /^\s{0,3}(?:!!!|\?\?\?\+?)\s+(\w+)(?:\s+"([^"]*)")?\s*$/;

function stripInlineEmphasis(text: string): string {
  return text.replace(/\*\*|__/g, "");
}

function parseMarkdown(content: string): DocumentBlock[] {
  const lines = content.split(/\r?\n/);
  const blocks: DocumentBlock[] = [];
  let buffer: string[] = [];
  // Buffer holds only an admonition lead; blank lines do not end it
  let leadOnly = false;

  const flush = (): void => {
    leadOnly = false;
    const text = normalizeText(stripInlineEmphasis(buffer.join(" ")));
    if (text !== "") {
      blocks.push(paragraph(text));
    }
    buffer = [];
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";

    const fence = FENCE_OPEN.exec(line);
    if (fence) {
      flush();
      const marker = fence[1] ?? "```";
      const closing = new RegExp(`^\\s{0,3}${marker[0] === "`" ? "`" : "~"}{${marker.length},}\\s*$`);
      const body: string[] = [];
      let closed = false;
      for (i = i + 1; i < lines.length; i++) {
        const inner = lines[i] ?? "";
        if (closing.test(inner)) {
          closed = true;
          break;
        }
        body.push(inner);
      }
      if (!closed) {
        throw new ExtractionSkip("Malformed Markdown: unclosed code fence");
      }
      const text = trimCode(body.join("\n"));
      if (text !== "") {
        const language = fence[2] ? fence[2].toLowerCase() : null;
        blocks.push(code(text, language));
      }
      continue;
    }

    const atx = ATX_HEADING.exec(line);
    if (atx) {
      flush();
      const text = normalizeText(stripInlineEmphasis(atx[2] ?? ""));
      if (text !== "") {
        blocks.push(heading(text, (atx[1] ?? "#").length));
      }
      continue;
    }

    const unquoted = line.replace(QUOTE_MARKER, "");
    const alert =
      (QUOTE_MARKER.test(line) ? ALERT_MARKER.exec(unquoted) : null) ?? MKDOCS_ADMONITION.exec(line);
    const label = alert ? admonitionLabel(alert[1] ?? "") : null;
    if (alert && label !== null) {
      flush();
      const lead = admonitionText(label, alert[2] ?? "", "");
      buffer.push(lead === "" ? `${label}:` : lead);
      leadOnly = true;
      continue;
    }

    if (line.trim() === "" || (QUOTE_MARKER.test(line) && unquoted.trim() === "")) {
      if (!leadOnly) {
        flush();
      }
      continue;
    }

    if (LIST_ITEM.test(line)) {
      flush();
      buffer.push(line.replace(LIST_ITEM, ""));
      continue;
    }

    buffer.push(unquoted);
    leadOnly = false;
  }

  flush();
  return blocks;
}

/**
 * Parse a fetched body into blocks.
 *
 * @throws ExtractionSkip for binary, empty or malformed content
 */
export function parseDocument(content: string, contentType: string | null): DocumentBlock[] {
  assertTextual(content, contentType);
  return looksLikeHtml(content, contentType) ? parseHtml(content) : parseMarkdown(content);
}
