/**
 * Extractor Tests
 *
 * Run: node --import tsx --test src/extract/extractor.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import type { FetchResult } from "../types/fetch.js";
import type { FetchTarget } from "../types/target.js";
import { isCodePattern } from "./code-patterns.js";
import type { DocumentBlock } from "./document.js";
import { extractDocument } from "./extractor.js";
import { detectGotchas, splitSentences } from "./gotchas.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const DOC_URL = "https://docs.example.test/auth/";

const TARGET: FetchTarget = {
  url: DOC_URL,
  category: "pattern-specific",
  priority: "critical",
  area: "auth",
  origin: { domain: "fitness-tracker", pattern: "social_platform", pass: 0 },
};

const SOURCE = { sourceUrl: DOC_URL, category: "pattern-specific", area: "auth" } as const;

function ok(content: string, contentType: string | null = "text/markdown"): FetchResult {
  return {
    target: TARGET,
    status: "ok",
    content,
    contentType,
    httpStatus: 200,
    fetchedAt: "2026-01-01T00:00:00.000Z",
    attempts: 1,
    error: null,
    fromCache: false,
  };
}

function codeBlock(text: string, language: string | null = null): DocumentBlock {
  return { kind: "code", text, language, level: 0 };
}

function para(text: string): DocumentBlock {
  return { kind: "paragraph", text, language: null, level: 0 };
}

function head(text: string): DocumentBlock {
  return { kind: "heading", text, language: null, level: 2 };
}

// ═══════════════════════════════════════════════════════════════════════════
// CODE PATTERNS
// ═══════════════════════════════════════════════════════════════════════════

test("shell command lists are not patterns", () => {
  assert.equal(isCodePattern(codeBlock("npm install\nnpx ampx sandbox", "bash")), false);
  assert.equal(isCodePattern(codeBlock("# install\nnpm install\nnpx ampx sandbox")), false);
});

test("single lines and prose are not patterns", () => {
  assert.equal(isCodePattern(codeBlock("const a = 1;")), false);
  assert.equal(isCodePattern(codeBlock("hello world\nsecond line")), false);
});

test("declarations, assignments and keyed configuration are patterns", () => {
  assert.equal(isCodePattern(codeBlock("const a = 1;\nconst b = 2;", "ts")), true);
  assert.equal(isCodePattern(codeBlock("name: app\nversion: 1", "yaml")), true);
});

test("patterns take their description from the preceding block and their kind from context", () => {
  const markdown = [
    "# Usage example",
    "",
    "Define the schema:",
    "",
    "```ts",
    "const schema = a.schema({",
    "  Todo: a.model({ content: a.string() }),",
    "});",
    "```",
    "",
    "```ts",
    "export const data = defineData({ schema });",
    "export type Schema = ClientSchema<typeof schema>;",
    "```",
    "",
    "## Deploy",
    "",
    "```bash",
    "npx ampx sandbox",
    "npx ampx pipeline-deploy",
    "```",
    "",
    "Configure the bucket:",
    "",
    "```ts",
    "export const storage = defineStorage({",
    '  name: "photos",',
    "});",
    "```",
  ].join("\n");

  const extraction = extractDocument(ok(markdown));

  assert.equal(extraction.skipped, null);
  assert.deepEqual(
    extraction.patterns.map((p) => [p.description, p.kind, p.language]),
    [
      ["Define the schema:", "example", "ts"],
      ["", "example", "ts"],
      ["Configure the bucket:", "pattern", "ts"],
    ]
  );
  const [first] = extraction.patterns;
  assert.ok(first);
  assert.equal(
    first.codeText,
    "const schema = a.schema({\n  Todo: a.model({ content: a.string() }),\n});"
  );
  assert.equal(first.sourceUrl, DOC_URL);
  assert.equal(first.category, "pattern-specific");
  assert.equal(first.area, "auth");
});

// ═══════════════════════════════════════════════════════════════════════════
// GOTCHAS
// ═══════════════════════════════════════════════════════════════════════════

test("a single warning sentence yields exactly one gotcha", () => {
  const extraction = extractDocument(ok("Warning: policy must be attached to user, not group."));

  assert.deepEqual(extraction.gotchas, [
    {
      sourceUrl: DOC_URL,
      warningText: "Warning: policy must be attached to user, not group.",
      nearbyContext: "",
      indicator: "warning:",
      category: "pattern-specific",
      area: "auth",
    },
  ]);
  assert.deepEqual(extraction.patterns, []);
});

test("warning text spans the first to the last indicator sentence", () => {
  const blocks = [
    para(
      "Groups are optional. Make sure the role exists. Then deploy. Avoid wildcard policies. Done here."
    ),
    para("Roles are created per environment."),
  ];

  const [gotcha, ...rest] = detectGotchas(blocks, SOURCE);

  assert.ok(gotcha);
  assert.equal(rest.length, 0);
  assert.equal(gotcha.warningText, "Make sure the role exists. Then deploy. Avoid wildcard policies.");
  assert.equal(gotcha.indicator, "make sure");
  assert.equal(gotcha.nearbyContext, "Roles are created per environment.");
});

test("an indicator heading turns the paragraph under it into a gotcha", () => {
  const blocks = [
    head("Troubleshooting"),
    para("If the sandbox hangs, restart it."),
    para("Second paragraph."),
  ];

  assert.deepEqual(
    detectGotchas(blocks, SOURCE).map((g) => [g.warningText, g.indicator, g.nearbyContext]),
    [["If the sandbox hangs, restart it.", "troubleshooting", "Second paragraph."]]
  );
});

test("an indicator heading reaches past code blocks to the next paragraph", () => {
  const blocks = [
    head("Troubleshooting"),
    codeBlock("npx ampx sandbox --once", "bash"),
    para("Delete the stale stack first."),
    para("Then redeploy."),
  ];

  assert.deepEqual(
    detectGotchas(blocks, SOURCE).map((g) => [g.warningText, g.indicator, g.nearbyContext]),
    [["Delete the stale stack first.", "troubleshooting", "Then redeploy."]]
  );
});

test("a paragraph with its own indicator under an indicator heading is counted once", () => {
  const blocks = [head("Common mistakes"), para("Note: keys are case sensitive.")];

  assert.deepEqual(
    detectGotchas(blocks, SOURCE).map((g) => [g.warningText, g.indicator]),
    [["Note: keys are case sensitive.", "note:"]]
  );
});

test("splitSentences breaks on terminal punctuation before a capital", () => {
  assert.deepEqual(splitSentences("Use v2. Then call it, e.g. twice! Done?"), [
    "Use v2.",
    "Then call it, e.g. twice!",
    "Done?",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// HTML DOCUMENTS AND SKIPS
// ═══════════════════════════════════════════════════════════════════════════

test("HTML documents yield patterns and callout gotchas", () => {
  const html = [
    "<main><h2>Example</h2><p>Add auth:</p>",
    '<pre><code class="language-ts">',
    'import { defineAuth } from "@aws-amplify/backend";\n',
    "export const auth = defineAuth({ loginWith: { email: true } });",
    "</code></pre>",
    '<div class="callout"><p>Important: email login cannot be disabled later.</p></div></main>',
  ].join("");

  const extraction = extractDocument(ok(html, "text/html; charset=utf-8"));

  assert.deepEqual(
    extraction.patterns.map((p) => [p.description, p.kind, p.language]),
    [["Add auth:", "example", "ts"]]
  );
  assert.deepEqual(
    extraction.gotchas.map((g) => [g.warningText, g.indicator]),
    [["Important: email login cannot be disabled later.", "important:"]]
  );
});

test("admonition markup without a colon still yields a gotcha", () => {
  const html = extractDocument(
    ok(
      '<div class="admonition warning"><p class="admonition-title">Warning</p>' +
        "<p>Policy must be attached to user, not group.</p></div>",
      "text/html"
    )
  );
  const markdown = extractDocument(
    ok("> [!WARNING]\n> Policy must be attached to user, not group.\n", "text/markdown")
  );

  for (const extraction of [html, markdown]) {
    assert.deepEqual(
      extraction.gotchas.map((g) => [g.warningText, g.indicator, g.sourceUrl]),
      [["Warning: Policy must be attached to user, not group.", "warning:", DOC_URL]]
    );
  }
});

test("failed fetches and unparseable bodies yield nothing and never throw", () => {
  const failed: FetchResult = { ...ok(""), status: "error", content: null, error: "HTTP 404" };
  assert.deepEqual(extractDocument(failed), {
    sourceUrl: DOC_URL,
    patterns: [],
    gotchas: [],
    skipped: "Fetch status error",
  });

  const binary = extractDocument(ok("GIF89a\u0000\u0000", "application/octet-stream"));
  assert.deepEqual(binary.patterns, []);
  assert.equal(binary.skipped, "Binary content type: application/octet-stream");
});
