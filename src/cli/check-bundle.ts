#!/usr/bin/env node
/**
 * CLI command that gates a research bundle for downstream use.
 *
 * Usage:
 *   npx tsx src/cli/check-bundle.ts [options]
 *   npm run check-bundle -- --dir output/bundle
 *
 * Options:
 *   --dir <path>         Bundle directory (default: output/bundle)
 *   --allow-incomplete   Accept a bundle whose status is incomplete
 *   --json               Output the result as JSON (for CI parsing)
 *   -h, --help           Show help
 *
 * Exit codes:
 *   0 - Bundle accepted
 *   1 - Bundle missing, invalid or incomplete
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { BundleGateError, assertBundleReady } from "../bundle/index.js";

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      dir: { type: "string", default: "output/bundle" },
      "allow-incomplete": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: check-bundle [options]

Options:
  --dir <path>         Bundle directory (default: output/bundle)
  --allow-incomplete   Accept a bundle whose status is incomplete
  --json               Output the result as JSON (for CI parsing)
  -h, --help           Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

// ============================================================
// Main
// ============================================================

function main(): number {
  const args = parseCliArgs();
  const directory = resolve(args.dir ?? "output/bundle");
  const isJson = args.json === true;

  try {
    const header = assertBundleReady(directory, {
      allowIncomplete: args["allow-incomplete"] === true,
    });
    if (isJson) {
      console.log(JSON.stringify({ ready: true, directory, ...header }, null, 2));
    } else if (header.status === "complete") {
      console.log(c("green", `✓ Bundle ${header.runId} is complete (overallScore ${header.overallScore})`));
    } else {
      console.log(
        c("yellow", `⚠ Bundle ${header.runId} is incomplete (overallScore ${header.overallScore}), accepted`)
      );
    }
    return 0;
  } catch (err) {
    if (!(err instanceof BundleGateError)) {
      throw err;
    }
    if (isJson) {
      console.log(
        JSON.stringify({ ready: false, directory, message: err.message, issues: err.issues }, null, 2)
      );
    } else {
      console.error(c("red", `✗ ${err.format()}`));
    }
    return 1;
  }
}

try {
  process.exit(main());
} catch (err) {
  console.error("Unexpected error:", err);
  process.exit(1);
}
