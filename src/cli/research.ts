#!/usr/bin/env node
/**
 * CLI command to research reference documentation for a project and
 * write a research bundle.
 *
 * Usage:
 *   npx tsx src/cli/research.ts --domain <name> [options]
 *   npm run research -- --domain contact-manager --pattern simple_crud
 *
 * Options:
 *   --domain <name>      Project domain (required, e.g. contact-manager)
 *   --pattern <name>     Architecture pattern (default: unknown)
 *   --output <dir>       Bundle directory (default: output/bundle)
 *   --catalog <path>     Target catalog JSON (default: config/target-catalog.json)
 *   --dry-run            Print the resolved targets without fetching
 *   --json               Output the result as JSON (for CI parsing)
 *   --no-cache           Always fetch from the network
 *   --log-level <level>  debug, info, warn or error (default: LOG_LEVEL)
 *   -h, --help           Show help
 *
 * Exit codes:
 *   0 - Complete bundle written
 *   1 - Incomplete bundle written
 *   2 - Fatal configuration error, nothing fetched
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";

import {
  ConfigError,
  PipelineConfigError,
  appLoggerOptions,
  loadAppConfig,
  pipelineConfigFromEnv,
} from "../config/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { runResearch } from "../pipeline/index.js";
import {
  CatalogError,
  DEFAULT_CATALOG_PATH,
  createResearchRequest,
  loadTargetCatalog,
  resolveTargets,
} from "../targets/index.js";
import type { FetchTarget } from "../types/index.js";

const LogLevelArg = z.enum(["debug", "info", "warn", "error"]);

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      domain: { type: "string" },
      pattern: { type: "string", default: "unknown" },
      output: { type: "string", default: "output/bundle" },
      catalog: { type: "string", default: DEFAULT_CATALOG_PATH },
      "dry-run": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      "no-cache": { type: "boolean", default: false },
      "log-level": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: research --domain <name> [options]

Options:
  --domain <name>      Project domain (required, e.g. contact-manager)
  --pattern <name>     Architecture pattern (default: unknown)
  --output <dir>       Bundle directory (default: output/bundle)
  --catalog <path>     Target catalog JSON (default: ${DEFAULT_CATALOG_PATH})
  --dry-run            Print the resolved targets without fetching
  --json               Output the result as JSON (for CI parsing)
  --no-cache           Always fetch from the network
  --log-level <level>  debug, info, warn or error (default: LOG_LEVEL)
  -h, --help           Show this help message

Patterns: social_platform, e_commerce, content_management,
          dashboard_analytics, simple_crud (anything else: unknown)
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
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printTargets(targets: readonly FetchTarget[]): void {
  console.log(c("bold", `─── Resolved targets (${targets.length}) ───`));
  for (const t of targets) {
    console.log(`  ${c("cyan", t.priority.padEnd(13))} ${t.category.padEnd(16)} ${t.area.padEnd(10)} ${t.url}`);
  }
}

function describeError(err: unknown): string {
  if (err instanceof PipelineConfigError || err instanceof CatalogError) {
    return err.format();
  }
  return err instanceof Error ? err.message : String(err);
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<number> {
  const args = parseCliArgs();
  const isJson = args.json === true;

  try {
    const app = loadAppConfig();
    const level = LogLevelArg.safeParse(args["log-level"] ?? app.logLevel);
    if (!level.success) {
      throw new ConfigError(`Invalid --log-level: ${args["log-level"] ?? ""}`);
    }
    if (!args.domain) {
      throw new ConfigError("--domain is required");
    }

    const runId = initRunId();
    const logger = createLogger({
      ...appLoggerOptions(app),
      level: level.data,
      console: !isJson,
    });
    logger.info("Research requested", {
      env: app.env,
      domain: args.domain,
      pattern: args.pattern,
      dryRun: args["dry-run"],
    });

    const catalog = loadTargetCatalog(args.catalog);
    const request = createResearchRequest(args.domain, args.pattern ?? "unknown");

    if (args["dry-run"] === true) {
      const targets = resolveTargets(request, catalog);
      if (isJson) {
        console.log(JSON.stringify({ runId, request, targets }, null, 2));
      } else {
        printTargets(targets);
      }
      return 0;
    }

    const config = pipelineConfigFromEnv(args["no-cache"] === true ? { cache: { enabled: false } } : {});

    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort(new Error("Interrupted"));
    process.once("SIGINT", onInterrupt);

    const outcome = await runResearch(request, {
      config,
      catalog,
      outputDir: resolve(args.output ?? "output/bundle"),
      logger,
      signal: controller.signal,
      runId,
    }).finally(() => process.removeListener("SIGINT", onInterrupt));

    const { bundle, artifacts, exitCode } = outcome;
    if (isJson) {
      console.log(
        JSON.stringify(
          {
            runId: bundle.runId,
            status: bundle.status,
            overallScore: bundle.overallScore,
            directory: artifacts.directory,
            passes: bundle.passes.length,
            exhaustion: bundle.exhaustion,
            cancelled: bundle.cancelled,
            reasons: bundle.coverage.reasons,
          },
          null,
          2
        )
      );
      return exitCode;
    }

    console.log("");
    if (bundle.status === "complete") {
      console.log(c("green", `✓ Bundle complete (overallScore ${bundle.overallScore})`));
    } else {
      console.log(c("yellow", `⚠ Bundle incomplete (overallScore ${bundle.overallScore})`));
      for (const reason of bundle.coverage.reasons) {
        console.log(`  ${c("dim", "-")} ${reason}`);
      }
    }
    console.log(`  ${c("dim", "written to")} ${artifacts.directory}`);
    return exitCode;
  } catch (err) {
    if (err instanceof ConfigError || err instanceof CatalogError) {
      if (isJson) {
        console.log(JSON.stringify({ error: err.name, message: describeError(err) }, null, 2));
      } else {
        console.error(c("red", `✗ ${describeError(err)}`));
      }
      return 2;
    }
    throw err;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("Unexpected error:", err);
    process.exit(2);
  });
