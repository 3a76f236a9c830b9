/**
 * Bundle summary reader and the downstream gate.
 *
 * Consumers of a research bundle read its summary header and refuse
 * bundles whose status is `incomplete` unless told to accept them.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { COVERAGE_FILE, HEADER_SEPARATOR, SUMMARY_FILE } from "./writer.js";

export const BundleSummaryHeaderSchema = z
  .object({
    runId: z.string().min(1),
    generatedAt: z.string().datetime(),
    status: z.enum(["complete", "incomplete"]),
    overallScore: z.coerce.number().min(0).max(1),
    domain: z.string().min(1),
    pattern: z.string().min(1),
  })
  .strict();

export type BundleSummaryHeader = z.infer<typeof BundleSummaryHeaderSchema>;

const CoverageDocumentSchema = z.object({
  missing: z.record(z.string(), z.array(z.string())),
  reasons: z.array(z.string()),
});

export class BundleGateError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "BundleGateError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join("\n");
  }
}

/**
 * Parse the `key: value` lines above the separator of a summary.md.
 *
 * @throws BundleGateError if the header is missing or invalid
 */
export function parseSummaryHeader(text: string): BundleSummaryHeader {
  const lines = text.split(/\r?\n/);
  const end = lines.indexOf(HEADER_SEPARATOR);
  if (end === -1) {
    throw new BundleGateError("Summary has no header separator");
  }

  const fields: Record<string, string> = {};
  for (const line of lines.slice(0, end)) {
    const match = /^(\w+):\s?(.*)$/.exec(line);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      fields[match[1]] = match[2];
    }
  }

  const result = BundleSummaryHeaderSchema.safeParse(fields);
  if (!result.success) {
    throw new BundleGateError(
      "Invalid summary header",
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }
  return result.data;
}

/**
 * Read the summary header of the bundle in a directory.
 *
 * @throws BundleGateError if there is no readable, valid summary
 */
export function readBundleSummary(directory: string): BundleSummaryHeader {
  const path = join(directory, SUMMARY_FILE);
  if (!existsSync(path)) {
    throw new BundleGateError(`No ${SUMMARY_FILE} in ${directory}`);
  }
  return parseSummaryHeader(readFileSync(path, "utf-8"));
}

function readGateReasons(directory: string): string[] {
  const path = join(directory, COVERAGE_FILE);
  if (!existsSync(path)) {
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    return [`${COVERAGE_FILE} is unreadable: ${err instanceof Error ? err.message : String(err)}`];
  }
  const result = CoverageDocumentSchema.safeParse(parsed);
  return result.success ? result.data.reasons : [`${COVERAGE_FILE} does not match the expected shape`];
}

export interface GateOptions {
  /** Accept an incomplete bundle */
  allowIncomplete?: boolean;
}

/**
 * Gate a bundle for downstream use.
 *
 * @returns the summary header of an acceptable bundle
 * @throws BundleGateError for missing, invalid or (unless allowed) incomplete bundles
 */
export function assertBundleReady(directory: string, options: GateOptions = {}): BundleSummaryHeader {
  const summary = readBundleSummary(directory);
  if (summary.status === "incomplete" && !options.allowIncomplete) {
    throw new BundleGateError(
      `Bundle ${summary.runId} is incomplete (overallScore ${summary.overallScore})`,
      readGateReasons(directory)
    );
  }
  return summary;
}
