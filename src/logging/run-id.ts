/**
 * Run ID generation and management.
 * Every research run gets a unique run ID; it names the run in log lines
 * and in the header of the bundle summary.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Current run ID for this process */
let currentRunId: string | null = null;

/**
 * Set the process-wide run ID used by log lines.
 * Generates one when none is given.
 */
export function initRunId(runId?: string): string {
  currentRunId = runId ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
