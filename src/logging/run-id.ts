/**
 * Run IDs: `YYYYMMDD-xxxxxx`, UTC date plus six hex digits.
 * The current ID is stamped into every log line and into report.json.
 */

import { randomBytes } from "node:crypto";

const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${datePart}-${randomBytes(3).toString("hex")}`;
}

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}

let currentRunId: string | null = null;

/**
 * Start a run. A caller-supplied ID (e.g. to correlate with an outer job)
 * must have the standard shape.
 */
export function initRunId(runId: string = generateRunId()): string {
  if (!isRunId(runId)) {
    throw new Error(`Invalid run ID: ${runId}. Expected YYYYMMDD-xxxxxx.`);
  }
  currentRunId = runId;
  return currentRunId;
}

/**
 * The current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
