/**
 * Machine-readable run report.
 *
 * Carries the run id so a report.json can be matched with the log lines of
 * the run that wrote it. Entries are sorted the same way as the markdown
 * reports.
 */

import type { FailureOutcome, SuccessOutcome } from "../types/index.js";
import { compareOutcomes } from "./markdown.js";

export const REPORT_VERSION = "1.0.0";

export interface ReportMeta {
  runId: string;
  /** ISO timestamp; defaults to now */
  generatedAt?: string;
}

export interface ReportTotals {
  attempted: number;
  succeeded: number;
  failed: number;
  /** Successes that were already on disk before the run */
  existing: number;
}

export interface JsonReport {
  reportVersion: string;
  runId: string;
  generatedAt: string;
  storeRoot: string;
  totals: ReportTotals;
  successes: SuccessOutcome[];
  failures: FailureOutcome[];
}

export interface ReportOutcomes {
  successes: readonly Readonly<SuccessOutcome>[];
  failures: readonly Readonly<FailureOutcome>[];
}

export function buildJsonReport(
  storeRoot: string,
  outcomes: ReportOutcomes,
  meta: ReportMeta
): JsonReport {
  const successes = [...outcomes.successes].sort(compareOutcomes);
  const failures = [...outcomes.failures].sort(compareOutcomes);

  return {
    reportVersion: REPORT_VERSION,
    runId: meta.runId,
    generatedAt: meta.generatedAt ?? new Date().toISOString(),
    storeRoot,
    totals: {
      attempted: successes.length + failures.length,
      succeeded: successes.length,
      failed: failures.length,
      existing: successes.filter((s) => s.source === "existing").length,
    },
    successes,
    failures,
  };
}

export function serializeReport(report: JsonReport, pretty = true): string {
  return JSON.stringify(report, null, pretty ? 2 : undefined);
}
