/**
 * Writes the run reports into the store root:
 *
 *   index.md     downloaded papers, grouped by topic
 *   failed.md    papers that need a manual download
 *   report.json  both lists plus totals and the run id
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { buildJsonReport, serializeReport, type ReportMeta, type ReportOutcomes } from "./json.js";
import { renderFailureIndex, renderSuccessIndex } from "./markdown.js";

export const SUCCESS_INDEX_FILE = "index.md";
export const FAILURE_INDEX_FILE = "failed.md";
export const JSON_REPORT_FILE = "report.json";

export interface WrittenReports {
  successIndex: string;
  failureIndex: string;
  jsonReport: string;
}

export async function writeReports(
  storeRoot: string,
  outcomes: ReportOutcomes,
  meta: ReportMeta
): Promise<WrittenReports> {
  await mkdir(storeRoot, { recursive: true });

  const written: WrittenReports = {
    successIndex: join(storeRoot, SUCCESS_INDEX_FILE),
    failureIndex: join(storeRoot, FAILURE_INDEX_FILE),
    jsonReport: join(storeRoot, JSON_REPORT_FILE),
  };

  await writeFile(written.successIndex, renderSuccessIndex(outcomes.successes), "utf-8");
  await writeFile(written.failureIndex, renderFailureIndex(outcomes.failures), "utf-8");
  await writeFile(
    written.jsonReport,
    `${serializeReport(buildJsonReport(storeRoot, outcomes, meta))}\n`,
    "utf-8"
  );

  return written;
}
