#!/usr/bin/env node
/**
 * paperfetch: download every paper listed in a records file into a
 * topic-organised store, then write index.md, failed.md and report.json.
 *
 * Usage:
 *   npm start -- [options]
 *
 * Options:
 *   --records <path>      Records file, YAML or JSON (default: papers.yml)
 *   --out <dir>           Store root (default: papers)
 *   --concurrency <n>     Downloads in flight (default: 6)
 *   --cookies <path>      Netscape cookies.txt (default: cookies.txt, if present)
 *   --verify-pdf          Reject bodies that do not start with %PDF
 *   --json                Print the run summary as JSON
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - Run completed (individual downloads may have failed; see failed.md)
 *   1 - Invalid input or configuration
 */

import { parseArgs } from "node:util";

import { loadConfig, ConfigError, FetchSettingsError, type ConfigOverrides } from "./config/index.js";
import { createLogger } from "./logging/index.js";
import { RecordSourceError } from "./records/index.js";
import { runPipeline, type PipelineResult } from "./pipeline.js";

const HELP = `
Usage: paperfetch [options]

Options:
  --records <path>      Records file, YAML or JSON (default: papers.yml)
  --out <dir>           Store root (default: papers)
  --concurrency <n>     Downloads in flight (default: 6)
  --cookies <path>      Netscape cookies.txt (default: cookies.txt, if present)
  --verify-pdf          Reject bodies that do not start with %PDF
  --json                Print the run summary as JSON
  -h, --help            Show this help message

Environment:
  PAPERS_FILE, STORE_ROOT, CONCURRENCY, COOKIE_FILE, VERIFY_PDF,
  USER_AGENT, FALLBACK_USER_AGENT, FALLBACK_REFERER, PUBLISHER_REFERER,
  REQUEST_TIMEOUT_MS, MAX_REDIRECTS, LOG_LEVEL, LOG_TO_FILE, LOG_DIR

Exit codes:
  0 - Run completed (failed downloads are listed in failed.md)
  1 - Invalid input or configuration
`;

// ============================================================
// CLI Parsing
// ============================================================

export interface CliValues {
  records?: string;
  out?: string;
  concurrency?: string;
  cookies?: string;
  "verify-pdf"?: boolean;
}

function parseCliArgs(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      records: { type: "string" },
      out: { type: "string" },
      concurrency: { type: "string" },
      cookies: { type: "string" },
      "verify-pdf": { type: "boolean" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

/**
 * Turn flags into config overrides. Absent flags leave the environment value
 * in place.
 *
 * @throws ConfigError for a non-numeric --concurrency
 */
export function buildOverrides(values: CliValues): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (values.records !== undefined) overrides.recordsFile = values.records;
  if (values.out !== undefined) overrides.storeRoot = values.out;
  if (values.cookies !== undefined) overrides.cookieFile = values.cookies;
  if (values["verify-pdf"] !== undefined) overrides.verifyPdf = values["verify-pdf"];
  if (values.concurrency !== undefined) {
    if (!/^\d+$/.test(values.concurrency)) {
      throw new ConfigError(
        `Invalid --concurrency: ${values.concurrency}. Must be a positive integer.`
      );
    }
    overrides.concurrency = Number(values.concurrency);
  }
  return overrides;
}

// ============================================================
// Output
// ============================================================

export interface RunSummary {
  runId: string;
  attempted: number;
  succeeded: number;
  existing: number;
  failed: number;
  skipped: number;
  duplicates: number;
  elapsedMs: number;
  reports: PipelineResult["reports"];
}

export function summarize(result: PipelineResult): RunSummary {
  const { outcomes, stats } = result;
  return {
    runId: result.runId,
    attempted: outcomes.attempted,
    succeeded: outcomes.successes.length,
    existing: outcomes.successes.filter((s) => s.source === "existing").length,
    failed: outcomes.failures.length,
    skipped: stats.skipped,
    duplicates: stats.duplicates,
    elapsedMs: outcomes.elapsedMs,
    reports: result.reports,
  };
}

export function formatSummary(summary: RunSummary): string {
  return [
    "",
    `Run ${summary.runId} finished in ${(summary.elapsedMs / 1000).toFixed(1)}s`,
    `  Downloaded:      ${summary.succeeded - summary.existing}`,
    `  Already present: ${summary.existing}`,
    `  Failed:          ${summary.failed}`,
    `  Duplicates:      ${summary.duplicates}`,
    `  Skipped:         ${summary.skipped}`,
    "",
    `  Index:    ${summary.reports.successIndex}`,
    `  Failures: ${summary.reports.failureIndex}`,
    `  Report:   ${summary.reports.jsonReport}`,
    "",
  ].join("\n");
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  const config = loadConfig(process.env, buildOverrides(args));
  const logger = createLogger({
    level: config.logLevel,
    console: !args.json,
    file: config.logToFile,
    logDir: config.logDir,
  });

  const result = await runPipeline(config, {
    logger,
    onOutcome: (outcome, { completed, total }) => {
      logger.info(`[${completed}/${total}] ${outcome.kind === "success" ? "OK" : "FAILED"}`, {
        title: outcome.title,
      });
    },
  });

  const summary = summarize(result);
  if (args.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(formatSummary(summary));
  }
}

function reportFatal(err: unknown): never {
  if (err instanceof RecordSourceError || err instanceof FetchSettingsError) {
    console.error(err.format());
  } else if (err instanceof ConfigError) {
    console.error(`Configuration error: ${err.message}`);
  } else {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
  }
  process.exit(1);
}

// Only run when executed directly (not imported by tests)
const entry = process.argv[1] ?? "";
const isDirectExecution =
  entry.endsWith("src/index.ts") || entry.endsWith("dist/index.js") || entry.endsWith("paperfetch");

if (isDirectExecution) {
  main().catch(reportFatal);
}
