/**
 * One download run, end to end:
 *
 *   load records → flatten → fetch every item (bounded pool) → write reports
 *
 * Input and configuration problems throw before any network activity. Once
 * downloads start, per-item problems only ever show up as failure outcomes.
 */

import { existsSync } from "node:fs";
import type { AppConfig } from "./config/index.js";
import {
  ArtifactFetcher,
  CookieJar,
  createDefaultStrategies,
  type StrategySet,
} from "./fetch/index.js";
import { createLogger, initRunId, type Logger } from "./logging/index.js";
import { runDownloads, type RunOutcomes, type RunProgress } from "./orchestrator/index.js";
import { flattenRecordsWithStats, loadRecordsFile, type FlattenStats } from "./records/index.js";
import { writeReports, type WrittenReports } from "./reports/index.js";
import type { Outcome } from "./types/index.js";

export interface PipelineDependencies {
  logger?: Logger;
  /** Run ID to use instead of a generated one */
  runId?: string;
  /** Replace the network strategies; the caller keeps ownership of them */
  strategies?: StrategySet;
  onOutcome?: (outcome: Outcome, progress: RunProgress) => void;
}

export interface PipelineResult {
  runId: string;
  stats: FlattenStats;
  outcomes: RunOutcomes;
  reports: WrittenReports;
}

/**
 * Cookie jar from the configured file, or an empty one when there is no
 * such file.
 */
export async function loadCookieJar(path: string | undefined, logger: Logger): Promise<CookieJar> {
  if (path === undefined || !existsSync(path)) {
    logger.debug("No cookie file", { path });
    return CookieJar.empty();
  }
  const jar = await CookieJar.fromFile(path);
  logger.info("Loaded cookies", { path, cookies: jar.size });
  return jar;
}

/**
 * Run the full pipeline for a validated configuration.
 *
 * @throws RecordSourceError when the records file is missing or invalid
 */
export async function runPipeline(
  config: AppConfig,
  deps: PipelineDependencies = {}
): Promise<PipelineResult> {
  const runId = initRunId(deps.runId);
  const logger =
    deps.logger ??
    createLogger({ level: config.logLevel, file: config.logToFile, logDir: config.logDir });
  const settings = config.fetch;

  logger.info("Run started", {
    runId,
    records: config.recordsFile,
    storeRoot: settings.storeRoot,
    concurrency: settings.concurrency,
  });

  const records = await loadRecordsFile(config.recordsFile);
  const { items, stats } = flattenRecordsWithStats(records);
  logger.info("Work items ready", { ...stats });

  const cookies = await loadCookieJar(settings.cookieFile, logger);
  const ownsStrategies = deps.strategies === undefined;
  const strategySet = deps.strategies ?? createDefaultStrategies(settings, cookies);

  let outcomes: RunOutcomes;
  try {
    const fetcher = new ArtifactFetcher({
      storeRoot: settings.storeRoot,
      strategies: strategySet.strategies,
      logger: logger.child({ component: "fetch" }),
    });

    outcomes = await runDownloads(items, {
      fetcher,
      concurrency: settings.concurrency,
      logger,
      onOutcome: (outcome, progress) => {
        logger.debug("Progress", { ...progress, kind: outcome.kind, title: outcome.title });
        deps.onOutcome?.(outcome, progress);
      },
    });
  } finally {
    if (ownsStrategies) {
      await strategySet.close();
    }
  }

  const reports = await writeReports(settings.storeRoot, outcomes, { runId });
  logger.info("Reports written", { ...reports });
  logger.info("Run finished", {
    runId,
    attempted: outcomes.attempted,
    succeeded: outcomes.successes.length,
    failed: outcomes.failures.length,
    elapsedMs: outcomes.elapsedMs,
  });

  return { runId, stats, outcomes, reports };
}
