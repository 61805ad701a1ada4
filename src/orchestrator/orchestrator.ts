/**
 * Download orchestrator.
 *
 * Runs the fetcher for every work item through a bounded pool. Items are
 * independent: each is attempted exactly once, in no guaranteed order, and
 * one item's failure never cancels another. Outcomes land in two
 * append-only logs, one for successes and one for failures.
 */

import pLimit from "p-limit";
import type { ItemFetcher } from "../fetch/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { FailureOutcome, Outcome, SuccessOutcome, WorkItem } from "../types/index.js";
import { slug } from "../store/index.js";
import { OutcomeLog } from "./outcome-log.js";

export const DEFAULT_CONCURRENCY = 6;

export interface RunProgress {
  completed: number;
  total: number;
}

export interface RunOptions {
  fetcher: ItemFetcher;
  /** Maximum items in flight (default 6) */
  concurrency?: number;
  logger?: Logger;
  /** Called once per item as soon as its outcome is known */
  onOutcome?: (outcome: Outcome, progress: RunProgress) => void;
  /** Clock for elapsed time, in milliseconds */
  clock?: () => number;
}

export interface RunOutcomes {
  successes: ReadonlyArray<Readonly<SuccessOutcome>>;
  failures: ReadonlyArray<Readonly<FailureOutcome>>;
  attempted: number;
  elapsedMs: number;
}

/**
 * Failure for an item whose fetcher threw instead of returning an outcome.
 */
function unexpectedFailure(item: WorkItem, err: unknown): FailureOutcome {
  return {
    kind: "failure",
    topicSlug: slug(item.topic),
    titleSlug: slug(item.title),
    title: item.title,
    link: item.link,
    attempts: [],
    reason: err instanceof Error ? err.message : String(err),
  };
}

/**
 * Fetch every item with at most `concurrency` in flight.
 *
 * @example
 *   const result = await runDownloads(items, { fetcher, concurrency: 6 });
 *   console.log(`${result.successes.length} of ${result.attempted} downloaded`);
 */
export async function runDownloads(
  items: readonly WorkItem[],
  options: RunOptions
): Promise<RunOutcomes> {
  const { fetcher, onOutcome } = options;
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  const logger = options.logger ?? createSilentLogger();
  const clock = options.clock ?? (() => Date.now());

  const successes = new OutcomeLog<SuccessOutcome>();
  const failures = new OutcomeLog<FailureOutcome>();
  const limit = pLimit(concurrency);
  const startedAt = clock();
  let completed = 0;

  logger.info("Starting downloads", { items: items.length, concurrency });

  async function runOne(item: WorkItem): Promise<void> {
    let outcome: Outcome;
    try {
      outcome = await fetcher.fetch(item);
    } catch (err) {
      logger.error("Fetcher threw", { title: item.title, error: String(err) });
      outcome = unexpectedFailure(item, err);
    }

    if (outcome.kind === "success") {
      successes.append(outcome);
    } else {
      failures.append(outcome);
    }
    completed++;
    try {
      onOutcome?.(outcome, { completed, total: items.length });
    } catch (err) {
      logger.warn("Progress callback failed", { title: item.title, error: String(err) });
    }
  }

  await Promise.all(items.map((item) => limit(() => runOne(item))));

  const elapsedMs = clock() - startedAt;
  logger.info("Downloads finished", {
    succeeded: successes.size,
    failed: failures.size,
    elapsedMs,
  });

  return {
    successes: successes.snapshot(),
    failures: failures.snapshot(),
    attempted: items.length,
    elapsedMs,
  };
}
