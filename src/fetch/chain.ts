/**
 * Fetch strategy chain.
 *
 * For one work item: return early if the artifact is already on disk,
 * otherwise try each strategy in order until one places the artifact.
 * Every item ends in exactly one outcome; nothing here throws.
 */

import {
  artifactExists,
  ensureDirectory,
  locateArtifact,
  type ArtifactLocation,
} from "../store/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type {
  AttemptFailure,
  FailureOutcome,
  Outcome,
  SuccessOutcome,
  ArtifactSource,
  WorkItem,
} from "../types/index.js";
import { describeError, type FetchStrategy, type StrategyResult } from "./strategies.js";

/**
 * Anything that turns a work item into an outcome.
 * The orchestrator depends on this, not on the concrete chain.
 */
export interface ItemFetcher {
  fetch(item: WorkItem): Promise<Outcome>;
}

export interface ArtifactFetcherOptions {
  storeRoot: string;
  strategies: readonly FetchStrategy[];
  logger?: Logger;
}

function success(item: WorkItem, location: ArtifactLocation, source: ArtifactSource): SuccessOutcome {
  return {
    kind: "success",
    topicSlug: location.topicSlug,
    titleSlug: location.titleSlug,
    title: item.title,
    path: location.path,
    source,
  };
}

function failure(
  item: WorkItem,
  location: ArtifactLocation,
  attempts: AttemptFailure[],
  reason?: string
): FailureOutcome {
  return {
    kind: "failure",
    topicSlug: location.topicSlug,
    titleSlug: location.titleSlug,
    title: item.title,
    link: item.link,
    attempts,
    ...(reason !== undefined ? { reason } : {}),
  };
}

export class ArtifactFetcher implements ItemFetcher {
  private readonly storeRoot: string;
  private readonly strategies: readonly FetchStrategy[];
  private readonly logger: Logger;

  constructor(options: ArtifactFetcherOptions) {
    this.storeRoot = options.storeRoot;
    this.strategies = options.strategies;
    this.logger = options.logger ?? createSilentLogger();
  }

  async fetch(item: WorkItem): Promise<Outcome> {
    const location = locateArtifact(this.storeRoot, item);

    if (await artifactExists(location.path)) {
      this.logger.info("Already exists", { title: item.title, path: location.path });
      return success(item, location, "existing");
    }

    try {
      await ensureDirectory(location.directory);
    } catch (err) {
      const reason = `Cannot create ${location.directory}: ${describeError(err)}`;
      this.logger.error("Topic directory unavailable", { title: item.title, reason });
      return failure(item, location, [], reason);
    }

    this.logger.info("Downloading", { title: item.title, link: item.link });

    const attempts: AttemptFailure[] = [];
    for (const strategy of this.strategies) {
      const result = await this.attempt(strategy, item, location.path);
      if (result.ok) {
        this.logger.info("Downloaded", {
          title: item.title,
          strategy: strategy.name,
          bytes: result.bytes,
        });
        return success(item, location, strategy.name);
      }
      attempts.push({ strategy: strategy.name, reason: result.reason });
      this.logger.warn("Attempt failed", {
        title: item.title,
        strategy: strategy.name,
        reason: result.reason,
      });
    }

    this.logger.error("All attempts failed", { title: item.title, link: item.link });
    return failure(item, location, attempts);
  }

  /**
   * Run one strategy, converting a throw into a failed result.
   */
  private async attempt(
    strategy: FetchStrategy,
    item: WorkItem,
    destination: string
  ): Promise<StrategyResult> {
    try {
      return await strategy.attempt(item, destination);
    } catch (err) {
      return { ok: false, reason: describeError(err) };
    }
  }
}
