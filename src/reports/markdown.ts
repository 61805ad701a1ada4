/**
 * Markdown reports for a run.
 *
 * index.md lists downloaded papers grouped under one heading per topic;
 * failed.md lists papers that need a manual download, with their links.
 * Both are sorted by topic slug, then title slug, then title, comparing
 * code units, so the same outcomes always render the same text.
 */

import { relativeArtifactPath } from "../store/index.js";
import type { FailureOutcome, SuccessOutcome } from "../types/index.js";

export const SUCCESS_INDEX_HEADING = "# Downloaded Papers";
export const FAILURE_INDEX_HEADING = "# Failed Downloads (manual)";

interface Sortable {
  topicSlug: string;
  titleSlug: string;
  title: string;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareOutcomes(a: Sortable, b: Sortable): number {
  return (
    compareText(a.topicSlug, b.topicSlug) ||
    compareText(a.titleSlug, b.titleSlug) ||
    compareText(a.title, b.title)
  );
}

function sorted<T extends Sortable>(outcomes: readonly T[]): T[] {
  return [...outcomes].sort(compareOutcomes);
}

/**
 * Render index.md.
 *
 * @example
 *   # Downloaded Papers
 *
 *   ## Deep_Learning
 *
 *   - [Attention Is All You Need](Deep_Learning/Attention_Is_All_You_Need.pdf)
 */
export function renderSuccessIndex(successes: readonly Readonly<SuccessOutcome>[]): string {
  const lines: string[] = [SUCCESS_INDEX_HEADING, ""];
  let currentTopic: string | undefined;

  for (const outcome of sorted(successes)) {
    if (outcome.topicSlug !== currentTopic) {
      if (currentTopic !== undefined) {
        lines.push("");
      }
      lines.push(`## ${outcome.topicSlug}`, "");
      currentTopic = outcome.topicSlug;
    }
    lines.push(
      `- [${outcome.title}](${relativeArtifactPath(outcome.topicSlug, outcome.titleSlug)})`
    );
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Render failed.md: one entry per failure, no topic headings.
 */
export function renderFailureIndex(failures: readonly Readonly<FailureOutcome>[]): string {
  const entries = sorted(failures).map(
    (outcome) =>
      `- **${outcome.title}**  \n` +
      `  → Category: \`${outcome.topicSlug}\`  \n` +
      `  → URL: [${outcome.link}](${outcome.link})\n\n`
  );
  return `${FAILURE_INDEX_HEADING}\n\n${entries.join("")}`;
}
