/**
 * Record deduplicator.
 *
 * Walks the nested record list and emits one work item per unique link.
 * Order is stable: records in input order, each parent immediately followed
 * by its not-yet-seen related entries. The first occurrence of a link wins;
 * later records with the same link are dropped, title included.
 */

import type { PaperRecord } from "./schema.js";
import type { WorkItem } from "../types/index.js";

export interface FlattenStats {
  /** Top-level records read */
  records: number;
  /** Related entries read */
  related: number;
  /** Work items emitted */
  emitted: number;
  /** Entries dropped because their link was already seen */
  duplicates: number;
  /** Entries dropped for a missing title, link or primary topic */
  skipped: number;
}

export interface FlattenResult {
  items: WorkItem[];
  stats: FlattenStats;
}

interface Entry {
  title: string;
  link: string;
}

/**
 * Flatten records into unique work items, with counts of what was dropped.
 */
export function flattenRecordsWithStats(records: readonly PaperRecord[]): FlattenResult {
  const seen = new Set<string>();
  const items: WorkItem[] = [];
  const stats: FlattenStats = { records: 0, related: 0, emitted: 0, duplicates: 0, skipped: 0 };

  function visit(entry: Entry, topic: string): void {
    if (entry.title === "" || entry.link === "") {
      stats.skipped++;
      return;
    }
    if (seen.has(entry.link)) {
      stats.duplicates++;
      return;
    }
    seen.add(entry.link);
    items.push({ title: entry.title, link: entry.link, topic });
    stats.emitted++;
  }

  for (const record of records) {
    stats.records++;
    stats.related += record.related.length;

    const topic = record.topics[0] ?? "";
    if (topic === "") {
      // No primary topic to file the record or its related entries under.
      stats.skipped += 1 + record.related.length;
      continue;
    }

    visit(record, topic);
    for (const related of record.related) {
      visit(related, topic);
    }
  }

  return { items, stats };
}

/**
 * Flatten records into unique work items.
 */
export function flattenRecords(records: readonly PaperRecord[]): WorkItem[] {
  return flattenRecordsWithStats(records).items;
}
