#!/usr/bin/env node
/**
 * CLI tool to preview the work list of a run without downloading anything.
 *
 * Loads and flattens the records file, then prints every work item with the
 * path its artifact will be stored at and whether that file is already
 * present. A present artifact costs no request in a real run, so the preview
 * shows how much network work a run will do.
 *
 * Usage:
 *   npm run preview -- [options]
 *
 * Options:
 *   --records <path>   Records file (default: PAPERS_FILE or papers.yml)
 *   --out <dir>        Store root (default: STORE_ROOT or papers)
 *   --json             Output as JSON
 *   -h, --help         Show help
 *
 * Exit codes:
 *   0 - Preview printed
 *   1 - Invalid records file or configuration
 */

import { parseArgs } from "node:util";

import { loadConfig, ConfigError, FetchSettingsError } from "../config/index.js";
import {
  flattenRecordsWithStats,
  loadRecordsFile,
  RecordSourceError,
  type FlattenStats,
  type PaperRecord,
} from "../records/index.js";
import { artifactExists, locateArtifact } from "../store/index.js";

// ============================================================
// Types
// ============================================================

export interface PreviewEntry {
  title: string;
  link: string;
  topic: string;
  path: string;
  present: boolean;
}

export interface WorkPreview {
  storeRoot: string;
  entries: PreviewEntry[];
  stats: FlattenStats;
  /** Items a run would actually request */
  pending: number;
}

// ============================================================
// Preview
// ============================================================

export async function buildPreview(
  records: readonly PaperRecord[],
  storeRoot: string
): Promise<WorkPreview> {
  const { items, stats } = flattenRecordsWithStats(records);

  const entries = await Promise.all(
    items.map(async (item) => {
      const location = locateArtifact(storeRoot, item);
      return {
        title: item.title,
        link: item.link,
        topic: item.topic,
        path: location.path,
        present: await artifactExists(location.path),
      };
    })
  );

  return {
    storeRoot,
    entries,
    stats,
    pending: entries.filter((e) => !e.present).length,
  };
}

export function formatPreview(preview: WorkPreview): string {
  const lines: string[] = [];

  for (const entry of preview.entries) {
    lines.push(`${entry.present ? "✓" : "·"} ${entry.title}`);
    lines.push(`    topic: ${entry.topic}`);
    lines.push(`    link:  ${entry.link}`);
    lines.push(`    path:  ${entry.path}`);
  }

  const { stats } = preview;
  if (lines.length > 0) {
    lines.push("");
  }
  lines.push(`Records:    ${stats.records} (${stats.related} related entries)`);
  lines.push(`Work items: ${stats.emitted}`);
  lines.push(`Duplicates: ${stats.duplicates}`);
  lines.push(`Skipped:    ${stats.skipped}`);
  lines.push(`Present:    ${stats.emitted - preview.pending}`);
  lines.push(`To fetch:   ${preview.pending}`);

  return lines.join("\n");
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      records: { type: "string" },
      out: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: preview-work [options]

Options:
  --records <path>   Records file (default: PAPERS_FILE or papers.yml)
  --out <dir>        Store root (default: STORE_ROOT or papers)
  --json             Output as JSON
  -h, --help         Show this help message

Exit codes:
  0 - Preview printed
  1 - Invalid records file or configuration
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();

  const config = loadConfig(process.env, {
    ...(args.records !== undefined ? { recordsFile: args.records } : {}),
    ...(args.out !== undefined ? { storeRoot: args.out } : {}),
  });

  const records = await loadRecordsFile(config.recordsFile);
  const preview = await buildPreview(records, config.fetch.storeRoot);

  if (args.json) {
    console.log(JSON.stringify(preview, null, 2));
  } else {
    console.log(formatPreview(preview));
  }
}

// Only run when executed directly (not imported by tests)
const entry = process.argv[1] ?? "";
const isDirectExecution = entry.endsWith("preview-work.ts") || entry.endsWith("preview-work.js");

if (isDirectExecution) {
  main().catch((err: unknown) => {
    if (err instanceof RecordSourceError || err instanceof FetchSettingsError) {
      console.error(err.format());
    } else if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  });
}
