/**
 * Record source loader.
 *
 * Reads a records file (YAML, which includes JSON), validates its shape and
 * returns typed records. Any problem here is an input error: the run aborts
 * before any download starts.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import type { ZodIssue } from "zod";
import { RecordCollectionSchema, type PaperRecord } from "./schema.js";

/**
 * Individual problem found in a records source.
 */
export interface RecordIssue {
  /** Path to the offending value, e.g. [3, "related", 0, "link"] */
  path: (string | number)[];
  message: string;
}

/**
 * Fatal error for an unreadable or malformed records source.
 */
export class RecordSourceError extends Error {
  public readonly source: string;
  public readonly issues: RecordIssue[];

  constructor(message: string, source: string, issues: RecordIssue[]) {
    super(message);
    this.name = "RecordSourceError";
    this.source = source;
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [`Invalid records source ${this.source}:`];
    for (const issue of this.issues) {
      const location = issue.path.length > 0 ? formatPath(issue.path) : "(root)";
      lines.push(`  - ${location}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Render a path as `[3].related[0].link`.
 */
function formatPath(path: (string | number)[]): string {
  return path
    .map((segment, i) =>
      typeof segment === "number" ? `[${segment}]` : i === 0 ? segment : `.${segment}`
    )
    .join("");
}

function formatZodIssues(zodIssues: ZodIssue[]): RecordIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
  }));
}

/**
 * Validate already-parsed input without throwing.
 */
export function validateRecords(input: unknown): {
  success: boolean;
  records?: PaperRecord[];
  errors?: RecordIssue[];
} {
  const result = RecordCollectionSchema.safeParse(input);

  if (result.success) {
    return { success: true, records: result.data };
  }

  return { success: false, errors: formatZodIssues(result.error.issues) };
}

/**
 * Validate already-parsed input.
 *
 * @param source - Name used in error messages (usually the file path)
 * @throws RecordSourceError if the input is not a valid record sequence
 */
export function parseRecords(input: unknown, source = "(input)"): PaperRecord[] {
  const result = validateRecords(input);

  if (!result.success || !result.records) {
    const issues = result.errors ?? [];
    throw new RecordSourceError(
      `Invalid records source: ${issues.length} validation error(s)`,
      source,
      issues
    );
  }

  return result.records;
}

/**
 * Parse records from YAML or JSON text.
 *
 * @throws RecordSourceError on syntax or schema errors
 */
export function parseRecordsText(text: string, source = "(input)"): PaperRecord[] {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RecordSourceError(`Records source is not valid YAML`, source, [
      { path: [], message },
    ]);
  }

  return parseRecords(document, source);
}

/**
 * Read and parse a records file.
 *
 * @throws RecordSourceError if the file is missing, unreadable or invalid
 */
export async function loadRecordsFile(path: string): Promise<PaperRecord[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RecordSourceError(`Cannot read records source`, path, [{ path: [], message }]);
  }

  return parseRecordsText(text, path);
}
