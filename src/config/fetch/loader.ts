/**
 * Fetch settings loader and validator.
 */

import type { ZodIssue } from "zod";
import { FetchSettingsSchema, type FetchSettings } from "./schema.js";

/**
 * Structured validation error for fetch settings.
 */
export class FetchSettingsError extends Error {
  public readonly issues: SettingsIssue[];

  constructor(message: string, issues: SettingsIssue[]) {
    super(message);
    this.name = "FetchSettingsError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Fetch settings validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface SettingsIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): SettingsIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate and freeze fetch settings.
 *
 * @throws FetchSettingsError if validation fails
 */
export function loadFetchSettings(input: unknown): Readonly<FetchSettings> {
  const result = FetchSettingsSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new FetchSettingsError(
      `Invalid fetch settings: ${issues.length} validation error(s)`,
      issues
    );
  }

  return Object.freeze(result.data);
}
