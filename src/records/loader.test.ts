/**
 * Record Source Loader Tests
 *
 * Run with: node --import tsx src/records/loader.test.ts
 *
 * These tests verify:
 *   1. YAML and JSON record files parse into typed records
 *   2. Missing and null fields get their lenient defaults
 *   3. Malformed sources raise RecordSourceError with located issues
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  loadRecordsFile,
  parseRecords,
  parseRecordsText,
  validateRecords,
  RecordSourceError,
} from "./loader.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST RUNNER
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

/**
 * Run fn and return the RecordSourceError it throws.
 */
async function captureError(fn: () => unknown): Promise<RecordSourceError> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof RecordSourceError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected RecordSourceError");
}

const dir = mkdtempSync(join(tmpdir(), "paperfetch-records-"));

const SAMPLE_YAML = `
- title: Attention Is All You Need
  link: https://example.org/attention.pdf
  topics: [Transformers, NLP]
  year: 2017
  related:
    - title: Layer Normalization
      link: https://example.org/layernorm.pdf
- title: 1984
  link: https://example.org/1984.pdf
  topics:
    - Fiction
`;

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Parsing");

await test("parses YAML records with related entries", () => {
  const records = parseRecordsText(SAMPLE_YAML);
  assert.equal(records.length, 2);
  assert.deepEqual(records[0], {
    title: "Attention Is All You Need",
    link: "https://example.org/attention.pdf",
    topics: ["Transformers", "NLP"],
    related: [{ title: "Layer Normalization", link: "https://example.org/layernorm.pdf" }],
  });
});

await test("numeric titles become strings", () => {
  const records = parseRecordsText(SAMPLE_YAML);
  assert.equal(records[1]?.title, "1984");
});

await test("missing related and topics default to empty lists", () => {
  const records = parseRecords([{ title: "T", link: "L" }]);
  assert.deepEqual(records[0], { title: "T", link: "L", topics: [], related: [] });
});

await test("null title and link become empty strings", () => {
  const records = parseRecords([{ title: null, link: null, topics: ["X"], related: null }]);
  assert.deepEqual(records[0], { title: "", link: "", topics: ["X"], related: [] });
});

await test("surrounding whitespace is kept", () => {
  const records = parseRecords([{ title: "  Spaced  ", link: " L ", topics: [" X "] }]);
  assert.equal(records[0]?.title, "  Spaced  ");
  assert.equal(records[0]?.link, " L ");
  assert.deepEqual(records[0]?.topics, [" X "]);
});

await test("JSON text is accepted", () => {
  const records = parseRecordsText('[{"title": "J", "link": "j", "topics": ["T"]}]');
  assert.equal(records[0]?.title, "J");
});

await test("empty sequence is valid", () => {
  assert.deepEqual(parseRecordsText("[]"), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Validation Errors");

await test("a mapping at the root is rejected", async () => {
  const err = await captureError(() => parseRecordsText("title: lonely\nlink: x\n", "papers.yml"));
  assert.equal(err.source, "papers.yml");
  assert.equal(err.issues.length, 1);
  assert.deepEqual(err.issues[0]?.path, []);
});

await test("an empty document is rejected", async () => {
  const err = await captureError(() => parseRecordsText(""));
  assert.equal(err.issues.length, 1);
});

await test("wrong field type is located by path", async () => {
  const err = await captureError(() =>
    parseRecords([{ title: "ok", link: "ok", topics: ["T"], related: [{ title: "r", link: ["x"] }] }])
  );
  assert.deepEqual(err.issues[0]?.path, [0, "related", 0, "link"]);
  assert.ok(err.format().includes("[0].related[0].link"));
});

await test("a non-mapping record is rejected", async () => {
  const err = await captureError(() => parseRecords(["just a string"]));
  assert.deepEqual(err.issues[0]?.path, [0]);
});

await test("YAML syntax errors are input errors", async () => {
  const err = await captureError(() => parseRecordsText("- title: [unclosed\n", "broken.yml"));
  assert.equal(err.source, "broken.yml");
  assert.equal(err.message, "Records source is not valid YAML");
});

await test("validateRecords reports without throwing", () => {
  const result = validateRecords({ not: "a list" });
  assert.equal(result.success, false);
  assert.equal(result.records, undefined);
  assert.ok(result.errors && result.errors.length > 0);
});

await test("format lists the source and each issue", async () => {
  const err = await captureError(() => parseRecords([{ title: {} }], "papers.yml"));
  const lines = err.format().split("\n");
  assert.equal(lines[0], "Invalid records source papers.yml:");
  assert.ok(lines[1]?.startsWith("  - [0].title: "));
});

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

section("Files");

await test("loads records from a file", async () => {
  const path = join(dir, "papers.yml");
  writeFileSync(path, SAMPLE_YAML);
  const records = await loadRecordsFile(path);
  assert.equal(records.length, 2);
});

await test("a missing file is an input error", async () => {
  const path = join(dir, "missing.yml");
  const err = await captureError(() => loadRecordsFile(path));
  assert.equal(err.source, path);
  assert.equal(err.message, "Cannot read records source");
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

rmSync(dir, { recursive: true, force: true });

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
