/**
 * Download Orchestrator Tests
 *
 * Run with: node --import tsx src/orchestrator/orchestrator.test.ts
 *
 * Uses in-memory fetchers, no network or filesystem.
 *
 * These tests verify:
 *   1. No more than `concurrency` items are in flight at once
 *   2. Every item is attempted exactly once
 *   3. One item's failure (or throw) does not affect the others
 *   4. Progress callbacks and frozen result snapshots
 */

import { strict as assert } from "node:assert";
import { setTimeout as delay } from "node:timers/promises";

import { OutcomeLog, runDownloads } from "./index.js";
import type { ItemFetcher } from "../fetch/index.js";
import type { LogContext, Logger } from "../logging/index.js";
import type { Outcome, WorkItem } from "../types/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
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

function makeItems(count: number, topic = "T"): WorkItem[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `Paper ${i}`,
    link: `https://papers.example/${i}.pdf`,
    topic,
  }));
}

function successFor(item: WorkItem): Outcome {
  return {
    kind: "success",
    topicSlug: item.topic,
    titleSlug: item.title.replace(" ", "_"),
    title: item.title,
    path: `/store/${item.topic}/${item.title}.pdf`,
    source: "primary",
  };
}

function failureFor(item: WorkItem): Outcome {
  return {
    kind: "failure",
    topicSlug: item.topic,
    titleSlug: item.title.replace(" ", "_"),
    title: item.title,
    link: item.link,
    attempts: [{ strategy: "primary", reason: "HTTP 404" }],
  };
}

/**
 * Fetcher that records calls and peak parallelism.
 */
class CountingFetcher implements ItemFetcher {
  inFlight = 0;
  peak = 0;
  readonly calls: string[] = [];

  constructor(private readonly decide: (item: WorkItem) => Outcome | Error = successFor) {}

  async fetch(item: WorkItem): Promise<Outcome> {
    this.calls.push(item.link);
    this.inFlight++;
    this.peak = Math.max(this.peak, this.inFlight);
    try {
      await delay(5);
      const result = this.decide(item);
      if (result instanceof Error) {
        throw result;
      }
      return result;
    } finally {
      this.inFlight--;
    }
  }
}

/**
 * Logger that keeps warnings for inspection.
 */
function warningLogger(warnings: Array<[string, LogContext | undefined]>): Logger {
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: (message, context) => {
      warnings.push([message, context]);
    },
    error: () => {},
    child: () => logger,
  };
  return logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONCURRENCY
// ═══════════════════════════════════════════════════════════════════════════

section("Concurrency");

await test("never exceeds the configured bound", async () => {
  const fetcher = new CountingFetcher();
  await runDownloads(makeItems(20), { fetcher, concurrency: 3 });
  assert.ok(fetcher.peak <= 3, `peak was ${fetcher.peak}`);
  assert.equal(fetcher.peak, 3);
});

await test("defaults to six in flight", async () => {
  const fetcher = new CountingFetcher();
  await runDownloads(makeItems(20), { fetcher });
  assert.equal(fetcher.peak, 6);
});

await test("concurrency of one runs items one at a time", async () => {
  const fetcher = new CountingFetcher();
  await runDownloads(makeItems(5), { fetcher, concurrency: 1 });
  assert.equal(fetcher.peak, 1);
});

await test("concurrency below one is raised to one", async () => {
  const fetcher = new CountingFetcher();
  const result = await runDownloads(makeItems(3), { fetcher, concurrency: 0 });
  assert.equal(fetcher.peak, 1);
  assert.equal(result.successes.length, 3);
});

// ═══════════════════════════════════════════════════════════════════════════
// OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════

section("Outcomes");

await test("every item is attempted exactly once", async () => {
  const items = makeItems(12);
  const fetcher = new CountingFetcher();
  const result = await runDownloads(items, { fetcher, concurrency: 4 });
  assert.deepEqual([...fetcher.calls].sort(), items.map((i) => i.link).sort());
  assert.equal(result.attempted, 12);
  assert.equal(result.successes.length + result.failures.length, 12);
});

await test("failures are isolated from successes", async () => {
  const items = makeItems(6);
  const fetcher = new CountingFetcher((item) =>
    item.title === "Paper 2" ? failureFor(item) : successFor(item)
  );
  const result = await runDownloads(items, { fetcher, concurrency: 2 });
  assert.equal(result.successes.length, 5);
  assert.deepEqual(
    result.failures.map((f) => f.title),
    ["Paper 2"]
  );
});

await test("a throwing fetcher becomes a failure for that item only", async () => {
  const items: WorkItem[] = [
    { title: "Good", link: "https://papers.example/good.pdf", topic: "Deep Learning" },
    { title: "Bad: Paper", link: "https://papers.example/bad.pdf", topic: "Deep Learning" },
  ];
  const fetcher = new CountingFetcher((item) =>
    item.title === "Good" ? successFor(item) : new Error("disk on fire")
  );
  const result = await runDownloads(items, { fetcher });
  assert.equal(result.successes.length, 1);
  assert.deepEqual(result.failures, [
    {
      kind: "failure",
      topicSlug: "Deep_Learning",
      titleSlug: "Bad__Paper",
      title: "Bad: Paper",
      link: "https://papers.example/bad.pdf",
      attempts: [],
      reason: "disk on fire",
    },
  ]);
});

await test("empty input finishes with nothing attempted", async () => {
  const fetcher = new CountingFetcher();
  const result = await runDownloads([], { fetcher });
  assert.equal(result.attempted, 0);
  assert.deepEqual(result.successes, []);
  assert.deepEqual(result.failures, []);
  assert.equal(fetcher.calls.length, 0);
});

await test("progress is reported once per item", async () => {
  const progress: Array<[string, number, number]> = [];
  await runDownloads(makeItems(4), {
    fetcher: new CountingFetcher(),
    concurrency: 2,
    onOutcome: (outcome, { completed, total }) => progress.push([outcome.kind, completed, total]),
  });
  assert.deepEqual(
    progress.map(([, completed]) => completed),
    [1, 2, 3, 4]
  );
  assert.ok(progress.every(([kind, , total]) => kind === "success" && total === 4));
});

await test("a throwing progress callback does not lose outcomes", async () => {
  const warnings: Array<[string, LogContext | undefined]> = [];
  const completedSeen: number[] = [];
  const result = await runDownloads(makeItems(3), {
    fetcher: new CountingFetcher(),
    concurrency: 1,
    logger: warningLogger(warnings),
    onOutcome: (_outcome, { completed }) => {
      completedSeen.push(completed);
      if (completed === 1) {
        throw new Error("callback failed");
      }
    },
  });
  assert.equal(result.attempted, 3);
  assert.equal(result.successes.length, 3);
  assert.deepEqual(completedSeen, [1, 2, 3]);
  assert.deepEqual(warnings, [
    ["Progress callback failed", { title: "Paper 0", error: "Error: callback failed" }],
  ]);
});

await test("elapsed time comes from the clock", async () => {
  const ticks = [1000, 1250];
  const result = await runDownloads(makeItems(1), {
    fetcher: new CountingFetcher(),
    clock: () => ticks.shift() ?? 0,
  });
  assert.equal(result.elapsedMs, 250);
});

await test("result lists are frozen", async () => {
  const result = await runDownloads(makeItems(2), { fetcher: new CountingFetcher() });
  assert.ok(Object.isFrozen(result.successes));
  assert.ok(Object.isFrozen(result.failures));
  assert.ok(Object.isFrozen(result.successes[0]));
});

// ═══════════════════════════════════════════════════════════════════════════
// OUTCOME LOG
// ═══════════════════════════════════════════════════════════════════════════

section("Outcome Log");

await test("snapshots do not change after later appends", () => {
  const log = new OutcomeLog<{ id: number }>();
  log.append({ id: 1 });
  const first = log.snapshot();
  log.append({ id: 2 });
  assert.deepEqual(first, [{ id: 1 }]);
  assert.deepEqual(log.snapshot(), [{ id: 1 }, { id: 2 }]);
  assert.equal(log.size, 2);
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
