/**
 * Logger tests.
 *
 * Run: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { createLogger, formatLogEntry, isLogLevel, type LogLevel } from "./logger.js";
import { generateSpanId, generateTraceId } from "./trace-id.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
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

function capture(): { entries: [LogLevel, string][]; sink: (l: LogLevel, e: string) => void } {
  const entries: [LogLevel, string][] = [];
  return { entries, sink: (l, e) => entries.push([l, e]) };
}

const TIMESTAMP = "2026-01-01T00:00:00.000Z";

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

section("Formatting");

test("entry without trace or fields", () => {
  assert.equal(
    formatLogEntry("warn", "Cache read failed", {}, undefined, TIMESTAMP),
    "[2026-01-01T00:00:00.000Z] [WARN ] [no-trace] Cache read failed"
  );
});

test("trace ID goes in the prefix, other fields in the JSON tail", () => {
  assert.equal(
    formatLogEntry(
      "info",
      "Stage completed",
      { traceId: "trace-1", stage: "preprocessing" },
      { durationMs: 5 },
      TIMESTAMP
    ),
    '[2026-01-01T00:00:00.000Z] [INFO ] [trace-1] Stage completed {"stage":"preprocessing","durationMs":5}'
  );
});

test("context overrides a bound field of the same name", () => {
  assert.equal(
    formatLogEntry("error", "x", { stage: "a" }, { stage: "b" }, TIMESTAMP),
    '[2026-01-01T00:00:00.000Z] [ERROR] [no-trace] x {"stage":"b"}'
  );
});

test("isLogLevel accepts the four levels only", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("error"), true);
  assert.equal(isLogLevel("trace"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════════════════

section("Logger");

test("entries below the level are dropped", () => {
  const { entries, sink } = capture();
  const logger = createLogger({ level: "warn", console: false, sink });
  logger.debug("d");
  logger.info("i");
  logger.warn("w");
  logger.error("e");
  assert.deepEqual(
    entries.map(([level]) => level),
    ["warn", "error"]
  );
});

test("child loggers add bindings and keep the parent's level", () => {
  const { entries, sink } = capture();
  const logger = createLogger({ level: "info", console: false, sink });
  const child = logger.child({ traceId: "abc" }).child({ stage: "compaction" });

  assert.equal(child.level, "info");
  child.info("careful");

  assert.equal(entries.length, 1);
  assert.match(entries[0]?.[1] ?? "", /^\[[^\]]+\] \[INFO \] \[abc\] careful \{"stage":"compaction"\}$/);
});

test("parent bindings are not changed by a child", () => {
  const { entries, sink } = capture();
  const logger = createLogger({ level: "info", console: false, sink, bindings: { traceId: "root" } });
  logger.child({ traceId: "other" });
  logger.info("hello");
  assert.match(entries[0]?.[1] ?? "", /\[root\] hello$/);
});

test("file output appends one line per entry and creates the directory", () => {
  const dir = join(tmpdir(), `logger-test-${process.pid}`);
  const file = join(dir, "nested", "pipeline.log");
  try {
    const logger = createLogger({ level: "info", console: false, file });
    logger.info("first");
    logger.warn("second", { n: 2 });

    const lines = readFileSync(file, "utf-8").trimEnd().split("\n");
    assert.equal(lines.length, 2);
    assert.match(lines[0] ?? "", /\[INFO \] \[no-trace\] first$/);
    assert.match(lines[1] ?? "", /\[WARN \] \[no-trace\] second \{"n":2\}$/);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// IDS
// ═══════════════════════════════════════════════════════════════════════════

section("IDs");

test("trace IDs are UUIDs and unique", () => {
  const a = generateTraceId();
  assert.match(a, /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  assert.notEqual(a, generateTraceId());
});

test("span IDs are 16 hex characters", () => {
  assert.match(generateSpanId(), /^[0-9a-f]{16}$/);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
