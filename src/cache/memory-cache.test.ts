/**
 * Memory cache and cache key tests.
 *
 * Run: node --import tsx src/cache/memory-cache.test.ts
 */

import { strict as assert } from "node:assert";
import { setTimeout as sleep } from "node:timers/promises";

import { CacheError } from "../errors/index.js";
import { StageType } from "../types/pipeline.js";
import { buildCacheKey } from "./keys.js";
import { MemoryCache } from "./memory-cache.js";

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

/** A clock the test moves by hand. */
function manualClock(start = 1_000): { now: () => number; advance: (ms: number) => void } {
  let time = start;
  return {
    now: () => time,
    advance: (ms) => {
      time += ms;
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// BASIC OPERATIONS
// ═══════════════════════════════════════════════════════════════════════════

section("Basic Operations");

await test("get returns what set stored", async () => {
  const cache = new MemoryCache();
  await cache.set("k", "v");
  assert.equal(await cache.get("k"), "v");
  assert.equal(await cache.exists("k"), true);
});

await test("get of an unknown key is undefined", async () => {
  const cache = new MemoryCache();
  assert.equal(await cache.get("missing"), undefined);
  assert.equal(await cache.exists("missing"), false);
});

await test("set overwrites an existing entry", async () => {
  const cache = new MemoryCache();
  await cache.set("k", "old");
  await cache.set("k", "new");
  assert.equal(await cache.get("k"), "new");
  assert.equal(cache.size(), 1);
});

await test("delete removes one entry", async () => {
  const cache = new MemoryCache();
  await cache.set("a", "1");
  await cache.set("b", "2");
  await cache.delete("a");
  assert.equal(await cache.get("a"), undefined);
  assert.equal(await cache.get("b"), "2");
});

await test("clear removes every entry", async () => {
  const cache = new MemoryCache();
  await cache.set("a", "1");
  await cache.set("b", "2", 60);
  await cache.clear();
  assert.equal(cache.size(), 0);
});

// ═══════════════════════════════════════════════════════════════════════════
// EXPIRY
// ═══════════════════════════════════════════════════════════════════════════

section("Expiry");

await test("entry is live up to its expiry instant", async () => {
  const clock = manualClock();
  const cache = new MemoryCache({ now: clock.now });
  await cache.set("k", "v", 10);

  clock.advance(10_000);
  assert.equal(await cache.get("k"), "v");

  clock.advance(1);
  assert.equal(await cache.get("k"), undefined);
  assert.equal(await cache.exists("k"), false);
});

await test("entry without a TTL never expires", async () => {
  const clock = manualClock();
  const cache = new MemoryCache({ now: clock.now });
  await cache.set("k", "v");
  clock.advance(365 * 24 * 3600 * 1000);
  assert.equal(await cache.get("k"), "v");
});

await test("zero TTL expires on the next tick of the clock", async () => {
  const clock = manualClock();
  const cache = new MemoryCache({ now: clock.now });
  await cache.set("k", "v", 0);
  assert.equal(await cache.get("k"), "v");
  clock.advance(1);
  assert.equal(await cache.get("k"), undefined);
});

await test("negative TTL is rejected", async () => {
  const cache = new MemoryCache();
  await assert.rejects(cache.set("k", "v", -1), (err: unknown) => {
    assert.ok(err instanceof CacheError);
    assert.equal(err.message, 'Invalid TTL for "k": -1');
    return true;
  });
  assert.equal(await cache.exists("k"), false);
});

await test("non-finite TTL is rejected", async () => {
  const cache = new MemoryCache();
  await assert.rejects(cache.set("k", "v", Number.NaN), CacheError);
});

await test("size counts live entries only", async () => {
  const clock = manualClock();
  const cache = new MemoryCache({ now: clock.now });
  await cache.set("short", "1", 1);
  await cache.set("long", "2", 100);
  clock.advance(2_000);
  assert.equal(cache.size(), 1);
});

await test("prune removes expired entries and reports the count", async () => {
  const clock = manualClock();
  const cache = new MemoryCache({ now: clock.now });
  await cache.set("a", "1", 1);
  await cache.set("b", "2", 1);
  await cache.set("c", "3");
  clock.advance(1_001);
  assert.equal(cache.prune(), 2);
  assert.equal(cache.prune(), 0);
  assert.equal(await cache.get("c"), "3");
});

await test("background sweep prunes without reads", async () => {
  const clock = manualClock();
  const cache = new MemoryCache({ now: clock.now, sweepIntervalMs: 10 });
  await cache.set("a", "1", 0);
  clock.advance(5);
  await sleep(50);
  assert.equal(cache.prune(), 0);
  cache.dispose();
  cache.dispose();
});

// ═══════════════════════════════════════════════════════════════════════════
// KEYS
// ═══════════════════════════════════════════════════════════════════════════

section("Keys");

await test("key is the stage type and a sha256 digest", () => {
  const key = buildCacheKey(StageType.Preprocessing, "Explain recursion");
  assert.match(key, /^preprocessing:[0-9a-f]{64}$/);
});

await test("same inputs give the same key", () => {
  assert.equal(
    buildCacheKey(StageType.WorkingAwareness, "prompt", null),
    buildCacheKey(StageType.WorkingAwareness, "prompt", null)
  );
});

await test("stage type namespaces the key", () => {
  const [, preprocessing] = buildCacheKey(StageType.Preprocessing, "x").split(":");
  const [, compaction] = buildCacheKey(StageType.Compaction, "x").split(":");
  assert.equal(preprocessing, compaction);
  assert.notEqual(
    buildCacheKey(StageType.Preprocessing, "x"),
    buildCacheKey(StageType.Compaction, "x")
  );
});

await test("part boundaries matter", () => {
  assert.notEqual(
    buildCacheKey(StageType.Reranking, "ab", "c"),
    buildCacheKey(StageType.Reranking, "a", "bc")
  );
});

await test("missing context differs from empty context", () => {
  assert.notEqual(
    buildCacheKey(StageType.WorkingAwareness, "p", null),
    buildCacheKey(StageType.WorkingAwareness, "p", "")
  );
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
