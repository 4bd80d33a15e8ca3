/**
 * Base class for pipeline stages.
 *
 * `execute` owns the stage's lifecycle: skip when disabled, time the run,
 * bound it by the run signal and the stage timeout, publish the output,
 * and turn any thrown error into a failed result. Subclasses implement
 * `run` and never see the bookkeeping.
 *
 *   pending ─┬─ disabled ──────────────► skipped
 *            └─ running ─┬─ output ────► completed
 *                        └─ throws ────► failed
 */

import { performance } from "node:perf_hooks";
import type { z } from "zod";

import type { Cache } from "../cache/index.js";
import { CacheError, classifyError, errorMessage } from "../errors/index.js";
import type { Logger } from "../logging/index.js";
import { createStageSignal, raceAbort, throwIfAborted } from "../pipeline/cancellation.js";
import type { StageContext } from "../pipeline/context.js";
import {
  StageStatus,
  type SkipReason,
  type StageOutputMap,
  type StageResult,
  type StageType,
} from "../types/pipeline.js";
import { deepFreeze } from "../utils/freeze.js";

export interface StageOptions {
  readonly enabled: boolean;
  /** Upper bound on one invocation. */
  readonly timeoutMs: number;
  /** Shared cache; cacheable stages compute directly when absent. */
  readonly cache?: Cache;
  readonly cacheTtlSeconds?: number;
}

/**
 * State of one stage invocation, handed to `run`.
 * Stage instances are shared by concurrent runs, so nothing per-run lives on them.
 */
export class StageRun {
  private hits = 0;
  private misses = 0;

  constructor(
    readonly context: StageContext,
    readonly signal: AbortSignal,
    readonly logger: Logger,
    private readonly cache: Cache | undefined,
    private readonly ttlSeconds: number | undefined
  ) {}

  /** True when every cache lookup of this invocation hit. */
  get servedFromCache(): boolean {
    return this.hits > 0 && this.misses === 0;
  }

  /**
   * Memoize `compute` under `key`. Values are stored as JSON and checked
   * against `schema` on the way out; a cache fault or a value that does
   * not match counts as a miss.
   */
  async cached<T>(key: string, schema: z.ZodType<T>, compute: () => Promise<T>): Promise<T> {
    if (!this.cache || !this.context.cacheEnabled) {
      return compute();
    }

    const hit = await this.read(key, schema);
    this.context.recordCacheLookup(hit !== undefined);

    if (hit !== undefined) {
      this.hits++;
      this.logger.debug("Cache hit", { key });
      return hit;
    }

    this.misses++;
    const value = await compute();
    await this.write(key, value);
    return value;
  }

  private async read<T>(key: string, schema: z.ZodType<T>): Promise<T | undefined> {
    if (!this.cache) return undefined;

    let raw: string | undefined;
    try {
      raw = await this.cache.get(key);
    } catch (err) {
      const cacheError = new CacheError(key, `Cache read failed: ${errorMessage(err)}`, { cause: err });
      this.logger.warn("Cache read failed, treating as miss", { key, error: cacheError.message });
      return undefined;
    }
    if (raw === undefined) return undefined;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      this.logger.warn("Cached value is not valid JSON, treating as miss", { key, error: errorMessage(err) });
      return undefined;
    }

    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn("Cached value has an unexpected shape, treating as miss", { key });
      return undefined;
    }
    return parsed.data;
  }

  private async write(key: string, value: unknown): Promise<void> {
    if (!this.cache) return;

    try {
      await this.cache.set(key, JSON.stringify(value), this.ttlSeconds);
    } catch (err) {
      const cacheError = new CacheError(key, `Cache write failed: ${errorMessage(err)}`, { cause: err });
      this.logger.warn("Cache write failed, result not cached", { key, error: cacheError.message });
    }
  }
}

/**
 * Build a skipped result. Skips take no time and produce nothing.
 */
export function skippedResult<K extends StageType>(stageType: K, reason: SkipReason): StageResult<K> {
  return Object.freeze({
    stageType,
    status: StageStatus.Skipped,
    durationMs: 0,
    skipReason: reason,
  });
}

/**
 * Build a failed result.
 */
export function failedResult<K extends StageType>(
  stageType: K,
  err: unknown,
  durationMs: number
): StageResult<K> {
  return Object.freeze({
    stageType,
    status: StageStatus.Failed,
    durationMs,
    error: errorMessage(err),
    errorKind: classifyError(err),
  });
}

export abstract class BaseStage<K extends StageType> {
  abstract readonly stageType: K;

  readonly enabled: boolean;
  private readonly timeoutMs: number;
  private readonly cache: Cache | undefined;
  private readonly cacheTtlSeconds: number | undefined;

  constructor(options: StageOptions) {
    this.enabled = options.enabled;
    this.timeoutMs = options.timeoutMs;
    this.cache = options.cache;
    this.cacheTtlSeconds = options.cacheTtlSeconds;
  }

  /**
   * The stage's own work. Throw to fail; the output is published by `execute`.
   */
  protected abstract run(run: StageRun): Promise<StageOutputMap[K]>;

  /**
   * Run the stage. Never rejects.
   */
  async execute(context: StageContext): Promise<StageResult<K>> {
    const logger = context.logger.child({ stage: this.stageType });

    if (!this.enabled) {
      logger.debug("Stage disabled, skipping");
      return skippedResult(this.stageType, "disabled");
    }

    const start = performance.now();
    const scope = createStageSignal(context.signal, this.timeoutMs);

    try {
      throwIfAborted(scope.signal);
      logger.info("Stage started");

      const run = new StageRun(context, scope.signal, logger, this.cache, this.cacheTtlSeconds);
      const output = deepFreeze(await raceAbort(this.run(run), scope.signal));
      const durationMs = performance.now() - start;

      context.publish(this.stageType, output);
      logger.info("Stage completed", { durationMs: Math.round(durationMs) });

      return Object.freeze({
        stageType: this.stageType,
        status: StageStatus.Completed,
        output,
        durationMs,
        cacheHit: run.servedFromCache,
      });
    } catch (err) {
      const result = failedResult(this.stageType, err, performance.now() - start);
      logger.error("Stage failed", { error: result.error, kind: result.errorKind });
      return result;
    } finally {
      scope.dispose();
    }
  }
}
