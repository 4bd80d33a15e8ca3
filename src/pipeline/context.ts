/**
 * Per-run stage context.
 *
 * One StageContext is created by each `process` call and never shared.
 * Results are appended only by the orchestrator; each stage publishes at
 * most one output, under its own stage type.
 */

import type { Logger } from "../logging/index.js";
import type {
  PipelineRequest,
  SharedData,
  StageOutputMap,
  StageResult,
  StageType,
} from "../types/pipeline.js";

export interface StageContextOptions {
  readonly request: PipelineRequest;
  readonly cacheEnabled: boolean;
  readonly logger: Logger;
  readonly traceId: string;
  readonly signal?: AbortSignal;
}

export interface CacheStats {
  hits: number;
  misses: number;
}

export class StageContext {
  readonly request: PipelineRequest;
  readonly cacheEnabled: boolean;
  readonly logger: Logger;
  readonly traceId: string;
  readonly signal: AbortSignal | undefined;

  private readonly results: StageResult[] = [];
  private readonly shared: SharedData = {};
  private readonly stats: CacheStats = { hits: 0, misses: 0 };

  constructor(options: StageContextOptions) {
    this.request = options.request;
    this.cacheEnabled = options.cacheEnabled;
    this.logger = options.logger;
    this.traceId = options.traceId;
    this.signal = options.signal;
  }

  /** Results produced so far, in definition order. */
  get previousResults(): readonly StageResult[] {
    return [...this.results];
  }

  get sharedData(): Readonly<SharedData> {
    return { ...this.shared };
  }

  get cacheStats(): Readonly<CacheStats> {
    return { ...this.stats };
  }

  getOutput<K extends StageType>(stageType: K): StageOutputMap[K] | undefined {
    return this.shared[stageType];
  }

  /**
   * Publish a stage's output.
   * @throws Error if the stage type already published in this run
   */
  publish<K extends StageType>(stageType: K, output: StageOutputMap[K]): void {
    if (this.shared[stageType] !== undefined) {
      throw new Error(`Shared data for stage "${stageType}" was already written`);
    }
    this.shared[stageType] = output;
  }

  appendResult(result: StageResult): void {
    this.results.push(result);
  }

  recordCacheLookup(hit: boolean): void {
    if (hit) {
      this.stats.hits++;
    } else {
      this.stats.misses++;
    }
  }
}
