/**
 * Reasoning pipeline orchestrator.
 *
 * Builds the five stages once, in their fixed order, and runs them for each
 * request. Stages run one after another because each may read what the
 * previous ones published; only the working awareness perspectives fan
 * out. Everything a run mutates (context, tracer, metrics, logger
 * bindings) is created inside `process`, so one pipeline serves any number
 * of concurrent requests.
 */

import { performance } from "node:perf_hooks";

import { MemoryCache, type Cache } from "../cache/index.js";
import {
  loadPipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from "../config/pipeline/index.js";
import { ConfigurationError, errorMessage } from "../errors/index.js";
import { createLogger, generateTraceId, type Logger } from "../logging/index.js";
import { MetricsCollector, Tracer } from "../observability/index.js";
import {
  DEFAULT_PROMPTS_DIR,
  loadStageTemplates,
  PromptTemplateLoader,
  type StageTemplates,
} from "../prompts/index.js";
import {
  CompactionStage,
  failedResult,
  FinalResponseStage,
  PreprocessingStage,
  RerankingStage,
  skippedResult,
  WorkingAwarenessStage,
  type BaseStage,
} from "../stages/index.js";
import type { Compactor, ReasoningAgent, Reranker } from "../types/collaborators.js";
import {
  StageStatus,
  StageType,
  type FinalResponseSource,
  type PipelineRequest,
  type PipelineResult,
  type PipelineResultMetadata,
  type StageResult,
} from "../types/pipeline.js";
import { deepFreeze } from "../utils/freeze.js";
import { StageContext } from "./context.js";
import { createPipelineRequest, type PipelineRequestInput } from "./request.js";

export interface ReasoningPipelineOptions {
  readonly agent: ReasoningAgent;
  /** Validated config, or any subset of its fields over the defaults. */
  readonly config?: PipelineConfigInput;
  readonly compactor?: Compactor;
  /** Required when reranking is enabled. */
  readonly reranker?: Reranker;
  /** Shared across runs; a MemoryCache is created when omitted. */
  readonly cache?: Cache;
  readonly logger?: Logger;
  /** Pre-parsed templates; loaded from `config.promptsDir` when omitted. */
  readonly templates?: StageTemplates;
}

export interface ProcessOptions {
  /** Aborting cancels the run; the current stage fails, the rest are skipped. */
  readonly signal?: AbortSignal;
}

type AnyStage = BaseStage<StageType>;

function loadTemplates(dir: string): StageTemplates {
  try {
    return loadStageTemplates(new PromptTemplateLoader(dir));
  } catch (err) {
    throw new ConfigurationError(`Invalid prompt templates in ${dir}: ${errorMessage(err)}`);
  }
}

/**
 * The final text of a run: the synthesized answer when FinalResponse
 * completed, else the output of the last completed stage, else the prompt.
 */
export function resolveFinalResponse(
  context: StageContext
): { text: string; source: FinalResponseSource } {
  const final = context.getOutput(StageType.FinalResponse);
  if (final) return { text: final.text, source: StageType.FinalResponse };

  const reranking = context.getOutput(StageType.Reranking);
  if (reranking) return { text: reranking.top, source: StageType.Reranking };

  const compaction = context.getOutput(StageType.Compaction);
  if (compaction) return { text: compaction.text, source: StageType.Compaction };

  const awareness = context.getOutput(StageType.WorkingAwareness);
  const firstPerspective = awareness?.perspectives.find(
    (p) => p.status === StageStatus.Completed && p.text !== undefined
  );
  if (firstPerspective?.text !== undefined) {
    return { text: firstPerspective.text, source: StageType.WorkingAwareness };
  }

  const preprocessing = context.getOutput(StageType.Preprocessing);
  if (preprocessing) return { text: preprocessing.text, source: StageType.Preprocessing };

  return { text: context.request.prompt, source: "request" };
}

export class ReasoningPipeline {
  readonly config: Readonly<PipelineConfig>;
  private readonly stages: readonly AnyStage[];
  private readonly cache: Cache | undefined;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError for an invalid config, reranking without a
   *         reranker, or missing/invalid prompt templates
   */
  constructor(options: ReasoningPipelineOptions) {
    const config = loadPipelineConfig(options.config ?? {});

    if (config.enableReranking && !options.reranker) {
      throw new ConfigurationError(
        "Reranking is enabled but no reranker was provided; pass a reranker or set enableReranking to false",
        [{ path: ["enableReranking"], message: "Requires a reranker collaborator", code: "custom" }]
      );
    }

    this.config = config;
    this.logger = options.logger ?? createLogger({ level: config.logLevel });
    this.cache =
      config.cacheStrategy === "none" ? undefined : (options.cache ?? new MemoryCache());

    const templates = options.templates ?? loadTemplates(config.promptsDir ?? DEFAULT_PROMPTS_DIR);
    const common = {
      timeoutMs: config.timeoutSeconds * 1000,
      cache: this.cache,
      cacheTtlSeconds: config.cacheTtlSeconds,
    };

    this.stages = [
      new PreprocessingStage({
        ...common,
        enabled: config.enablePreprocessing,
        agent: options.agent,
        template: templates.preprocessing,
      }),
      new WorkingAwarenessStage({
        ...common,
        enabled: config.enableWorkingAwareness,
        agent: options.agent,
        template: templates.perspective,
        framings: config.perspectiveFramings.slice(0, config.numPerspectives),
        parallel: config.parallelExecution,
      }),
      new CompactionStage({
        ...common,
        enabled: config.enableCompaction,
        compactor: options.compactor,
      }),
      new RerankingStage({
        ...common,
        enabled: config.enableReranking,
        reranker: options.reranker,
        topK: config.rerankTopK,
      }),
      new FinalResponseStage({
        ...common,
        enabled: config.enableFinalResponse,
        agent: options.agent,
        template: templates.finalResponse,
      }),
    ];

    this.logger.debug("Pipeline initialized", {
      enabled: this.stages.filter((s) => s.enabled).map((s) => s.stageType),
      parallelExecution: config.parallelExecution,
      cacheStrategy: config.cacheStrategy,
    });
  }

  /** Stage types in definition order. */
  get stageTypes(): StageType[] {
    return this.stages.map((stage) => stage.stageType);
  }

  /**
   * Run a request through every stage.
   *
   * Resolves with a result for every stage, whatever happened to them;
   * inspect `stages[i].status` for partial failure.
   *
   * @throws ConfigurationError if the request itself is invalid (before any stage runs)
   */
  async process(
    input: PipelineRequest | PipelineRequestInput | string,
    options: ProcessOptions = {}
  ): Promise<PipelineResult> {
    const request = createPipelineRequest(
      typeof input === "string" ? input : { ...input, constraints: [...(input.constraints ?? [])] }
    );

    const tracer = this.config.enableTracing ? new Tracer() : null;
    const traceId = tracer?.traceId ?? generateTraceId();
    const logger = this.logger.child({ traceId });
    const metrics = this.config.enableMetrics ? new MetricsCollector() : null;

    const context = new StageContext({
      request,
      cacheEnabled: this.cache !== undefined,
      logger,
      traceId,
      ...(options.signal ? { signal: options.signal } : {}),
    });

    logger.info("Processing request", { promptChars: request.prompt.length });

    const pipelineSpan = tracer?.startSpan("reasoning_pipeline", {
      prompt_length: String(request.prompt.length),
    });

    const start = performance.now();
    let halted = false;

    for (const stage of this.stages) {
      let result: StageResult;

      if (halted) {
        result = skippedResult(stage.stageType, "aborted");
      } else {
        const span = tracer?.startSpan(`stage_${stage.stageType}`);
        result = await this.runStage(stage, context, logger);
        if (span && tracer) {
          tracer.endSpan(span, { status: result.status });
        }
        halted = this.shouldHalt(result, options.signal);
      }

      context.appendResult(result);
      metrics?.recordDuration(result.stageType, result.durationMs);
    }

    const totalDurationMs = performance.now() - start;

    if (pipelineSpan && tracer) {
      tracer.endSpan(pipelineSpan);
    }

    const { text: finalResponse, source } = resolveFinalResponse(context);
    const stats = context.cacheStats;

    if (metrics) {
      metrics.increment("cache_hits", stats.hits);
      metrics.increment("cache_misses", stats.misses);
    }

    const metadata: PipelineResultMetadata = {
      cacheHits: stats.hits,
      finalResponseSource: source,
      ...(metrics ? { metrics: metrics.summarize() } : {}),
      ...(tracer ? { traceId: tracer.traceId, spans: tracer.export() } : {}),
    };

    const stages = context.previousResults;
    logger.info("Pipeline complete", {
      durationMs: Math.round(totalDurationMs),
      failed: stages.filter((s) => s.status === StageStatus.Failed).map((s) => s.stageType),
      responseChars: finalResponse.length,
    });

    return deepFreeze({
      finalResponse,
      stages,
      totalDurationMs,
      request,
      metadata,
    });
  }

  private async runStage(stage: AnyStage, context: StageContext, logger: Logger): Promise<StageResult> {
    try {
      return await stage.execute(context);
    } catch (err) {
      // execute() does not reject; anything arriving here is a bug in a stage
      logger.error("Unexpected stage fault", { stage: stage.stageType, error: errorMessage(err) });
      return failedResult(stage.stageType, err, 0);
    }
  }

  private shouldHalt(result: StageResult, signal: AbortSignal | undefined): boolean {
    if (signal?.aborted) return true;
    return result.status === StageStatus.Failed && this.config.failurePolicy === "abort";
  }
}
