/**
 * Reasoning pipeline.
 *
 * Usage:
 *   import { ReasoningPipeline } from "reasoning-pipeline";
 *
 *   const pipeline = new ReasoningPipeline({ agent, reranker });
 *   const result = await pipeline.process("Explain recursion");
 *   console.log(result.finalResponse);
 */

export {
  ReasoningPipeline,
  resolveFinalResponse,
  createPipelineRequest,
  PipelineRequestSchema,
  StageContext,
  type ReasoningPipelineOptions,
  type ProcessOptions,
  type PipelineRequestInput,
  type CacheStats,
} from "./pipeline/index.js";

export * from "./types/index.js";

export {
  ConfigurationError,
  CollaboratorError,
  CacheError,
  CancellationError,
  type ConfigurationIssue,
} from "./errors/index.js";

export {
  loadPipelineConfig,
  loadPipelineConfigFile,
  validatePipelineConfig,
  pipelineConfigFromEnv,
  readPipelineEnv,
  loadAppConfig,
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_PERSPECTIVE_FRAMINGS,
  CONFIG_SECTION,
  type AppConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from "./config/index.js";

export { MemoryCache, buildCacheKey, type Cache, type MemoryCacheOptions } from "./cache/index.js";

export {
  createLogger,
  silentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";

export { MetricsCollector, Tracer } from "./observability/index.js";

export {
  PromptTemplateLoader,
  loadStageTemplates,
  parseTemplate,
  renderPrompt,
  DEFAULT_PROMPTS_DIR,
  type StageTemplates,
  type ParsedTemplate,
} from "./prompts/index.js";
