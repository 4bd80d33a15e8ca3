/**
 * Pipeline orchestration.
 */

export {
  ReasoningPipeline,
  resolveFinalResponse,
  type ReasoningPipelineOptions,
  type ProcessOptions,
} from "./reasoning-pipeline.js";
export { StageContext, type StageContextOptions, type CacheStats } from "./context.js";
export { createPipelineRequest, PipelineRequestSchema, type PipelineRequestInput } from "./request.js";
export { createStageSignal, raceAbort, throwIfAborted, abortReason, type StageSignal } from "./cancellation.js";
