/**
 * Pipeline stages.
 */

export {
  BaseStage,
  StageRun,
  skippedResult,
  failedResult,
  type StageOptions,
} from "./base.js";
export { PreprocessingStage, type PreprocessingStageOptions } from "./preprocessing.js";
export { WorkingAwarenessStage, type WorkingAwarenessStageOptions } from "./working-awareness.js";
export { CompactionStage, SOURCE_SEPARATOR, type CompactionStageOptions } from "./compaction.js";
export { RerankingStage, orderByScore, type RerankingStageOptions } from "./reranking.js";
export {
  FinalResponseStage,
  formatIntermediateResults,
  MAX_EXCERPT_CHARS,
  type FinalResponseStageOptions,
} from "./final-response.js";
export { callAgent, callCompactor, callReranker, RankedCandidatesSchema } from "./collaborators.js";
