/**
 * Collaborator contracts consumed by the stages.
 * Implementations are stateless services shared by every run.
 */

import type { RankedCandidate } from "./pipeline.js";

export interface CallOptions {
  /** Aborted when the run is cancelled or the stage times out. */
  readonly signal?: AbortSignal;
}

export interface AgentCallOptions extends CallOptions {
  readonly maxTokens?: number;
  readonly temperature?: number;
}

export interface AgentResponse {
  readonly text: string;
}

/** The model-backed reasoning capability. Retries are its own concern. */
export interface ReasoningAgent {
  execute(
    prompt: string,
    context?: string,
    options?: AgentCallOptions
  ): Promise<AgentResponse>;
}

export interface Compactor {
  compact(input: string, options?: CallOptions): Promise<string>;
}

export interface Reranker {
  rerank(
    candidates: readonly string[],
    query?: string,
    options?: CallOptions
  ): Promise<RankedCandidate[]>;
}
