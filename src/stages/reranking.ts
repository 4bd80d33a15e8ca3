/**
 * Reranking stage.
 * Scores the candidate answers and keeps the best `topK`, highest first.
 */

import { buildCacheKey } from "../cache/index.js";
import { CollaboratorError } from "../errors/index.js";
import type { Reranker } from "../types/collaborators.js";
import { StageType, type RankedCandidate, type RerankingOutput } from "../types/pipeline.js";
import { BaseStage, type StageOptions, type StageRun } from "./base.js";
import { callReranker, RankedCandidatesSchema } from "./collaborators.js";
import { perspectiveTexts, unique } from "./sources.js";

export interface RerankingStageOptions extends StageOptions {
  readonly reranker?: Reranker;
  readonly topK: number;
}

/**
 * Sort by descending score. Ties keep their input order.
 */
export function orderByScore(ranked: readonly RankedCandidate[]): RankedCandidate[] {
  return ranked
    .map((candidate, position) => ({ candidate, position }))
    .sort((a, b) => b.candidate.score - a.candidate.score || a.position - b.position)
    .map(({ candidate }) => candidate);
}

export class RerankingStage extends BaseStage<StageType.Reranking> {
  readonly stageType = StageType.Reranking;

  private readonly reranker: Reranker | undefined;
  private readonly topK: number;

  constructor(options: RerankingStageOptions) {
    super(options);
    this.reranker = options.reranker;
    this.topK = options.topK;
  }

  protected async run(run: StageRun): Promise<RerankingOutput> {
    const { prompt } = run.context.request;
    const candidates = this.collectCandidates(run);

    const [only] = candidates;
    if (only === undefined) {
      run.logger.warn("No candidates to rerank, using the request prompt");
      return { top: prompt, ranked: [{ document: prompt, score: 0 }] };
    }
    if (candidates.length === 1) {
      run.logger.info("Single candidate, no reranking needed");
      return { top: only, ranked: [{ document: only, score: 1 }] };
    }

    const reranker = this.reranker;
    if (!reranker) {
      throw new CollaboratorError("reranker", "No reranker configured");
    }

    const scored = await run.cached(
      buildCacheKey(this.stageType, prompt, ...candidates),
      RankedCandidatesSchema,
      () => callReranker(reranker, candidates, prompt, run.signal)
    );

    const ranked = orderByScore(scored).slice(0, this.topK);
    const [top] = ranked;
    if (top === undefined) {
      throw new CollaboratorError("reranker", "Reranker returned no candidates");
    }

    run.logger.info("Reranking complete", { candidates: candidates.length, topScore: top.score });
    return { top: top.document, ranked };
  }

  private collectCandidates(run: StageRun): string[] {
    const candidates = perspectiveTexts(run.context);

    const compaction = run.context.getOutput(StageType.Compaction);
    if (compaction?.compacted) {
      candidates.push(compaction.text);
    }

    if (candidates.length === 0) {
      const preprocessed = run.context.getOutput(StageType.Preprocessing);
      if (preprocessed) candidates.push(preprocessed.text);
    }

    return unique(candidates);
  }
}
