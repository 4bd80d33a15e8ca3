/**
 * Final response stage.
 * Synthesizes the answer from the request and every output published so
 * far in the run.
 */

import { buildRequestContext, renderPrompt, type ParsedTemplate } from "../prompts/index.js";
import type { ReasoningAgent } from "../types/collaborators.js";
import { StageStatus, StageType, type SharedData, type TextOutput } from "../types/pipeline.js";
import { BaseStage, type StageOptions, type StageRun } from "./base.js";
import { callAgent } from "./collaborators.js";

/** Longest excerpt of one intermediate result placed in the synthesis prompt. */
export const MAX_EXCERPT_CHARS = 500;

export interface FinalResponseStageOptions extends StageOptions {
  readonly agent: ReasoningAgent;
  readonly template: ParsedTemplate;
}

function excerpt(text: string): string {
  return text.length > MAX_EXCERPT_CHARS ? `${text.slice(0, MAX_EXCERPT_CHARS)}...` : text;
}

/**
 * Format the published outputs as titled sections, in stage order.
 */
export function formatIntermediateResults(shared: Readonly<SharedData>): string {
  const sections: string[] = [];

  const preprocessing = shared[StageType.Preprocessing];
  if (preprocessing) {
    sections.push(`Preprocessing:\n${excerpt(preprocessing.text)}`);
  }

  const awareness = shared[StageType.WorkingAwareness];
  if (awareness) {
    for (const perspective of awareness.perspectives) {
      if (perspective.status === StageStatus.Completed && perspective.text !== undefined) {
        sections.push(`Perspective ${perspective.index + 1}:\n${excerpt(perspective.text)}`);
      }
    }
  }

  const compaction = shared[StageType.Compaction];
  if (compaction?.compacted) {
    sections.push(`Compaction:\n${excerpt(compaction.text)}`);
  }

  const reranking = shared[StageType.Reranking];
  if (reranking) {
    sections.push(`Top Ranked Result:\n${excerpt(reranking.top)}`);
  }

  return sections.join("\n\n");
}

export class FinalResponseStage extends BaseStage<StageType.FinalResponse> {
  readonly stageType = StageType.FinalResponse;

  private readonly agent: ReasoningAgent;
  private readonly template: ParsedTemplate;

  constructor(options: FinalResponseStageOptions) {
    super(options);
    this.agent = options.agent;
    this.template = options.template;
  }

  protected async run(run: StageRun): Promise<TextOutput> {
    const results = formatIntermediateResults(run.context.sharedData);
    const prompt = renderPrompt(this.template, {
      ...buildRequestContext(run.context.request),
      ...(results ? { "synthesis.results": results } : {}),
    });

    run.logger.debug("Rendered synthesis prompt", { chars: prompt.length });

    const text = await callAgent(this.agent, prompt, undefined, {
      signal: run.signal,
      maxTokens: 1500,
      temperature: 0.5,
    });

    return { text };
  }
}
