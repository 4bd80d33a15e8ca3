/**
 * Preprocessing stage.
 * Asks the agent to normalize the request into a task later stages can
 * reason about.
 */

import { z } from "zod";

import { buildCacheKey } from "../cache/index.js";
import { buildRequestContext, renderPrompt, type ParsedTemplate } from "../prompts/index.js";
import type { ReasoningAgent } from "../types/collaborators.js";
import { StageType, type TextOutput } from "../types/pipeline.js";
import { BaseStage, type StageOptions, type StageRun } from "./base.js";
import { callAgent } from "./collaborators.js";

export interface PreprocessingStageOptions extends StageOptions {
  readonly agent: ReasoningAgent;
  readonly template: ParsedTemplate;
}

export class PreprocessingStage extends BaseStage<StageType.Preprocessing> {
  readonly stageType = StageType.Preprocessing;

  private readonly agent: ReasoningAgent;
  private readonly template: ParsedTemplate;

  constructor(options: PreprocessingStageOptions) {
    super(options);
    this.agent = options.agent;
    this.template = options.template;
  }

  protected async run(run: StageRun): Promise<TextOutput> {
    const prompt = renderPrompt(this.template, buildRequestContext(run.context.request));
    run.logger.debug("Rendered preprocessing prompt", { chars: prompt.length });

    const text = await run.cached(buildCacheKey(this.stageType, prompt), z.string(), () =>
      callAgent(this.agent, prompt, undefined, {
        signal: run.signal,
        maxTokens: 500,
        temperature: 0.3,
      })
    );

    return { text };
  }
}
