/**
 * Working awareness stage.
 *
 * Reasons about the task from several framings. The perspectives do not
 * depend on each other: with parallel execution they are dispatched
 * together and joined; otherwise they run one after another. Either way
 * the output lists them by perspective index.
 */

import { z } from "zod";

import { buildCacheKey } from "../cache/index.js";
import { CollaboratorError, errorMessage } from "../errors/index.js";
import { throwIfAborted } from "../pipeline/cancellation.js";
import { renderPrompt, type ParsedTemplate } from "../prompts/index.js";
import type { ReasoningAgent } from "../types/collaborators.js";
import {
  StageStatus,
  StageType,
  type PerspectiveOutput,
  type WorkingAwarenessOutput,
} from "../types/pipeline.js";
import { BaseStage, type StageOptions, type StageRun } from "./base.js";
import { callAgent } from "./collaborators.js";

export interface WorkingAwarenessStageOptions extends StageOptions {
  readonly agent: ReasoningAgent;
  readonly template: ParsedTemplate;
  /** One framing per perspective; its length is the perspective count. */
  readonly framings: readonly string[];
  readonly parallel: boolean;
}

export class WorkingAwarenessStage extends BaseStage<StageType.WorkingAwareness> {
  readonly stageType = StageType.WorkingAwareness;

  private readonly agent: ReasoningAgent;
  private readonly template: ParsedTemplate;
  private readonly framings: readonly string[];
  private readonly parallel: boolean;

  constructor(options: WorkingAwarenessStageOptions) {
    super(options);
    this.agent = options.agent;
    this.template = options.template;
    this.framings = options.framings;
    this.parallel = options.parallel;
  }

  get numPerspectives(): number {
    return this.framings.length;
  }

  protected async run(run: StageRun): Promise<WorkingAwarenessOutput> {
    const { request } = run.context;
    // Preprocessing may have been skipped or failed
    const input = run.context.getOutput(StageType.Preprocessing)?.text ?? request.prompt;

    run.logger.info("Generating perspectives", {
      count: this.framings.length,
      parallel: this.parallel,
    });

    const settled = this.parallel
      ? await Promise.allSettled(
          this.framings.map((framing, index) => this.reason(run, framing, index, input))
        )
      : await this.runSequentially(run, input);

    // A cancelled run fails the stage even when some perspectives finished
    throwIfAborted(run.signal);

    const perspectives = settled.map((outcome, index): PerspectiveOutput => {
      const framing = this.framings[index] ?? "";
      if (outcome.status === "fulfilled") {
        return { index, framing, status: StageStatus.Completed, text: outcome.value };
      }
      return { index, framing, status: StageStatus.Failed, error: errorMessage(outcome.reason) };
    });

    const failed = perspectives.filter((p) => p.status === StageStatus.Failed);
    if (failed.length === perspectives.length) {
      throw new CollaboratorError(
        "agent",
        `All ${perspectives.length} perspectives failed: ${failed[0]?.error ?? "unknown error"}`
      );
    }
    if (failed.length > 0) {
      run.logger.warn("Some perspectives failed", { failed: failed.map((p) => p.index) });
    }

    return { perspectives };
  }

  private async runSequentially(run: StageRun, input: string): Promise<PromiseSettledResult<string>[]> {
    const settled: PromiseSettledResult<string>[] = [];
    for (const [index, framing] of this.framings.entries()) {
      throwIfAborted(run.signal);
      try {
        settled.push({ status: "fulfilled", value: await this.reason(run, framing, index, input) });
      } catch (reason) {
        settled.push({ status: "rejected", reason });
      }
    }
    return settled;
  }

  private async reason(run: StageRun, framing: string, index: number, input: string): Promise<string> {
    const prompt = renderPrompt(this.template, {
      "perspective.index": String(index + 1),
      "perspective.framing": framing,
      "perspective.input": input,
    });
    const context = run.context.request.context;

    run.logger.debug("Starting perspective", { index });

    const text = await run.cached(
      buildCacheKey(this.stageType, prompt, context ?? null),
      z.string(),
      () =>
        callAgent(this.agent, prompt, context, {
          signal: run.signal,
          maxTokens: 1000,
          temperature: 0.7,
        })
    );

    run.logger.debug("Perspective complete", { index, chars: text.length });
    return text;
  }
}
