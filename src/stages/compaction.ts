/**
 * Compaction stage.
 *
 * Compresses the perspectives (or the preprocessed task when there are
 * none) into one shorter text. Without a compactor the sources pass
 * through joined by blank lines; that is a completed stage with
 * `compacted: false`, not a failure.
 */

import { z } from "zod";

import { buildCacheKey } from "../cache/index.js";
import type { Compactor } from "../types/collaborators.js";
import { StageType, type CompactionOutput } from "../types/pipeline.js";
import { BaseStage, type StageOptions, type StageRun } from "./base.js";
import { callCompactor } from "./collaborators.js";
import { perspectiveTexts } from "./sources.js";

export const SOURCE_SEPARATOR = "\n\n";

export interface CompactionStageOptions extends StageOptions {
  readonly compactor?: Compactor;
}

export class CompactionStage extends BaseStage<StageType.Compaction> {
  readonly stageType = StageType.Compaction;

  private readonly compactor: Compactor | undefined;

  constructor(options: CompactionStageOptions) {
    super(options);
    this.compactor = options.compactor;
  }

  protected async run(run: StageRun): Promise<CompactionOutput> {
    const sources = this.collectSources(run);

    if (sources.length === 0) {
      run.logger.warn("Nothing to compact, passing the request prompt through");
      return { text: run.context.request.prompt, compacted: false, sourceCount: 0 };
    }

    const [first] = sources;
    if (sources.length === 1 && first !== undefined) {
      run.logger.info("Single source, no compaction needed");
      return { text: first, compacted: false, sourceCount: 1 };
    }

    const joined = sources.join(SOURCE_SEPARATOR);

    if (!this.compactor) {
      run.logger.info("No compactor configured, passing sources through", { sources: sources.length });
      return { text: joined, compacted: false, sourceCount: sources.length };
    }

    const compactor = this.compactor;
    const text = await run.cached(buildCacheKey(this.stageType, joined), z.string(), () =>
      callCompactor(compactor, joined, run.signal)
    );

    run.logger.info("Compaction complete", { sources: sources.length, chars: text.length });
    return { text, compacted: true, sourceCount: sources.length };
  }

  private collectSources(run: StageRun): string[] {
    const perspectives = perspectiveTexts(run.context);
    if (perspectives.length > 0) return perspectives;

    const preprocessed = run.context.getOutput(StageType.Preprocessing);
    return preprocessed ? [preprocessed.text] : [];
  }
}
