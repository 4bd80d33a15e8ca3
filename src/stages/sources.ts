/**
 * Readers over the outputs published earlier in a run.
 */

import type { StageContext } from "../pipeline/context.js";
import { StageStatus, StageType } from "../types/pipeline.js";

/**
 * Texts of the completed perspectives, in perspective order.
 */
export function perspectiveTexts(context: StageContext): string[] {
  const output = context.getOutput(StageType.WorkingAwareness);
  if (!output) return [];

  const texts: string[] = [];
  for (const perspective of output.perspectives) {
    if (perspective.status === StageStatus.Completed && perspective.text !== undefined) {
      texts.push(perspective.text);
    }
  }
  return texts;
}

/**
 * Drop repeated strings, keeping the first occurrence.
 */
export function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}
