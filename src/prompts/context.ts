/**
 * Prompt context: the variables a stage template may reference.
 *
 * Every value is a string. A variable left undefined is missing; the
 * renderer refuses to substitute it, and `{{#if}}` treats it as false.
 */

import type { PipelineRequest } from "../types/pipeline.js";

export type RequestVariable = "request.prompt" | "request.context" | "request.constraints";

export type PerspectiveVariable =
  | "perspective.index"
  | "perspective.framing"
  | "perspective.input";

export type SynthesisVariable = "synthesis.results";

export type PromptVariable = RequestVariable | PerspectiveVariable | SynthesisVariable;

export type PromptContext = Readonly<Partial<Record<PromptVariable, string>>>;

/**
 * Format a list as "- item" lines.
 */
export function formatBulletList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

/**
 * Variables describing the request. Absent context and an empty
 * constraint list leave their variables unset.
 */
export function buildRequestContext(request: PipelineRequest): PromptContext {
  return {
    "request.prompt": request.prompt,
    ...(request.context ? { "request.context": request.context } : {}),
    ...(request.constraints.length > 0
      ? { "request.constraints": formatBulletList(request.constraints) }
      : {}),
  };
}
