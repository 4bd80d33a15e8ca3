/**
 * Request construction and validation.
 */

import { z } from "zod";

import { ConfigurationError } from "../errors/index.js";
import type { PipelineRequest } from "../types/pipeline.js";
import { deepFreeze } from "../utils/freeze.js";

export const PipelineRequestSchema = z
  .object({
    prompt: z.string().refine((value) => value.trim().length > 0, {
      message: "Prompt must not be empty",
    }),
    context: z.string().optional(),
    constraints: z.array(z.string()).default([]),
    metadata: z.record(z.string()).optional(),
  })
  .strict();

export type PipelineRequestInput = z.input<typeof PipelineRequestSchema>;

/**
 * Build a frozen PipelineRequest from a prompt string or request fields.
 *
 * @throws ConfigurationError if the prompt is empty or a field has the wrong type
 */
export function createPipelineRequest(input: string | PipelineRequestInput): PipelineRequest {
  const result = PipelineRequestSchema.safeParse(
    typeof input === "string" ? { prompt: input } : input
  );

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid pipeline request: ${result.error.issues.length} validation error(s)`,
      result.error.issues.map((issue) => ({
        path: issue.path.filter(
          (p): p is string | number => typeof p === "string" || typeof p === "number"
        ),
        message: issue.message,
        code: issue.code,
      }))
    );
  }

  const { prompt, context, constraints, metadata } = result.data;
  return deepFreeze({
    prompt,
    ...(context !== undefined ? { context } : {}),
    constraints,
    ...(metadata !== undefined ? { metadata } : {}),
  });
}
