/**
 * Pipeline configuration schema definition.
 *
 * The config is validated once when a pipeline is built and then frozen.
 * Flags only decide whether a stage runs or is skipped; they never change
 * stage order, output shape or error semantics.
 */

import { z } from "zod";
import { CacheStrategy, FailurePolicy, LogLevelSchema } from "./enums.js";

/** Longest stage timeout a timer can hold (2^31 - 1 ms, in whole seconds). */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export const PipelineConfigSchema = z
  .object({
    enablePreprocessing: z.boolean().describe("Run the preprocessing stage"),
    enableWorkingAwareness: z
      .boolean()
      .describe("Run the multi-perspective working awareness stage"),
    enableCompaction: z.boolean().describe("Run the compaction stage"),
    enableReranking: z
      .boolean()
      .describe("Run the reranking stage; requires a reranker collaborator"),
    enableFinalResponse: z.boolean().describe("Run the final synthesis stage"),

    parallelExecution: z
      .boolean()
      .describe("Dispatch working awareness perspectives concurrently"),
    enableMetrics: z.boolean().describe("Attach per-stage timing metrics to the result"),
    enableTracing: z.boolean().describe("Attach a trace ID and spans to the result"),
    logLevel: LogLevelSchema,

    numPerspectives: z
      .number()
      .int()
      .min(1)
      .describe("Number of perspectives generated by working awareness"),
    perspectiveFramings: z
      .array(z.string().min(1))
      .min(1)
      .describe("Framing sentence for each perspective, by index"),

    cacheStrategy: CacheStrategy,
    cacheTtlSeconds: z
      .number()
      .positive()
      .describe("Lifetime of cached collaborator results"),

    timeoutSeconds: z
      .number()
      .positive()
      .max(MAX_TIMEOUT_SECONDS, `timeoutSeconds must be at most ${MAX_TIMEOUT_SECONDS}`)
      .describe("Upper bound on the duration of a single stage"),
    failurePolicy: FailurePolicy,

    rerankTopK: z
      .number()
      .int()
      .min(1)
      .describe("Number of ranked candidates kept by the reranking stage"),

    promptsDir: z
      .string()
      .min(1)
      .optional()
      .describe("Directory holding the stage prompt templates"),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.numPerspectives > config.perspectiveFramings.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["numPerspectives"],
        message: `numPerspectives (${config.numPerspectives}) exceeds the ${config.perspectiveFramings.length} configured perspective framings`,
      });
    }
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Input accepted where a config is expected: any subset of the fields. */
export type PipelineConfigInput = Partial<PipelineConfig>;
