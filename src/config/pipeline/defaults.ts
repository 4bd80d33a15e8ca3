/**
 * Default pipeline configuration.
 *
 * Every stage on, perspectives fanned out, metrics on, tracing off,
 * results cached in memory for an hour.
 */

import type { PipelineConfig } from "./schema.js";

export const DEFAULT_PERSPECTIVE_FRAMINGS: readonly string[] = [
  "Analyze this problem from a logical, step-by-step perspective.",
  "Consider this problem from a creative, intuitive perspective.",
  "Examine this problem critically, identifying potential issues.",
];

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  enablePreprocessing: true,
  enableWorkingAwareness: true,
  enableCompaction: true,
  enableReranking: true,
  enableFinalResponse: true,

  parallelExecution: true,
  enableMetrics: true,
  enableTracing: false,
  logLevel: "info",

  numPerspectives: 3,
  perspectiveFramings: [...DEFAULT_PERSPECTIVE_FRAMINGS],

  cacheStrategy: "memory",
  cacheTtlSeconds: 3600,

  timeoutSeconds: 60,
  failurePolicy: "continue",

  rerankTopK: 3,
};
