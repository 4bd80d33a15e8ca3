/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Merging partial input over the defaults
 * - Validating against the schema with fail-fast behavior
 * - Reading the `reasoningPipeline` section of a JSON config file
 * - Overlaying PIPELINE_* environment variables
 * - Freezing configuration to enforce immutability
 */

import { existsSync, readFileSync } from "node:fs";
import type { ZodIssue } from "zod";

import { ConfigurationError, type ConfigurationIssue } from "../../errors/index.js";
import { deepFreeze } from "../../utils/freeze.js";
import { envBool, envEnum, envInt, envNumber, type EnvSource } from "../env.js";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";
import { CacheStrategy, FailurePolicy, LogLevelSchema } from "./enums.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";

/** Section of a JSON config file holding the pipeline settings. */
export const CONFIG_SECTION = "reasoningPipeline";

/**
 * Convert Zod issues to our structured format.
 */
function formatZodIssues(zodIssues: ZodIssue[]): ConfigurationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate pipeline configuration without loading.
 *
 * @param input - Partial configuration; missing fields take their defaults
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: ConfigurationIssue[];
} {
  if (!isRecord(input)) {
    return {
      success: false,
      errors: [{ path: [], message: "Expected a configuration object", code: "invalid_type" }],
    };
  }

  // An explicit undefined keeps the default
  const provided = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
  const result = PipelineConfigSchema.safeParse({ ...DEFAULT_PIPELINE_CONFIG, ...provided });

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Validate and load pipeline configuration.
 *
 * @param input - Partial configuration; missing fields take their defaults
 * @returns Validated and frozen PipelineConfig
 * @throws ConfigurationError if validation fails
 */
export function loadPipelineConfig(input: unknown = {}): Readonly<PipelineConfig> {
  const result = validatePipelineConfig(input);

  if (!result.success || !result.config) {
    const issues = result.errors ?? [];
    throw new ConfigurationError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.config);
}

/**
 * Load pipeline configuration from the `reasoningPipeline` section of a
 * JSON file. A missing file or section yields the defaults.
 *
 * @throws ConfigurationError if the file is not valid JSON or the section is invalid
 */
export function loadPipelineConfigFile(path: string): Readonly<PipelineConfig> {
  if (!existsSync(path)) {
    return loadPipelineConfig({});
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      `Failed to parse config file ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const section = isRecord(data) ? data[CONFIG_SECTION] : undefined;
  if (section === undefined) {
    return loadPipelineConfig({});
  }

  return loadPipelineConfig(section);
}

/**
 * Read PIPELINE_* environment overrides. Unset variables are omitted.
 *
 * @throws ConfigurationError for malformed values
 */
export function readPipelineEnv(env: EnvSource = process.env): Partial<PipelineConfig> {
  const overrides: Partial<PipelineConfig> = {};

  const parallelExecution = envBool("PIPELINE_PARALLEL_EXECUTION", env);
  if (parallelExecution !== undefined) overrides.parallelExecution = parallelExecution;

  const enableMetrics = envBool("PIPELINE_ENABLE_METRICS", env);
  if (enableMetrics !== undefined) overrides.enableMetrics = enableMetrics;

  const enableTracing = envBool("PIPELINE_ENABLE_TRACING", env);
  if (enableTracing !== undefined) overrides.enableTracing = enableTracing;

  const cacheStrategy = envEnum("PIPELINE_CACHE_STRATEGY", CacheStrategy.options, env);
  if (cacheStrategy !== undefined) overrides.cacheStrategy = cacheStrategy;

  const cacheTtlSeconds = envNumber("PIPELINE_CACHE_TTL_SECONDS", env);
  if (cacheTtlSeconds !== undefined) overrides.cacheTtlSeconds = cacheTtlSeconds;

  const timeoutSeconds = envNumber("PIPELINE_TIMEOUT_SECONDS", env);
  if (timeoutSeconds !== undefined) overrides.timeoutSeconds = timeoutSeconds;

  const numPerspectives = envInt("PIPELINE_NUM_PERSPECTIVES", env);
  if (numPerspectives !== undefined) overrides.numPerspectives = numPerspectives;

  const failurePolicy = envEnum("PIPELINE_FAILURE_POLICY", FailurePolicy.options, env);
  if (failurePolicy !== undefined) overrides.failurePolicy = failurePolicy;

  const logLevel = envEnum("PIPELINE_LOG_LEVEL", LogLevelSchema.options, env);
  if (logLevel !== undefined) overrides.logLevel = logLevel;

  return overrides;
}

/**
 * Overlay PIPELINE_* environment variables on a base configuration.
 */
export function pipelineConfigFromEnv(
  base: Readonly<PipelineConfig> = DEFAULT_PIPELINE_CONFIG,
  env: EnvSource = process.env
): Readonly<PipelineConfig> {
  return loadPipelineConfig({ ...base, ...readPipelineEnv(env) });
}
