/**
 * Pipeline configuration module.
 *
 * Provides schema-validated, immutable configuration for reasoning pipelines.
 *
 * Usage:
 *   import { loadPipelineConfig } from "./config/index.js";
 *
 *   // Defaults
 *   const config = loadPipelineConfig();
 *
 *   // Overrides
 *   const sequential = loadPipelineConfig({ parallelExecution: false });
 */

export { CacheStrategy, FailurePolicy, LogLevelSchema } from "./enums.js";

export type { PipelineConfig, PipelineConfigInput } from "./schema.js";
export { MAX_TIMEOUT_SECONDS, PipelineConfigSchema } from "./schema.js";

export {
  loadPipelineConfig,
  loadPipelineConfigFile,
  validatePipelineConfig,
  readPipelineEnv,
  pipelineConfigFromEnv,
  CONFIG_SECTION,
} from "./loader.js";

export { DEFAULT_PIPELINE_CONFIG, DEFAULT_PERSPECTIVE_FRAMINGS } from "./defaults.js";
