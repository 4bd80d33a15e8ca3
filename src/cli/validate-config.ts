#!/usr/bin/env node
/**
 * CLI command to validate a reasoning pipeline setup before deploying it.
 *
 * Validates:
 * - Application config (NODE_ENV, LOG_LEVEL)
 * - The `reasoningPipeline` section of the config file, with PIPELINE_* overrides
 * - The stage prompt templates
 *
 * Reports the stage plan: which stages run and which collaborators they need.
 *
 * Usage:
 *   npx tsx src/cli/validate-config.ts [options]
 *   npm run validate-config
 *
 * Options:
 *   --config <path>   Path to config JSON (default: pipeline.config.json)
 *   --ignore-env      Do not apply PIPELINE_* environment overrides
 *   --verbose         Show detailed output
 *   --json            Output entire report as JSON (for CI parsing)
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  loadAppConfig,
  loadPipelineConfigFile,
  pipelineConfigFromEnv,
  type EnvSource,
  type PipelineConfig,
} from "../config/index.js";
import { ConfigurationError, errorMessage } from "../errors/index.js";
import {
  DEFAULT_PROMPTS_DIR,
  loadStageTemplates,
  PromptTemplateLoader,
  STAGE_TEMPLATE_FILES,
  type StageTemplateName,
} from "../prompts/index.js";
import { STAGE_ORDER, StageType } from "../types/pipeline.js";

// ============================================================
// Types
// ============================================================

export interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

export interface ValidationReport {
  timestamp: string;
  configPath: string;
  steps: StepResult[];
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
  };
}

export interface ValidateOptions {
  configPath: string;
  /** Apply PIPELINE_* overrides from `env`. */
  useEnv: boolean;
  env: EnvSource;
}

type StageFlag =
  | "enablePreprocessing"
  | "enableWorkingAwareness"
  | "enableCompaction"
  | "enableReranking"
  | "enableFinalResponse";

const STAGE_FLAGS: Record<StageType, StageFlag> = {
  [StageType.Preprocessing]: "enablePreprocessing",
  [StageType.WorkingAwareness]: "enableWorkingAwareness",
  [StageType.Compaction]: "enableCompaction",
  [StageType.Reranking]: "enableReranking",
  [StageType.FinalResponse]: "enableFinalResponse",
};

const TEMPLATE_NAMES: readonly StageTemplateName[] = ["preprocessing", "perspective", "finalResponse"];

const STAGE_NEEDS: Record<StageType, string> = {
  [StageType.Preprocessing]: "agent",
  [StageType.WorkingAwareness]: "agent",
  [StageType.Compaction]: "compactor optional",
  [StageType.Reranking]: "reranker required",
  [StageType.FinalResponse]: "agent",
};

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      config: { type: "string", default: "pipeline.config.json" },
      "ignore-env": { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-config [options]

Options:
  --config <path>   Path to config JSON (default: pipeline.config.json)
  --ignore-env      Do not apply PIPELINE_* environment overrides
  --verbose         Show detailed output
  --json            Output entire report as JSON (for CI parsing)
  -h, --help        Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY && !process.env["NO_COLOR"];

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printStep(step: StepResult, verbose: boolean): void {
  const icon = step.success ? c("green", "✓") : c("red", "✗");
  console.log(`${icon} ${c("bold", step.component)}: ${step.message}`);

  // Failures always show their details
  if (step.details && (verbose || !step.success)) {
    const bullet = step.success ? c("dim", "•") : c("red", "•");
    for (const detail of step.details) {
      console.log(`    ${bullet} ${detail}`);
    }
  }
}

function printReport(report: ValidationReport, verbose: boolean): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Reasoning Pipeline Configuration Validation"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");

  for (const step of report.steps) {
    printStep(step, verbose);
  }

  const { stepsPassed, stepsFailed } = report.summary;
  console.log("");
  console.log("─".repeat(60));
  if (stepsFailed === 0) {
    console.log(c("green", `✓ All validations passed (${stepsPassed}/${stepsPassed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${stepsFailed} error(s)`));
  }
  console.log("─".repeat(60));
  console.log("");
}

// ============================================================
// Validation Steps
// ============================================================

/**
 * One line per stage, in definition order, naming what an enabled stage needs.
 */
export function formatStagePlan(config: Readonly<PipelineConfig>): string[] {
  return STAGE_ORDER.map((stage) =>
    config[STAGE_FLAGS[stage]] ? `${stage}: enabled (${STAGE_NEEDS[stage]})` : `${stage}: skipped`
  );
}

function runAppConfigStep(env: EnvSource): StepResult {
  try {
    const app = loadAppConfig(env);
    return {
      success: true,
      component: "AppConfig",
      message: "loaded",
      details: [`NODE_ENV: ${app.env}`, `LOG_LEVEL: ${app.logLevel}`],
    };
  } catch (err) {
    return { success: false, component: "AppConfig", message: "validation failed", details: [errorMessage(err)] };
  }
}

function runPipelineConfigStep(options: ValidateOptions): {
  step: StepResult;
  config?: Readonly<PipelineConfig>;
} {
  const component = "PipelineConfig";
  try {
    const fromFile = loadPipelineConfigFile(options.configPath);
    const config = options.useEnv ? pipelineConfigFromEnv(fromFile, options.env) : fromFile;

    const source = existsSync(options.configPath)
      ? `loaded from ${options.configPath}`
      : `no file at ${options.configPath}, using defaults`;

    return {
      config,
      step: {
        success: true,
        component,
        message: source,
        details: [
          `Perspectives: ${config.numPerspectives} (${config.parallelExecution ? "parallel" : "sequential"})`,
          config.cacheStrategy === "memory"
            ? `Cache: memory, ttl ${config.cacheTtlSeconds}s`
            : "Cache: none",
          `Stage timeout: ${config.timeoutSeconds}s`,
          `Failure policy: ${config.failurePolicy}`,
        ],
      },
    };
  } catch (err) {
    const message = err instanceof ConfigurationError ? err.format() : errorMessage(err);
    return { step: { success: false, component, message: "validation failed", details: [message] } };
  }
}

function runTemplatesStep(config: Readonly<PipelineConfig>): StepResult {
  const dir = config.promptsDir ?? DEFAULT_PROMPTS_DIR;
  try {
    const templates = loadStageTemplates(new PromptTemplateLoader(dir));
    return {
      success: true,
      component: "PromptTemplates",
      message: `${TEMPLATE_NAMES.length} templates loaded from ${dir}`,
      details: TEMPLATE_NAMES.map(
        (name) => `${STAGE_TEMPLATE_FILES[name]}: ${templates[name].variables.join(", ")}`
      ),
    };
  } catch (err) {
    return {
      success: false,
      component: "PromptTemplates",
      message: "validation failed",
      details: [errorMessage(err)],
    };
  }
}

function runStagePlanStep(config: Readonly<PipelineConfig>): StepResult {
  const enabled = STAGE_ORDER.filter((stage) => config[STAGE_FLAGS[stage]]).length;
  return {
    success: true,
    component: "StagePlan",
    message: `${enabled}/${STAGE_ORDER.length} stages enabled`,
    details: formatStagePlan(config),
  };
}

// ============================================================
// Report Building
// ============================================================

/**
 * Run every validation step. Steps that need a valid pipeline config are
 * left out when it fails to load.
 */
export function validatePipelineSetup(options: ValidateOptions): ValidationReport {
  const steps: StepResult[] = [runAppConfigStep(options.env)];

  const { step, config } = runPipelineConfigStep(options);
  steps.push(step);

  if (config) {
    steps.push(runTemplatesStep(config));
    steps.push(runStagePlanStep(config));
  }

  const passed = steps.filter((s) => s.success).length;
  return {
    timestamp: new Date().toISOString(),
    configPath: options.configPath,
    steps,
    summary: {
      stepsPassed: passed,
      stepsFailed: steps.length - passed,
      stepsTotal: steps.length,
    },
  };
}

// ============================================================
// Main
// ============================================================

function main(): void {
  const args = parseCliArgs();

  const report = validatePipelineSetup({
    configPath: resolve(args.config ?? "pipeline.config.json"),
    useEnv: args["ignore-env"] !== true,
    env: process.env,
  });

  if (args.json === true) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report, args.verbose === true);
  }

  process.exit(report.summary.stepsFailed > 0 ? 1 : 0);
}

const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("validate-config.ts") || process.argv[1].endsWith("validate-config.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err: unknown) {
    console.error("Unexpected error:", err);
    process.exit(1);
  }
}
