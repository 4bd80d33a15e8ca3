/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigurationError } from "../errors/index.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";
import { optionalEnv, type EnvSource } from "./env.js";

export { ConfigurationError } from "../errors/index.js";
export { optionalEnv, envInt, envNumber, envBool, envEnum, type EnvSource } from "./env.js";

// Re-export pipeline configuration module
export * from "./pipeline/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level for process-level logging */
  readonly logLevel: LogLevel;
  /** Log file path; console only when unset */
  readonly logFile?: string;
  /** Application name */
  readonly appName: string;
}

/**
 * Load and validate application configuration.
 * Fails fast on values outside the accepted sets.
 */
export function loadAppConfig(env: EnvSource = process.env): AppConfig {
  const nodeEnv = optionalEnv("NODE_ENV", "development", env);
  if (!["development", "production", "test"].includes(nodeEnv)) {
    throw new ConfigurationError(
      `Invalid NODE_ENV: ${nodeEnv}. Must be development, production, or test.`
    );
  }

  const logLevel = optionalEnv("LOG_LEVEL", "info", env);
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  const logFile = env["LOG_FILE"];

  return {
    env: nodeEnv,
    logLevel,
    ...(logFile ? { logFile } : {}),
    appName: optionalEnv("APP_NAME", "reasoning-pipeline", env),
  };
}
