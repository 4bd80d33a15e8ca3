/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

import { ConfigurationError } from "../errors/index.js";

/** Where variables are read from; `process.env` unless a test passes its own. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function read(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(
  key: string,
  defaultValue: string,
  env: EnvSource = process.env
): string {
  return read(env, key) ?? defaultValue;
}

/**
 * Get an optional environment variable as an integer.
 * Returns undefined when unset.
 */
export function envInt(key: string, env: EnvSource = process.env): number | undefined {
  const value = read(env, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(
      `Environment variable ${key} must be a valid integer, got: ${value}`
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a finite number.
 * Returns undefined when unset.
 */
export function envNumber(key: string, env: EnvSource = process.env): number | undefined {
  const value = read(env, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(
      `Environment variable ${key} must be a number, got: ${value}`
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 * Returns undefined when unset.
 */
export function envBool(key: string, env: EnvSource = process.env): boolean | undefined {
  const value = read(env, key);
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigurationError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}

/**
 * Get an optional environment variable restricted to a set of values.
 * Returns undefined when unset.
 */
export function envEnum<T extends string>(
  key: string,
  allowed: readonly T[],
  env: EnvSource = process.env
): T | undefined {
  const value = read(env, key);
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((option) => option === value.toLowerCase());
  if (match === undefined) {
    throw new ConfigurationError(
      `Environment variable ${key} must be one of ${allowed.join(", ")}, got: ${value}`
    );
  }
  return match;
}
