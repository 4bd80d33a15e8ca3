/**
 * Enumerations for pipeline configuration.
 */

import { z } from "zod";

/**
 * Cache strategies.
 *   - none:   always recompute
 *   - memory: in-process TTL cache shared by every run of the pipeline
 */
export const CacheStrategy = z.enum(["none", "memory"]);
export type CacheStrategy = z.infer<typeof CacheStrategy>;

/**
 * What happens to the remaining stages after one fails.
 *   - continue: later stages run with whatever shared data exists
 *   - abort:    later stages are skipped with reason "aborted"
 */
export const FailurePolicy = z.enum(["continue", "abort"]);
export type FailurePolicy = z.infer<typeof FailurePolicy>;

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
