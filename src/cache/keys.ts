/**
 * Cache key construction.
 * Keys are namespaced by stage type so stages never read each other's entries.
 */

import { createHash } from "node:crypto";

import type { StageType } from "../types/pipeline.js";

/**
 * Build a cache key: `<stageType>:<sha256 of the JSON-encoded parts>`.
 */
export function buildCacheKey(
  stageType: StageType,
  ...parts: ReadonlyArray<string | number | boolean | null>
): string {
  const digest = createHash("sha256").update(JSON.stringify(parts)).digest("hex");
  return `${stageType}:${digest}`;
}
