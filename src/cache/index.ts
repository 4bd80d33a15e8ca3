/**
 * Caching for collaborator results.
 */

export type { Cache } from "./cache.js";
export { MemoryCache, type MemoryCacheOptions } from "./memory-cache.js";
export { buildCacheKey } from "./keys.js";
