/**
 * Cache contract shared by every run of a pipeline.
 *
 * Operations are async so that an out-of-process backend can sit behind
 * the same interface as the in-memory one.
 */

export interface Cache {
  /** The stored value, or undefined when absent or expired. */
  get(key: string): Promise<string | undefined>;
  /**
   * Store a value.
   * @param ttlSeconds - Lifetime; the entry never expires when omitted
   */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Same expiry check as `get`. */
  exists(key: string): Promise<boolean>;
  /** Remove every entry, expired or not. */
  clear(): Promise<void>;
}
