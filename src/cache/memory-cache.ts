/**
 * In-memory TTL cache.
 *
 * Entries expire lazily: `get` and `exists` treat an entry past its
 * expiry as absent and evict it. An optional sweep reclaims memory held
 * by entries nobody reads again.
 *
 * Each operation runs to completion inside a single turn of the event
 * loop, so concurrent runs see per-key operations in a total order.
 */

import { CacheError } from "../errors/index.js";
import type { Cache } from "./cache.js";

interface CacheEntry {
  readonly value: string;
  /** Epoch milliseconds, or null for entries that never expire. */
  readonly expiresAt: number | null;
}

export interface MemoryCacheOptions {
  /** Clock in epoch milliseconds. */
  now?: () => number;
  /** Run `prune()` on this interval. Off when unset. */
  sweepIntervalMs?: number;
}

export class MemoryCache implements Cache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: MemoryCacheOptions = {}) {
    this.now = options.now ?? Date.now;

    if (options.sweepIntervalMs !== undefined) {
      this.sweepTimer = setInterval(() => this.prune(), options.sweepIntervalMs);
      // The sweep alone must not keep the process alive
      this.sweepTimer.unref();
    }
  }

  async get(key: string): Promise<string | undefined> {
    return this.lookup(key)?.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds !== undefined && (!Number.isFinite(ttlSeconds) || ttlSeconds < 0)) {
      throw new CacheError(key, `Invalid TTL for "${key}": ${ttlSeconds}`);
    }

    const expiresAt = ttlSeconds === undefined ? null : this.now() + ttlSeconds * 1000;
    this.entries.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.lookup(key) !== undefined;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  /**
   * Number of live (unexpired) entries.
   */
  size(): number {
    const now = this.now();
    let count = 0;
    for (const entry of this.entries.values()) {
      if (!this.isExpired(entry, now)) count++;
    }
    return count;
  }

  /**
   * Remove expired entries.
   * @returns How many entries were removed
   */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Stop the background sweep, if any.
   */
  dispose(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private lookup(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;

    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      return undefined;
    }

    return entry;
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return entry.expiresAt !== null && now > entry.expiresAt;
  }
}
