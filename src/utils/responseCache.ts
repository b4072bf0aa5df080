import { log } from './logger.js';

/**
 * Default lifetime of a cached response (30 minutes)
 */
export const DEFAULT_CACHE_TTL_MS = 30 * 60 * 1000;

interface CacheEntry<V> {
  value: V;
  timestamp: number;
}

/**
 * ResponseCache - time-bounded memo of remote query results
 *
 * One instance is shared by every component of a process. Entries expire
 * `ttlMs` after they were set and are deleted by the `get` that finds them
 * expired; there is no background sweep. Each operation is one synchronous
 * read-modify-write, so concurrent async callers cannot interleave inside it.
 *
 * The cache never notices remote changes: callers remove keys they made stale.
 */
export class ResponseCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly ttlMs: number = DEFAULT_CACHE_TTL_MS) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (Date.now() - entry.timestamp >= this.ttlMs) {
      this.entries.delete(key);
      this.misses++;
      log.debug(`[CACHE] Expired: ${key}`);
      return undefined;
    }
    this.hits++;
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, timestamp: Date.now() });
  }

  remove(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Stored entry count, expired-but-unvisited entries included
   */
  size(): number {
    return this.entries.size;
  }

  /**
   * Presence check without touching hit counters or evicting
   */
  has(key: string): boolean {
    return this.entries.has(key);
  }

  getStats(): { entries: number; hits: number; misses: number } {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
