/**
 * Lookup Cache - LRU with TTL for network-backed handler results
 * Map insertion order doubles as recency order: a hit re-inserts the key at the tail.
 */

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface LookupCacheConfig {
  /** Maximum number of entries (triggers LRU eviction) */
  maxSize: number;
  /** Time-to-live in milliseconds (0 = no expiration) */
  ttlMs: number;
  /** Clock, injectable for tests */
  now: () => number;
}

export interface LookupCacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
}

const DEFAULT_CONFIG: LookupCacheConfig = {
  maxSize: 500,
  ttlMs: 60 * 60 * 1000, // 1 hour
  now: () => Date.now(),
};

export class LookupCache<V> {
  private entries: Map<string, CacheEntry<V>> = new Map();
  private config: LookupCacheConfig;
  private hits = 0;
  private misses = 0;

  constructor(config: Partial<LookupCacheConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** Returns undefined if expired or missing */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.config.ttlMs > 0 && entry.expiresAt <= this.config.now()) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to tail (mark as recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  set(key: string, value: V): void {
    const expiresAt =
      this.config.ttlMs > 0 ? this.config.now() + this.config.ttlMs : Number.MAX_SAFE_INTEGER;

    this.entries.delete(key);
    if (this.entries.size >= this.config.maxSize) {
      // Evict LRU (head of the map)
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): LookupCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }
}
