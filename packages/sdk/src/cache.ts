/**
 * In-memory LRU cache with a sliding time-to-live
 */

/**
 * Configuration options for the expiring cache
 */
export interface ExpiringCacheOptions {
  /** Maximum number of live entries (default: 1000) */
  maxSize?: number;
  /** Idle time after which an entry expires, in milliseconds (default: 1 hour) */
  ttlMs?: number;
  /** Clock, injectable for tests (default: Date.now) */
  now?: () => number;
}

/**
 * Cache statistics for monitoring and debugging
 */
export interface CacheStats {
  /** Current number of cached entries (expired ones included until touched) */
  size: number;
  /** Cache hit rate (hits / total requests) */
  hitRate: number;
  /** Cache miss rate (misses / total requests) */
  missRate: number;
  /** Entries dropped because the size cap was exceeded */
  evicted: number;
  /** Entries dropped because they sat idle past the TTL */
  expired: number;
}

interface CacheEntry<V> {
  value: V;
  lastAccess: number;
}

/**
 * LRU cache whose entries expire after a period without access
 *
 * Every successful `get` refreshes the entry's TTL and marks it most recently
 * used. Uses native Map with insertion-order for O(1) LRU operations: the first
 * key is always the least recently used.
 */
export class ExpiringLruCache<K, V> {
  private cache = new Map<K, CacheEntry<V>>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evicted = 0;
  private expired = 0;

  constructor(options: ExpiringCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 1000;
    this.ttlMs = options.ttlMs ?? 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Get a live entry, refreshing its TTL and LRU position
   * @returns The value, or undefined if absent or expired
   */
  get(key: K): V | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    const now = this.now();
    if (this.isExpired(entry, now)) {
      this.cache.delete(key);
      this.expired++;
      this.misses++;
      return undefined;
    }

    // LRU: Move to end (most recently used)
    entry.lastAccess = now;
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.hits++;
    return entry.value;
  }

  /**
   * Store a value as the most recently used entry
   */
  set(key: K, value: V): void {
    this.cache.delete(key);
    this.cache.set(key, { value, lastAccess: this.now() });
    this.evictIfNeeded();
  }

  /**
   * Drop every entry whose TTL has run out
   * @returns Number of entries removed
   */
  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.cache) {
      if (this.isExpired(entry, now)) {
        this.cache.delete(key);
        removed++;
      }
    }
    this.expired += removed;
    return removed;
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Get cache statistics
   */
  stats(): CacheStats {
    const total = this.hits + this.misses;

    return {
      size: this.cache.size,
      hitRate: total > 0 ? this.hits / total : 0,
      missRate: total > 0 ? this.misses / total : 0,
      evicted: this.evicted,
      expired: this.expired,
    };
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now - entry.lastAccess >= this.ttlMs;
  }

  /**
   * Evict least recently used entries until within the size cap
   */
  private evictIfNeeded(): void {
    if (this.cache.size <= this.maxSize) {
      return;
    }
    // Expired entries go first so a live entry is never evicted in their place
    this.purgeExpired();

    while (this.cache.size > this.maxSize) {
      const first = this.cache.keys().next();
      if (first.done) break;
      this.cache.delete(first.value);
      this.evicted++;
    }
  }
}
