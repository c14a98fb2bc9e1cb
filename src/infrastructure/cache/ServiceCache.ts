/**
 * @canopy/core - Service Cache
 *
 * LRU cache of resolved service instances with per-entry hit counting.
 * Entries live until evicted by capacity, invalidated, or cleared.
 */

/**
 * Cached resolution
 */
export interface ServiceCacheEntry<K> {
  key: K;
  instance: unknown;
  hitCount: number;
  cachedAt: number;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
  hitRate: number;
}

/**
 * ServiceCache - LRU cache keyed by service identifier
 *
 * @template K - Key type
 *
 * @example
 * ```typescript
 * const cache = new ServiceCache<ServiceIdentifier<unknown>>(256);
 *
 * cache.set(TimeServiceToken, timeService);
 * cache.get(TimeServiceToken)?.hitCount; // 1
 * ```
 */
export class ServiceCache<K> {
  private entries: Map<K, ServiceCacheEntry<K>> = new Map();
  private hits = 0;
  private misses = 0;

  constructor(private readonly capacity: number = 1000) {}

  /**
   * Look up an entry, counting a hit or a miss
   */
  get(key: K): ServiceCacheEntry<K> | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    // Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);

    entry.hitCount++;
    this.hits++;
    return entry;
  }

  /**
   * Store an instance, replacing any previous entry for the key
   */
  set(key: K, instance: unknown): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }

    // Evict oldest if at capacity
    if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(key, {
      key,
      instance,
      hitCount: 0,
      cachedAt: Date.now(),
    });
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  invalidate(key: K): boolean {
    return this.entries.delete(key);
  }

  /**
   * Clear all entries and statistics
   */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      capacity: this.capacity,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  /**
   * Snapshot of the cached entries, least recently used first
   */
  snapshot(): ReadonlyArray<Readonly<ServiceCacheEntry<K>>> {
    return Array.from(this.entries.values(), (entry) => ({ ...entry }));
  }

  get size(): number {
    return this.entries.size;
  }
}
