import { ContentItem, ItemCacheStats } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { Clock, systemClock } from '../utils/time';

export interface CacheEntry<V> {
  value: V;
  lastAccessTime: number;
}

export interface ItemCacheOptions {
  /** Maximum number of entries. Default: 100 */
  capacity?: number;
  clock?: Clock;
}

/**
 * Count-bounded LRU store. The backing Map is kept in access order (every
 * read or write re-inserts the key), so the first key is always the least
 * recently used one.
 *
 * Every method is synchronous, so each call runs to completion on the event
 * loop before any other feed task can observe the cache.
 */
export class ItemCache<V = ContentItem, K extends string | number = number> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly capacity: number;
  private readonly clock: Clock;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ItemCacheOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 100);
    this.clock = options.clock ?? systemClock;
  }

  put(key: K, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value, lastAccessTime: this.clock() });

    if (this.entries.size > this.capacity) {
      const removed = this.evictOldest(this.entries.size - this.capacity);
      debugLogger.info('ITEM_CACHE', `Evicted ${removed} least recently used entries`, {
        size: this.entries.size,
        capacity: this.capacity
      });
    }
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    entry.lastAccessTime = this.clock();
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  /** Presence check that does not count as an access */
  has(key: K): boolean {
    return this.entries.has(key);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Evict the least recently accessed half of the entries (rounding the
   * number removed up). Used on memory pressure.
   */
  trimToHalf(): number {
    const before = this.entries.size;
    const removed = this.evictOldest(before - Math.floor(before / 2));
    debugLogger.info('ITEM_CACHE', 'Trimmed cache after memory pressure', {
      before,
      after: this.entries.size
    });
    return removed;
  }

  /** Keys from least to most recently used */
  keys(): K[] {
    return Array.from(this.entries.keys());
  }

  lastAccessTime(key: K): number | undefined {
    return this.entries.get(key)?.lastAccessTime;
  }

  stats(): ItemCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions
    };
  }

  private evictOldest(count: number): number {
    let removed = 0;
    for (const key of this.entries.keys()) {
      if (removed >= count) break;
      this.entries.delete(key);
      removed++;
    }
    this.evictions += removed;
    return removed;
  }
}
