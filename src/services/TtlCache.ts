import NodeCache from 'node-cache';
import logger from '../utils/logger';

interface CacheEntry<V> {
  value: V;
  insertedAt: number; // ms
}

export interface TtlCacheOptions {
  /** Entry lifetime; an entry is expired once its age reaches this value */
  ttlMs: number;
  /** Label for log lines */
  name?: string;
}

/**
 * Time-bounded key/value store on top of node-cache. Expiry is per
 * instance, never per entry, and there is no capacity bound.
 *
 * Every operation runs to completion on the event loop, so concurrent
 * fetch tasks see atomic get/set with last-write-wins per key.
 */
export class TtlCache<K extends string | number, V> {
  private readonly ttlMs: number;

  protected readonly name: string;

  private readonly store: NodeCache;

  constructor({ ttlMs, name = 'cache' }: TtlCacheOptions) {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new RangeError(`TtlCache ttlMs must be a positive number, got ${ttlMs}`);
    }
    this.ttlMs = ttlMs;
    this.name = name;
    // checkperiod 0: expired entries go on read or prune, no background timer.
    // Reads return copies of the stored record.
    this.store = new NodeCache({
      stdTTL: ttlMs / 1000,
      checkperiod: 0,
      useClones: true,
    });
  }

  getTtlMs(): number {
    return this.ttlMs;
  }

  get(key: K): V | undefined {
    const entry = this.store.get<CacheEntry<V>>(key);
    if (!entry) {
      return undefined;
    }
    // node-cache keeps an entry through the exact expiry millisecond
    if (this.isExpired(entry, Date.now())) {
      this.store.del(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V): void {
    const entry: CacheEntry<V> = { value, insertedAt: Date.now() };
    this.store.set(key, entry);
  }

  delete(key: K): boolean {
    return this.store.del(key) > 0;
  }

  clear(): void {
    this.store.flushAll();
  }

  /**
   * Number of stored entries, expired ones included until they are read or pruned.
   */
  size(): number {
    return this.store.keys().length;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  pruneExpired(): number {
    const now = Date.now();
    let removed = 0;
    this.store.keys().forEach((key) => {
      const entry = this.store.get<CacheEntry<V>>(key);
      if (!entry || this.isExpired(entry, now)) {
        this.store.del(key);
        removed += 1;
      }
    });

    if (removed > 0) {
      logger.debug('TtlCache pruned expired entries', {
        cache: this.name,
        removed,
        remaining: this.size(),
      });
    }
    return removed;
  }

  /**
   * Unexpired entries with their wall-clock insertion time.
   */
  protected liveEntries(now = Date.now()): Array<{ key: string; value: V; insertedAt: number }> {
    return this.store.keys().flatMap((key) => {
      const entry = this.store.get<CacheEntry<V>>(key);
      if (!entry || this.isExpired(entry, now)) {
        return [];
      }
      return [{ key, value: entry.value, insertedAt: entry.insertedAt }];
    });
  }

  /**
   * Puts back an entry that was inserted earlier; its age counts from insertedAt.
   */
  protected restore(key: K, value: V, insertedAt: number): void {
    const entry: CacheEntry<V> = { value, insertedAt };
    this.store.set(key, entry);
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now - entry.insertedAt >= this.ttlMs;
  }
}
