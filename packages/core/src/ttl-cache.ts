/** Default lifetime of a cache entry (24 hours). */
export const DEFAULT_CACHE_TTL_SECONDS = 24 * 60 * 60;

/** Default capacity before least-recently-used entries are evicted. */
export const DEFAULT_CACHE_MAX_ENTRIES = 500;

/** Stored value plus the time it was fetched. Entries are replaced, never mutated. */
export interface CacheEntry<V> {
  readonly key: string;
  readonly payload: V;
  readonly createdAt: number;
}

export interface TtlCacheOptions {
  ttlSeconds?: number;
  maxEntries?: number;
  /** Clock in milliseconds; injectable so tests can advance time. */
  now?: () => number;
}

/**
 * Map-backed cache with expiry-on-read and an LRU capacity bound.
 *
 * An entry is absent once `now - createdAt >= ttl`. There is no background
 * sweep: stale entries are dropped when a read finds them. Map insertion order
 * doubles as recency order, so a hit re-inserts the entry at the tail and
 * eviction takes from the head.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inflight = new Map<string, Promise<V>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions = {}) {
    const ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    const maxEntries = options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;

    if (ttlSeconds <= 0) {
      throw new Error(`TtlCache ttlSeconds must be positive, received ${ttlSeconds}`);
    }
    if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
      throw new Error(`TtlCache maxEntries must be a positive integer, received ${maxEntries}`);
    }

    this.ttlMs = ttlSeconds * 1000;
    this.maxEntries = maxEntries;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      return undefined;
    }

    if (this.now() - entry.createdAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.payload;
  }

  put(key: string, payload: V): void {
    this.entries.delete(key);
    this.entries.set(key, { key, payload, createdAt: this.now() });
    this.evictOverflow();
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Return the fresh cached value for `key`, or run `compute` and store its
   * result. Concurrent misses for the same key share one `compute` call.
   * A rejected computation stores nothing and rejects every waiting caller.
   */
  async getOrCompute(key: string, compute: () => Promise<V>): Promise<CacheLookup<V>> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return { value: cached, hit: true };
    }

    const pending = this.inflight.get(key);
    if (pending) {
      return { value: await pending, hit: false };
    }

    const task = compute().then((value) => {
      this.put(key, value);
      return value;
    });
    this.inflight.set(key, task);

    try {
      return { value: await task, hit: false };
    } finally {
      if (this.inflight.get(key) === task) {
        this.inflight.delete(key);
      }
    }
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
    }
  }
}

/** Result of {@link TtlCache.getOrCompute}; `hit` is false when the value was computed or shared. */
export interface CacheLookup<V> {
  value: V;
  hit: boolean;
}
