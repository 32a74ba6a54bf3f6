export type CacheStatus = "HIT" | "MISS";

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

/**
 * Rendered-response cache keyed by "{METHOD}-{full url}".
 *
 * Entries expire `ttlSeconds` after they were computed and the whole cache
 * is bounded LRU-style: a Map keeps insertion order, reads re-insert the key
 * at the most-recently-used end, and the first key is evicted on overflow.
 * Concurrent misses on the same key may both compute; the last write wins.
 */
export class ResponseCache<V = unknown> {
  private map = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly maxEntries: number,
    private readonly now: () => number = Date.now,
  ) {
    if (maxEntries < 1) throw new Error("ResponseCache maxEntries must be >= 1");
  }

  /** Fresh value for `key`, or undefined when absent or expired */
  get(key: string): V | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.map.delete(key);
      return undefined;
    }
    this.map.delete(key);
    this.map.set(key, entry);
    return entry.value;
  }

  set(key: string, value: V, ttlSeconds: number): void {
    if (this.map.has(key)) this.map.delete(key);
    this.map.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
    if (this.map.size > this.maxEntries) {
      const oldest = this.map.keys().next().value;
      if (oldest !== undefined) this.map.delete(oldest);
    }
  }

  /**
   * Serve `key` from the cache, or compute, store and return it.
   * A rejected `compute` propagates and leaves nothing behind.
   */
  async getOrCompute(
    key: string,
    ttlSeconds: number,
    compute: () => Promise<V>,
  ): Promise<{ value: V; status: CacheStatus }> {
    const cached = this.get(key);
    if (cached !== undefined) return { value: cached, status: "HIT" };

    const value = await compute();
    this.set(key, value, ttlSeconds);
    return { value, status: "MISS" };
  }

  get size(): number {
    return this.map.size;
  }

  clear(): void {
    this.map.clear();
  }
}

export function cacheKey(method: string, fullUrl: string): string {
  return `${method}-${fullUrl}`;
}
