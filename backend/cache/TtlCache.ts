export type TtlCacheOptions = {
  ttlMs: number;
  maxEntries: number;
  /** Clock in epoch milliseconds. Defaults to `Date.now`. */
  now?: () => number;
};

type CacheEntry<T> = {
  value: T;
  expiresAtMs: number;
};

/**
 * Process-local TTL cache.
 *
 * - Explicit TTL per cache instance.
 * - Bounded: the oldest entry is evicted when `maxEntries` is reached.
 * - No persistence.
 */
export class TtlCache<T> {
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(options: TtlCacheOptions) {
    const ttlMs = options.ttlMs;
    const maxEntries = Math.trunc(options.maxEntries);

    if (!Number.isFinite(ttlMs) || ttlMs <= 0)
      throw new Error('TtlCache: ttlMs must be > 0.');
    if (!Number.isFinite(maxEntries) || maxEntries <= 0)
      throw new Error('TtlCache: maxEntries must be > 0.');

    this.ttlMs = ttlMs;
    this.maxEntries = maxEntries;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  /** Returns the cached value, or undefined when absent or expired. */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T): void {
    if (!this.entries.has(key)) {
      while (this.entries.size >= this.maxEntries) {
        const firstKey = this.entries.keys().next();
        if (firstKey.done) break;
        this.entries.delete(firstKey.value);
      }
    } else {
      // Re-insert so eviction order follows write order.
      this.entries.delete(key);
    }

    this.entries.set(key, {
      value,
      expiresAtMs: this.now() + this.ttlMs,
    });
  }

  /** Removes every key starting with `prefix`; returns how many were removed. */
  deleteByPrefix(prefix: string): number {
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (!key.startsWith(prefix)) continue;
      this.entries.delete(key);
      removed += 1;
    }
    return removed;
  }
}
