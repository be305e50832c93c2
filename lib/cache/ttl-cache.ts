/**
 * In-memory time-to-live cache for warehouse results.
 *
 * Entries live for `ttlMs` from the moment they are stored and are replaced
 * on the first access after expiry. Concurrent misses on one key share the
 * same in-flight computation; a rejected computation is never stored.
 *
 * Storing a value first drops every expired entry, then the entries closest
 * to expiry while the cache holds more than `maxEntries`.
 *
 * The clock is injectable so tests can move time without waiting.
 */

export type Clock = () => number;

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export const DEFAULT_MAX_ENTRIES = 500;

export interface TtlCacheOptions {
  ttlMs: number;
  maxEntries?: number;
  clock?: Clock;
}

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inflight = new Map<string, Promise<V>>();
  private readonly clock: Clock;
  readonly ttlMs: number;
  readonly maxEntries: number;

  constructor({ ttlMs, maxEntries = DEFAULT_MAX_ENTRIES, clock = Date.now }: TtlCacheOptions) {
    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new RangeError(`ttlMs must be a non-negative number, got ${ttlMs}`);
    }
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.ttlMs = ttlMs;
    this.maxEntries = maxEntries;
    this.clock = clock;
  }

  /** Build the key for a function name and its argument tuple. */
  static key(namespace: string, args: readonly unknown[]): string {
    return `${namespace}:${JSON.stringify(args)}`;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * True when `key` holds a value that has not expired yet.
   */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && this.clock() < entry.expiresAt;
  }

  /**
   * Return the fresh value for `key`, or run `compute`, store its result
   * and return it.
   */
  async getOrCompute(key: string, compute: () => Promise<V>): Promise<V> {
    const now = this.clock();
    const entry = this.entries.get(key);
    if (entry && now < entry.expiresAt) {
      return entry.value;
    }
    if (entry) this.entries.delete(key);

    const pending = this.inflight.get(key);
    if (pending) return pending;

    // A run that was cleared, or replaced by a newer one, neither stores
    // its value nor removes the newer run's in-flight slot.
    const run: Promise<V> = compute()
      .then((value) => {
        if (this.inflight.get(key) === run) this.store(key, value);
        return value;
      })
      .finally(() => {
        if (this.inflight.get(key) === run) this.inflight.delete(key);
      });
    this.inflight.set(key, run);
    return run;
  }

  private store(key: string, value: V): void {
    const now = this.clock();
    this.prune();
    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
    this.evictOverflow();
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      let oldestKey: string | null = null;
      let oldestExpiry = Infinity;
      for (const [key, entry] of this.entries) {
        if (entry.expiresAt < oldestExpiry) {
          oldestExpiry = entry.expiresAt;
          oldestKey = key;
        }
      }
      if (oldestKey === null) return;
      this.entries.delete(oldestKey);
    }
  }

  /** Drop expired entries. Returns how many were removed. */
  prune(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.inflight.clear();
  }
}
