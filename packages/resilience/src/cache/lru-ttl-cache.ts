/**
 * Bounded in-memory cache with least-recently-used eviction and per-entry TTL.
 *
 * Recency is the insertion order of the backing Map: reads and writes move the
 * key to the end, so the first key is always the eviction candidate. Expiry is
 * lazy on read; `cleanup()` and the opt-in timer sweep the rest.
 *
 * All operations are synchronous, so concurrent requests on the event loop can
 * never interleave inside one of them.
 */

interface CacheEntry<V> {
  storedAt: number;
  value: V;
}

export type EvictionReason = 'capacity' | 'expired';

export interface LruTtlCacheOptions<V> {
  maxEntries: number;
  now?: (() => number) | undefined;
  onEvict?: ((key: string, value: V, reason: EvictionReason) => void) | undefined;
  ttlMs: number;
}

export interface CacheStats {
  evictions: number;
  expirations: number;
  hits: number;
  maxEntries: number;
  misses: number;
  size: number;
  stores: number;
  ttlMs: number;
}

export class LruTtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly onEvict: ((key: string, value: V, reason: EvictionReason) => void) | undefined;
  private cleanupTimer?: ReturnType<typeof setInterval> | undefined;

  private hits = 0;
  private misses = 0;
  private expirations = 0;
  private evictions = 0;
  private stores = 0;

  constructor(options: LruTtlCacheOptions<V>) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new Error(`LruTtlCache maxEntries must be a positive integer, got ${options.maxEntries}`);
    }
    if (!(options.ttlMs > 0)) {
      throw new Error(`LruTtlCache ttlMs must be positive, got ${options.ttlMs}`);
    }

    this.maxEntries = options.maxEntries;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => Date.now());
    this.onEvict = options.onEvict;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry, this.now())) {
      this.remove(key, entry, 'expired');
      this.misses++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /**
   * Insert or replace. Replacing writes a fresh entry with a new timestamp.
   */
  set(key: string, value: V): void {
    this.entries.delete(key);

    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.entries().next();
      if (oldest.done) break;
      const [oldestKey, oldestEntry] = oldest.value;
      const reason = this.isExpired(oldestEntry, this.now()) ? 'expired' : 'capacity';
      this.remove(oldestKey, oldestEntry, reason);
    }

    this.entries.set(key, { storedAt: this.now(), value });
    this.stores++;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Remove every expired entry; returns how many were removed.
   */
  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.remove(key, entry, 'expired');
        removed++;
      }
    }
    return removed;
  }

  startAutoCleanup(intervalMs = this.ttlMs): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.cleanup(), intervalMs);
  }

  stopAutoCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  clear(): void {
    this.stopAutoCleanup();
    this.entries.clear();
  }

  getStats(): CacheStats {
    return {
      evictions: this.evictions,
      expirations: this.expirations,
      hits: this.hits,
      maxEntries: this.maxEntries,
      misses: this.misses,
      size: this.entries.size,
      stores: this.stores,
      ttlMs: this.ttlMs,
    };
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return entry.storedAt + this.ttlMs <= now;
  }

  private remove(key: string, entry: CacheEntry<V>, reason: EvictionReason): void {
    this.entries.delete(key);
    if (reason === 'expired') {
      this.expirations++;
    } else {
      this.evictions++;
    }
    this.onEvict?.(key, entry.value, reason);
  }
}
