import { afterEach, describe, expect, it, vi } from 'vitest';

import { LruTtlCache } from '../lru-ttl-cache.js';

describe('LruTtlCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns undefined for a missing key and counts the miss', () => {
    const cache = new LruTtlCache<string>({ maxEntries: 2, ttlMs: 1000 });

    expect(cache.get('missing')).toBeUndefined();
    expect(cache.getStats().misses).toBe(1);
  });

  it('stores and retrieves values', () => {
    const cache = new LruTtlCache<string>({ maxEntries: 2, ttlMs: 1000 });
    cache.set('key', 'value');

    expect(cache.get('key')).toBe('value');
    expect(cache.getStats()).toMatchObject({ hits: 1, size: 1, stores: 1 });
  });

  it('never grows beyond maxEntries and evicts the least recently used key', () => {
    const onEvict = vi.fn();
    const cache = new LruTtlCache<number>({ maxEntries: 2, onEvict, ttlMs: 60_000 });

    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);

    expect(cache.size).toBe(2);
    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
    expect(onEvict).toHaveBeenCalledWith('b', 2, 'capacity');
    expect(cache.getStats().evictions).toBe(1);
  });

  it('treats a write as an access', () => {
    const cache = new LruTtlCache<number>({ maxEntries: 2, ttlMs: 60_000 });

    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);
    cache.set('c', 3);

    expect(cache.get('a')).toBe(10);
    expect(cache.get('b')).toBeUndefined();
  });

  it('treats an entry older than the TTL as a miss', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    const cache = new LruTtlCache<string>({ maxEntries: 10, ttlMs: 10 });

    cache.set('key', 'value');
    vi.setSystemTime(new Date('2024-01-01T00:00:00.009Z'));
    expect(cache.get('key')).toBe('value');

    vi.setSystemTime(new Date('2024-01-01T00:00:00.010Z'));
    expect(cache.get('key')).toBeUndefined();
    expect(cache.size).toBe(0);
    expect(cache.getStats().expirations).toBe(1);
  });

  it('cleanup removes only expired entries', () => {
    let now = 0;
    const cache = new LruTtlCache<number>({ maxEntries: 10, now: () => now, ttlMs: 100 });

    cache.set('old', 1);
    now = 50;
    cache.set('young', 2);
    now = 120;

    expect(cache.cleanup()).toBe(1);
    expect(cache.get('old')).toBeUndefined();
    expect(cache.get('young')).toBe(2);
  });

  it('sweeps on the auto-cleanup interval', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    const cache = new LruTtlCache<number>({ maxEntries: 10, ttlMs: 100 });
    try {
      cache.set('a', 1);
      cache.startAutoCleanup();
      cache.startAutoCleanup();

      vi.advanceTimersByTime(100);

      expect(cache.size).toBe(0);
    } finally {
      cache.clear();
    }
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new LruTtlCache({ maxEntries: 0, ttlMs: 1 })).toThrow(
      'LruTtlCache maxEntries must be a positive integer, got 0'
    );
  });
});
