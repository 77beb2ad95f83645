import type { EventSink } from '@spamcheck/events';
import { type CacheStats, LruTtlCache } from '@spamcheck/resilience';
import { z } from 'zod';

import type { SpamPredictorEvent } from '../events.js';

export const PredictionCacheConfigSchema = z.object({
  /** Sweep interval for expired entries; 0 leaves expiry to lookups */
  cleanupIntervalMs: z.number().int().nonnegative().default(0),
  enabled: z.boolean().default(true),
  maxEntries: z.number().int().positive().default(10_000),
  ttlMs: z.number().int().positive().default(3_600_000),
});

export type PredictionCacheConfig = z.infer<typeof PredictionCacheConfigSchema>;

export interface CachedPrediction {
  createdAt: number;
  message: string;
  verdict: boolean;
}

export interface PredictionCacheOptions {
  eventBus?: EventSink<SpamPredictorEvent> | undefined;
  maxEntries: number;
  now?: (() => number) | undefined;
  ttlMs: number;
}

/**
 * Verdicts keyed by fingerprint, model id and prompt version.
 * Only definitive verdicts are ever stored.
 */
export class PredictionCache {
  private readonly cache: LruTtlCache<CachedPrediction>;
  private readonly eventBus: EventSink<SpamPredictorEvent> | undefined;
  private readonly now: () => number;

  constructor(options: PredictionCacheOptions) {
    this.eventBus = options.eventBus;
    this.now = options.now ?? (() => Date.now());
    this.cache = new LruTtlCache<CachedPrediction>({
      maxEntries: options.maxEntries,
      now: this.now,
      onEvict: (key, _value, reason) => this.eventBus?.emit({ key, reason, type: 'cache.evicted' }),
      ttlMs: options.ttlMs,
    });
  }

  static key(fingerprint: string, modelId: string, promptVersion: string): string {
    return `${fingerprint}:${modelId}:${promptVersion}`;
  }

  get(key: string): CachedPrediction | undefined {
    const entry = this.cache.get(key);
    if (entry) {
      this.eventBus?.emit({ key, type: 'cache.hit' });
    } else {
      this.eventBus?.emit({ key, type: 'cache.miss' });
    }
    return entry;
  }

  put(key: string, verdict: boolean, message: string): void {
    this.cache.set(key, { createdAt: this.now(), message, verdict });
  }

  cleanup(): number {
    return this.cache.cleanup();
  }

  startAutoCleanup(intervalMs?: number): void {
    this.cache.startAutoCleanup(intervalMs);
  }

  stopAutoCleanup(): void {
    this.cache.stopAutoCleanup();
  }

  clear(): void {
    this.cache.clear();
  }

  getStats(): CacheStats {
    return this.cache.getStats();
  }
}
