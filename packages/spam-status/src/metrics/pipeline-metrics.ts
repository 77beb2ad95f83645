import {
  createInitialCallStats,
  type ProviderCallStats,
  recordCallOutcome,
} from '@spamcheck/resilience';

import type { PipelineEvent } from '../events.js';

export interface TimerSummary {
  avgMs: number;
  count: number;
  maxMs: number;
}

export interface PipelineMetricsSummary {
  /** Hits over lookups, 0 before the first lookup */
  cacheHitRate: number;
  counters: Record<string, number>;
  providers: Record<string, ProviderCallStats>;
  timers: Record<string, TimerSummary>;
}

interface EventSource {
  subscribe(handler: (event: PipelineEvent) => void): () => void;
}

/**
 * Folds pipeline events into counters, duration timers and rolling
 * per-provider call statistics.
 */
export class PipelineMetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly timers = new Map<string, TimerSummary>();
  private readonly providerStats = new Map<string, ProviderCallStats>();
  private unsubscribe: (() => void) | undefined;

  constructor(private readonly now: () => number = () => Date.now()) {}

  attach(source: EventSource): void {
    this.detach();
    this.unsubscribe = source.subscribe((event) => this.record(event));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  record(event: PipelineEvent): void {
    switch (event.type) {
      case 'request.completed':
        this.increment(`requests.${event.outcome}`);
        if (event.outcome !== 'rejected') {
          this.observe('request.duration', event.durationMs);
        }
        break;
      case 'provider.call.completed': {
        this.increment(`provider.${event.provider}.${event.success ? 'success' : (event.errorKind ?? 'failure')}`);
        this.observe(`provider.${event.provider}.duration`, event.durationMs);
        const current = this.providerStats.get(event.provider) ?? createInitialCallStats();
        this.providerStats.set(
          event.provider,
          recordCallOutcome(
            current,
            { errorKind: event.errorKind, latencyMs: event.durationMs, success: event.success },
            this.now()
          )
        );
        break;
      }
      case 'provider.request.retrying':
        this.increment(`provider.${event.provider}.retries`);
        break;
      case 'provider.request.failed':
        this.increment(`provider.${event.provider}.http_failures`);
        break;
      case 'cache.hit':
      case 'cache.miss':
        this.increment(event.type);
        break;
      case 'cache.evicted':
        this.increment(`cache.evicted.${event.reason}`);
        break;
      case 'classifier.completed':
        this.increment(`classifier.${event.outcome}`);
        if (!event.cached) {
          this.observe('classifier.duration', event.durationMs);
        }
        break;
      case 'provider.request.started':
      case 'provider.request.succeeded':
        break;
    }
  }

  getSummary(): PipelineMetricsSummary {
    const hits = this.counters.get('cache.hit') ?? 0;
    const lookups = hits + (this.counters.get('cache.miss') ?? 0);

    return {
      cacheHitRate: lookups === 0 ? 0 : hits / lookups,
      counters: Object.fromEntries(this.counters),
      providers: Object.fromEntries(this.providerStats),
      timers: Object.fromEntries(this.timers),
    };
  }

  reset(): void {
    this.counters.clear();
    this.timers.clear();
    this.providerStats.clear();
  }

  private increment(name: string): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + 1);
  }

  private observe(name: string, durationMs: number): void {
    const current = this.timers.get(name);
    if (!current) {
      this.timers.set(name, { avgMs: durationMs, count: 1, maxMs: durationMs });
      return;
    }
    const count = current.count + 1;
    this.timers.set(name, {
      avgMs: (current.avgMs * current.count + durationMs) / count,
      count,
      maxMs: Math.max(current.maxMs, durationMs),
    });
  }
}
