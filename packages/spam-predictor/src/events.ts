import type { EvictionReason } from '@spamcheck/resilience';

import type { ClassifierErrorKind } from './errors.js';

export type SpamPredictorEvent =
  | { key: string; type: 'cache.hit' }
  | { key: string; type: 'cache.miss' }
  | { key: string; reason: EvictionReason; type: 'cache.evicted' }
  | {
      cached: boolean;
      durationMs: number;
      errorKind?: ClassifierErrorKind | undefined;
      outcome: 'error' | 'legitimate' | 'spam';
      type: 'classifier.completed';
    };
