import type { ContractProviderEvent } from '@spamcheck/contract-providers';
import type { ContractProviderName, ProviderErrorKind } from '@spamcheck/core';
import type { SpamPredictorEvent } from '@spamcheck/spam-predictor';

export type RequestOutcome = 'cancelled' | 'completed' | 'rejected' | 'timed_out';

export type PipelineEvent =
  | ContractProviderEvent
  | SpamPredictorEvent
  | {
      chainId: number;
      durationMs: number;
      errorKind?: ProviderErrorKind | undefined;
      provider: ContractProviderName;
      success: boolean;
      type: 'provider.call.completed';
    }
  | {
      addressCount: number;
      chainId: number;
      durationMs: number;
      outcome: RequestOutcome;
      type: 'request.completed';
    };
