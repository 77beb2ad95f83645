import type { ContractProviderName } from '@spamcheck/core';

/**
 * Events emitted by provider HTTP traffic, fed by HttpClient hooks.
 * One started event pairs with exactly one succeeded or failed event.
 */
export type ContractProviderEvent =
  | {
      endpoint: string;
      method: string;
      provider: ContractProviderName;
      type: 'provider.request.started';
    }
  | {
      durationMs: number;
      endpoint: string;
      method: string;
      provider: ContractProviderName;
      status: number;
      type: 'provider.request.succeeded';
    }
  | {
      durationMs: number;
      endpoint: string;
      error: string;
      method: string;
      provider: ContractProviderName;
      status?: number | undefined;
      type: 'provider.request.failed';
    }
  | {
      attemptNumber: number;
      delayMs: number;
      provider: ContractProviderName;
      reason: 'rate_limit' | 'retry';
      type: 'provider.request.retrying';
    };
