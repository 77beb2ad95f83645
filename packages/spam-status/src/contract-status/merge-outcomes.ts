import type { ContractMetadata, ContractProviderName, ProviderFailure } from '@spamcheck/core';
import type { Result } from 'neverthrow';

export const NO_DATA_MESSAGE = 'no data found for the contract on any provider';
export const CLASSIFICATION_DISABLED_MESSAGE = 'spam classification is disabled';

export interface ProviderOutcome {
  provider: ContractProviderName;
  result: Result<ContractMetadata, ProviderFailure>;
}

export type MergedMetadata =
  | { diagnostics: ProviderFailure[]; metadata: ContractMetadata; status: 'found' }
  | { diagnostics: ProviderFailure[]; message: string; status: 'missing' };

/**
 * Pick the canonical metadata from outcomes listed in priority order.
 *
 * The first success wins even if a lower-priority provider answered sooner.
 * When nobody answered, a real error anywhere makes "not found" unreliable,
 * so the message then reports the errors instead.
 */
export function mergeProviderOutcomes(outcomes: readonly ProviderOutcome[]): MergedMetadata {
  const diagnostics: ProviderFailure[] = [];
  let canonical: ContractMetadata | undefined;

  for (const outcome of outcomes) {
    if (outcome.result.isOk()) {
      canonical ??= outcome.result.value;
    } else {
      diagnostics.push(outcome.result.error);
    }
  }

  if (canonical) {
    return { diagnostics, metadata: canonical, status: 'found' };
  }

  if (diagnostics.every((failure) => failure.kind === 'not_found')) {
    return { diagnostics, message: NO_DATA_MESSAGE, status: 'missing' };
  }

  return {
    diagnostics,
    message: `unable to retrieve contract data from external services (${summarizeFailures(diagnostics)})`,
    status: 'missing',
  };
}

/**
 * `moralis: timeout; pinax: unavailable`
 */
export function summarizeFailures(failures: readonly ProviderFailure[]): string {
  return failures.map((failure) => `${failure.provider}: ${failure.kind}`).join('; ');
}
