import type { ChainRegistry } from '@spamcheck/contract-providers';
import type { ContractStatusResponse } from '@spamcheck/core';
import type { ContractStatusService } from '@spamcheck/spam-status';
import { err, ok, type Result } from 'neverthrow';

import { CliError } from '../shared/cli-error.js';

import { type CheckSummary, summarizeResults } from './check-utils.js';

export interface CheckHandlerDependencies {
  chainRegistry: ChainRegistry;
  contractStatus: Pick<ContractStatusService, 'handle'>;
}

export interface CheckParams {
  addresses: string[];
  /** Chain id, name or alias */
  chain: string;
}

export interface CheckResult {
  chainId: number;
  chainName: string;
  results: ContractStatusResponse;
  summary: CheckSummary;
}

/**
 * Resolves the chain argument and runs one contract status request.
 */
export class CheckHandler {
  constructor(private readonly deps: CheckHandlerDependencies) {}

  async execute(params: CheckParams, signal?: AbortSignal): Promise<Result<CheckResult, CliError>> {
    // Unknown numeric ids still go to the service, which lists the supported chains
    const requested = params.chain.trim();
    const chain = this.deps.chainRegistry.lookup(requested);
    const chainId = chain?.chainId ?? (/^\d+$/.test(requested) ? Number(requested) : undefined);
    if (chainId === undefined) {
      return err(CliError.invalidArgs(`Unknown chain '${params.chain}'. Run 'spamcheck chains' to list supported chains`));
    }

    const response = await this.deps.contractStatus.handle({ addresses: params.addresses, chainId }, { signal });
    if (response.isErr()) {
      return err(CliError.fromRequestError(response.error));
    }

    return ok({
      chainId,
      chainName: chain?.name ?? `Chain ${chainId}`,
      results: response.value,
      summary: summarizeResults(response.value),
    });
  }
}
