import type { ChainRegistry } from '@spamcheck/contract-providers';

import { buildChainInfo, buildSummary, type ChainInfo, type ChainListSummary, sortChains } from './chains-utils.js';

export interface ChainsResult {
  chains: ChainInfo[];
  summary: ChainListSummary;
}

/**
 * Lists configured chains. Needs the registry only, no network.
 */
export class ChainsHandler {
  constructor(private readonly registry: ChainRegistry) {}

  execute(): ChainsResult {
    const chains = sortChains(this.registry.list().map((chain) => buildChainInfo(chain, this.registry)));
    return { chains, summary: buildSummary(chains) };
  }
}
