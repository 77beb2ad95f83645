import { type ChainConfig, type ChainRegistry, type ChainSupportStatus, statusMessage } from '@spamcheck/contract-providers';
import type { ContractProviderName } from '@spamcheck/core';

export interface ChainInfo {
  aliases: string[];
  chainId: number;
  enabled: boolean;
  name: string;
  /** Providers that would be queried, in priority order */
  providers: ContractProviderName[];
  status: ChainSupportStatus;
  statusMessage: string;
}

export interface ChainListSummary {
  enabledChains: number;
  totalChains: number;
}

export function buildChainInfo(chain: ChainConfig, registry: ChainRegistry): ChainInfo {
  return {
    aliases: [...chain.aliases],
    chainId: chain.chainId,
    enabled: chain.enabled,
    name: chain.name,
    providers: chain.enabled ? registry.enabledProvidersFor(chain) : [],
    status: chain.status,
    statusMessage: statusMessage(chain.status),
  };
}

export function buildSummary(chains: readonly ChainInfo[]): ChainListSummary {
  return {
    enabledChains: chains.filter((chain) => chain.enabled).length,
    totalChains: chains.length,
  };
}

/**
 * Enabled chains first, each group by chain id.
 */
export function sortChains(chains: readonly ChainInfo[]): ChainInfo[] {
  return [...chains].sort((a, b) => Number(b.enabled) - Number(a.enabled) || a.chainId - b.chainId);
}

/**
 * `137 Polygon (MATIC): fully supported [moralis, pinax]`
 */
export function formatChainLine(info: ChainInfo): string {
  const aliases = info.aliases.length > 0 ? ` (${info.aliases.join(', ')})` : '';
  const providers = info.providers.length > 0 ? info.providers.join(', ') : 'no providers';
  const state = info.enabled ? info.statusMessage : `disabled, ${info.statusMessage}`;
  return `${info.chainId} ${info.name}${aliases}: ${state} [${providers}]`;
}
