import type { ContractProviderName } from './contract-metadata.js';

export type ProviderErrorKind = 'not_found' | 'timeout' | 'rate_limited' | 'unauthorized' | 'unavailable';

/**
 * One provider's failure for one address. Only ever surfaced as diagnostics.
 */
export interface ProviderFailure {
  kind: ProviderErrorKind;
  message: string;
  provider: ContractProviderName;
}

/**
 * Per-address outcome. `contractSpamStatus` is null when undetermined.
 */
export interface ContractStatusResult {
  cached?: boolean | undefined;
  chainId: number;
  contractSpamStatus: boolean | null;
  diagnostics: ProviderFailure[];
  message: string;
  source?: ContractProviderName | undefined;
}

export type ContractStatusResponse = Record<string, ContractStatusResult>;

export interface ContractStatusRequest {
  addresses: readonly string[];
  chainId: number;
}

export interface ContractStatusWireResult {
  chain_id: number;
  contract_spam_status: boolean | null;
  message: string;
}

/**
 * Outbound shape handed to the transport layer.
 */
export function toWireResponse(response: ContractStatusResponse): Record<string, ContractStatusWireResult> {
  const wire: Record<string, ContractStatusWireResult> = {};
  for (const [address, result] of Object.entries(response)) {
    wire[address] = {
      chain_id: result.chainId,
      contract_spam_status: result.contractSpamStatus,
      message: result.message,
    };
  }
  return wire;
}
