import type { ContractMetadata, ContractType } from '@spamcheck/core';

import type { MoralisNftItem } from './moralis.schemas.js';

export function mapMoralisContractType(raw: string | null | undefined): ContractType {
  switch (raw) {
    case 'ERC721':
      return 'ERC721';
    case 'ERC1155':
      return 'ERC1155';
    default:
      return 'UNKNOWN';
  }
}

export function mapMoralisNftItem(item: MoralisNftItem, chainId: number, address: string): ContractMetadata {
  const additionalData: Record<string, string> = {};
  if (item.contract_type) {
    additionalData['contract_type'] = item.contract_type;
  }
  if (item.token_hash) {
    additionalData['token_hash'] = item.token_hash;
  }
  if (item.metadata !== undefined && item.metadata !== null) {
    additionalData['metadata'] = typeof item.metadata === 'string' ? item.metadata : JSON.stringify(item.metadata);
  }

  return {
    additionalData,
    address,
    chainId,
    contractType: mapMoralisContractType(item.contract_type),
    name: item.name ?? undefined,
    source: 'moralis',
    symbol: item.symbol ?? undefined,
  };
}
