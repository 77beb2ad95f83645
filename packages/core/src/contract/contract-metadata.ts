import { z } from 'zod';

export const CONTRACT_PROVIDER_NAMES = ['moralis', 'pinax'] as const;

/**
 * Closed set of metadata sources. Adding a provider means adding a variant here.
 */
export type ContractProviderName = (typeof CONTRACT_PROVIDER_NAMES)[number];

export const ContractProviderNameSchema = z.enum(CONTRACT_PROVIDER_NAMES);

export const ContractTypeSchema = z.enum(['ERC20', 'ERC721', 'ERC1155', 'CONTRACT', 'UNKNOWN']);
export type ContractType = z.infer<typeof ContractTypeSchema>;

/**
 * Provider-sourced description of a contract. Lives for the duration of one request.
 */
export interface ContractMetadata {
  additionalData: Record<string, string>;
  address: string;
  chainId: number;
  contractType: ContractType;
  creationBlock?: number | undefined;
  creatorAddress?: string | undefined;
  description?: string | undefined;
  holderCount?: number | undefined;
  isVerified?: boolean | undefined;
  name?: string | undefined;
  source: ContractProviderName;
  symbol?: string | undefined;
  totalSupply?: string | undefined;
  transactionCount?: number | undefined;
}

/**
 * Map a provider's free-form standard label onto ContractType.
 */
export function parseContractType(raw: string | null | undefined): ContractType {
  if (!raw) {
    return 'UNKNOWN';
  }
  const parsed = ContractTypeSchema.safeParse(raw.trim().toUpperCase());
  return parsed.success ? parsed.data : 'UNKNOWN';
}
