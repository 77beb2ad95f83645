import { createHash } from 'node:crypto';

import type { ContractMetadata, ContractType } from '@spamcheck/core';

/**
 * Provider-independent view of a contract. This is both what the model sees
 * and what the cache key is derived from, so two providers describing the same
 * contract identically share one cached verdict.
 */
export interface ClassificationFeatures {
  address: string;
  chainId: number;
  contractType: ContractType;
  creationBlock: number | null;
  holderCount: number | null;
  isVerified: boolean | null;
  name: string | null;
  symbol: string | null;
  totalSupply: string | null;
  transactionCount: number | null;
}

export function extractClassificationFeatures(chainId: number, metadata: ContractMetadata): ClassificationFeatures {
  return {
    address: metadata.address.toLowerCase(),
    chainId,
    contractType: metadata.contractType,
    creationBlock: metadata.creationBlock ?? null,
    holderCount: metadata.holderCount ?? null,
    isVerified: metadata.isVerified ?? null,
    name: metadata.name?.trim() || null,
    symbol: metadata.symbol?.trim() || null,
    totalSupply: metadata.totalSupply ?? null,
    transactionCount: metadata.transactionCount ?? null,
  };
}

/**
 * JSON with keys in a fixed order, independent of how the object was built.
 */
export function canonicalJson(features: ClassificationFeatures): string {
  const ordered: [string, unknown][] = Object.entries(features).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(Object.fromEntries(ordered));
}

/**
 * sha256 hex digest of the canonical features.
 */
export function fingerprintFeatures(features: ClassificationFeatures): string {
  return createHash('sha256').update(canonicalJson(features)).digest('hex');
}

export function fingerprintMetadata(chainId: number, metadata: ContractMetadata): string {
  return fingerprintFeatures(extractClassificationFeatures(chainId, metadata));
}
