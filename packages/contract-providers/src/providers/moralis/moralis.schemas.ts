import { z } from 'zod';

/**
 * One NFT from GET /nft/{address}. Only the collection-level fields are read.
 */
export const MoralisNftItemSchema = z
  .object({
    contract_type: z.string().nullish(),
    metadata: z.unknown().optional(),
    name: z.string().nullish(),
    symbol: z.string().nullish(),
    token_address: z.string().min(1, 'Token address must not be empty'),
    token_hash: z.string().nullish(),
    token_id: z.string().optional(),
  })
  .passthrough();

export const MoralisContractNftsResponseSchema = z
  .object({
    cursor: z.string().nullish(),
    result: z.array(MoralisNftItemSchema).default([]),
  })
  .passthrough();

export type MoralisNftItem = z.infer<typeof MoralisNftItemSchema>;
export type MoralisContractNftsResponse = z.infer<typeof MoralisContractNftsResponseSchema>;
