import { z } from 'zod';

export const DEFAULT_PINAX_DB_NAME = 'mainnet:evm-nft-tokens@v0.6.2';

/**
 * Pinax database names are interpolated into SQL, so only this alphabet is accepted.
 */
export const PINAX_DB_NAME_PATTERN = /^[A-Za-z0-9_:@.-]+$/;

export const ChainSupportStatusSchema = z.enum(['full', 'partial', 'planned']);
export type ChainSupportStatus = z.infer<typeof ChainSupportStatusSchema>;

const providerOverrides = {
  enabled: z.boolean().default(true),
  retries: z.number().int().min(1).max(10).optional(),
  timeoutMs: z.number().int().positive().max(300_000).optional(),
};

export const PinaxDbNameSchema = z
  .string()
  .regex(PINAX_DB_NAME_PATTERN, 'Pinax database name may only contain letters, digits and _ : @ . -');

export const MoralisChainSettingsSchema = z.object({
  ...providerOverrides,
  baseUrl: z.string().url().optional(),
  chain: z.string().trim().min(1, 'Moralis chain slug must not be empty'),
});

export const PinaxChainSettingsSchema = z.object({
  ...providerOverrides,
  /** Falls back to the provider-level database name */
  dbName: PinaxDbNameSchema.optional(),
});

export const ChainConfigSchema = z.object({
  aliases: z.array(z.string().trim().min(1)).default([]),
  chainId: z.number().int().positive(),
  enabled: z.boolean().default(true),
  name: z.string().trim().min(1),
  providers: z
    .object({
      moralis: MoralisChainSettingsSchema.optional(),
      pinax: PinaxChainSettingsSchema.optional(),
    })
    .default({}),
  status: ChainSupportStatusSchema.default('full'),
});

export type ChainConfig = z.infer<typeof ChainConfigSchema>;
export type ChainConfigInput = z.input<typeof ChainConfigSchema>;
export type MoralisChainSettings = z.infer<typeof MoralisChainSettingsSchema>;
export type PinaxChainSettings = z.infer<typeof PinaxChainSettingsSchema>;
