import { CONTRACT_PROVIDER_NAMES, ContractProviderNameSchema } from '@spamcheck/core';
import { z } from 'zod';

import { DEFAULT_PINAX_DB_NAME, PinaxDbNameSchema } from '../chains/chain-config.schema.js';

const retries = z.number().int().min(1).max(10).default(3);
const timeoutMs = (defaultMs: number) => z.number().int().positive().max(300_000).default(defaultMs);

export const MoralisProviderConfigSchema = z.object({
  apiKey: z.string().default(''),
  baseUrl: z.string().url().default('https://deep-index.moralis.io/api/v2'),
  enabled: z.boolean().default(true),
  healthCheckTimeoutMs: timeoutMs(5_000),
  retries,
  timeoutMs: timeoutMs(30_000),
});

export const PinaxProviderConfigSchema = z.object({
  apiAuth: z.string().default(''),
  apiUser: z.string().default(''),
  dbName: PinaxDbNameSchema.default(DEFAULT_PINAX_DB_NAME),
  enabled: z.boolean().default(true),
  endpoint: z.string().url().default('https://api.pinax.network/sql'),
  healthCheckTimeoutMs: timeoutMs(5_000),
  retries,
  timeoutMs: timeoutMs(20_000),
});

export const ProvidersConfigSchema = z.object({
  moralis: MoralisProviderConfigSchema.default({}),
  pinax: PinaxProviderConfigSchema.default({}),
  priority: z
    .array(ContractProviderNameSchema)
    .default([...CONTRACT_PROVIDER_NAMES])
    .refine((names) => new Set(names).size === names.length, { message: 'Provider priority must not repeat a provider' }),
});

export type MoralisProviderConfig = z.infer<typeof MoralisProviderConfigSchema>;
export type PinaxProviderConfig = z.infer<typeof PinaxProviderConfigSchema>;
export type ProvidersConfig = z.infer<typeof ProvidersConfigSchema>;
