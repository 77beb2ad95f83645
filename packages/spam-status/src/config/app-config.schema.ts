import { ChainConfigSchema, ProvidersConfigSchema } from '@spamcheck/contract-providers';
import { ClassifierConfigSchema, PredictionCacheConfigSchema } from '@spamcheck/spam-predictor';
import { z } from 'zod';

export const EnvironmentSchema = z.enum(['development', 'production', 'test']);

export const PipelineConfigSchema = z.object({
  /** Concurrent outbound calls (providers and classifier) within one request */
  fanOutWidth: z.number().int().min(1).max(64).default(8),
  /** Per-dependency health probe timeout */
  healthCheckTimeoutMs: z.number().int().positive().default(5_000),
  maxAddressesPerRequest: z.number().int().min(1).max(1_000).default(100),
  requestTimeoutMs: z.number().int().positive().default(30_000),
});

export const AppConfigSchema = z.object({
  cache: PredictionCacheConfigSchema.default({}),
  /** Added to, or replacing by chain id, the built-in chains */
  chains: z.array(ChainConfigSchema).default([]),
  classifier: ClassifierConfigSchema.default({}),
  environment: EnvironmentSchema.default('development'),
  pipeline: PipelineConfigSchema.default({}),
  providers: ProvidersConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;
