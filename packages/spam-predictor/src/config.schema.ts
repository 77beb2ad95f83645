import { z } from 'zod';

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';

export const ClassifierConfigSchema = z
  .object({
    apiKey: z.string().default(''),
    baseUrl: z.string().url().default(DEFAULT_OPENAI_BASE_URL),
    enabled: z.boolean().default(true),
    healthCheckTimeoutMs: z.number().int().positive().default(5_000),
    healthModel: z.string().min(1).default('gpt-3.5-turbo'),
    maxTokens: z.number().int().min(1).max(4096).default(10),
    modelRegistryPath: z.string().min(1).default('config/model-registry.json'),
    modelType: z.string().min(1).default('spam_classification'),
    modelVersion: z.string().min(1).default('latest'),
    organization: z.string().min(1).optional(),
    promptRegistryPath: z.string().min(1).default('config/prompts.json'),
    retries: z.number().int().min(1).max(10).default(3),
    temperature: z.number().min(0).max(2).default(0),
    timeoutSeconds: z.number().int().min(1).max(300).default(30),
  })
  .superRefine((config, ctx) => {
    if (config.enabled && config.apiKey.trim() === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'OpenAI API key is required when the classifier is enabled (set OPENAI_API_KEY)',
        path: ['apiKey'],
      });
    }
  });

export type ClassifierConfig = z.infer<typeof ClassifierConfigSchema>;
export type ClassifierConfigInput = z.input<typeof ClassifierConfigSchema>;
