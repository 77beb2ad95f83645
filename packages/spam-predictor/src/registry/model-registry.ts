import { ConfigError } from '@spamcheck/core';
import { getLogger } from '@spamcheck/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { formatZodIssues, readJsonFile } from './json-file.js';

const logger = getLogger('ModelRegistry');

export const ModelRegistryFileSchema = z.object({
  models: z.record(z.string(), z.record(z.string(), z.string())),
});

export type ModelRegistryFile = z.infer<typeof ModelRegistryFileSchema>;

/**
 * Model ids by model type and version, e.g. `spam_classification` / `latest`.
 */
export class ModelRegistry {
  private constructor(private readonly models: ModelRegistryFile['models']) {}

  static fromJson(value: unknown): Result<ModelRegistry, ConfigError> {
    const parsed = ModelRegistryFileSchema.safeParse(value);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      return err(new ConfigError(`Invalid model registry: ${issues.join('; ')}`, issues));
    }

    for (const [modelType, versions] of Object.entries(parsed.data.models)) {
      const entries = Object.entries(versions);
      if (entries.length === 0) {
        return err(new ConfigError(`Model type '${modelType}' has no versions configured`));
      }

      for (const [version, modelId] of entries) {
        if (modelId.trim() === '') {
          return err(new ConfigError(`Empty model ID for ${modelType}:${version}`));
        }
        if (!modelId.startsWith('ft:') && !modelId.startsWith('gpt-')) {
          logger.warn(`Model ID '${modelId}' for ${modelType}:${version} doesn't match expected OpenAI format`);
        }
      }
    }

    return ok(new ModelRegistry(parsed.data.models));
  }

  static fromFile(filePath: string): Result<ModelRegistry, ConfigError> {
    return readJsonFile(filePath).andThen((value) => ModelRegistry.fromJson(value));
  }

  resolve(modelType: string, version: string): Result<string, ConfigError> {
    const versions = this.models[modelType];
    if (!versions) {
      return err(new ConfigError(`Model type '${modelType}' not found`));
    }

    const modelId = versions[version];
    if (modelId === undefined) {
      return err(new ConfigError(`Version '${version}' not found for model type '${modelType}'`));
    }
    return ok(modelId);
  }

  modelTypes(): string[] {
    return Object.keys(this.models);
  }

  versions(modelType: string): string[] {
    return Object.keys(this.models[modelType] ?? {});
  }
}
