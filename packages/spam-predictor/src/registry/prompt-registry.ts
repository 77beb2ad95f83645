import { ConfigError } from '@spamcheck/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { formatZodIssues, readJsonFile } from './json-file.js';

export const PromptVersionSchema = z.object({
  date: z.string(),
  description: z.string(),
  systemMessage: z.string(),
  version: z.string(),
});

export const PromptRegistryFileSchema = z.object({
  currentVersion: z.string(),
  versions: z.array(PromptVersionSchema),
});

export type PromptVersion = z.infer<typeof PromptVersionSchema>;

export interface PromptVersionInfo {
  date: string;
  description: string;
  messageLength: number;
  version: string;
}

/**
 * Versioned system prompts. The current version always exists.
 */
export class PromptRegistry {
  private constructor(
    private readonly prompts: readonly PromptVersion[],
    private readonly currentVersion: PromptVersion
  ) {}

  static fromJson(value: unknown): Result<PromptRegistry, ConfigError> {
    const parsed = PromptRegistryFileSchema.safeParse(value);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      return err(new ConfigError(`Invalid prompt registry: ${issues.join('; ')}`, issues));
    }

    const { currentVersion, versions } = parsed.data;
    if (versions.length === 0) {
      return err(new ConfigError('No prompt versions configured'));
    }

    const seen = new Set<string>();
    for (const prompt of versions) {
      if (prompt.version.trim() === '') {
        return err(new ConfigError('Empty version identifier found'));
      }
      if (prompt.systemMessage.trim() === '') {
        return err(new ConfigError(`Empty system message for version '${prompt.version}'`));
      }
      if (seen.has(prompt.version)) {
        return err(new ConfigError(`Duplicate version '${prompt.version}' found`));
      }
      seen.add(prompt.version);
    }

    const current = versions.find((prompt) => prompt.version === currentVersion);
    if (!current) {
      return err(new ConfigError(`Current version '${currentVersion}' not found in available versions`));
    }

    return ok(new PromptRegistry(versions, current));
  }

  static fromFile(filePath: string): Result<PromptRegistry, ConfigError> {
    return readJsonFile(filePath).andThen((value) => PromptRegistry.fromJson(value));
  }

  current(): PromptVersion {
    return this.currentVersion;
  }

  get(version: string): Result<PromptVersion, ConfigError> {
    const prompt = this.prompts.find((candidate) => candidate.version === version);
    return prompt ? ok(prompt) : err(new ConfigError(`Prompt version '${version}' not found`));
  }

  versions(): string[] {
    return this.prompts.map((prompt) => prompt.version);
  }

  info(version: string): PromptVersionInfo | undefined {
    const prompt = this.prompts.find((candidate) => candidate.version === version);
    if (!prompt) return undefined;
    return {
      date: prompt.date,
      description: prompt.description,
      messageLength: prompt.systemMessage.length,
      version: prompt.version,
    };
  }
}
