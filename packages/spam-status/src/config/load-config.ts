import fs from 'node:fs';
import path from 'node:path';

import { BUILT_IN_CHAINS, type ChainConfig } from '@spamcheck/contract-providers';
import { ConfigError, getErrorMessage, hasErrorCode, isObject } from '@spamcheck/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { type AppConfig, AppConfigSchema, EnvironmentSchema } from './app-config.schema.js';

export const DEFAULT_CONFIG_PATH = 'config/spamcheck.json';

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const configEnvSchema = z.object({
  MORALIS_API_KEY: optionalSecret,
  NODE_ENV: EnvironmentSchema.optional().catch(undefined),
  OPENAI_API_KEY: optionalSecret,
  OPENAI_ORGANIZATION: optionalSecret,
  PINAX_API_AUTH: optionalSecret,
  PINAX_API_USER: optionalSecret,
  SPAMCHECK_CONFIG: optionalSecret,
});

type ConfigEnv = z.infer<typeof configEnvSchema>;

export interface LoadAppConfigOptions {
  /** Explicit file; must exist */
  configPath?: string | undefined;
  cwd?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

export interface LoadedAppConfig extends AppConfig {
  /** Directory relative paths in the config (registries) resolve against */
  baseDir: string;
  /** Absolute path of the file that was read, if any */
  sourcePath?: string | undefined;
}

/**
 * Load configuration: optional JSON file, secrets from the environment, then
 * schema validation. Built-in chains are merged with configured ones by id.
 *
 * File lookup order: `configPath`, `SPAMCHECK_CONFIG`, `./config/spamcheck.json`.
 * Only the last may be missing.
 */
export function loadAppConfig(options: LoadAppConfigOptions = {}): Result<LoadedAppConfig, ConfigError> {
  const cwd = options.cwd ?? process.cwd();
  const env = configEnvSchema.parse(options.env ?? process.env);

  const explicitPath = options.configPath ?? env.SPAMCHECK_CONFIG;
  const filePath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_PATH);

  const fileResult = readConfigFile(filePath, explicitPath === undefined);
  if (fileResult.isErr()) {
    return err(fileResult.error);
  }

  const parsed = AppConfigSchema.safeParse(applyEnvOverlay(fileResult.value ?? {}, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return err(new ConfigError(`Configuration validation failed: ${issues.join('; ')}`, issues));
  }

  const chains = mergeChains(BUILT_IN_CHAINS, parsed.data.chains);
  if (chains.isErr()) {
    return err(chains.error);
  }

  return ok({
    ...parsed.data,
    baseDir: cwd,
    chains: chains.value,
    sourcePath: fileResult.value === undefined ? undefined : filePath,
  });
}

/**
 * Configured chains replace built-ins with the same id; new ids are appended.
 * A chain id may appear only once in the configured list.
 */
export function mergeChains(
  builtIn: readonly ChainConfig[],
  configured: readonly ChainConfig[]
): Result<ChainConfig[], ConfigError> {
  const overrides = new Map<number, ChainConfig>();
  const issues: string[] = [];
  for (const chain of configured) {
    if (overrides.has(chain.chainId)) {
      issues.push(`duplicate chain ID ${chain.chainId}`);
      continue;
    }
    overrides.set(chain.chainId, chain);
  }
  if (issues.length > 0) {
    return err(new ConfigError(`Configuration validation failed: ${issues.join('; ')}`, issues));
  }

  const merged = builtIn.map((chain) => overrides.get(chain.chainId) ?? chain);
  const builtInIds = new Set(builtIn.map((chain) => chain.chainId));
  return ok([...merged, ...configured.filter((chain) => !builtInIds.has(chain.chainId))]);
}

function readConfigFile(filePath: string, optional: boolean): Result<Record<string, unknown> | undefined, ConfigError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (optional && hasErrorCode(error, 'ENOENT')) {
      return ok(undefined);
    }
    return err(new ConfigError(`Failed to load configuration from ${filePath}: ${getErrorMessage(error)}`));
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    return err(new ConfigError(`Failed to parse configuration ${filePath}: ${getErrorMessage(error)}`));
  }

  if (!isObject(data)) {
    return err(new ConfigError(`Configuration ${filePath} must contain a JSON object`));
  }
  return ok(data);
}

function section(parent: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parent[key];
  return isObject(value) ? value : {};
}

function defined(values: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function applyEnvOverlay(raw: Record<string, unknown>, env: ConfigEnv): Record<string, unknown> {
  const providers = section(raw, 'providers');

  const overlaid: Record<string, unknown> = {
    ...raw,
    classifier: {
      ...section(raw, 'classifier'),
      ...defined({ apiKey: env.OPENAI_API_KEY, organization: env.OPENAI_ORGANIZATION }),
    },
    providers: {
      ...providers,
      moralis: { ...section(providers, 'moralis'), ...defined({ apiKey: env.MORALIS_API_KEY }) },
      pinax: {
        ...section(providers, 'pinax'),
        ...defined({ apiAuth: env.PINAX_API_AUTH, apiUser: env.PINAX_API_USER }),
      },
    },
  };

  if (raw['environment'] === undefined && env.NODE_ENV !== undefined) {
    overlaid['environment'] = env.NODE_ENV;
  }
  return overlaid;
}
