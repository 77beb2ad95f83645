import { describe, expect, it, vi } from 'vitest';

import { createContractProviders, createProviderRegistry } from '../../register-providers.js';
import { ProvidersConfigSchema } from '../provider-config.schema.js';
import { ProviderRegistry } from '../provider-registry.js';
import type { ProviderFactory } from '../types.js';

describe('ProviderRegistry', () => {
  it('registers the built-in providers', () => {
    const registry = createProviderRegistry();

    expect(registry.getAllProviders().map((metadata) => metadata.name)).toEqual(['moralis', 'pinax']);
    expect(registry.isRegistered('pinax')).toBe(true);
  });

  it('refuses duplicate registrations', () => {
    const registry = createProviderRegistry();
    const duplicate: ProviderFactory = {
      create: vi.fn(),
      metadata: { credentialEnvVars: [], description: 'dup', displayName: 'Dup', name: 'moralis' },
    };

    expect(() => registry.register(duplicate)).toThrow("Provider 'moralis' is already registered");
  });

  it('explains which providers exist when asked for an unregistered one', () => {
    const registry = new ProviderRegistry();

    expect(() => registry.createProvider('pinax', ProvidersConfigSchema.parse({}))).toThrow(
      "Provider 'pinax' is not registered. Available providers: none"
    );
  });

  it('creates only enabled providers', async () => {
    const config = ProvidersConfigSchema.parse({ moralis: { apiKey: 'test-secret' }, pinax: { enabled: false } });

    const providers = createContractProviders(config);

    expect([...providers.keys()]).toEqual(['moralis']);
    await Promise.all([...providers.values()].map((provider) => provider.destroy()));
  });
});

describe('ProvidersConfigSchema', () => {
  it('fills defaults', () => {
    const config = ProvidersConfigSchema.parse({});

    expect(config.priority).toEqual(['moralis', 'pinax']);
    expect(config.moralis.timeoutMs).toBe(30_000);
    expect(config.pinax.timeoutMs).toBe(20_000);
    expect(config.pinax.dbName).toBe('mainnet:evm-nft-tokens@v0.6.2');
  });

  it('rejects a priority list that repeats a provider', () => {
    const result = ProvidersConfigSchema.safeParse({ priority: ['pinax', 'pinax'] });

    expect(result.success).toBe(false);
  });
});
