import type { ContractProviderName } from '@spamcheck/core';

import type { ContractMetadataProvider, ProviderDependencies, ProviderFactory, ProviderMetadata } from './types.js';
import type { ProvidersConfig } from './provider-config.schema.js';

/**
 * Factories keyed by provider name. Create via `createProviderRegistry()` for the built-in set.
 */
export class ProviderRegistry {
  private readonly factories = new Map<ContractProviderName, ProviderFactory>();

  register(factory: ProviderFactory): void {
    const name = factory.metadata.name;
    if (this.factories.has(name)) {
      throw new Error(`Provider '${name}' is already registered`);
    }
    this.factories.set(name, factory);
  }

  isRegistered(name: ContractProviderName): boolean {
    return this.factories.has(name);
  }

  getAllProviders(): ProviderMetadata[] {
    return [...this.factories.values()].map((factory) => factory.metadata);
  }

  createProvider(
    name: ContractProviderName,
    config: ProvidersConfig,
    deps: ProviderDependencies = {}
  ): ContractMetadataProvider {
    const factory = this.factories.get(name);
    if (!factory) {
      const available = [...this.factories.keys()].join(', ');
      throw new Error(`Provider '${name}' is not registered. Available providers: ${available || 'none'}`);
    }
    return factory.create(config, deps);
  }

  /**
   * Instantiate every provider that is both registered and enabled, keyed by name.
   */
  createEnabledProviders(
    config: ProvidersConfig,
    deps: ProviderDependencies = {}
  ): Map<ContractProviderName, ContractMetadataProvider> {
    const providers = new Map<ContractProviderName, ContractMetadataProvider>();
    for (const name of this.factories.keys()) {
      if (config[name].enabled) {
        providers.set(name, this.createProvider(name, config, deps));
      }
    }
    return providers;
  }
}
