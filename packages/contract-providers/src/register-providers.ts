import type { ContractProviderName } from '@spamcheck/core';

import type { ProvidersConfig } from './core/provider-config.schema.js';
import { ProviderRegistry } from './core/provider-registry.js';
import type { ContractMetadataProvider, ProviderDependencies } from './core/types.js';
import { BUILT_IN_PROVIDER_FACTORIES } from './providers/index.js';

export function createProviderRegistry(): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const factory of BUILT_IN_PROVIDER_FACTORIES) {
    registry.register(factory);
  }
  return registry;
}

/**
 * Enabled built-in providers for the given configuration.
 */
export function createContractProviders(
  config: ProvidersConfig,
  deps: ProviderDependencies = {}
): Map<ContractProviderName, ContractMetadataProvider> {
  return createProviderRegistry().createEnabledProviders(config, deps);
}
