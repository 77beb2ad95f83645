export * from './chains/chain-config.schema.js';
export { BUILT_IN_CHAINS } from './chains/chain-definitions.js';
export * from './chains/chain-registry.js';
export { BaseContractApiClient, type ProviderClientSettings } from './core/base-api-client.js';
export * from './core/errors.js';
export * from './core/provider-config.schema.js';
export { ProviderRegistry } from './core/provider-registry.js';
export type * from './core/types.js';
export type { ContractProviderEvent } from './events.js';
export * from './providers/index.js';
export { createContractProviders, createProviderRegistry } from './register-providers.js';
