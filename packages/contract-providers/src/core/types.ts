import type { ContractMetadata, ContractProviderName } from '@spamcheck/core';
import type { EventSink } from '@spamcheck/events';
import type { HttpEffects } from '@spamcheck/http';
import type { DependencyStatus } from '@spamcheck/resilience';
import type { Result } from 'neverthrow';

import type { ChainConfig } from '../chains/chain-config.schema.js';
import type { ContractProviderEvent } from '../events.js';

import type { ContractProviderError } from './errors.js';
import type { ProvidersConfig } from './provider-config.schema.js';

export interface ProviderCallOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Capability set every metadata source implements.
 */
export interface ContractMetadataProvider {
  readonly name: ContractProviderName;

  /**
   * Look up one contract on one chain. `address` is already normalized.
   */
  fetchMetadata(
    chain: ChainConfig,
    address: string,
    options?: ProviderCallOptions
  ): Promise<Result<ContractMetadata, ContractProviderError>>;

  /**
   * Cheap reachability probe bounded by the provider's health-check timeout.
   */
  healthCheck(options?: ProviderCallOptions): Promise<DependencyStatus>;

  destroy(): Promise<void>;
}

export interface ProviderMetadata {
  credentialEnvVars: readonly string[];
  description: string;
  displayName: string;
  name: ContractProviderName;
}

export interface ProviderDependencies {
  eventBus?: EventSink<ContractProviderEvent> | undefined;
  httpEffects?: Partial<HttpEffects> | undefined;
}

export interface ProviderFactory {
  create(config: ProvidersConfig, deps: ProviderDependencies): ContractMetadataProvider;
  metadata: ProviderMetadata;
}

export interface HealthCheckRequest {
  body?: string | undefined;
  endpoint: string;
  headers?: Record<string, string> | undefined;
  method: 'GET' | 'POST';
}
