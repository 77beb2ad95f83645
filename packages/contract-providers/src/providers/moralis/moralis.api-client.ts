import type { ContractMetadata } from '@spamcheck/core';
import type { HttpClient } from '@spamcheck/http';
import { err, ok, type Result } from 'neverthrow';

import type { ChainConfig } from '../../chains/chain-config.schema.js';
import { BaseContractApiClient } from '../../core/base-api-client.js';
import { ContractProviderError } from '../../core/errors.js';
import type { MoralisProviderConfig } from '../../core/provider-config.schema.js';
import type { HealthCheckRequest, ProviderCallOptions, ProviderDependencies, ProviderMetadata } from '../../core/types.js';

import { mapMoralisNftItem } from './moralis.mapper-utils.js';
import { MoralisContractNftsResponseSchema } from './moralis.schemas.js';

export const MORALIS_METADATA: ProviderMetadata = {
  credentialEnvVars: ['MORALIS_API_KEY'],
  description: 'Moralis NFT API: collection name, symbol and token standard',
  displayName: 'Moralis',
  name: 'moralis',
};

export class MoralisApiClient extends BaseContractApiClient {
  private readonly overrideClients = new Map<string, HttpClient>();

  constructor(config: MoralisProviderConfig, deps: ProviderDependencies = {}) {
    super(
      MORALIS_METADATA,
      {
        baseUrl: config.baseUrl,
        defaultHeaders: { 'X-API-Key': config.apiKey },
        healthCheckTimeoutMs: config.healthCheckTimeoutMs,
        retries: config.retries,
        timeoutMs: config.timeoutMs,
      },
      deps
    );

    if (!config.apiKey) {
      this.logger.warn('No API key found for Moralis. Set environment variable: MORALIS_API_KEY');
    }
  }

  async fetchMetadata(
    chain: ChainConfig,
    address: string,
    options: ProviderCallOptions = {}
  ): Promise<Result<ContractMetadata, ContractProviderError>> {
    const settings = chain.providers.moralis;
    if (!settings) {
      return err(
        new ContractProviderError(`moralis: no chain mapping for chain ${chain.chainId}`, 'unavailable', 'moralis', {
          chainId: chain.chainId,
        })
      );
    }

    const query = new URLSearchParams({
      chain: settings.chain,
      format: 'decimal',
      limit: '1',
      normalizeMetadata: 'true',
    });

    this.logger.debug({ chain: settings.chain, chainId: chain.chainId }, `Fetching contract NFTs for ${address}`);

    const result = await this.clientFor(settings.baseUrl).get(`/nft/${address}?${query.toString()}`, {
      retries: settings.retries,
      schema: MoralisContractNftsResponseSchema,
      signal: options.signal,
      timeout: settings.timeoutMs,
    });

    if (result.isErr()) {
      return err(this.toProviderError(result.error, chain.chainId));
    }

    const first = result.value.result[0];
    if (!first) {
      return err(
        new ContractProviderError('moralis: no NFT metadata found for contract', 'not_found', 'moralis', {
          chainId: chain.chainId,
        })
      );
    }

    return ok(mapMoralisNftItem(first, chain.chainId, address));
  }

  override async destroy(): Promise<void> {
    await Promise.all([super.destroy(), ...[...this.overrideClients.values()].map((client) => client.close())]);
  }

  protected getHealthCheckRequest(): HealthCheckRequest {
    return { endpoint: '/info/endpointWeights', method: 'GET' };
  }

  /**
   * Chains may point at a different Moralis deployment; one client per base URL.
   */
  private clientFor(baseUrl: string | undefined): HttpClient {
    if (!baseUrl || baseUrl === this.settings.baseUrl) {
      return this.httpClient;
    }

    let client = this.overrideClients.get(baseUrl);
    if (!client) {
      client = this.createHttpClient({ baseUrl });
      this.overrideClients.set(baseUrl, client);
    }
    return client;
  }
}
