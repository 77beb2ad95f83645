import { type ContractMetadata, parseContractType } from '@spamcheck/core';
import { err, ok, type Result } from 'neverthrow';

import type { ChainConfig } from '../../chains/chain-config.schema.js';
import { BaseContractApiClient } from '../../core/base-api-client.js';
import { ContractProviderError } from '../../core/errors.js';
import type { PinaxProviderConfig } from '../../core/provider-config.schema.js';
import type { HealthCheckRequest, ProviderCallOptions, ProviderDependencies, ProviderMetadata } from '../../core/types.js';

import { buildContractMetadataQuery, PINAX_HEALTH_QUERY } from './pinax.query-builder.js';
import { type PinaxContractRow, PinaxSqlResponseSchema } from './pinax.schemas.js';

export const PINAX_METADATA: ProviderMetadata = {
  credentialEnvVars: ['PINAX_API_USER', 'PINAX_API_AUTH'],
  description: 'Pinax SQL endpoint over indexed ERC-721 and ERC-1155 collections',
  displayName: 'Pinax',
  name: 'pinax',
};

export function basicAuthHeader(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
}

export function mapPinaxRow(row: PinaxContractRow, chainId: number, address: string): ContractMetadata {
  return {
    additionalData: {},
    address,
    chainId,
    contractType: parseContractType(row.standard),
    description: row.description,
    name: row.name,
    source: 'pinax',
    symbol: row.symbol,
  };
}

export class PinaxApiClient extends BaseContractApiClient {
  private readonly defaultDbName: string;

  constructor(config: PinaxProviderConfig, deps: ProviderDependencies = {}) {
    super(
      PINAX_METADATA,
      {
        baseUrl: config.endpoint,
        defaultHeaders: {
          Authorization: basicAuthHeader(config.apiUser, config.apiAuth),
          'Content-Type': 'text/plain',
        },
        healthCheckTimeoutMs: config.healthCheckTimeoutMs,
        retries: config.retries,
        timeoutMs: config.timeoutMs,
      },
      deps
    );

    this.defaultDbName = config.dbName;
    if (!config.apiUser || !config.apiAuth) {
      this.logger.warn('Pinax credentials incomplete. Set environment variables: PINAX_API_USER, PINAX_API_AUTH');
    }
  }

  async fetchMetadata(
    chain: ChainConfig,
    address: string,
    options: ProviderCallOptions = {}
  ): Promise<Result<ContractMetadata, ContractProviderError>> {
    const settings = chain.providers.pinax;
    const dbName = settings?.dbName ?? this.defaultDbName;

    const queryResult = buildContractMetadataQuery(dbName, address);
    if (queryResult.isErr()) {
      return err(
        new ContractProviderError(`pinax: ${queryResult.error.message}`, 'unavailable', 'pinax', {
          cause: queryResult.error,
          chainId: chain.chainId,
        })
      );
    }

    this.logger.debug({ chainId: chain.chainId, dbName }, `Querying collection metadata for ${address}`);

    const result = await this.httpClient.post('', queryResult.value, {
      retries: settings?.retries,
      schema: PinaxSqlResponseSchema,
      signal: options.signal,
      timeout: settings?.timeoutMs,
    });

    if (result.isErr()) {
      return err(this.toProviderError(result.error, chain.chainId));
    }

    if (result.value.error) {
      return err(
        new ContractProviderError(`pinax: SQL error: ${result.value.error}`, 'unavailable', 'pinax', {
          chainId: chain.chainId,
        })
      );
    }

    const row = result.value.data?.[0];
    if (!row) {
      return err(
        new ContractProviderError('pinax: no collection metadata found for contract', 'not_found', 'pinax', {
          chainId: chain.chainId,
        })
      );
    }

    return ok(mapPinaxRow(row, chain.chainId, address));
  }

  protected getHealthCheckRequest(): HealthCheckRequest {
    return { body: PINAX_HEALTH_QUERY, endpoint: '', method: 'POST' };
  }
}
