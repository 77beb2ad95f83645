import type { ContractMetadata, ContractProviderName } from '@spamcheck/core';
import { HttpClient, HttpError, type HttpClientConfig, type HttpClientError } from '@spamcheck/http';
import { getLogger, type Logger } from '@spamcheck/logger';
import { down, type DependencyStatus, up } from '@spamcheck/resilience';
import type { Result } from 'neverthrow';

import type { ChainConfig } from '../chains/chain-config.schema.js';
import type { ContractProviderEvent } from '../events.js';

import { classifyHttpFailure, type ContractProviderError, fromHttpFailure } from './errors.js';
import type {
  ContractMetadataProvider,
  HealthCheckRequest,
  ProviderCallOptions,
  ProviderDependencies,
  ProviderMetadata,
} from './types.js';

export interface ProviderClientSettings {
  baseUrl: string;
  /** Credential headers sent on every request */
  defaultHeaders?: Record<string, string> | undefined;
  healthCheckTimeoutMs: number;
  retries: number;
  timeoutMs: number;
}

/**
 * Shared plumbing for HTTP-backed metadata providers: client construction,
 * event wiring, health probing and error classification.
 */
export abstract class BaseContractApiClient implements ContractMetadataProvider {
  protected readonly logger: Logger;
  protected readonly httpClient: HttpClient;

  constructor(
    protected readonly metadata: ProviderMetadata,
    protected readonly settings: ProviderClientSettings,
    protected readonly deps: ProviderDependencies
  ) {
    this.logger = getLogger(metadata.displayName.replace(/\s+/g, ''));
    this.httpClient = this.createHttpClient({});

    this.logger.debug(
      `Initialized ${metadata.displayName} - BaseUrl: ${settings.baseUrl}, Timeout: ${settings.timeoutMs}ms, Attempts: ${settings.retries}`
    );
  }

  get name(): ContractProviderName {
    return this.metadata.name;
  }

  abstract fetchMetadata(
    chain: ChainConfig,
    address: string,
    options?: ProviderCallOptions
  ): Promise<Result<ContractMetadata, ContractProviderError>>;

  /**
   * Request used to probe the provider. Any 2xx counts as up.
   */
  protected abstract getHealthCheckRequest(): HealthCheckRequest;

  async healthCheck(options: ProviderCallOptions = {}): Promise<DependencyStatus> {
    const request = this.getHealthCheckRequest();
    const callOptions = {
      headers: request.headers,
      retries: 1,
      signal: options.signal,
      timeout: this.settings.healthCheckTimeoutMs,
    };

    const result =
      request.method === 'POST'
        ? await this.httpClient.post(request.endpoint, request.body ?? '', callOptions)
        : await this.httpClient.get(request.endpoint, callOptions);

    if (result.isOk()) {
      return up();
    }

    const kind = classifyHttpFailure(result.error);
    const reason = describeHealthFailure(result.error);
    if (kind === 'unauthorized') {
      this.logger.error(`${this.metadata.displayName} health check failed: ${reason}`);
    } else {
      this.logger.warn(`${this.metadata.displayName} health check failed: ${reason}`);
    }
    return down(kind, reason);
  }

  async destroy(): Promise<void> {
    await this.httpClient.close();
  }

  protected toProviderError(error: HttpClientError, chainId: number): ContractProviderError {
    const providerError = fromHttpFailure(error, this.metadata.name, chainId);
    if (providerError.kind === 'unauthorized') {
      const envHint = this.metadata.credentialEnvVars.join(', ');
      this.logger.error(
        { chainId, statusCode: providerError.statusCode },
        `${this.metadata.displayName} rejected our credentials; check ${envHint}`
      );
    }
    return providerError;
  }

  protected createHttpClient(overrides: Partial<Pick<HttpClientConfig, 'baseUrl' | 'defaultHeaders'>>): HttpClient {
    const provider = this.metadata.name;
    const emit = (event: ContractProviderEvent) => this.deps.eventBus?.emit(event);

    return new HttpClient(
      {
        baseUrl: overrides.baseUrl ?? this.settings.baseUrl,
        defaultHeaders: overrides.defaultHeaders ?? this.settings.defaultHeaders,
        hooks: {
          onBackoff: ({ attemptNumber, delayMs, reason }) =>
            emit({ attemptNumber, delayMs, provider, reason, type: 'provider.request.retrying' }),
          onRequestFailure: ({ durationMs, endpoint, error, method, status }) =>
            emit({ durationMs, endpoint, error, method, provider, status, type: 'provider.request.failed' }),
          onRequestStart: ({ endpoint, method }) => emit({ endpoint, method, provider, type: 'provider.request.started' }),
          onRequestSuccess: ({ durationMs, endpoint, method, status }) =>
            emit({ durationMs, endpoint, method, provider, status, type: 'provider.request.succeeded' }),
        },
        providerName: provider,
        retries: this.settings.retries,
        timeout: this.settings.timeoutMs,
      },
      this.deps.httpEffects
    );
  }
}

function describeHealthFailure(error: HttpClientError): string {
  if (error instanceof HttpError) {
    return error.statusCode === 401 || error.statusCode === 403
      ? 'Authentication failed'
      : `API returned status ${error.statusCode}`;
  }
  return error.message;
}
