import type { ContractProviderName, ProviderErrorKind } from '@spamcheck/core';
import { DomainError } from '@spamcheck/core';
import {
  HttpError,
  type HttpClientError,
  RateLimitError,
  RequestAbortedError,
  RequestTimeoutError,
} from '@spamcheck/http';

/**
 * A provider could not produce metadata for one address.
 * `unauthorized` is a configuration problem and carries error severity.
 */
export class ContractProviderError extends DomainError {
  readonly code = 'PROVIDER_ERROR';
  readonly severity: 'error' | 'warning';
  readonly statusCode?: number | undefined;

  constructor(
    message: string,
    public readonly kind: ProviderErrorKind,
    public readonly provider: ContractProviderName,
    options: { cause?: unknown; chainId?: number | undefined; statusCode?: number | undefined } = {}
  ) {
    super(message, { chainId: options.chainId });
    this.severity = kind === 'unauthorized' ? 'error' : 'warning';
    this.statusCode = options.statusCode;
    this.cause = options.cause;
  }
}

export function classifyHttpFailure(error: HttpClientError): ProviderErrorKind {
  if (error instanceof RateLimitError) return 'rate_limited';
  if (error instanceof RequestTimeoutError || error instanceof RequestAbortedError) return 'timeout';
  if (error instanceof HttpError) {
    if (error.statusCode === 404) return 'not_found';
    if (error.statusCode === 401 || error.statusCode === 403) return 'unauthorized';
    if (error.statusCode === 408) return 'timeout';
    if (error.statusCode === 429) return 'rate_limited';
  }
  return 'unavailable';
}

export function fromHttpFailure(
  error: HttpClientError,
  provider: ContractProviderName,
  chainId?: number
): ContractProviderError {
  const kind = classifyHttpFailure(error);
  const statusCode = error instanceof HttpError ? error.statusCode : undefined;
  return new ContractProviderError(`${provider}: ${error.message}`, kind, provider, { cause: error, chainId, statusCode });
}
