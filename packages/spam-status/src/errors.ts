import { DomainError, type ErrorContext } from '@spamcheck/core';

export type RequestErrorCode =
  | 'CHAIN_DISABLED'
  | 'EMPTY_REQUEST'
  | 'INVALID_ADDRESS'
  | 'NO_ENABLED_PROVIDERS'
  | 'REQUEST_CANCELLED'
  | 'REQUEST_TIMEOUT'
  | 'TOO_MANY_ADDRESSES'
  | 'UNSUPPORTED_CHAIN';

/**
 * The request as a whole was rejected or abandoned. Per-address problems never
 * surface here; they become undetermined results.
 */
export class RequestError extends DomainError {
  readonly severity = 'warning' as const;

  constructor(
    public readonly code: RequestErrorCode,
    message: string,
    context?: ErrorContext
  ) {
    super(message, context);
  }

  /**
   * True for rejections caused by the caller's input rather than by time running out.
   */
  get isInvalidRequest(): boolean {
    return this.code !== 'REQUEST_TIMEOUT' && this.code !== 'REQUEST_CANCELLED';
  }
}
