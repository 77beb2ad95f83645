import { DomainError } from '@spamcheck/core';
import {
  HttpError,
  type HttpClientError,
  RateLimitError,
  RequestAbortedError,
  RequestTimeoutError,
} from '@spamcheck/http';

export type ClassifierErrorKind = 'parse_failure' | 'rate_limited' | 'timeout' | 'unauthorized' | 'unavailable';

export class ClassifierError extends DomainError {
  readonly code = 'CLASSIFIER_ERROR';
  readonly severity: 'error' | 'warning';
  readonly statusCode?: number | undefined;

  constructor(
    message: string,
    public readonly kind: ClassifierErrorKind,
    options: { cause?: unknown; statusCode?: number | undefined } = {}
  ) {
    super(message);
    this.severity = kind === 'unauthorized' ? 'error' : 'warning';
    this.statusCode = options.statusCode;
    this.cause = options.cause;
  }
}

export function classifyCompletionFailure(error: HttpClientError): ClassifierErrorKind {
  if (error instanceof RateLimitError) return 'rate_limited';
  if (error instanceof RequestTimeoutError || error instanceof RequestAbortedError) return 'timeout';
  if (error instanceof HttpError) {
    if (error.statusCode === 401 || error.statusCode === 403) return 'unauthorized';
    if (error.statusCode === 408) return 'timeout';
    if (error.statusCode === 429) return 'rate_limited';
  }
  return 'unavailable';
}

export function classifierErrorFromHttp(error: HttpClientError): ClassifierError {
  return new ClassifierError(`openai: ${error.message}`, classifyCompletionFailure(error), {
    cause: error,
    statusCode: error instanceof HttpError ? error.statusCode : undefined,
  });
}
