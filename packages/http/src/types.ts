import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Response schema accepted by the client. Input is left open so schemas
 * with transforms validate raw JSON.
 */
export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface BackoffConfig {
  baseDelayMs: number;
  /** Randomize each delay within [delay/2, delay] */
  jitter: boolean;
  maxDelayMs: number;
}

export interface HttpClientConfig {
  backoff?: Partial<BackoffConfig> | undefined;
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  hooks?: HttpClientHooks | undefined;
  providerName: string;
  /** Total attempts per logical request, including the first one */
  retries?: number | undefined;
  timeout?: number | undefined;
}

export interface HttpRequestOptions {
  body?: string | object | undefined;
  headers?: Record<string, string> | undefined;
  method?: 'GET' | 'POST' | undefined;
  retries?: number | undefined;
  /** Caller cancellation; aborts the in-flight attempt and any pending backoff */
  signal?: AbortSignal | undefined;
  timeout?: number | undefined;
}

export interface HttpClientHooks {
  /**
   * Called once per logical request, before the first attempt.
   * Paired with exactly one onRequestSuccess or onRequestFailure.
   */
  onRequestStart?: (event: { endpoint: string; method: string; timestamp: number }) => void;

  onRequestSuccess?: (event: { durationMs: number; endpoint: string; method: string; status: number }) => void;

  /**
   * Final failure only; intermediate attempt failures surface through onBackoff.
   */
  onRequestFailure?: (event: {
    durationMs: number;
    endpoint: string;
    error: string;
    method: string;
    status?: number | undefined;
  }) => void;

  onRateLimited?: (event: { retryAfterMs?: number | undefined; status: number }) => void;

  onBackoff?: (event: { attemptNumber: number; delayMs: number; reason: 'rate_limit' | 'retry' }) => void;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfter?: number | undefined
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class RequestTimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'RequestTimeoutError';
  }
}

export class RequestAbortedError extends Error {
  constructor(message = 'Request aborted by caller') {
    super(message);
    this.name = 'RequestAbortedError';
  }
}

export class NetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly endpoint: string,
    public readonly validationIssues: { message: string; path: string }[],
    public readonly truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}

export type HttpClientError =
  | HttpError
  | NetworkError
  | RateLimitError
  | RequestAbortedError
  | RequestTimeoutError
  | ResponseValidationError;
