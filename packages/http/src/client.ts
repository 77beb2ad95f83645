import { getErrorMessage } from '@spamcheck/core';
import { getLogger, type Logger } from '@spamcheck/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';

import * as HttpUtils from './core/http-utils.js';
import type { FetchResponseLike, HttpEffects } from './core/types.js';
import type { BackoffConfig, HttpClientConfig, HttpClientHooks, HttpRequestOptions, ResponseSchema } from './types.js';
import {
  HttpError,
  type HttpClientError,
  NetworkError,
  RateLimitError,
  RequestAbortedError,
  RequestTimeoutError,
  ResponseValidationError,
} from './types.js';

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  jitter: false,
  maxDelayMs: 10_000,
};

type AttemptOutcome =
  | { status: number; type: 'success'; value: unknown }
  | { error: HttpClientError; retryable: boolean; type: 'failure' };

interface ResolvedConfig {
  backoff: BackoffConfig;
  baseUrl: string;
  defaultHeaders: Record<string, string>;
  hooks: HttpClientHooks | undefined;
  providerName: string;
  retries: number;
  timeout: number;
}

export class HttpClient {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  private closePromise?: Promise<void> | undefined;
  private isClosed = false;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    const retries = config.retries ?? 3;
    if (!Number.isInteger(retries) || retries < 1) {
      throw new Error(`HttpClient for ${config.providerName}: retries must be a positive integer, got ${retries}`);
    }

    this.config = {
      backoff: { ...DEFAULT_BACKOFF, ...config.backoff },
      baseUrl: config.baseUrl,
      defaultHeaders: {
        Accept: 'application/json',
        'User-Agent': 'spamcheck/0.1.0',
        ...config.defaultHeaders,
      },
      hooks: config.hooks,
      providerName: config.providerName,
      retries,
      timeout: config.timeout ?? 10_000,
    };

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    this.agent = new Agent({
      keepAliveMaxTimeout: 60_000,
      keepAliveTimeout: 10_000,
      pipelining: 1,
    });

    this.effects = {
      delay: HttpUtils.cancellableDelay,
      fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }),
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      random: () => Math.random(),
      ...effects,
    };

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${config.baseUrl}, Timeout: ${this.config.timeout}ms, Attempts: ${this.config.retries}`
    );
  }

  async get<T>(
    endpoint: string,
    options: Omit<HttpRequestOptions, 'method' | 'body'> & { schema: ResponseSchema<T> }
  ): Promise<Result<T, HttpClientError>>;
  async get(endpoint: string, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<Result<unknown, HttpClientError>>;
  async get(
    endpoint: string,
    options: Omit<HttpRequestOptions, 'method' | 'body'> & { schema?: ResponseSchema<unknown> } = {}
  ): Promise<Result<unknown, HttpClientError>> {
    return this.request(endpoint, { ...options, method: 'GET' });
  }

  async post<T>(
    endpoint: string,
    body: string | object,
    options: Omit<HttpRequestOptions, 'method' | 'body'> & { schema: ResponseSchema<T> }
  ): Promise<Result<T, HttpClientError>>;
  async post(
    endpoint: string,
    body: string | object,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>
  ): Promise<Result<unknown, HttpClientError>>;
  async post(
    endpoint: string,
    body: string | object,
    options: Omit<HttpRequestOptions, 'method' | 'body'> & { schema?: ResponseSchema<unknown> } = {}
  ): Promise<Result<unknown, HttpClientError>> {
    return this.request(endpoint, { ...options, body, method: 'POST' });
  }

  /**
   * Perform a logical request: up to `retries` attempts, each bounded by `timeout`.
   *
   * Network errors, attempt timeouts, 408, 429 and 5xx are retried with exponential
   * backoff. Other 4xx statuses and schema mismatches fail immediately. Caller
   * cancellation through `signal` stops the in-flight attempt and any pending backoff.
   */
  async request<T>(
    endpoint: string,
    options: HttpRequestOptions & { schema: ResponseSchema<T> }
  ): Promise<Result<T, HttpClientError>>;
  async request(
    endpoint: string,
    options?: HttpRequestOptions & { schema?: ResponseSchema<unknown> | undefined }
  ): Promise<Result<unknown, HttpClientError>>;
  async request(
    endpoint: string,
    options: HttpRequestOptions & { schema?: ResponseSchema<unknown> | undefined } = {}
  ): Promise<Result<unknown, HttpClientError>> {
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint);
    const method = options.method ?? 'GET';
    const attempts = options.retries ?? this.config.retries;
    const hooks = this.config.hooks;
    const sanitizedEndpoint = HttpUtils.sanitizeEndpoint(endpoint);
    const signal = options.signal;

    if (signal?.aborted) {
      return err(new RequestAbortedError());
    }

    const startTime = this.effects.now();
    hooks?.onRequestStart?.({ endpoint: sanitizedEndpoint, method, timestamp: startTime });

    let lastError: HttpClientError = new NetworkError('Request failed before any attempt completed');

    for (let attempt = 1; attempt <= attempts; attempt++) {
      this.effects.log(
        'debug',
        `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(url)}, Method: ${method}, Attempt: ${attempt}/${attempts}`
      );

      const outcome = await this.executeAttempt(url, endpoint, options);

      if (outcome.type === 'success') {
        hooks?.onRequestSuccess?.({
          durationMs: this.effects.now() - startTime,
          endpoint: sanitizedEndpoint,
          method,
          status: outcome.status,
        });
        return ok(outcome.value);
      }

      lastError = outcome.error;
      if (!outcome.retryable || attempt >= attempts) {
        break;
      }

      const delay = this.retryDelay(outcome.error, attempt);
      const reason = outcome.error instanceof RateLimitError ? 'rate_limit' : 'retry';
      if (outcome.error instanceof RateLimitError) {
        hooks?.onRateLimited?.({ retryAfterMs: delay, status: 429 });
      }

      this.effects.log(
        'warn',
        `Request failed, retrying - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${attempts}, Delay: ${delay}ms, Error: ${outcome.error.message}`,
        { method, providerName: this.config.providerName }
      );
      hooks?.onBackoff?.({ attemptNumber: attempt, delayMs: delay, reason });

      await this.effects.delay(delay, signal);
      if (signal?.aborted) {
        lastError = new RequestAbortedError();
        break;
      }
    }

    hooks?.onRequestFailure?.({
      durationMs: this.effects.now() - startTime,
      endpoint: sanitizedEndpoint,
      error: lastError.message,
      method,
      status: statusOf(lastError),
    });

    return err(lastError);
  }

  /**
   * Close the undici agent so keep-alive sockets do not hold the process open.
   * Idempotent.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
      } catch (error) {
        const errorMessage = getErrorMessage(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`, { cause: error });
      }
    })();

    return this.closePromise;
  }

  private async executeAttempt(
    url: string,
    endpoint: string,
    options: HttpRequestOptions & { schema?: ResponseSchema<unknown> | undefined }
  ): Promise<AttemptOutcome> {
    const timeout = options.timeout ?? this.config.timeout;
    const signal = options.signal;
    const controller = new AbortController();
    let timedOut = false;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const headers: Record<string, string> = { ...this.config.defaultHeaders, ...options.headers };
      let body: string | null = null;
      if (typeof options.body === 'string') {
        body = options.body;
      } else if (options.body !== undefined) {
        body = JSON.stringify(options.body);
        headers['Content-Type'] = 'application/json';
      }

      const response = await this.effects.fetch(url, {
        body,
        headers,
        method: options.method ?? 'GET',
        signal: controller.signal,
      });
      const text = await response.text();

      if (!response.ok) {
        return this.failureFromStatus(response, text);
      }

      return this.parseBody(text, response.status, endpoint, options.schema);
    } catch (error) {
      if (signal?.aborted) {
        return { error: new RequestAbortedError(), retryable: false, type: 'failure' };
      }
      if (timedOut) {
        return {
          error: new RequestTimeoutError(`Request timeout after ${timeout}ms`, timeout),
          retryable: true,
          type: 'failure',
        };
      }
      return {
        error: new NetworkError(getErrorMessage(error, 'Network request failed'), { cause: error }),
        retryable: true,
        type: 'failure',
      };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private failureFromStatus(response: FetchResponseLike, text: string): AttemptOutcome {
    if (response.status === 429) {
      const info = HttpUtils.parseRateLimitHeaders((name) => response.headers.get(name), this.effects.now());
      this.effects.log('warn', `Rate limit 429 response received - Source: ${info.source}`, {
        providerName: this.config.providerName,
        retryAfterMs: info.delayMs,
      });
      return {
        error: new RateLimitError(`${this.config.providerName} rate limit exceeded`, info.delayMs),
        retryable: true,
        type: 'failure',
      };
    }

    return {
      error: new HttpError(`HTTP ${response.status}: ${HttpUtils.truncateBody(text)}`, response.status, text),
      retryable: HttpUtils.isRetryableStatus(response.status),
      type: 'failure',
    };
  }

  private parseBody(
    text: string,
    status: number,
    endpoint: string,
    schema: ResponseSchema<unknown> | undefined
  ): AttemptOutcome {
    let data: unknown;
    if (text.length > 0) {
      try {
        data = JSON.parse(text);
      } catch {
        return {
          error: new ResponseValidationError(
            'Response body is not valid JSON',
            this.config.providerName,
            endpoint,
            [],
            text.slice(0, 500)
          ),
          retryable: false,
          type: 'failure',
        };
      }
    }

    if (!schema) {
      return { status, type: 'success', value: data };
    }

    const parseResult = schema.safeParse(data);
    if (parseResult.success) {
      return { status, type: 'success', value: parseResult.data };
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));
    const firstFive = allIssues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');
    const truncatedPayload = text.slice(0, 500);

    this.effects.log('error', `Response validation failed (first 5 of ${allIssues.length} issues): ${firstFive}`, {
      endpoint: HttpUtils.sanitizeEndpoint(endpoint),
      providerName: this.config.providerName,
      truncatedPayload,
    });

    return {
      error: new ResponseValidationError(
        `Response validation failed: ${firstFive}`,
        this.config.providerName,
        endpoint,
        allIssues,
        truncatedPayload
      ),
      retryable: false,
      type: 'failure',
    };
  }

  private retryDelay(error: HttpClientError, attempt: number): number {
    const { baseDelayMs, jitter, maxDelayMs } = this.config.backoff;

    // Server-provided delay wins over computed backoff
    if (error instanceof RateLimitError && error.retryAfter !== undefined) {
      return Math.min(error.retryAfter, maxDelayMs);
    }

    const delay = HttpUtils.calculateExponentialBackoff(attempt, baseDelayMs, maxDelayMs);
    return jitter ? HttpUtils.applyJitter(delay, this.effects.random()) : delay;
  }
}

function statusOf(error: HttpClientError): number | undefined {
  if (error instanceof HttpError) return error.statusCode;
  if (error instanceof RateLimitError) return 429;
  return undefined;
}
