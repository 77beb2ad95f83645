// Pure HTTP utility functions

import type { RateLimitHeaderInfo } from './types.js';

const MAX_HEADER_DELAY_MS = 30_000;

/**
 * Build URL from base URL and endpoint
 */
export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  // Empty endpoint targets the base URL itself (single-endpoint SQL APIs)
  if (!endpoint || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

/**
 * Redact credential-like query parameters before logging
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);
    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Low-cardinality endpoint label for hooks and metrics.
 * Contract addresses and key-like path segments are replaced with placeholders.
 */
export const sanitizeEndpoint = (endpoint: string): string => {
  try {
    const url = new URL(endpoint, 'http://placeholder.local');
    return url.pathname
      .replace(/\/0x[a-f0-9]{40}/gi, '/{address}')
      .replace(/\/[a-f0-9]{32,}/gi, '/{apiKey}')
      .replace(/\/[A-Za-z0-9_-]{20,}/g, '/{apiKey}');
  } catch {
    return endpoint;
  }
};

/**
 * Statuses worth another attempt: request timeout, rate limiting and server errors.
 */
export const isRetryableStatus = (status: number): boolean =>
  status === 408 || status === 429 || (status >= 500 && status < 600);

/**
 * Parse Retry-After header value (delay-seconds or HTTP-date)
 */
export const parseRetryAfter = (value: string, currentTime: number): number | undefined => {
  const seconds = parseInt(value, 10);
  if (!isNaN(seconds) && String(seconds) === value.trim()) {
    if (seconds === 0) {
      return 1000;
    }
    if (seconds > 0) {
      return Math.min(seconds * 1000, MAX_HEADER_DELAY_MS);
    }
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - currentTime;
    if (delayMs > 0) {
      return Math.min(delayMs, MAX_HEADER_DELAY_MS);
    }
  }

  return undefined;
};

/**
 * Delay until a Unix timestamp given in seconds
 */
export const parseUnixTimestamp = (value: string, currentTime: number): number | undefined => {
  const timestamp = parseInt(value, 10);
  if (isNaN(timestamp) || timestamp <= 0) {
    return undefined;
  }

  const delaySeconds = timestamp - Math.floor(currentTime / 1000);
  if (delaySeconds > 0) {
    return Math.min(delaySeconds * 1000, MAX_HEADER_DELAY_MS);
  }

  return undefined;
};

/**
 * Determine the server-requested retry delay from a 429 response.
 * Checked in order: Retry-After, X-RateLimit-Reset, RateLimit-Reset.
 */
export const parseRateLimitHeaders = (
  getHeader: (name: string) => string | null,
  currentTime: number
): RateLimitHeaderInfo => {
  const retryAfter = getHeader('retry-after');
  if (retryAfter) {
    const delayMs = parseRetryAfter(retryAfter, currentTime);
    if (delayMs !== undefined) {
      return { delayMs, source: 'Retry-After' };
    }
  }

  const xRateLimitReset = getHeader('x-ratelimit-reset');
  if (xRateLimitReset) {
    const delayMs = parseUnixTimestamp(xRateLimitReset, currentTime);
    if (delayMs !== undefined) {
      return { delayMs, source: 'X-RateLimit-Reset' };
    }
  }

  // IETF draft header carries delta-seconds
  const rateLimitReset = getHeader('ratelimit-reset');
  if (rateLimitReset) {
    const seconds = parseInt(rateLimitReset, 10);
    if (!isNaN(seconds) && seconds >= 0) {
      return { delayMs: Math.min(seconds * 1000, MAX_HEADER_DELAY_MS), source: 'RateLimit-Reset' };
    }
  }

  return { source: 'default' };
};

/**
 * Exponential backoff: base * 2^(attempt-1), capped at maxDelayMs
 */
export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  const delay = baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, maxDelayMs);
};

/**
 * Spread a delay over [delay/2, delay] using a random sample in [0, 1)
 */
export const applyJitter = (delayMs: number, sample: number): number => {
  const half = delayMs / 2;
  return Math.round(half + half * sample);
};

/**
 * Resolves after `ms`, or immediately once `signal` aborts.
 */
export const cancellableDelay = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export const truncateBody = (body: string, maxLength = 200): string =>
  body.length > maxLength ? `${body.slice(0, maxLength)}...` : body;
