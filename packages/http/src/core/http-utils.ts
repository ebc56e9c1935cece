// Pure HTTP utility functions
// All functions are pure - no side effects

import type { HttpMethod, RetryPolicy } from '../types.js';

import type { RetryDecision, RetryDelayInfo } from './types.js';

/**
 * Join base URL and endpoint. Trailing slashes on the base are stripped.
 */
export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const cleanBaseUrl = stripTrailingSlashes(baseUrl);

  if (!endpoint || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

export const stripTrailingSlashes = (value: string): string => value.replace(/\/+$/, '');

/**
 * Sanitize URL for logging (mask sensitive query parameters)
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
 * Reduce an endpoint to a low-cardinality template for hooks and logs.
 * The query string is dropped and identifier-like path segments become `{id}`.
 */
export const sanitizeEndpoint = (endpoint: string): string => {
  const pathname = endpoint.split('?')[0] ?? '';
  const path = pathname.startsWith('/') ? pathname : `/${pathname}`;

  return path
    .split('/')
    .map((segment, index) => (index > 1 && /\d/.test(segment) ? '{id}' : segment))
    .join('/');
};

export const isRetryableMethod = (method: HttpMethod, policy: RetryPolicy): boolean =>
  policy.retryableMethods.includes(method);

/**
 * Decide what to do with a completed, non-2xx response.
 */
export const classifyStatus = (status: number, policy: RetryPolicy): RetryDecision => {
  if (policy.retryableStatusCodes.includes(status)) {
    return { shouldRetry: true, type: status === 429 ? 'rate_limit' : 'server' };
  }

  if (status >= 500 && status < 600) {
    return { shouldRetry: false, type: 'server' };
  }

  return { shouldRetry: false, type: 'client' };
};

/**
 * Parse a Retry-After header value (delay-seconds or HTTP-date).
 */
export const parseRetryAfter = (value: string, currentTime: number, maxDelayMs: number): number | undefined => {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Math.min(parseInt(trimmed, 10) * 1000, maxDelayMs);
  }

  const date = Date.parse(trimmed);
  if (!isNaN(date)) {
    return Math.min(Math.max(0, date - currentTime), maxDelayMs);
  }

  return undefined;
};

/**
 * Backoff before retry number `retry` (1-based): factor * 2^(retry - 1), capped.
 */
export const calculateExponentialBackoff = (retry: number, backoffFactorMs: number, maxDelayMs: number): number => {
  const delay = backoffFactorMs * Math.pow(2, retry - 1);
  return Math.min(delay, maxDelayMs);
};

/**
 * Delay before the next attempt. A Retry-After header on 429/503 wins over the
 * computed backoff when the policy respects it.
 */
export const resolveRetryDelay = (
  retry: number,
  policy: RetryPolicy,
  response: { headers: { get(name: string): string | null }; status: number } | undefined,
  currentTime: number
): RetryDelayInfo => {
  if (response && policy.respectRetryAfter && (response.status === 429 || response.status === 503)) {
    const header = response.headers.get('retry-after');
    if (header) {
      const delayMs = parseRetryAfter(header, currentTime, policy.maxBackoffMs);
      if (delayMs !== undefined) {
        return { delayMs, source: 'Retry-After' };
      }
    }
  }

  return {
    delayMs: calculateExponentialBackoff(retry, policy.backoffFactorMs, policy.maxBackoffMs),
    source: 'backoff',
  };
};
