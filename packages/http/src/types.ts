import type { Logger } from '@bankwire/logger';
import type { ZodType, ZodTypeDef } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts = maxRetries + 1. */
  maxRetries: number;
  /** Base of the exponential backoff: factor * 2^(retry - 1). */
  backoffFactorMs: number;
  maxBackoffMs: number;
  retryableStatusCodes: readonly number[];
  retryableMethods: readonly HttpMethod[];
  /** Honour Retry-After on 429 and 503 responses. */
  respectRetryAfter: boolean;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxRetries: 3,
  backoffFactorMs: 1000,
  maxBackoffMs: 120_000,
  retryableStatusCodes: Object.freeze([429, 500, 502, 503, 504]),
  // POST is retried too. A transfer can be submitted twice if the server does not deduplicate.
  retryableMethods: Object.freeze<HttpMethod[]>(['GET', 'POST']),
  respectRetryAfter: true,
});

export interface PoolOptions {
  connections?: number | undefined;
  keepAliveTimeoutMs?: number | undefined;
  keepAliveMaxTimeoutMs?: number | undefined;
}

export interface HttpClientConfig {
  baseUrl: string;
  /** Used in the logger category and hook events. */
  clientName: string;
  defaultHeaders?: Record<string, string> | undefined;
  hooks?: HttpClientHooks | undefined;
  logger?: Logger | undefined;
  pool?: PoolOptions | undefined;
  retry?: Partial<RetryPolicy> | undefined;
  /** Per-attempt timeout in milliseconds. */
  timeout?: number | undefined;
}

export interface HttpRequestOptions {
  body?: string | object | undefined;
  headers?: Record<string, string> | undefined;
  method?: HttpMethod | undefined;
  timeout?: number | undefined;
}

export interface HttpRequestOptionsWithSchema<T> extends HttpRequestOptions {
  schema: ZodType<T, ZodTypeDef, unknown>;
}

export interface HttpClientHooks {
  /**
   * Called once when a logical request starts (before any retry attempts).
   * Paired with exactly one terminal event (onRequestSuccess or onRequestFailure).
   */
  onRequestStart?: (event: { endpoint: string; method: HttpMethod; timestamp: number }) => void;

  /**
   * Called once when a logical request succeeds. durationMs covers every attempt.
   */
  onRequestSuccess?: (event: {
    attempts: number;
    durationMs: number;
    endpoint: string;
    method: HttpMethod;
    status: number;
  }) => void;

  /**
   * Called once when a logical request fails for good. Intermediate failures
   * that lead to a retry are not reported here.
   */
  onRequestFailure?: (event: {
    attempts: number;
    durationMs: number;
    endpoint: string;
    error: string;
    method: HttpMethod;
    status?: number | undefined;
  }) => void;

  /**
   * Called before each retry attempt.
   */
  onBackoff?: (event: {
    attemptNumber: number;
    delayMs: number;
    reason: 'network' | 'status';
    status?: number | undefined;
  }) => void;
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

/**
 * Connection refused, DNS failure, reset, or per-attempt timeout.
 */
export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly timedOut: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/**
 * Every allowed attempt failed with a retryable outcome.
 * `lastError` (also the `cause`) is the failure of the final attempt.
 */
export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastStatus: number | undefined,
    public readonly lastError: HttpError | NetworkError
  ) {
    super(message, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * A 2xx response whose body is not JSON.
 */
export class ResponseParseError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseParseError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public readonly clientName: string,
    public readonly endpoint: string,
    public readonly validationIssues: { message: string; path: string }[],
    public readonly truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}

export class ClientClosedError extends Error {
  constructor(clientName: string) {
    super(`${clientName} HTTP client is closed`);
    this.name = 'ClientClosedError';
  }
}

export type HttpClientError =
  | HttpError
  | NetworkError
  | RetryExhaustedError
  | ResponseParseError
  | ResponseValidationError
  | ClientClosedError;
