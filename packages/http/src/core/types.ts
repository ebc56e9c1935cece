// Pure types for functional core
// No classes, only data structures and their factories

import type { LogLevel } from '@bankwire/logger';

import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../types.js';

/**
 * Classification of a non-2xx status against the retry policy
 */
export interface RetryDecision {
  shouldRetry: boolean;
  type: 'rate_limit' | 'server' | 'client';
}

export interface RetryDelayInfo {
  delayMs: number;
  source: 'Retry-After' | 'backoff';
}

/**
 * The subset of fetch() the client relies on. Both undici's fetch and the
 * global fetch satisfy it.
 */
export interface FetchInit {
  body: string | null;
  headers: Record<string, string>;
  method: string;
  signal: AbortSignal;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  delay: (ms: number) => Promise<void>;
  fetch: FetchFn;
  log: (level: Exclude<LogLevel, 'trace'>, message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}

/**
 * Factory functions for initial states
 */
const assertNonNegativeFinite = (fieldName: string, value: number): void => {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid retry configuration: ${fieldName} must be a non-negative finite number, got ${value}`);
  }
};

export const createRetryPolicy = (overrides: Partial<RetryPolicy> = {}): RetryPolicy => {
  const policy: RetryPolicy = {
    ...DEFAULT_RETRY_POLICY,
    ...overrides,
  };

  assertNonNegativeFinite('maxRetries', policy.maxRetries);
  if (!Number.isInteger(policy.maxRetries)) {
    throw new Error(`Invalid retry configuration: maxRetries must be an integer, got ${policy.maxRetries}`);
  }
  assertNonNegativeFinite('backoffFactorMs', policy.backoffFactorMs);
  assertNonNegativeFinite('maxBackoffMs', policy.maxBackoffMs);

  return {
    ...policy,
    retryableStatusCodes: Object.freeze([...policy.retryableStatusCodes]),
    retryableMethods: Object.freeze([...policy.retryableMethods]),
  };
};
