import { stripTrailingSlashes, type HttpMethod } from '@bankwire/http';
import { err, ok, type Result } from 'neverthrow';
import { z, type ZodIssue } from 'zod';

export const DEFAULT_BASE_URL = 'http://localhost:8123';

const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const satisfies readonly HttpMethod[];

export const BankingClientConfigSchema = z.object({
  baseUrl: z.string().trim().url().transform(stripTrailingSlashes).default(DEFAULT_BASE_URL),
  timeoutMs: z.number().finite().positive().default(30_000),
  maxRetries: z.number().int().nonnegative().default(3),
  backoffFactorMs: z.number().finite().nonnegative().default(1000),
  maxBackoffMs: z.number().finite().positive().default(120_000),
  retryableStatusCodes: z.array(z.number().int().min(100).max(599)).default([429, 500, 502, 503, 504]),
  retryableMethods: z.array(z.enum(HTTP_METHODS)).default(['GET', 'POST']),
});

export interface BankingClientConfig {
  readonly baseUrl: string;
  /** Per-attempt timeout. */
  readonly timeoutMs: number;
  /** Retries after the first attempt. */
  readonly maxRetries: number;
  readonly backoffFactorMs: number;
  readonly maxBackoffMs: number;
  readonly retryableStatusCodes: readonly number[];
  readonly retryableMethods: readonly HttpMethod[];
}

export interface BankingClientConfigInput {
  baseUrl?: string | undefined;
  timeoutMs?: number | undefined;
  maxRetries?: number | undefined;
  backoffFactorMs?: number | undefined;
  maxBackoffMs?: number | undefined;
  retryableStatusCodes?: readonly number[] | undefined;
  retryableMethods?: readonly HttpMethod[] | undefined;
}

const numericEnv = z.string().trim().min(1).pipe(z.coerce.number().finite());

const BankingClientEnvSchema = z.object({
  BANKWIRE_BASE_URL: z.string().trim().min(1).optional(),
  BANKWIRE_TIMEOUT_SECONDS: numericEnv.optional(),
  BANKWIRE_MAX_RETRIES: numericEnv.optional(),
  BANKWIRE_BACKOFF_FACTOR_SECONDS: numericEnv.optional(),
});

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function secondsToMs(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : seconds * 1000;
}

/**
 * Validate a configuration and apply defaults. The result is frozen.
 */
export function parseBankingClientConfig(input: BankingClientConfigInput = {}): Result<BankingClientConfig, Error> {
  const result = BankingClientConfigSchema.safeParse(input);
  if (!result.success) {
    return err(new Error(`Invalid banking client configuration:\n${formatIssues(result.error.issues)}`));
  }

  const data = result.data;
  return ok(
    Object.freeze({
      ...data,
      retryableStatusCodes: Object.freeze([...data.retryableStatusCodes]),
      retryableMethods: Object.freeze([...data.retryableMethods]),
    })
  );
}

/**
 * @throws Error if the configuration is invalid
 */
export function createBankingClientConfig(input: BankingClientConfigInput = {}): BankingClientConfig {
  const result = parseBankingClientConfig(input);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

/**
 * Build a configuration from BANKWIRE_* environment variables. Durations in the
 * environment are seconds. Defined values in `overrides` win over the environment.
 */
export function loadBankingClientConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: BankingClientConfigInput = {}
): Result<BankingClientConfig, Error> {
  const parsedEnv = BankingClientEnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    return err(new Error(`Environment validation failed:\n${formatIssues(parsedEnv.error.issues)}`));
  }

  const vars = parsedEnv.data;
  return parseBankingClientConfig({
    ...overrides,
    baseUrl: overrides.baseUrl ?? vars.BANKWIRE_BASE_URL,
    timeoutMs: overrides.timeoutMs ?? secondsToMs(vars.BANKWIRE_TIMEOUT_SECONDS),
    maxRetries: overrides.maxRetries ?? vars.BANKWIRE_MAX_RETRIES,
    backoffFactorMs: overrides.backoffFactorMs ?? secondsToMs(vars.BANKWIRE_BACKOFF_FACTOR_SECONDS),
  });
}
