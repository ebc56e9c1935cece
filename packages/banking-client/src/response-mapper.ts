import {
  HttpError,
  NetworkError,
  ResponseParseError,
  ResponseValidationError,
  RetryExhaustedError,
  type HttpClientError,
} from '@bankwire/http';
import { z } from 'zod';

import { tryParseDecimal } from './decimal-utils.js';
import {
  ClientClosedError,
  HttpStatusError,
  SchemaError,
  TransportError,
  type BankingError,
  type BankingOperation,
} from './errors.js';
import type { Account, AccountBalance, TransferResult } from './types.js';

// Number or numeric string, transformed to Decimal
export const DecimalValueSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const decimal = tryParseDecimal(value);
  if (!decimal) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a valid numeric string or number' });
    return z.NEVER;
  }
  return decimal;
});

export const AuthTokenResponseSchema = z.object({
  token: z.string().min(1, 'Token must be a non-empty string'),
});

// Boolean, "true"/"false" in any case, or 1/0
const ValidFlagSchema = z
  .union([
    z.boolean(),
    z.literal(0),
    z.literal(1),
    z.string().trim().toLowerCase().pipe(z.enum(['true', 'false'])),
  ])
  .transform((flag) => flag === true || flag === 1 || flag === 'true');

export const ValidateAccountResponseSchema = z
  .object({
    valid: ValidFlagSchema.nullish(),
  })
  .transform(({ valid }) => valid ?? false);

export const TransferResponseSchema: z.ZodType<TransferResult, z.ZodTypeDef, unknown> = z.object({
  transactionId: z.string().default(''),
  status: z.string().default(''),
  message: z.string().default(''),
  fromAccount: z.string().default(''),
  toAccount: z.string().default(''),
  amount: DecimalValueSchema.default(0),
});

export const AccountSchema: z.ZodType<Account, z.ZodTypeDef, unknown> = z
  .object({
    accountId: z.string().optional(),
    accountHolder: z.string().optional(),
  })
  .passthrough();

export const AccountListResponseSchema = z.array(AccountSchema);

export const AccountBalanceResponseSchema: z.ZodType<AccountBalance, z.ZodTypeDef, unknown> = z
  .object({
    accountId: z.string().optional(),
    balance: DecimalValueSchema.optional(),
    currency: z.string().optional(),
  })
  .passthrough();

/**
 * Translate a transport failure into the banking taxonomy.
 */
export function mapTransportError(error: HttpClientError, operation: BankingOperation): BankingError {
  if (error instanceof HttpError) {
    return new HttpStatusError(`${operation} failed: ${error.message}`, error.statusCode, error.responseBody, {
      cause: error,
    });
  }

  if (error instanceof NetworkError) {
    return new TransportError(`${operation} failed: ${error.message}`, { attempts: 1, timedOut: error.timedOut }, { cause: error });
  }

  if (error instanceof RetryExhaustedError) {
    return new TransportError(
      `${operation} failed: ${error.message}`,
      {
        attempts: error.attempts,
        lastStatus: error.lastStatus,
        timedOut: error.lastError instanceof NetworkError && error.lastError.timedOut,
      },
      { cause: error }
    );
  }

  if (error instanceof ResponseValidationError) {
    return new SchemaError(`${operation} returned an unexpected response: ${error.message}`, error.validationIssues, {
      cause: error,
      context: { truncatedPayload: error.truncatedPayload },
    });
  }

  if (error instanceof ResponseParseError) {
    return new SchemaError(`${operation} returned an unexpected response: ${error.message}`, [], {
      cause: error,
      context: { truncatedPayload: error.truncatedPayload },
    });
  }

  return new ClientClosedError(operation, { cause: error });
}
