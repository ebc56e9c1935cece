/**
 * Failure taxonomy of the banking client. Every facade operation returns one
 * of these in its `Err` branch; none is thrown.
 */

export type BankingErrorKind = 'validation' | 'transport' | 'http_status' | 'schema' | 'client_closed';

export type BankingOperation = 'authenticate' | 'validateAccount' | 'transferFunds' | 'getAccounts' | 'getAccountBalance';

export interface ErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown> | undefined;
}

export abstract class BankingClientError extends Error {
  abstract readonly code: string;
  abstract readonly kind: BankingErrorKind;

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.timestamp = new Date().toISOString();
    this.context = options?.context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      kind: this.kind,
      message: this.message,
      name: this.name,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Caller input rejected before any request was sent.
 */
export class ValidationError extends BankingClientError {
  readonly code = 'VALIDATION_ERROR';
  readonly kind = 'validation' as const;

  constructor(
    message: string,
    public readonly field: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Connection refused, DNS failure, timeout, or every retry used up.
 */
export class TransportError extends BankingClientError {
  readonly code = 'TRANSPORT_ERROR';
  readonly kind = 'transport' as const;

  readonly attempts: number;
  readonly timedOut: boolean;
  readonly lastStatus?: number | undefined;

  constructor(
    message: string,
    details: { attempts: number; lastStatus?: number | undefined; timedOut: boolean },
    options?: ErrorOptions
  ) {
    super(message, options);
    this.attempts = details.attempts;
    this.timedOut = details.timedOut;
    this.lastStatus = details.lastStatus;
  }
}

export class HttpStatusError extends BankingClientError {
  readonly code = 'HTTP_STATUS_ERROR';
  readonly kind = 'http_status' as const;

  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * A 2xx response whose body does not have the expected shape.
 */
export class SchemaError extends BankingClientError {
  readonly code = 'SCHEMA_ERROR';
  readonly kind = 'schema' as const;

  constructor(
    message: string,
    public readonly issues: readonly { message: string; path: string }[],
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class ClientClosedError extends BankingClientError {
  readonly code = 'CLIENT_CLOSED';
  readonly kind = 'client_closed' as const;

  constructor(operation: BankingOperation, options?: ErrorOptions) {
    super(`Cannot ${operation}: banking client is closed`, options);
  }
}

export type BankingError = ValidationError | TransportError | HttpStatusError | SchemaError | ClientClosedError;
