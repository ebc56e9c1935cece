import { HttpClient } from '@bankwire/http';
import { getLogger, type Logger } from '@bankwire/logger';
import { err, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { AsyncLock } from './async-lock.js';
import { AuthState } from './auth-state.js';
import { createBankingClientConfig, type BankingClientConfig } from './config.js';
import { ClientClosedError, ValidationError, type BankingError, type BankingOperation } from './errors.js';
import {
  buildAuthenticateRequest,
  buildGetAccountBalanceRequest,
  buildGetAccountsRequest,
  buildTransferRequest,
  buildValidateAccountRequest,
  type WireRequest,
} from './request-builder.js';
import {
  AccountBalanceResponseSchema,
  AccountListResponseSchema,
  AuthTokenResponseSchema,
  mapTransportError,
  TransferResponseSchema,
  ValidateAccountResponseSchema,
} from './response-mapper.js';
import { TransferRequest, type AmountInput } from './transfer-request.js';
import type { Account, AccountBalance, BankingClientOptions, TransferResult } from './types.js';

export const DEFAULT_USERNAME = 'testuser';
export const DEFAULT_PASSWORD = 'password';

/**
 * Client for the remote banking service.
 *
 * Every operation resolves to a `Result`; failures are logged here and returned,
 * never thrown. Calls on one instance run one at a time, in call order.
 */
export class BankingClient {
  readonly config: BankingClientConfig;

  private readonly http: HttpClient;
  private readonly auth = new AuthState();
  private readonly lock = new AsyncLock();
  private readonly logger: Logger;
  private closed = false;

  constructor(options: BankingClientOptions = {}) {
    this.config = createBankingClientConfig(options.config);
    this.logger = options.logger ?? getLogger('BankingClient');

    this.http = new HttpClient(
      {
        baseUrl: this.config.baseUrl,
        clientName: 'banking',
        hooks: options.hooks,
        logger: options.logger,
        pool: options.pool,
        retry: {
          maxRetries: this.config.maxRetries,
          backoffFactorMs: this.config.backoffFactorMs,
          maxBackoffMs: this.config.maxBackoffMs,
          retryableStatusCodes: this.config.retryableStatusCodes,
          retryableMethods: this.config.retryableMethods,
        },
        timeout: this.config.timeoutMs,
      },
      options.effects
    );

    this.logger.info(`Banking client initialized with base URL: ${this.config.baseUrl}`);
  }

  get isAuthenticated(): boolean {
    return this.auth.isAuthenticated;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Exchange credentials for a bearer token. A failed attempt keeps any
   * previously held token.
   */
  async authenticate(username = DEFAULT_USERNAME, password = DEFAULT_PASSWORD): Promise<Result<void, BankingError>> {
    return this.run('authenticate', async (): Promise<Result<void, BankingError>> => {
      this.logger.info(`Attempting authentication for user: ${username}`);
      const result = await this.send(buildAuthenticateRequest(username, password), AuthTokenResponseSchema, 'authenticate');
      return result.map(({ token }) => {
        this.auth.setToken(token);
        this.logger.info('Authentication successful');
      });
    });
  }

  /**
   * Drop the bearer token. Later calls go out unauthenticated.
   */
  logout(): void {
    this.auth.clear();
  }

  /**
   * Whether the account exists and is active. Sends the bearer token whenever one is held.
   */
  async validateAccount(accountId: string): Promise<Result<boolean, BankingError>> {
    return this.run('validateAccount', async (): Promise<Result<boolean, BankingError>> => {
      if (accountId.trim() === '') {
        return err(new ValidationError('Account id must not be empty', 'accountId'));
      }

      this.logger.info(`Validating account: ${accountId}`);
      const result = await this.send(
        buildValidateAccountRequest(accountId, this.auth.current),
        ValidateAccountResponseSchema,
        'validateAccount'
      );
      if (result.isOk()) {
        this.logger.info(`Account ${accountId} validation result: ${result.value}`);
      }
      return result;
    });
  }

  async transferFunds(
    fromAccount: string,
    toAccount: string,
    amount: AmountInput,
    useAuth = false
  ): Promise<Result<TransferResult, BankingError>> {
    return this.run('transferFunds', async (): Promise<Result<TransferResult, BankingError>> => {
      const transfer = TransferRequest.create(fromAccount, toAccount, amount);
      if (transfer.isErr()) {
        return err(transfer.error);
      }

      this.logger.info(
        `Initiating transfer: ${transfer.value.fromAccount} -> ${transfer.value.toAccount}, Amount: ${transfer.value.amount.toFixed()}`
      );
      const result = await this.send(
        buildTransferRequest(transfer.value, this.auth.current, useAuth),
        TransferResponseSchema,
        'transferFunds'
      );
      if (result.isOk()) {
        this.logger.info(
          `Transfer successful - TransactionId: ${result.value.transactionId}, Status: ${result.value.status}`
        );
      }
      return result;
    });
  }

  async getAccounts(useAuth = false): Promise<Result<Account[], BankingError>> {
    return this.run('getAccounts', async (): Promise<Result<Account[], BankingError>> => {
      this.logger.info('Fetching accounts list');
      const result = await this.send(
        buildGetAccountsRequest(this.auth.current, useAuth),
        AccountListResponseSchema,
        'getAccounts'
      );
      if (result.isOk()) {
        this.logger.info(`Retrieved ${result.value.length} accounts`);
      }
      return result;
    });
  }

  async getAccountBalance(accountId: string, useAuth = false): Promise<Result<AccountBalance, BankingError>> {
    return this.run('getAccountBalance', async (): Promise<Result<AccountBalance, BankingError>> => {
      if (accountId.trim() === '') {
        return err(new ValidationError('Account id must not be empty', 'accountId'));
      }

      this.logger.info(`Fetching balance for account: ${accountId}`);
      const result = await this.send(
        buildGetAccountBalanceRequest(accountId, this.auth.current, useAuth),
        AccountBalanceResponseSchema,
        'getAccountBalance'
      );
      if (result.isOk()) {
        this.logger.info(`Balance retrieved for ${accountId}: ${result.value.balance?.toFixed() ?? 'N/A'}`);
      }
      return result;
    });
  }

  /**
   * Release pooled connections. Safe to call more than once; operations started
   * afterwards return ClientClosedError.
   */
  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.logger.info('Banking client session closed');
    }
    await this.http.close();
  }

  private async run<T>(
    operation: BankingOperation,
    task: () => Promise<Result<T, BankingError>>
  ): Promise<Result<T, BankingError>> {
    if (this.closed) {
      return this.failed(operation, new ClientClosedError(operation));
    }

    return this.lock.run(async (): Promise<Result<T, BankingError>> => {
      // close() may have run while this call waited for the lock
      if (this.closed) {
        return this.failed(operation, new ClientClosedError(operation));
      }

      const result = await task();
      if (result.isErr()) {
        return this.failed(operation, result.error);
      }
      return result;
    });
  }

  private async send<T>(
    request: WireRequest,
    schema: ZodType<T, ZodTypeDef, unknown>,
    operation: BankingOperation
  ): Promise<Result<T, BankingError>> {
    const result = await this.http.request(request.path, {
      body: request.body,
      headers: request.headers,
      method: request.method,
      schema,
    });
    return result.mapErr((error) => mapTransportError(error, operation));
  }

  private failed(operation: BankingOperation, error: BankingError): Result<never, BankingError> {
    this.logger.error(
      { code: error.code, kind: error.kind, operation, ...errorDetail(error) },
      `${operation} failed: ${error.message}`
    );
    return err(error);
  }
}

function errorDetail(error: BankingError): Record<string, unknown> {
  switch (error.kind) {
    case 'http_status':
      return { statusCode: error.statusCode, responseBody: error.responseBody };
    case 'transport':
      return { attempts: error.attempts, lastStatus: error.lastStatus, timedOut: error.timedOut };
    case 'schema':
      return { issues: error.issues };
    case 'validation':
      return { field: error.field };
    case 'client_closed':
      return {};
  }
}

/**
 * Run `fn` with a fresh client and close it afterwards, whether `fn` resolves or throws.
 */
export async function withBankingClient<T>(
  options: BankingClientOptions,
  fn: (client: BankingClient) => Promise<T>
): Promise<T> {
  const client = new BankingClient(options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
