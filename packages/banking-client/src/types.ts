import type { HttpClientHooks, HttpEffects, PoolOptions } from '@bankwire/http';
import type { Logger } from '@bankwire/logger';
import type { Decimal } from 'decimal.js';

import type { BankingClientConfigInput } from './config.js';

export interface TransferResult {
  transactionId: string;
  status: string;
  message: string;
  fromAccount: string;
  toAccount: string;
  amount: Decimal;
}

/**
 * One entry of the account list. Fields beyond these are kept as sent.
 */
export interface Account {
  accountId?: string | undefined;
  accountHolder?: string | undefined;
  [key: string]: unknown;
}

export interface AccountBalance {
  accountId?: string | undefined;
  balance?: Decimal | undefined;
  currency?: string | undefined;
  [key: string]: unknown;
}

export interface BankingClientOptions {
  config?: BankingClientConfigInput | undefined;
  /** Defaults to `getLogger('BankingClient')`. Also used by the transport. */
  logger?: Logger | undefined;
  hooks?: HttpClientHooks | undefined;
  pool?: PoolOptions | undefined;
  /** Transport effects, replaced in tests. */
  effects?: Partial<HttpEffects> | undefined;
}
