import type { BankingClient, BankingError, BankingErrorKind, TransferResult } from '@bankwire/banking-client';
import type { Result } from 'neverthrow';

import type { OutputManager } from '../shared/output.js';

export type StepOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: { code: string; kind: BankingErrorKind; message: string } };

export interface TransferSummary {
  transactionId: string;
  status: string;
  message: string;
  fromAccount: string;
  toAccount: string;
  amount: string;
}

export interface DemoReport {
  basicTransfer: StepOutcome<TransferSummary>;
  authentication: StepOutcome<true>;
  /** Absent when authentication failed */
  authenticatedTransfer?: StepOutcome<TransferSummary> | undefined;
  validations: { accountId: string; outcome: StepOutcome<boolean> }[];
  accounts: StepOutcome<{ shown: { accountHolder: string; accountId: string }[]; total: number }>;
  balance: StepOutcome<{ accountId: string; balance: string; currency: string }>;
  invalidTransfer: StepOutcome<TransferSummary>;
}

export interface DemoCredentials {
  username?: string | undefined;
  password?: string | undefined;
}

export const DEMO_VALIDATION_ACCOUNTS = ['ACC1000', 'ACC2000', 'ACC9999'] as const;

const SHOWN_ACCOUNTS = 5;

function toOutcome<T, U>(result: Result<T, BankingError>, map: (value: T) => U): StepOutcome<U> {
  if (result.isErr()) {
    return { ok: false, error: { code: result.error.code, kind: result.error.kind, message: result.error.message } };
  }
  return { ok: true, value: map(result.value) };
}

function summarizeTransfer(transfer: TransferResult): TransferSummary {
  return {
    transactionId: transfer.transactionId,
    status: transfer.status,
    message: transfer.message,
    fromAccount: transfer.fromAccount,
    toAccount: transfer.toAccount,
    amount: transfer.amount.toFixed(),
  };
}

/**
 * Scripted walkthrough of every operation against a running service.
 * Step failures are reported and the walkthrough continues.
 */
export async function runDemo(
  client: BankingClient,
  output: OutputManager,
  credentials: DemoCredentials = {}
): Promise<DemoReport> {
  output.step('[1] Basic Transfer (No Authentication)');
  const basicTransfer = toOutcome(await client.transferFunds('ACC1000', 'ACC1001', 100), summarizeTransfer);
  if (basicTransfer.ok) {
    output.success(`Transaction ID: ${basicTransfer.value.transactionId}`);
    output.success(`Status: ${basicTransfer.value.status}`);
    output.success(`Message: ${basicTransfer.value.message}`);
  } else {
    output.failure('Transfer failed');
  }

  output.step('[2] Transfer with Bearer Authentication');
  const authentication = toOutcome(
    await client.authenticate(credentials.username, credentials.password),
    (): true => true
  );
  let authenticatedTransfer: StepOutcome<TransferSummary> | undefined;
  if (authentication.ok) {
    output.success('Authentication successful');
    authenticatedTransfer = toOutcome(
      await client.transferFunds('ACC1002', 'ACC1003', '250.50', true),
      summarizeTransfer
    );
    if (authenticatedTransfer.ok) {
      output.success(`Transaction ID: ${authenticatedTransfer.value.transactionId}`);
      output.success(`Status: ${authenticatedTransfer.value.status}`);
    } else {
      output.failure('Transfer failed');
    }
  } else {
    output.failure('Authentication failed');
  }

  output.step('[3] Account Validation');
  const validations: DemoReport['validations'] = [];
  for (const accountId of DEMO_VALIDATION_ACCOUNTS) {
    const outcome = toOutcome(await client.validateAccount(accountId), (valid) => valid);
    validations.push({ accountId, outcome });
    if (outcome.ok && outcome.value) {
      output.success(`Valid: ${accountId}`);
    } else {
      output.failure(`Invalid: ${accountId}`);
    }
  }

  output.step('[4] Retrieve All Accounts');
  const accounts = toOutcome(await client.getAccounts(), (list) => ({
    shown: list.slice(0, SHOWN_ACCOUNTS).map((account) => ({
      accountId: account.accountId ?? 'N/A',
      accountHolder: account.accountHolder ?? 'N/A',
    })),
    total: list.length,
  }));
  if (accounts.ok) {
    output.success(`Found ${accounts.value.total} accounts:`);
    for (const account of accounts.value.shown) {
      output.log(`  - ${account.accountId}: ${account.accountHolder}`);
    }
  } else {
    output.failure('Failed to retrieve accounts');
  }

  output.step('[5] Get Account Balance');
  const balance = toOutcome(await client.getAccountBalance('ACC1000'), (value) => ({
    accountId: value.accountId ?? 'N/A',
    balance: value.balance?.toFixed() ?? 'N/A',
    currency: value.currency ?? 'N/A',
  }));
  if (balance.ok) {
    output.success(`Account: ${balance.value.accountId}`);
    output.success(`Balance: $${balance.value.balance}`);
  } else {
    output.failure('Failed to retrieve balance');
  }

  output.step('[6] Error Handling Demo (Invalid Account)');
  const invalidTransfer = toOutcome(await client.transferFunds('ACC9999', 'ACC1001', 50), summarizeTransfer);
  if (invalidTransfer.ok) {
    output.warn(`Transfer from ACC9999 was accepted: ${invalidTransfer.value.transactionId}`);
  } else {
    output.success(`Error handled: ${invalidTransfer.error.message}`);
  }

  return {
    basicTransfer,
    authentication,
    ...(authenticatedTransfer ? { authenticatedTransfer } : {}),
    validations,
    accounts,
    balance,
    invalidTransfer,
  };
}
