import type { FetchFn, FetchInit } from '@bankwire/http';
import { createLogger, type LogEntry } from '@bankwire/logger';
import { describe, expect, it, vi } from 'vitest';

import { BankingClient, withBankingClient } from '../client.js';
import type { BankingClientConfigInput } from '../config.js';
import { ClientClosedError, HttpStatusError, SchemaError, TransportError, ValidationError } from '../errors.js';

type Reply = { status: number; body?: unknown } | Error;

/**
 * Fetch stub answering with the given replies in order; the last one repeats.
 */
function replies(...items: Reply[]): FetchFn {
  let index = 0;
  return (_url: string, _init: FetchInit) => {
    const next = items[Math.min(index, items.length - 1)];
    index++;
    if (next === undefined) {
      return Promise.reject(new Error('no reply configured'));
    }
    if (next instanceof Error) {
      return Promise.reject(next);
    }
    const body = next.body === undefined ? null : typeof next.body === 'string' ? next.body : JSON.stringify(next.body);
    return Promise.resolve(new Response(body, { status: next.status }));
  };
}

function createBankingClient(fetchImpl: FetchFn, config: BankingClientConfigInput = {}) {
  const entries: LogEntry[] = [];
  const logger = createLogger('BankingClient', {
    level: 'info',
    sinks: [{ write: (entry) => entries.push(entry), flush: () => undefined }],
  });
  const effects = {
    delay: vi.fn((_ms: number) => Promise.resolve()),
    fetch: vi.fn(fetchImpl),
    log: vi.fn(),
    now: () => 0,
  };

  const client = new BankingClient({
    config: { baseUrl: 'https://bank.example.com', ...config },
    effects,
    logger,
  });

  return { client, effects, entries };
}

function requestAt(fetch: { mock: { calls: Parameters<FetchFn>[] } }, index: number): { init: FetchInit; url: string } {
  const call = fetch.mock.calls[index];
  if (!call) {
    throw new Error(`fetch call ${index} was not made`);
  }
  return { url: call[0], init: call[1] };
}

const BASE_HEADERS = { Accept: 'application/json', 'User-Agent': 'bankwire/1.0.0' };

describe('BankingClient - authentication', () => {
  it('should store the token and attach it to later calls', async () => {
    const { client, effects } = createBankingClient(
      replies({ status: 200, body: { token: 'abc' } }, { status: 200, body: { valid: true } })
    );

    const auth = await client.authenticate();
    const valid = await client.validateAccount('ACC1000');

    expect(auth.isOk()).toBe(true);
    expect(client.isAuthenticated).toBe(true);
    expect(valid._unsafeUnwrap()).toBe(true);

    const login = requestAt(effects.fetch, 0);
    expect(login.url).toBe('https://bank.example.com/authToken');
    expect(login.init.method).toBe('POST');
    expect(login.init.body).toBe('{"username":"testuser","password":"password"}');
    expect(login.init.headers).toEqual({ ...BASE_HEADERS, 'Content-Type': 'application/json' });

    const validate = requestAt(effects.fetch, 1);
    expect(validate.url).toBe('https://bank.example.com/accounts/validate/ACC1000');
    expect(validate.init.headers).toEqual({
      ...BASE_HEADERS,
      'Content-Type': 'application/json',
      Authorization: 'Bearer abc',
    });
  });

  it('should fail with SchemaError and stay anonymous when no token comes back', async () => {
    const { client } = createBankingClient(replies({ status: 200, body: { message: 'welcome' } }));

    const result = await client.authenticate('testuser', 'test-secret');

    expect(client.isAuthenticated).toBe(false);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(SchemaError);
    expect(error.message).toBe(
      'authenticate returned an unexpected response: Response validation failed: token: Required'
    );
  });

  it('should keep the previous token when a later authenticate fails', async () => {
    const { client, effects } = createBankingClient(
      replies(
        { status: 200, body: { token: 'abc' } },
        { status: 401, body: 'denied' },
        { status: 200, body: { valid: false } }
      )
    );

    await client.authenticate();
    const second = await client.authenticate('testuser', 'wrong-password');
    await client.validateAccount('ACC2000');

    const error = second._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(HttpStatusError);
    if (error instanceof HttpStatusError) {
      expect(error.statusCode).toBe(401);
      expect(error.responseBody).toBe('denied');
    }
    expect(effects.fetch).toHaveBeenCalledTimes(3);
    expect(requestAt(effects.fetch, 2).init.headers['Authorization']).toBe('Bearer abc');
  });

  it('should go out anonymous after logout', async () => {
    const { client, effects } = createBankingClient(
      replies({ status: 200, body: { token: 'abc' } }, { status: 200, body: { valid: true } })
    );

    await client.authenticate();
    client.logout();
    await client.validateAccount('ACC1000');

    expect(client.isAuthenticated).toBe(false);
    expect(requestAt(effects.fetch, 1).init.headers).toEqual({ ...BASE_HEADERS, 'Content-Type': 'application/json' });
  });
});

describe('BankingClient - transfers', () => {
  it('should map a successful transfer response', async () => {
    const { client, effects } = createBankingClient(
      replies({
        status: 200,
        body: { transactionId: 't1', status: 'SUCCESS', message: 'ok', fromAccount: 'A', toAccount: 'B', amount: 10.5 },
      })
    );

    const result = await client.transferFunds('A', 'B', 10.5);

    const transfer = result._unsafeUnwrap();
    expect(transfer.transactionId).toBe('t1');
    expect(transfer.status).toBe('SUCCESS');
    expect(transfer.message).toBe('ok');
    expect(transfer.fromAccount).toBe('A');
    expect(transfer.toAccount).toBe('B');
    expect(transfer.amount.toNumber()).toBe(10.5);

    const request = requestAt(effects.fetch, 0);
    expect(request.url).toBe('https://bank.example.com/transfer');
    expect(request.init.body).toBe('{"fromAccount":"A","toAccount":"B","amount":10.5}');
  });

  it('should not send the token unless useAuth is set', async () => {
    const { client, effects } = createBankingClient(
      replies({ status: 200, body: { token: 'abc' } }, { status: 200, body: { transactionId: 't2' } })
    );

    await client.authenticate();
    await client.transferFunds('ACC1000', 'ACC1001', 100);
    await client.transferFunds('ACC1002', 'ACC1003', '250.50', true);

    expect(requestAt(effects.fetch, 1).init.headers).toEqual({ ...BASE_HEADERS, 'Content-Type': 'application/json' });
    expect(requestAt(effects.fetch, 2).init.headers['Authorization']).toBe('Bearer abc');
  });

  it.each([
    ['ACC1000', 'ACC1001', 0, 'amount'],
    ['ACC1000', 'ACC1001', -10, 'amount'],
    ['', 'ACC1001', 10, 'fromAccount'],
    ['ACC1000', '', 10, 'toAccount'],
    ['ACC1000', 'ACC1001', '1e-400', 'amount'],
    ['ACC1000', 'ACC1001', '1e400', 'amount'],
  ])('should reject %s -> %s (%s) before any request', async (from, to, amount, field) => {
    const { client, effects } = createBankingClient(replies({ status: 200, body: {} }));

    const result = await client.transferFunds(from, to, amount);

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.field).toBe(field);
    }
    expect(effects.fetch).not.toHaveBeenCalled();
  });

  it('should report retry exhaustion as TransportError', async () => {
    const { client, effects } = createBankingClient(replies({ status: 500, body: 'boom' }), { maxRetries: 2 });

    const result = await client.transferFunds('A', 'B', 10);

    expect(effects.fetch).toHaveBeenCalledTimes(3);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.attempts).toBe(3);
      expect(error.lastStatus).toBe(500);
      expect(error.timedOut).toBe(false);
    }
  });
});

describe('BankingClient - queries', () => {
  it('should retry transient failures with exponential backoff', async () => {
    const { client, effects } = createBankingClient(
      replies({ status: 503 }, { status: 503 }, { status: 200, body: [{ accountId: 'ACC1000', accountHolder: 'Test Holder' }] })
    );

    const result = await client.getAccounts();

    expect(result._unsafeUnwrap()).toEqual([{ accountId: 'ACC1000', accountHolder: 'Test Holder' }]);
    expect(effects.fetch).toHaveBeenCalledTimes(3);
    expect(effects.delay.mock.calls.map((call) => call[0])).toEqual([1000, 2000]);
    expect(requestAt(effects.fetch, 0).init.headers).toEqual(BASE_HEADERS);
  });

  it('should fail with SchemaError when the account list is not an array', async () => {
    const { client } = createBankingClient(replies({ status: 200, body: { accounts: [] } }));

    const result = await client.getAccounts();

    expect(result._unsafeUnwrapErr().message).toBe(
      'getAccounts returned an unexpected response: Response validation failed: Expected array, received object'
    );
  });

  it('should report an unreachable service as TransportError', async () => {
    const { client } = createBankingClient(replies(new Error('ECONNREFUSED')), { maxRetries: 0 });

    const result = await client.getAccounts();

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe('getAccounts failed: Network error: ECONNREFUSED');
  });

  it('should fetch a balance', async () => {
    const { client, effects } = createBankingClient(
      replies({ status: 200, body: { accountId: 'ACC1000', balance: '1500.25', currency: 'USD' } })
    );

    const result = await client.getAccountBalance('ACC1000');

    const balance = result._unsafeUnwrap();
    expect(balance.accountId).toBe('ACC1000');
    expect(balance.balance?.toFixed()).toBe('1500.25');
    expect(balance.currency).toBe('USD');
    expect(requestAt(effects.fetch, 0).url).toBe('https://bank.example.com/accounts/balance/ACC1000');
  });

  it('should map a missing account to HttpStatusError without retrying', async () => {
    const { client, effects } = createBankingClient(replies({ status: 404, body: 'Account not found' }));

    const result = await client.getAccountBalance('ACC9999');

    expect(effects.fetch).toHaveBeenCalledOnce();
    expect(result._unsafeUnwrapErr().message).toBe('getAccountBalance failed: HTTP 404: Account not found');
  });

  it('should reject empty account ids before any request', async () => {
    const { client, effects } = createBankingClient(replies({ status: 200, body: {} }));

    const validate = await client.validateAccount('');
    const balance = await client.getAccountBalance('  ');

    expect(validate._unsafeUnwrapErr()).toBeInstanceOf(ValidationError);
    expect(balance._unsafeUnwrapErr()).toBeInstanceOf(ValidationError);
    expect(effects.fetch).not.toHaveBeenCalled();
  });
});

describe('BankingClient - lifecycle', () => {
  it('should return ClientClosedError after close without touching the network', async () => {
    const { client, effects } = createBankingClient(replies({ status: 200, body: {} }));

    await client.close();
    await client.close();
    const transfer = await client.transferFunds('ACC1000', 'ACC1001', 0);
    const accounts = await client.getAccounts();

    expect(client.isClosed).toBe(true);
    expect(transfer._unsafeUnwrapErr()).toBeInstanceOf(ClientClosedError);
    expect(transfer._unsafeUnwrapErr().message).toBe('Cannot transferFunds: banking client is closed');
    expect(accounts._unsafeUnwrapErr()).toBeInstanceOf(ClientClosedError);
    expect(effects.fetch).not.toHaveBeenCalled();
  });

  it('should run overlapping calls one at a time', async () => {
    const pending: ((response: Response) => void)[] = [];
    const { client, effects } = createBankingClient(
      () =>
        new Promise<Response>((resolve) => {
          pending.push(resolve);
        })
    );

    const first = client.getAccounts();
    const second = client.getAccounts();

    await vi.waitFor(() => expect(effects.fetch).toHaveBeenCalledTimes(1));
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(effects.fetch).toHaveBeenCalledTimes(1);

    pending[0]?.(new Response('[]', { status: 200 }));
    expect((await first).isOk()).toBe(true);

    await vi.waitFor(() => expect(effects.fetch).toHaveBeenCalledTimes(2));
    pending[1]?.(new Response('[{"accountId":"ACC1001"}]', { status: 200 }));
    expect((await second)._unsafeUnwrap()).toEqual([{ accountId: 'ACC1001' }]);
  });

  it('should log every failure at error level', async () => {
    const { client, entries } = createBankingClient(replies({ status: 200, body: {} }));

    await client.transferFunds('ACC1000', 'ACC1001', 0);

    const errors = entries.filter((entry) => entry.level === 'error');
    expect(errors).toHaveLength(1);
    expect(errors[0]?.msg).toBe('transferFunds failed: Amount must be greater than 0, got 0');
    expect(errors[0]?.context).toEqual({
      code: 'VALIDATION_ERROR',
      kind: 'validation',
      operation: 'transferFunds',
      field: 'amount',
    });
  });

  it('should close the client when the callback throws', async () => {
    const seen: { client?: BankingClient | undefined } = {};

    await expect(
      withBankingClient({ config: { baseUrl: 'https://bank.example.com' } }, (client) => {
        seen.client = client;
        return Promise.reject(new Error('callback failed'));
      })
    ).rejects.toThrow('callback failed');

    expect(seen.client?.isClosed).toBe(true);
  });
});
