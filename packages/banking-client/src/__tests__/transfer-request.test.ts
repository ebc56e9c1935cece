import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { ValidationError } from '../errors.js';
import { TransferRequest } from '../transfer-request.js';

describe('TransferRequest.create', () => {
  it('should accept a positive number amount', () => {
    const result = TransferRequest.create('ACC1000', 'ACC1001', 100);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.amount.toFixed()).toBe('100');
      expect(result.value.toJSON()).toEqual({ fromAccount: 'ACC1000', toAccount: 'ACC1001', amount: 100 });
    }
  });

  it('should accept numeric strings and Decimal instances', () => {
    const fromString = TransferRequest.create('ACC1002', 'ACC1003', ' 250.50 ');
    const fromDecimal = TransferRequest.create('ACC1002', 'ACC1003', new Decimal('0.01'));

    expect(fromString._unsafeUnwrap().toJSON().amount).toBe(250.5);
    expect(fromDecimal._unsafeUnwrap().amount.toFixed()).toBe('0.01');
  });

  it.each([
    [0, 'Amount must be greater than 0, got 0'],
    [-5, 'Amount must be greater than 0, got -5'],
    ['-0.5', 'Amount must be greater than 0, got -0.5'],
    [Number.NaN, 'Amount must be a finite number, got NaN'],
    [Number.POSITIVE_INFINITY, 'Amount must be a finite number, got Infinity'],
    ['abc', 'Amount must be a finite number, got abc'],
    ['', 'Amount must be a finite number, got '],
  ])('should reject amount %s', (amount, message) => {
    const result = TransferRequest.create('ACC1000', 'ACC1001', amount);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.field).toBe('amount');
      expect(result.error.message).toBe(message);
    }
  });

  it.each([
    ['1e-400', 'Amount cannot be sent as a JSON number without loss, got 1e-400'],
    ['1e400', 'Amount cannot be sent as a JSON number without loss, got 1e+400'],
    ['0.1000000000000000000001', 'Amount cannot be sent as a JSON number without loss, got 0.1000000000000000000001'],
  ])('should reject amount %s that a JSON number cannot carry exactly', (amount, message) => {
    const result = TransferRequest.create('ACC1000', 'ACC1001', amount);

    expect(result._unsafeUnwrapErr().field).toBe('amount');
    expect(result._unsafeUnwrapErr().message).toBe(message);
  });

  it('should reject blank account ids', () => {
    const noSource = TransferRequest.create('', 'ACC1001', 10);
    const noDestination = TransferRequest.create('ACC1000', '   ', 10);

    expect(noSource._unsafeUnwrapErr().field).toBe('fromAccount');
    expect(noSource._unsafeUnwrapErr().message).toBe('Source account must not be empty');
    expect(noDestination._unsafeUnwrapErr().field).toBe('toAccount');
    expect(noDestination._unsafeUnwrapErr().message).toBe('Destination account must not be empty');
  });

  it('should check the amount before the account ids', () => {
    const result = TransferRequest.create('', '', 0);

    expect(result._unsafeUnwrapErr().field).toBe('amount');
  });
});
