import { describe, expect, it } from 'vitest';

import { DemoCommandOptionsSchema, GlobalOptionsSchema, TransferCommandOptionsSchema } from '../schemas.js';

describe('GlobalOptionsSchema', () => {
  it('should parse numeric flags from strings', () => {
    const result = GlobalOptionsSchema.parse({ timeout: ' 2.5 ', maxRetries: '0' });

    expect(result).toEqual({ timeout: 2.5, maxRetries: 0 });
  });

  it('should reject a non-positive timeout', () => {
    const result = GlobalOptionsSchema.safeParse({ timeout: '0' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('--timeout must be a positive number of seconds');
  });

  it('should reject a fractional retry count', () => {
    const result = GlobalOptionsSchema.safeParse({ maxRetries: '1.5' });

    expect(result.error?.issues[0]?.message).toBe('--max-retries must be a whole number');
  });

  it('should reject an invalid base URL', () => {
    const result = GlobalOptionsSchema.safeParse({ baseUrl: 'localhost' });

    expect(result.error?.issues[0]?.message).toBe('--base-url must be a valid URL');
  });
});

describe('TransferCommandOptionsSchema', () => {
  it('should trim the account ids and keep the amount as text', () => {
    const result = TransferCommandOptionsSchema.parse({ from: ' ACC1000 ', to: 'ACC1001', amount: '250.50', auth: true });

    expect(result).toEqual({ from: 'ACC1000', to: 'ACC1001', amount: '250.50', auth: true });
  });

  it('should reject a blank source account', () => {
    const result = TransferCommandOptionsSchema.safeParse({ from: '   ', to: 'ACC1001', amount: '1' });

    expect(result.error?.issues[0]?.message).toBe('--from must not be empty');
  });
});

describe('DemoCommandOptionsSchema', () => {
  it('should reject an empty username', () => {
    const result = DemoCommandOptionsSchema.safeParse({ username: '' });

    expect(result.error?.issues[0]?.message).toBe('--username must not be empty');
  });
});
