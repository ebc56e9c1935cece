import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from '../cli-response.js';
import { ExitCodes } from '../exit-codes.js';

describe('cli-response', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
  });

  describe('createSuccessResponse', () => {
    it('should wrap data in a success envelope', () => {
      expect(createSuccessResponse('validate', { valid: true })).toEqual({
        success: true,
        command: 'validate',
        timestamp: '2024-01-01T00:00:00.000Z',
        data: { valid: true },
      });
    });

    it('should attach metadata when given', () => {
      const response = createSuccessResponse('accounts', [], { duration_ms: 12, count: 0 });

      expect(response.metadata).toEqual({ duration_ms: 12, count: 0 });
    });
  });

  describe('createErrorResponse', () => {
    it('should build an error envelope without data', () => {
      vi.stubEnv('NODE_ENV', 'test');

      const response = createErrorResponse('balance', new Error('not found'), 'NOT_FOUND', { statusCode: 404 });

      expect(response).toEqual({
        success: false,
        command: 'balance',
        timestamp: '2024-01-01T00:00:00.000Z',
        error: { code: 'NOT_FOUND', message: 'not found', details: { statusCode: 404 } },
      });
    });

    it('should omit details when none are given', () => {
      vi.stubEnv('NODE_ENV', 'test');

      const response = createErrorResponse('demo', new Error('boom'), 'GENERAL_ERROR');

      expect(response.error).toEqual({ code: 'GENERAL_ERROR', message: 'boom' });
    });

    it('should include the stack in development', () => {
      vi.stubEnv('NODE_ENV', 'development');
      const error = new Error('boom');

      const response = createErrorResponse('demo', error, 'GENERAL_ERROR');

      expect(response.error?.stack).toBe(error.stack);
    });
  });

  describe('exitCodeToErrorCode', () => {
    it('should name every exit code', () => {
      expect(exitCodeToErrorCode(ExitCodes.SUCCESS)).toBe('SUCCESS');
      expect(exitCodeToErrorCode(ExitCodes.INVALID_ARGS)).toBe('INVALID_ARGS');
      expect(exitCodeToErrorCode(ExitCodes.AUTHENTICATION_ERROR)).toBe('AUTHENTICATION_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.NETWORK_ERROR)).toBe('NETWORK_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.TIMEOUT)).toBe('TIMEOUT');
      expect(exitCodeToErrorCode(ExitCodes.CONFIG_ERROR)).toBe('CONFIG_ERROR');
    });
  });
});
