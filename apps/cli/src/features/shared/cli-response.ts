import { ExitCodes, type ExitCode } from './exit-codes.js';

export interface CLIResponseMetadata {
  [key: string]: unknown;

  /** Command execution duration in milliseconds */
  duration_ms?: number | undefined;

  /** CLI version */
  version?: string | undefined;
}

/**
 * Envelope printed in --json mode, on success and on failure.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;
  /** ISO 8601 */
  timestamp: string;
  /** Only present on success */
  data?: T;
  /** Only present on failure */
  error?:
    | {
        /** Machine-readable error code */
        code: string;
        details?: unknown;
        message: string;
        /** Only when NODE_ENV=development */
        stack?: string | undefined;
      }
    | undefined;
  metadata?: CLIResponseMetadata | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: CLIResponseMetadata): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(
  command: string,
  error: Error,
  code: string,
  details?: unknown
): CLIResponse<never> {
  const errorObj: { code: string; details?: unknown; message: string; stack?: string | undefined } = {
    code,
    message: error.message,
  };

  if (details !== undefined) {
    errorObj.details = details;
  }

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

const ERROR_CODES: Readonly<Record<ExitCode, string>> = {
  [ExitCodes.SUCCESS]: 'SUCCESS',
  [ExitCodes.GENERAL_ERROR]: 'GENERAL_ERROR',
  [ExitCodes.INVALID_ARGS]: 'INVALID_ARGS',
  [ExitCodes.AUTHENTICATION_ERROR]: 'AUTHENTICATION_ERROR',
  [ExitCodes.NOT_FOUND]: 'NOT_FOUND',
  [ExitCodes.RATE_LIMIT]: 'RATE_LIMIT',
  [ExitCodes.NETWORK_ERROR]: 'NETWORK_ERROR',
  [ExitCodes.VALIDATION_ERROR]: 'VALIDATION_ERROR',
  [ExitCodes.TIMEOUT]: 'TIMEOUT',
  [ExitCodes.CONFIG_ERROR]: 'CONFIG_ERROR',
};

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return ERROR_CODES[exitCode];
}
