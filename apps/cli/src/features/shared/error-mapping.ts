import type { BankingError } from '@bankwire/banking-client';

import { ExitCodes, type ExitCode } from './exit-codes.js';

function exitCodeForStatus(status: number | undefined): ExitCode | undefined {
  switch (status) {
    case 401:
    case 403:
      return ExitCodes.AUTHENTICATION_ERROR;
    case 404:
      return ExitCodes.NOT_FOUND;
    case 429:
      return ExitCodes.RATE_LIMIT;
    default:
      return undefined;
  }
}

export function exitCodeForError(error: BankingError): ExitCode {
  switch (error.kind) {
    case 'validation':
      return ExitCodes.VALIDATION_ERROR;
    case 'transport':
      if (error.timedOut) {
        return ExitCodes.TIMEOUT;
      }
      return exitCodeForStatus(error.lastStatus) ?? ExitCodes.NETWORK_ERROR;
    case 'http_status':
      return exitCodeForStatus(error.statusCode) ?? ExitCodes.GENERAL_ERROR;
    case 'schema':
    case 'client_closed':
      return ExitCodes.GENERAL_ERROR;
  }
}

/**
 * A failed authenticate is a credentials problem unless the service was unreachable.
 */
export function exitCodeForAuthError(error: BankingError): ExitCode {
  return error.kind === 'transport' ? exitCodeForError(error) : ExitCodes.AUTHENTICATION_ERROR;
}
