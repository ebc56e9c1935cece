import type { HttpMethod } from '@bankwire/http';

import type { AuthMode } from './auth-state.js';
import type { TransferRequest } from './transfer-request.js';

export interface WireRequest {
  method: HttpMethod;
  path: string;
  headers: Record<string, string>;
  body?: object | undefined;
}

const JSON_CONTENT_TYPE = { 'Content-Type': 'application/json' } as const;

/**
 * Content-Type, plus the bearer token when one is held.
 */
export function authHeaders(mode: AuthMode): Record<string, string> {
  if (mode.kind === 'bearer') {
    return { ...JSON_CONTENT_TYPE, Authorization: `Bearer ${mode.token}` };
  }
  return { ...JSON_CONTENT_TYPE };
}

export function buildAuthenticateRequest(username: string, password: string): WireRequest {
  return {
    method: 'POST',
    path: '/authToken',
    headers: { ...JSON_CONTENT_TYPE },
    body: { username, password },
  };
}

// No useAuth flag: validation always carries the token when one is held
export function buildValidateAccountRequest(accountId: string, auth: AuthMode): WireRequest {
  return {
    method: 'GET',
    path: `/accounts/validate/${encodeURIComponent(accountId)}`,
    headers: authHeaders(auth),
  };
}

export function buildTransferRequest(transfer: TransferRequest, auth: AuthMode, useAuth: boolean): WireRequest {
  return {
    method: 'POST',
    path: '/transfer',
    headers: useAuth ? authHeaders(auth) : { ...JSON_CONTENT_TYPE },
    body: transfer.toJSON(),
  };
}

export function buildGetAccountsRequest(auth: AuthMode, useAuth: boolean): WireRequest {
  return {
    method: 'GET',
    path: '/accounts',
    headers: useAuth ? authHeaders(auth) : {},
  };
}

export function buildGetAccountBalanceRequest(accountId: string, auth: AuthMode, useAuth: boolean): WireRequest {
  return {
    method: 'GET',
    path: `/accounts/balance/${encodeURIComponent(accountId)}`,
    headers: useAuth ? authHeaders(auth) : {},
  };
}
