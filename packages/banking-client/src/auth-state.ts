export type AuthMode = { readonly kind: 'anonymous' } | { readonly kind: 'bearer'; readonly token: string };

export const ANONYMOUS: AuthMode = Object.freeze({ kind: 'anonymous' });

/**
 * Bearer token held by one client. Only a successful authenticate sets it.
 */
export class AuthState {
  private mode: AuthMode = ANONYMOUS;

  get current(): AuthMode {
    return this.mode;
  }

  get isAuthenticated(): boolean {
    return this.mode.kind === 'bearer';
  }

  setToken(token: string): void {
    if (token.length === 0) {
      throw new Error('Bearer token must not be empty');
    }
    this.mode = Object.freeze({ kind: 'bearer', token });
  }

  clear(): void {
    this.mode = ANONYMOUS;
  }
}
