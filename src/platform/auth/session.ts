/**
 * Platform Auth Layer - Session Token Management
 *
 * Holds the access token issued by login/registration. One store per client
 * instance; nothing is persisted. Concurrent logins are not serialized, the
 * last write wins.
 */

export const ACCESS_TOKEN_HEADER = 'access-token';

/**
 * Shorten a token for log output
 */
export function maskToken(token: string): string {
  return token.length <= 4 ? '****' : `${token.substring(0, 4)}...`;
}

export class SessionStore {
  private token: string | null;

  constructor(
    initialToken: string | null = null,
    private readonly debug: boolean = false
  ) {
    this.token = initialToken && initialToken.length > 0 ? initialToken : null;
  }

  /**
   * Get the current access token
   * @returns The token string or null if no session
   */
  getToken(): string | null {
    return this.token;
  }

  setToken(token: string): void {
    if (!token) {
      throw new Error('Cannot store an empty access token');
    }
    this.token = token;
    if (this.debug) {
      console.log(`[Grustnogram/Auth] Session token stored (${maskToken(token)})`);
    }
  }

  clearToken(): void {
    this.token = null;
    if (this.debug) {
      console.log('[Grustnogram/Auth] Session token cleared');
    }
  }

  /**
   * Check presence only. Validity is decided by the server.
   */
  hasToken(): boolean {
    return this.token !== null;
  }
}
