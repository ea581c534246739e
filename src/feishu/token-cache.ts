/**
 * Tenant Access Token Cache
 *
 * Feishu issues tenant access tokens valid for `expire` seconds (typically two hours).
 * One cache is created per process and shared by reference with every client call.
 *
 * - The token is treated as expired EARLY_EXPIRY_SECONDS before the server's expiry
 * - Concurrent callers during a refresh share the same in-flight request
 * - A failed refresh leaves the cache empty so the next call tries again
 */

export const EARLY_EXPIRY_SECONDS = 300;

export interface IssuedToken {
  token: string;
  /** Lifetime reported by the server, in seconds */
  expiresInSeconds: number;
}

/** Fetches a fresh token from the auth endpoint */
export type TokenFetcher = () => Promise<IssuedToken>;

export class TenantTokenCache {
  private token: string | null = null;
  private expiresAt = 0;
  private inflight: Promise<string> | null = null;

  constructor(
    private readonly fetchToken: TokenFetcher,
    private readonly now: () => number = Date.now,
  ) {}

  /** True when no token is cached or the cached one is past its (early) expiry */
  isExpired(): boolean {
    return this.token === null || this.now() >= this.expiresAt;
  }

  /** Cached token if still valid, otherwise a refreshed one */
  async getToken(): Promise<string> {
    if (this.token !== null && !this.isExpired()) {
      return this.token;
    }
    return this.refresh();
  }

  /** Force a refresh. Callers arriving while one is in flight share its result. */
  refresh(): Promise<string> {
    if (!this.inflight) {
      this.inflight = this.fetchToken()
        .then(issued => {
          this.token = issued.token;
          this.expiresAt = this.now() + (issued.expiresInSeconds - EARLY_EXPIRY_SECONDS) * 1000;
          return issued.token;
        })
        .finally(() => {
          this.inflight = null;
        });
    }
    return this.inflight;
  }

  /** Drop the cached token (e.g. after the server rejected it) */
  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }
}
