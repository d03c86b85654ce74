import type { TokenAcquisitionResult } from './types';

const DEFAULT_REFRESH_MARGIN_MS = 5 * 60 * 1000;

export type TokenAcquirer = () => Promise<TokenAcquisitionResult>;

/**
 * Holds one bearer token and replaces it `refreshMarginMs` before it expires. Callers that
 * arrive while a replacement is being acquired wait on that same acquisition.
 */
export class TokenCache {
  private current: TokenAcquisitionResult | null = null;
  private pending: Promise<string> | null = null;

  public constructor(
    private readonly acquire: TokenAcquirer,
    private readonly refreshMarginMs = DEFAULT_REFRESH_MARGIN_MS,
  ) {}

  public async getToken(): Promise<string> {
    // Checked synchronously so a valid token never waits behind a pending acquisition.
    if (this.current && this.isFresh(this.current)) {
      return this.current.token;
    }

    if (!this.pending) {
      this.pending = this.refresh().finally(() => {
        this.pending = null;
      });
    }
    return await this.pending;
  }

  public invalidate(): void {
    this.current = null;
  }

  private async refresh(): Promise<string> {
    this.current = null;
    const acquired = await this.acquire();
    this.current = acquired;
    return acquired.token;
  }

  private isFresh(token: TokenAcquisitionResult): boolean {
    return token.expiresAt - this.refreshMarginMs > Date.now();
  }
}
