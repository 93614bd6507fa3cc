import { UserTokenStore } from '../../storage/firestore';
import { UserToken } from '../../types/relay';

export interface Token {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
}

export interface TokenSource {
  getToken(forceRefresh?: boolean): Promise<Token>;
}

export type TokenRefresher = (refreshToken: string) => Promise<Token>;

// Refresh slightly ahead of expiry so a request doesn't race the deadline
const EXPIRY_MARGIN_MS = 60 * 1000;

/**
 * StoredTokenSource hands out a usable access token for one athlete, refreshing
 * through the refresh token when the stored one is expired and writing the result back.
 *
 * An instance lives for one invocation: after a refresh the new token is reused for
 * the remaining requests instead of being read again.
 */
export class StoredTokenSource implements TokenSource {
  private current: UserToken;
  private refreshCount = 0;

  constructor(
    private store: UserTokenStore,
    initial: UserToken,
    private refresh: TokenRefresher,
    private now: () => Date = () => new Date()
  ) {
    this.current = initial;
  }

  get refreshes(): number {
    return this.refreshCount;
  }

  async getToken(forceRefresh = false): Promise<Token> {
    const expiresAt = this.current.expiresAt;
    const isExpiringSoon = expiresAt.getTime() - this.now().getTime() < EXPIRY_MARGIN_MS;

    if (forceRefresh || isExpiringSoon) {
      await this.refreshTokenFlow();
    }

    return {
      accessToken: this.current.accessToken,
      refreshToken: this.current.refreshToken,
      expiresAt: this.current.expiresAt,
    };
  }

  private async refreshTokenFlow(): Promise<void> {
    const refreshed = await this.refresh(this.current.refreshToken);
    this.refreshCount++;

    this.current = {
      userId: this.current.userId,
      accessToken: refreshed.accessToken,
      refreshToken: refreshed.refreshToken,
      expiresAt: refreshed.expiresAt,
      updatedAt: this.now(),
    };
    await this.store.save(this.current);
  }
}
