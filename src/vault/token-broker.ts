import { OAuthTokenError, type OAuthTokenGrant, type TokenRefresher } from "../connections/google-oauth";
import { ProviderError, UnauthenticatedError } from "../core/errors";
import type { RefreshedTokenUpdate, TokenCredentialStore, UserRecord } from "../db/users";
import { logger } from "../utils/logger";
import type { TokenVault } from "./token-vault";

export const REFRESH_WINDOW_MS = 5 * 60 * 1000;
export const DEFAULT_EXPIRES_IN_SECONDS = 3600;

export interface ObtainOptions {
  /** Refresh even when the stored expiry says the token is still valid. */
  forceRefresh?: boolean;
}

/** Anything that can hand out a usable access token for a user. */
export interface AccessTokenProvider {
  obtain(user: UserRecord, options?: ObtainOptions): Promise<string>;
}

export interface AccessTokenBrokerOptions {
  vault: TokenVault;
  store: TokenCredentialStore;
  refresher: TokenRefresher;
  now?: () => number;
}

// A token without a recorded expiry is treated as expired.
function isStillValid(expiresAt: string | null, nowMs: number): boolean {
  if (!expiresAt) {
    return false;
  }

  const expiresMs = Date.parse(expiresAt);
  if (Number.isNaN(expiresMs)) {
    return false;
  }

  return expiresMs > nowMs + REFRESH_WINDOW_MS;
}

/**
 * Returns a currently valid Google access token for a user, refreshing it
 * through the token endpoint when it is about to expire. Never retries on
 * its own: callers that see a 401 ask once more with `forceRefresh`.
 */
export class AccessTokenBroker implements AccessTokenProvider {
  private readonly now: () => number;

  constructor(private readonly options: AccessTokenBrokerOptions) {
    this.now = options.now ?? Date.now;
  }

  async obtain(user: UserRecord, options: ObtainOptions = {}): Promise<string> {
    const forceRefresh = options.forceRefresh === true;
    if (!forceRefresh && user.encryptedAccessToken && isStillValid(user.accessTokenExpiresAt, this.now())) {
      return this.options.vault.decrypt(user.encryptedAccessToken);
    }

    const refreshToken = this.options.vault.decrypt(user.encryptedRefreshToken);
    if (!refreshToken) {
      logger.warn("token_refresh_missing_refresh_token", { userId: user.id, forceRefresh });
      throw new UnauthenticatedError("Session expired; please sign in again to grant Drive access");
    }

    const grant = await this.requestRefresh(user.id, refreshToken);
    const requestedAtMs = this.now();
    const expiresInSeconds = grant.expiresIn ?? DEFAULT_EXPIRES_IN_SECONDS;
    const expiresAtMs = requestedAtMs + expiresInSeconds * 1000;
    const update: RefreshedTokenUpdate = {
      encryptedAccessToken: this.options.vault.encrypt(grant.accessToken),
      accessTokenExpiresAt: new Date(expiresAtMs).toISOString(),
    };
    if (grant.refreshToken) {
      update.encryptedRefreshToken = this.options.vault.encrypt(grant.refreshToken);
    }

    await this.options.store.saveRefreshedTokens(user.id, update);

    const previousExpiresMs = user.accessTokenExpiresAt ? Date.parse(user.accessTokenExpiresAt) : Number.NaN;
    if (expiresAtMs < previousExpiresMs) {
      logger.warn("token_refresh_expiry_regressed", {
        userId: user.id,
        previousExpiresAt: user.accessTokenExpiresAt,
        expiresAt: update.accessTokenExpiresAt,
      });
    }

    // Only after the commit, and all fields at once.
    Object.assign(user, {
      encryptedAccessToken: update.encryptedAccessToken,
      accessTokenExpiresAt: update.accessTokenExpiresAt,
      encryptedRefreshToken: update.encryptedRefreshToken ?? user.encryptedRefreshToken,
    });

    logger.info("token_refresh_succeeded", {
      userId: user.id,
      forceRefresh,
      rotatedRefreshToken: grant.refreshToken !== undefined,
      expiresAt: update.accessTokenExpiresAt,
    });

    return grant.accessToken;
  }

  private async requestRefresh(userId: string, refreshToken: string): Promise<OAuthTokenGrant> {
    try {
      return await this.options.refresher.refreshAccessToken(refreshToken);
    } catch (error) {
      if (error instanceof OAuthTokenError) {
        logger.warn("token_refresh_rejected", { userId, status: error.status, errorCode: error.errorCode });
        throw new UnauthenticatedError("Failed to refresh Google token; please sign in again");
      }

      logger.error("token_refresh_unreachable", { userId, error });
      throw new ProviderError(null, "Token endpoint unreachable");
    }
  }
}
