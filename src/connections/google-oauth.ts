import { createHash, randomBytes } from "node:crypto";

import type { GoogleOAuthConfig } from "../config";
import { logger } from "../utils/logger";
import { sanitizeProviderResponse } from "../utils/sanitize";

export const GOOGLE_SIGN_IN_SCOPES = [
  "openid",
  "email",
  "profile",
  "https://www.googleapis.com/auth/drive.readonly",
] as const;

export interface OAuthTokenGrant {
  accessToken: string;
  refreshToken?: string;
  expiresIn?: number;
}

export interface GoogleUserInfo {
  sub: string;
  email: string;
  name: string | null;
}

/** What the token broker needs from the provider's token endpoint. */
export interface TokenRefresher {
  refreshAccessToken(refreshToken: string): Promise<OAuthTokenGrant>;
}

/** The token endpoint answered, and refused (`{ error }` or a non-2xx status). */
export class OAuthTokenError extends Error {
  readonly status: number;
  readonly errorCode: string | null;

  constructor(status: number, errorCode: string | null) {
    super(`OAuth token request rejected (${status}${errorCode ? `: ${errorCode}` : ""})`);
    this.name = "OAuthTokenError";
    this.status = status;
    this.errorCode = errorCode;
  }
}

export function randomCodeVerifier(): string {
  return randomBytes(32).toString("base64url");
}

export function codeChallengeS256(codeVerifier: string): string {
  return createHash("sha256").update(codeVerifier).digest("base64url");
}

function parseExpiresIn(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return value;
  }

  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed) && parsed > 0) {
      return parsed;
    }
  }

  return undefined;
}

function asRecord(payload: unknown): Record<string, unknown> | null {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    return null;
  }

  return payload as Record<string, unknown>;
}

async function readJson(response: Response): Promise<{ payload: unknown; raw: string }> {
  const raw = await response.text();
  try {
    return { payload: JSON.parse(raw) as unknown, raw };
  } catch {
    return { payload: null, raw };
  }
}

function parseTokenGrant(payload: Record<string, unknown>, status: number): OAuthTokenGrant {
  const accessToken = payload["access_token"];
  if (typeof accessToken !== "string" || accessToken.length === 0) {
    throw new OAuthTokenError(status, "missing_access_token");
  }

  const refreshToken = payload["refresh_token"];
  return {
    accessToken,
    refreshToken: typeof refreshToken === "string" && refreshToken.length > 0 ? refreshToken : undefined,
    expiresIn: parseExpiresIn(payload["expires_in"]),
  };
}

export class GoogleOAuthClient implements TokenRefresher {
  constructor(private readonly config: GoogleOAuthConfig) {}

  buildAuthorizationUrl(state: string, codeChallenge: string): string {
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      redirect_uri: this.config.redirectUri,
      response_type: "code",
      scope: GOOGLE_SIGN_IN_SCOPES.join(" "),
      state,
      code_challenge: codeChallenge,
      code_challenge_method: "S256",
      access_type: "offline",
      prompt: "consent",
    });

    return `${this.config.authorizationUrl}?${params.toString()}`;
  }

  async exchangeCode(code: string, codeVerifier: string): Promise<OAuthTokenGrant> {
    return this.requestToken({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      code,
      code_verifier: codeVerifier,
      grant_type: "authorization_code",
      redirect_uri: this.config.redirectUri,
    });
  }

  async refreshAccessToken(refreshToken: string): Promise<OAuthTokenGrant> {
    return this.requestToken({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      refresh_token: refreshToken,
      grant_type: "refresh_token",
    });
  }

  async fetchUserInfo(accessToken: string): Promise<GoogleUserInfo> {
    const response = await fetch(this.config.userInfoUrl, {
      method: "GET",
      headers: {
        authorization: `Bearer ${accessToken}`,
        accept: "application/json",
      },
      signal: AbortSignal.timeout(this.config.tokenRequestTimeoutMs),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Google userinfo request failed (${response.status}): ${sanitizeProviderResponse(body)}`);
    }

    const payload = asRecord(await response.json());
    if (!payload) {
      throw new Error("Google userinfo response is invalid");
    }

    const sub = typeof payload["sub"] === "string" ? payload["sub"].trim() : "";
    const email = typeof payload["email"] === "string" ? payload["email"].trim().toLowerCase() : "";
    if (!sub || !email) {
      throw new Error("Google userinfo missing sub or email");
    }

    return {
      sub,
      email,
      name: typeof payload["name"] === "string" ? payload["name"].trim() : null,
    };
  }

  private async requestToken(form: Record<string, string>): Promise<OAuthTokenGrant> {
    const response = await fetch(this.config.tokenUrl, {
      method: "POST",
      headers: {
        "content-type": "application/x-www-form-urlencoded",
        accept: "application/json",
      },
      body: new URLSearchParams(form).toString(),
      signal: AbortSignal.timeout(this.config.tokenRequestTimeoutMs),
    });

    const { payload, raw } = await readJson(response);
    const record = asRecord(payload);
    const rawError = record ? record["error"] : undefined;
    const errorCode = typeof rawError === "string" ? rawError : null;

    if (!response.ok || errorCode || !record) {
      logger.warn("oauth_token_request_rejected", {
        grantType: form["grant_type"],
        status: response.status,
        body: sanitizeProviderResponse(raw),
      });
      throw new OAuthTokenError(response.status, errorCode);
    }

    return parseTokenGrant(record, response.status);
  }
}
