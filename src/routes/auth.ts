import { Hono, type Context, type MiddlewareHandler } from "hono";
import { deleteCookie, getCookie, setCookie } from "hono/cookie";

import type { SessionConfig } from "../config";
import {
  codeChallengeS256,
  randomCodeVerifier,
  type GoogleOAuthClient,
  type GoogleUserInfo,
  type OAuthTokenGrant,
} from "../connections/google-oauth";
import type { OAuthStateStore } from "../connections/oauth-state";
import type { SessionStore } from "../db/sessions";
import type { UserStore } from "../db/users";
import { requireUser } from "../middleware/session";
import { logger } from "../utils/logger";
import { DEFAULT_EXPIRES_IN_SECONDS } from "../vault/token-broker";
import type { TokenVault } from "../vault/token-vault";

export interface AuthRoutesOptions {
  oauth: GoogleOAuthClient;
  states: OAuthStateStore;
  sessions: SessionStore;
  users: UserStore;
  vault: TokenVault;
  session: SessionConfig;
  frontendUrl: string;
  requireSession: MiddlewareHandler;
}

function signInFailure(c: Context, message: string): Response {
  return c.json({ error: "Invalid request", message }, 400);
}

export function createAuthRoutes(options: AuthRoutesOptions): Hono {
  const app = new Hono();
  const { cookieName, ttlSeconds, secureCookies } = options.session;

  function sessionCookieOptions() {
    return {
      httpOnly: true,
      secure: secureCookies,
      sameSite: "Lax" as const,
      path: "/",
      maxAge: ttlSeconds,
    };
  }

  async function completeSignIn(code: string, codeVerifier: string): Promise<{
    grant: OAuthTokenGrant;
    profile: GoogleUserInfo;
  }> {
    const grant = await options.oauth.exchangeCode(code, codeVerifier);
    const profile = await options.oauth.fetchUserInfo(grant.accessToken);
    return { grant, profile };
  }

  app.get("/google/login", async (c) => {
    await options.states.cleanExpired();
    const codeVerifier = randomCodeVerifier();
    const state = await options.states.create(codeVerifier);
    const url = options.oauth.buildAuthorizationUrl(state, codeChallengeS256(codeVerifier));

    return c.redirect(url, 302);
  });

  app.get("/google/callback", async (c) => {
    const code = c.req.query("code")?.trim();
    const state = c.req.query("state")?.trim();
    const oauthError = c.req.query("error")?.trim();

    if (oauthError) {
      return signInFailure(c, `OAuth error: ${oauthError}`);
    }

    if (!code || !state) {
      return signInFailure(c, "Missing code or state");
    }

    const stateRecord = await options.states.consume(state);
    if (!stateRecord) {
      return signInFailure(c, "Invalid or expired state; please try logging in again");
    }

    let signIn: { grant: OAuthTokenGrant; profile: GoogleUserInfo };
    try {
      signIn = await completeSignIn(code, stateRecord.codeVerifier);
    } catch (error) {
      logger.warn("auth_google_callback_failed", { error });
      return signInFailure(c, "Google sign-in failed; please try again");
    }

    const { grant, profile } = signIn;
    const expiresInSeconds = grant.expiresIn ?? DEFAULT_EXPIRES_IN_SECONDS;
    const user = await options.users.upsertFromSignIn({
      id: profile.sub,
      email: profile.email,
      name: profile.name,
      encryptedAccessToken: options.vault.encrypt(grant.accessToken),
      encryptedRefreshToken: grant.refreshToken ? options.vault.encrypt(grant.refreshToken) : null,
      accessTokenExpiresAt: new Date(Date.now() + expiresInSeconds * 1000).toISOString(),
    });

    if (!user.encryptedRefreshToken) {
      logger.warn("auth_google_no_refresh_token", { userId: user.id });
    }

    await options.sessions.cleanupExpired();
    const session = await options.sessions.create(user.id);
    setCookie(c, cookieName, session.token, sessionCookieOptions());
    logger.info("auth_google_sign_in", { userId: user.id });

    return c.redirect(`${options.frontendUrl}/login/success`, 302);
  });

  app.get("/me", options.requireSession, (c) => {
    const user = requireUser(c);
    return c.json({ id: user.id, email: user.email, name: user.name });
  });

  app.post("/logout", async (c) => {
    const token = getCookie(c, cookieName)?.trim();
    if (token) {
      await options.sessions.delete(token);
    }

    deleteCookie(c, cookieName, { path: "/", secure: secureCookies });
    return c.json({ ok: true });
  });

  return app;
}
