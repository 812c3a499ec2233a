import type { Context } from "hono";
import { getCookie } from "hono/cookie";
import { createMiddleware } from "hono/factory";

import { UnauthenticatedError } from "../core/errors";
import type { SessionStore } from "../db/sessions";
import type { UserRecord, UserStore } from "../db/users";
import { logger } from "../utils/logger";

export interface SessionMiddlewareOptions {
  sessions: SessionStore;
  users: UserStore;
  cookieName: string;
}

/** Resolves the session cookie to a user record, or fails the request with 401. */
export function createSessionMiddleware(options: SessionMiddlewareOptions) {
  return createMiddleware(async (c, next) => {
    const token = getCookie(c, options.cookieName)?.trim();
    if (!token) {
      throw new UnauthenticatedError("Not authenticated");
    }

    const session = await options.sessions.validate(token);
    if (!session) {
      throw new UnauthenticatedError("Invalid or expired session");
    }

    const user = await options.users.getById(session.userId);
    if (!user) {
      throw new UnauthenticatedError("User not found");
    }

    c.set("user", user);

    void options.sessions.touch(token).catch((error) => {
      logger.warn("auth_session_touch_failed", { sessionId: session.id, error });
    });

    await next();
  });
}

export function requireUser(c: Context): UserRecord {
  const user = c.get("user");
  if (!user) {
    throw new UnauthenticatedError("Not authenticated");
  }

  return user;
}
