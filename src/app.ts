import { Hono } from "hono";

import type { AppConfig } from "./config";
import type { GoogleOAuthClient } from "./connections/google-oauth";
import type { OAuthStateStore } from "./connections/oauth-state";
import type { SessionStore } from "./db/sessions";
import type { UserStore } from "./db/users";
import type { DriveService } from "./drive/drive-service";
import { requestLoggerMiddleware } from "./middleware/logger";
import { requestIdMiddleware } from "./middleware/request-id";
import { createSessionMiddleware } from "./middleware/session";
import { createAuthRoutes } from "./routes/auth";
import { createDriveRoutes } from "./routes/drive";
import { createCorsMiddleware, resolveCorsOrigins } from "./utils/cors";
import { errorResponse } from "./utils/http-error";
import type { TokenVault } from "./vault/token-vault";

export interface AppDependencies {
  config: Pick<AppConfig, "env" | "frontendUrl" | "session">;
  version: string;
  oauth: GoogleOAuthClient;
  states: OAuthStateStore;
  sessions: SessionStore;
  users: UserStore;
  vault: TokenVault;
  drive: DriveService;
}

export function createApp(deps: AppDependencies): Hono {
  const corsOrigins = resolveCorsOrigins(deps.config.frontendUrl);
  const requireSession = createSessionMiddleware({
    sessions: deps.sessions,
    users: deps.users,
    cookieName: deps.config.session.cookieName,
  });

  const app = new Hono();
  app.use("*", requestIdMiddleware);
  app.use("*", createCorsMiddleware(corsOrigins));
  app.use("*", requestLoggerMiddleware);
  app.onError((err, c) => errorResponse(c, err));

  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      version: deps.version,
      environment: deps.config.env,
      timestamp: new Date().toISOString(),
    });
  });

  app.route(
    "/auth",
    createAuthRoutes({
      oauth: deps.oauth,
      states: deps.states,
      sessions: deps.sessions,
      users: deps.users,
      vault: deps.vault,
      session: deps.config.session,
      frontendUrl: deps.config.frontendUrl,
      requireSession,
    }),
  );
  app.route("/drive", createDriveRoutes({ drive: deps.drive, requireSession }));

  app.notFound((c) => c.json({ error: "Not found", requestId: c.get("requestId") }, 404));

  return app;
}
