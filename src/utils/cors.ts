import type { MiddlewareHandler } from "hono";
import { cors } from "hono/cors";

export const CORS_ALLOW_METHODS = ["GET", "POST", "OPTIONS"] as const;
export const CORS_ALLOW_HEADERS = ["Content-Type", "X-Request-Id"] as const;
export const CORS_EXPOSE_HEADERS = ["X-Request-Id"] as const;

// Session cookies travel with credentials, so the origin list is explicit and never "*".
export function resolveCorsOrigins(frontendUrl: string | undefined): string[] {
  const origin = frontendUrl?.trim().replace(/\/+$/, "");
  return origin ? [origin] : [];
}

export function resolveAllowedOrigin(requestOrigin: string, corsOrigins: string[]): string | null {
  if (!requestOrigin) {
    return null;
  }

  return corsOrigins.includes(requestOrigin) ? requestOrigin : null;
}

export function createCorsMiddleware(corsOrigins: string[]): MiddlewareHandler {
  return cors({
    origin: (requestOrigin) => resolveAllowedOrigin(requestOrigin, corsOrigins) ?? undefined,
    allowMethods: [...CORS_ALLOW_METHODS],
    allowHeaders: [...CORS_ALLOW_HEADERS],
    exposeHeaders: [...CORS_EXPOSE_HEADERS],
    credentials: true,
  });
}
