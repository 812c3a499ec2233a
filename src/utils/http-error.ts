import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { randomUUID } from "node:crypto";

import {
  InvalidRequestError,
  ProviderError,
  ScanLimitExceededError,
  SizeExceededError,
  UnauthenticatedError,
} from "../core/errors";
import { logger } from "./logger";

function requestIdOf(c: Context): string {
  return c.get("requestId") ?? randomUUID();
}

export function internalServerError(c: Context): Response {
  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected server error occurred while processing the request.",
      requestId: requestIdOf(c),
    },
    500,
  );
}

/** Single place where domain errors become HTTP responses; used by app.onError. */
export function errorResponse(c: Context, error: unknown): Response {
  const requestId = requestIdOf(c);

  if (error instanceof UnauthenticatedError) {
    return c.json({ error: "Unauthorized", message: error.message, requestId }, 401);
  }

  if (
    error instanceof ScanLimitExceededError ||
    error instanceof SizeExceededError ||
    error instanceof InvalidRequestError
  ) {
    return c.json({ error: "Invalid request", message: error.message, requestId }, 400);
  }

  if (error instanceof ProviderError) {
    logger.warn("http_provider_error", { requestId, status: error.status, error });
    return c.json(
      { error: "Bad gateway", message: "The Google Drive request could not be completed.", requestId },
      502,
    );
  }

  if (error instanceof HTTPException) {
    return error.getResponse();
  }

  logger.error("http_unhandled_error", { requestId, path: c.req.path, error });
  return internalServerError(c);
}
