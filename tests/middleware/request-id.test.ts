import { describe, expect, test } from "vitest";
import { Hono } from "hono";

import { requestIdMiddleware } from "../../src/middleware/request-id";
import { readJson } from "../helpers/test-app";

function createTestApp(): Hono {
  const app = new Hono();
  app.use("*", requestIdMiddleware);
  app.get("/test", (c) => {
    return c.json({
      requestId: c.get("requestId"),
    });
  });

  return app;
}

describe("request-id middleware", () => {
  test("preserves incoming X-Request-Id", async () => {
    const app = createTestApp();

    const response = await app.request("/test", {
      headers: {
        "X-Request-Id": "proxy-request-id-123",
      },
    });

    expect(response.headers.get("X-Request-Id")).toBe("proxy-request-id-123");
    expect(await readJson(response)).toEqual({ requestId: "proxy-request-id-123" });
  });

  test("generates a uuid when the incoming id is missing", async () => {
    const app = createTestApp();
    const response = await app.request("/test");
    const requestId = response.headers.get("X-Request-Id");

    expect(requestId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i);
    expect(await readJson(response)).toEqual({ requestId });
  });

  test("replaces oversized incoming ids", async () => {
    const app = createTestApp();
    const oversized = "x".repeat(129);

    const response = await app.request("/test", { headers: { "X-Request-Id": oversized } });

    expect(response.headers.get("X-Request-Id")).not.toBe(oversized);
    expect(response.headers.get("X-Request-Id")).toHaveLength(36);
  });
});
