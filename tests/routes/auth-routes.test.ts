import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { hashToken } from "../../src/db/sessions";
import { FakeGoogle, TEST_AUTHORIZATION_URL } from "../helpers/fake-google";
import { createTestContext, readJson, seedUser, sessionCookie, type TestContext } from "../helpers/test-app";

interface ErrorBody {
  error: string;
  message: string;
  requestId?: string;
}

let ctx: TestContext;
let google: FakeGoogle;

async function startLogin(): Promise<string> {
  const response = await ctx.app.request("/auth/google/login");
  expect(response.status).toBe(302);
  const location = new URL(response.headers.get("location") ?? "");
  return location.searchParams.get("state") ?? "";
}

beforeEach(async () => {
  ctx = await createTestContext();
  google = new FakeGoogle();
  vi.stubGlobal("fetch", google.fetch);
});

afterEach(async () => {
  vi.unstubAllGlobals();
  await ctx.close();
});

describe("auth routes", () => {
  test("login redirects to Google with a stored state", async () => {
    const response = await ctx.app.request("/auth/google/login");

    expect(response.status).toBe(302);
    const location = new URL(response.headers.get("location") ?? "");
    expect(`${location.origin}${location.pathname}`).toBe(TEST_AUTHORIZATION_URL);
    expect(location.searchParams.get("code_challenge_method")).toBe("S256");

    const stored = await ctx.db.execute("SELECT state FROM oauth_states");
    expect(stored.rows[0]?.["state"]).toBe(location.searchParams.get("state"));
  });

  test("callback signs the user in, stores encrypted tokens and sets the session cookie", async () => {
    const state = await startLogin();

    const response = await ctx.app.request(`/auth/google/callback?code=code-1&state=${encodeURIComponent(state)}`);

    expect(response.status).toBe(302);
    expect(response.headers.get("location")).toBe("http://frontend.test/login/success");
    const setCookie = response.headers.get("set-cookie") ?? "";
    expect(setCookie).toMatch(/^session=[A-Za-z0-9_-]+;/);
    expect(setCookie).toContain("HttpOnly");
    expect(setCookie).toContain("SameSite=Lax");
    expect(setCookie).toContain("Max-Age=3600");

    const user = await ctx.users.getById("google-sub-1");
    expect(user?.email).toBe("reader@example.com");
    expect(user?.encryptedAccessToken).not.toContain("access-issued-1");
    expect(ctx.vault.decrypt(user?.encryptedAccessToken ?? null)).toBe("access-issued-1");
    expect(ctx.vault.decrypt(user?.encryptedRefreshToken ?? null)).toBe("refresh-signin");

    const cookie = setCookie.split(";", 1)[0] ?? "";
    const me = await ctx.app.request("/auth/me", { headers: { cookie } });
    expect(me.status).toBe(200);
    expect(await readJson(me)).toEqual({ id: "google-sub-1", email: "reader@example.com", name: "Test Reader" });
  });

  test("a state can only be used once", async () => {
    const state = await startLogin();
    await ctx.app.request(`/auth/google/callback?code=code-1&state=${encodeURIComponent(state)}`);

    const replay = await ctx.app.request(`/auth/google/callback?code=code-1&state=${encodeURIComponent(state)}`);

    expect(replay.status).toBe(400);
    expect(await readJson<ErrorBody>(replay)).toEqual({
      error: "Invalid request",
      message: "Invalid or expired state; please try logging in again",
    });
  });

  test("provider errors on the callback are reported as 400", async () => {
    const response = await ctx.app.request("/auth/google/callback?error=access_denied");

    expect(response.status).toBe(400);
    expect((await readJson<ErrorBody>(response)).message).toBe("OAuth error: access_denied");
  });

  test("a refused code exchange is a 400 and creates no user", async () => {
    const state = await startLogin();
    vi.stubGlobal("fetch", async () => new Response(JSON.stringify({ error: "invalid_grant" }), { status: 400 }));

    const response = await ctx.app.request(`/auth/google/callback?code=bad&state=${encodeURIComponent(state)}`);

    expect(response.status).toBe(400);
    expect((await readJson<ErrorBody>(response)).message).toBe("Google sign-in failed; please try again");
    expect(await ctx.users.getById("google-sub-1")).toBeNull();
  });

  test("me without a session is 401", async () => {
    const response = await ctx.app.request("/auth/me");

    expect(response.status).toBe(401);
    const body = await readJson<ErrorBody>(response);
    expect(body.error).toBe("Unauthorized");
    expect(body.message).toBe("Not authenticated");
    expect(body.requestId).toBe(response.headers.get("x-request-id"));
  });

  test("me with an unknown session is 401", async () => {
    const response = await ctx.app.request("/auth/me", { headers: { cookie: "session=forged" } });

    expect(response.status).toBe(401);
    expect((await readJson<ErrorBody>(response)).message).toBe("Invalid or expired session");
  });

  test("logout deletes the session and clears the cookie", async () => {
    const user = await seedUser(ctx);
    const cookie = await sessionCookie(ctx, user.id);
    const token = cookie.slice("session=".length);

    const response = await ctx.app.request("/auth/logout", { method: "POST", headers: { cookie } });

    expect(response.status).toBe(200);
    expect(await readJson(response)).toEqual({ ok: true });
    expect(response.headers.get("set-cookie")).toMatch(/^session=;/);

    const remaining = await ctx.db.execute({ sql: "SELECT id FROM sessions WHERE id = ?", args: [hashToken(token)] });
    expect(remaining.rows).toHaveLength(0);
  });
});
