import { createClient, type Client } from "@libsql/client";
import type { Hono } from "hono";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { createApp } from "../../src/app";
import type { AppConfig, DriveLimits } from "../../src/config";
import { GoogleOAuthClient } from "../../src/connections/google-oauth";
import { OAuthStateStore } from "../../src/connections/oauth-state";
import { migrate } from "../../src/db/migrate";
import { SessionStore } from "../../src/db/sessions";
import { UserStore, type UserRecord } from "../../src/db/users";
import { DriveClient } from "../../src/drive/client";
import { DownloadExecutor } from "../../src/drive/download";
import { DriveService } from "../../src/drive/drive-service";
import { RecursiveScanner } from "../../src/drive/scanner";
import { AccessTokenBroker } from "../../src/vault/token-broker";
import { TokenVault } from "../../src/vault/token-vault";
import {
  TEST_AUTHORIZATION_URL,
  TEST_DRIVE_BASE_URL,
  TEST_TOKEN_URL,
  TEST_USERINFO_URL,
} from "./fake-google";

export const TEST_ENCRYPTION_KEY = Buffer.alloc(32, 7).toString("base64");

export const TEST_LIMITS: DriveLimits = {
  maxEligibleFileBytes: 50 * 1024 * 1024,
  maxScanFolders: 1000,
  maxScanFiles: 5000,
  maxDownloadFiles: 20,
};

export async function createTestDb(): Promise<Client> {
  const db = createClient({ url: ":memory:" });
  await migrate(db);
  return db;
}

export async function readJson<T>(response: Response): Promise<T> {
  return (await response.json()) as T;
}

export function createTestConfig(storageRoot: string, limits: DriveLimits = TEST_LIMITS): AppConfig {
  return {
    env: "test",
    port: 0,
    frontendUrl: "http://frontend.test",
    databaseUrl: ":memory:",
    storageRoot,
    tokenEncryptionKey: TEST_ENCRYPTION_KEY,
    google: {
      clientId: "test-client-id",
      clientSecret: "test-secret",
      redirectUri: "http://api.test/auth/google/callback",
      authorizationUrl: TEST_AUTHORIZATION_URL,
      tokenUrl: TEST_TOKEN_URL,
      userInfoUrl: TEST_USERINFO_URL,
      tokenRequestTimeoutMs: 5_000,
    },
    drive: {
      baseUrl: TEST_DRIVE_BASE_URL,
      requestTimeoutMs: 5_000,
      downloadTimeoutMs: 5_000,
    },
    session: {
      cookieName: "session",
      ttlSeconds: 3600,
      secureCookies: false,
    },
    limits,
  };
}

export interface TestContext {
  app: Hono;
  db: Client;
  config: AppConfig;
  users: UserStore;
  sessions: SessionStore;
  vault: TokenVault;
  storageRoot: string;
  close(): Promise<void>;
}

/** Wires the real stores and services against an in-memory db and a temp storage root. */
export async function createTestContext(limits: DriveLimits = TEST_LIMITS): Promise<TestContext> {
  const db = await createTestDb();
  const storageRoot = await mkdtemp(path.join(os.tmpdir(), "drive-library-test-"));
  const config = createTestConfig(storageRoot, limits);

  const vault = new TokenVault(config.tokenEncryptionKey);
  const users = new UserStore(db);
  const sessions = new SessionStore(db, config.session.ttlSeconds);
  const states = new OAuthStateStore(db);
  const oauth = new GoogleOAuthClient(config.google);
  const driveClient = new DriveClient(config.drive);
  const broker = new AccessTokenBroker({ vault, store: users, refresher: oauth });

  const drive = new DriveService({
    broker,
    rootFolders: users,
    metadata: driveClient,
    scanner: new RecursiveScanner(driveClient, {
      maxFolders: limits.maxScanFolders,
      maxFiles: limits.maxScanFiles,
      maxFileBytes: limits.maxEligibleFileBytes,
    }),
    downloader: new DownloadExecutor(driveClient),
    storageRoot,
    limits,
  });

  const app = createApp({ config, version: "test", oauth, states, sessions, users, vault, drive });

  return {
    app,
    db,
    config,
    users,
    sessions,
    vault,
    storageRoot,
    async close() {
      db.close();
      await rm(storageRoot, { recursive: true, force: true });
    },
  };
}

export interface SeedUserOptions {
  accessToken?: string;
  refreshToken?: string | null;
  expiresAt?: string;
  rootFolderId?: string;
}

export async function seedUser(ctx: TestContext, options: SeedUserOptions = {}): Promise<UserRecord> {
  const refreshToken = options.refreshToken === undefined ? "refresh-current" : options.refreshToken;
  const user = await ctx.users.upsertFromSignIn({
    id: "google-sub-1",
    email: "reader@example.com",
    name: "Test Reader",
    encryptedAccessToken: ctx.vault.encrypt(options.accessToken ?? "access-current"),
    encryptedRefreshToken: refreshToken === null ? null : ctx.vault.encrypt(refreshToken),
    accessTokenExpiresAt: options.expiresAt ?? new Date(Date.now() + 60 * 60 * 1000).toISOString(),
  });

  if (options.rootFolderId) {
    await ctx.users.setRootFolder(user.id, options.rootFolderId);
    user.driveRootFolderId = options.rootFolderId;
  }

  return user;
}

/** Cookie header for a fresh session of the given user. */
export async function sessionCookie(ctx: TestContext, userId: string): Promise<string> {
  const session = await ctx.sessions.create(userId);
  return `${ctx.config.session.cookieName}=${session.token}`;
}
