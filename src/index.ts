import { serve } from "@hono/node-server";
import { readFileSync } from "node:fs";

import { createApp } from "./app";
import { loadConfig } from "./config";
import { GoogleOAuthClient } from "./connections/google-oauth";
import { OAuthStateStore } from "./connections/oauth-state";
import { openDb } from "./db/client";
import { migrate } from "./db/migrate";
import { SessionStore } from "./db/sessions";
import { UserStore } from "./db/users";
import { DriveClient } from "./drive/client";
import { DownloadExecutor } from "./drive/download";
import { DriveService } from "./drive/drive-service";
import { RecursiveScanner } from "./drive/scanner";
import { logger } from "./utils/logger";
import { AccessTokenBroker } from "./vault/token-broker";
import { TokenVault } from "./vault/token-vault";

function readAppVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }

  return "0.0.0";
}

const config = loadConfig();
const db = openDb(config.databaseUrl);
await migrate(db);

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
    maxFolders: config.limits.maxScanFolders,
    maxFiles: config.limits.maxScanFiles,
    maxFileBytes: config.limits.maxEligibleFileBytes,
  }),
  downloader: new DownloadExecutor(driveClient),
  storageRoot: config.storageRoot,
  limits: config.limits,
});

const app = createApp({
  config,
  version: readAppVersion(),
  oauth,
  states,
  sessions,
  users,
  vault,
  drive,
});

if (!config.session.secureCookies && config.env === "production") {
  logger.warn("startup_insecure_cookies", {
    message: "SECURE_COOKIES is off in production; session cookies will be sent over plain HTTP",
  });
}

serve({ fetch: app.fetch, hostname: "0.0.0.0", port: config.port }, (info) => {
  logger.info("startup_server_listening", {
    url: `http://localhost:${info.port}`,
    port: info.port,
    environment: config.env,
    storageRoot: config.storageRoot,
  });
});
