export interface DriveLimits {
  maxEligibleFileBytes: number;
  maxScanFolders: number;
  maxScanFiles: number;
  maxDownloadFiles: number;
}

export interface GoogleOAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  authorizationUrl: string;
  tokenUrl: string;
  userInfoUrl: string;
  tokenRequestTimeoutMs: number;
}

export interface DriveApiConfig {
  baseUrl: string;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
}

export interface SessionConfig {
  cookieName: string;
  ttlSeconds: number;
  secureCookies: boolean;
}

export interface AppConfig {
  env: string;
  port: number;
  frontendUrl: string;
  databaseUrl: string;
  storageRoot: string;
  tokenEncryptionKey: string;
  google: GoogleOAuthConfig;
  drive: DriveApiConfig;
  session: SessionConfig;
  limits: DriveLimits;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_MAX_ELIGIBLE_FILE_BYTES = 50 * 1024 * 1024;
export const DEFAULT_MAX_SCAN_FOLDERS = 1000;
export const DEFAULT_MAX_SCAN_FILES = 5000;
export const DEFAULT_MAX_DOWNLOAD_FILES = 20;

const DEFAULT_FRONTEND_URL = "http://localhost:3000";
const DEFAULT_DATABASE_URL = "file:./data/app.db";
const DEFAULT_STORAGE_ROOT = "storage";
const DEFAULT_SESSION_COOKIE_NAME = "session";
const DEFAULT_SESSION_TTL_SECONDS = 3600;
const MIN_SESSION_TTL_SECONDS = 60;
const DEFAULT_DRIVE_REQUEST_TIMEOUT_MS = 60_000;
const DEFAULT_DRIVE_DOWNLOAD_TIMEOUT_MS = 120_000;
const DEFAULT_TOKEN_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_PORT = 3001;

const REQUIRED_ENV = [
  "GOOGLE_CLIENT_ID",
  "GOOGLE_CLIENT_SECRET",
  "GOOGLE_REDIRECT_URI",
  "TOKEN_ENCRYPTION_KEY",
] as const;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readTrimmed(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value && value.length > 0 ? value : undefined;
}

function requireEnv(env: Env, key: (typeof REQUIRED_ENV)[number]): string {
  const value = readTrimmed(env, key);
  if (!value) {
    throw new ConfigError(`Required env var ${key} is missing or empty`);
  }

  return value;
}

function parseIntegerAtLeast(raw: string | undefined, fallback: number, minimum: number): number {
  if (!raw?.trim()) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    return fallback;
  }

  return Math.max(minimum, parsed);
}

function parseBoolean(raw: string | undefined): boolean {
  const normalized = raw?.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

export function loadConfig(env: Env = process.env): AppConfig {
  const missing = REQUIRED_ENV.filter((key) => !readTrimmed(env, key));
  if (missing.length > 0) {
    throw new ConfigError(`Required env vars missing or empty: ${missing.join(", ")}`);
  }

  return {
    env: readTrimmed(env, "NODE_ENV")?.toLowerCase() ?? "development",
    port: parseIntegerAtLeast(env.PORT, DEFAULT_PORT, 1),
    frontendUrl: (readTrimmed(env, "FRONTEND_URL") ?? DEFAULT_FRONTEND_URL).replace(/\/+$/, ""),
    databaseUrl: readTrimmed(env, "DATABASE_URL") ?? DEFAULT_DATABASE_URL,
    storageRoot: readTrimmed(env, "STORAGE_ROOT") ?? DEFAULT_STORAGE_ROOT,
    tokenEncryptionKey: requireEnv(env, "TOKEN_ENCRYPTION_KEY"),
    google: {
      clientId: requireEnv(env, "GOOGLE_CLIENT_ID"),
      clientSecret: requireEnv(env, "GOOGLE_CLIENT_SECRET"),
      redirectUri: requireEnv(env, "GOOGLE_REDIRECT_URI"),
      authorizationUrl: "https://accounts.google.com/o/oauth2/v2/auth",
      tokenUrl: "https://oauth2.googleapis.com/token",
      userInfoUrl: "https://openidconnect.googleapis.com/v1/userinfo",
      tokenRequestTimeoutMs: parseIntegerAtLeast(
        env.TOKEN_REQUEST_TIMEOUT_MS,
        DEFAULT_TOKEN_REQUEST_TIMEOUT_MS,
        1,
      ),
    },
    drive: {
      baseUrl: "https://www.googleapis.com/drive/v3",
      requestTimeoutMs: parseIntegerAtLeast(
        env.DRIVE_REQUEST_TIMEOUT_MS,
        DEFAULT_DRIVE_REQUEST_TIMEOUT_MS,
        1,
      ),
      downloadTimeoutMs: parseIntegerAtLeast(
        env.DRIVE_DOWNLOAD_TIMEOUT_MS,
        DEFAULT_DRIVE_DOWNLOAD_TIMEOUT_MS,
        1,
      ),
    },
    session: {
      cookieName: readTrimmed(env, "SESSION_COOKIE_NAME") ?? DEFAULT_SESSION_COOKIE_NAME,
      ttlSeconds: parseIntegerAtLeast(
        env.SESSION_TTL_SECONDS,
        DEFAULT_SESSION_TTL_SECONDS,
        MIN_SESSION_TTL_SECONDS,
      ),
      secureCookies: parseBoolean(env.SECURE_COOKIES),
    },
    limits: {
      maxEligibleFileBytes: parseIntegerAtLeast(
        env.MAX_ELIGIBLE_FILE_SIZE_BYTES,
        DEFAULT_MAX_ELIGIBLE_FILE_BYTES,
        0,
      ),
      maxScanFolders: parseIntegerAtLeast(env.MAX_SCAN_FOLDERS, DEFAULT_MAX_SCAN_FOLDERS, 1),
      maxScanFiles: parseIntegerAtLeast(env.MAX_SCAN_FILES, DEFAULT_MAX_SCAN_FILES, 1),
      maxDownloadFiles: parseIntegerAtLeast(env.MAX_DOWNLOAD_FILES, DEFAULT_MAX_DOWNLOAD_FILES, 1),
    },
  };
}
