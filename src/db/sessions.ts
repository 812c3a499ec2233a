import type { Client } from "@libsql/client";
import { createHash, randomBytes } from "node:crypto";

export interface SessionRecord {
  id: string;
  userId: string;
  expiresAt: string;
  createdAt: string;
  lastActiveAt: string;
}

function asString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function toSessionRecord(row: Record<string, unknown> | undefined): SessionRecord | null {
  if (!row) {
    return null;
  }

  const id = asString(row["id"]);
  const userId = asString(row["user_id"]);
  const expiresAt = asString(row["expires_at"]);
  const createdAt = asString(row["created_at"]);
  const lastActiveAt = asString(row["last_active_at"]);

  if (!id || !userId || !expiresAt || !createdAt || !lastActiveAt) {
    return null;
  }

  return {
    id,
    userId,
    expiresAt,
    createdAt,
    lastActiveAt,
  };
}

export function hashToken(token: string): string {
  return createHash("sha256").update(token).digest("hex");
}

/** Only the SHA-256 of a session token is stored; the cookie holds the token. */
export class SessionStore {
  constructor(
    private readonly db: Client,
    private readonly ttlSeconds: number,
  ) {}

  async create(userId: string): Promise<SessionRecord & { token: string }> {
    const now = new Date();
    const nowIso = now.toISOString();
    const token = randomBytes(32).toString("base64url");
    const tokenHash = hashToken(token);
    const expiresAt = new Date(now.getTime() + this.ttlSeconds * 1000).toISOString();

    await this.db.execute({
      sql: `INSERT INTO sessions (
        id,
        user_id,
        expires_at,
        created_at,
        last_active_at
      ) VALUES (?, ?, ?, ?, ?)`,
      args: [tokenHash, userId, expiresAt, nowIso, nowIso],
    });

    return {
      id: tokenHash,
      userId,
      expiresAt,
      createdAt: nowIso,
      lastActiveAt: nowIso,
      token,
    };
  }

  async validate(token: string): Promise<SessionRecord | null> {
    const normalized = token.trim();
    if (!normalized) {
      return null;
    }

    const result = await this.db.execute({
      sql: `SELECT
        id,
        user_id,
        expires_at,
        created_at,
        last_active_at
      FROM sessions
      WHERE id = ? AND expires_at > ?`,
      args: [hashToken(normalized), new Date().toISOString()],
    });

    return toSessionRecord(result.rows[0]);
  }

  async touch(token: string): Promise<void> {
    const normalized = token.trim();
    if (!normalized) {
      return;
    }

    await this.db.execute({
      sql: `UPDATE sessions
        SET last_active_at = ?
        WHERE id = ?`,
      args: [new Date().toISOString(), hashToken(normalized)],
    });
  }

  async delete(token: string): Promise<void> {
    const normalized = token.trim();
    if (!normalized) {
      return;
    }

    await this.db.execute({
      sql: "DELETE FROM sessions WHERE id = ?",
      args: [hashToken(normalized)],
    });
  }

  async cleanupExpired(nowMs: number = Date.now()): Promise<void> {
    await this.db.execute({
      sql: "DELETE FROM sessions WHERE expires_at <= ?",
      args: [new Date(nowMs).toISOString()],
    });
  }
}
