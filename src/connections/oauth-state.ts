import type { Client } from "@libsql/client";
import { randomBytes } from "node:crypto";

const OAUTH_STATE_TTL_MS = 10 * 60 * 1000;

export interface OAuthStateRecord {
  state: string;
  codeVerifier: string;
  createdAt: string;
}

function asString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

/** Server-side CSRF state for the Google sign-in redirect, consumed once. */
export class OAuthStateStore {
  constructor(private readonly db: Client) {}

  async create(codeVerifier: string): Promise<string> {
    const state = randomBytes(32).toString("base64url");

    await this.db.execute({
      sql: `INSERT INTO oauth_states (state, code_verifier, created_at)
        VALUES (?, ?, ?)`,
      args: [state, codeVerifier, new Date().toISOString()],
    });

    return state;
  }

  async consume(state: string, nowMs: number = Date.now()): Promise<OAuthStateRecord | null> {
    const result = await this.db.execute({
      sql: `DELETE FROM oauth_states
        WHERE state = ?
        RETURNING state, code_verifier, created_at`,
      args: [state],
    });

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    const storedState = asString(row["state"]);
    const codeVerifier = asString(row["code_verifier"]);
    const createdAt = asString(row["created_at"]);
    if (!storedState || !codeVerifier || !createdAt) {
      return null;
    }

    if (Date.parse(createdAt) < nowMs - OAUTH_STATE_TTL_MS) {
      return null;
    }

    return { state: storedState, codeVerifier, createdAt };
  }

  async cleanExpired(nowMs: number = Date.now()): Promise<void> {
    const cutoff = new Date(nowMs - OAUTH_STATE_TTL_MS).toISOString();
    await this.db.execute({
      sql: `DELETE FROM oauth_states
        WHERE created_at < ?`,
      args: [cutoff],
    });
  }
}
