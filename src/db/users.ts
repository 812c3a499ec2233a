import type { Client } from "@libsql/client";

export interface UserRecord {
  /** Google subject id. */
  id: string;
  email: string;
  name: string | null;
  encryptedAccessToken: string;
  encryptedRefreshToken: string | null;
  accessTokenExpiresAt: string | null;
  driveRootFolderId: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface SignInUserInput {
  id: string;
  email: string;
  name?: string | null;
  encryptedAccessToken: string;
  encryptedRefreshToken: string | null;
  accessTokenExpiresAt: string;
}

export interface RefreshedTokenUpdate {
  encryptedAccessToken: string;
  accessTokenExpiresAt: string;
  /** Only set when the provider rotated the refresh token. */
  encryptedRefreshToken?: string;
}

/** The slice of persistence the token broker writes through. */
export interface TokenCredentialStore {
  saveRefreshedTokens(userId: string, update: RefreshedTokenUpdate): Promise<void>;
}

const USER_COLUMNS = `id,
      email,
      name,
      encrypted_access_token,
      encrypted_refresh_token,
      access_token_expires_at,
      drive_root_folder_id,
      created_at,
      updated_at`;

function asString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function asNonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

function toUserRecord(row: Record<string, unknown> | undefined): UserRecord | null {
  if (!row) {
    return null;
  }

  const id = asString(row["id"]);
  const email = asString(row["email"]);
  const encryptedAccessToken = asNonEmptyString(row["encrypted_access_token"]);
  const createdAt = asString(row["created_at"]);
  const updatedAt = asString(row["updated_at"]);

  if (!id || !email || !encryptedAccessToken || !createdAt || !updatedAt) {
    return null;
  }

  return {
    id,
    email,
    name: asString(row["name"]),
    encryptedAccessToken,
    encryptedRefreshToken: asNonEmptyString(row["encrypted_refresh_token"]),
    accessTokenExpiresAt: asString(row["access_token_expires_at"]),
    driveRootFolderId: asString(row["drive_root_folder_id"]),
    createdAt,
    updatedAt,
  };
}

export class UserStore implements TokenCredentialStore {
  constructor(private readonly db: Client) {}

  async getById(id: string): Promise<UserRecord | null> {
    const result = await this.db.execute({
      sql: `SELECT
      ${USER_COLUMNS}
    FROM users
    WHERE id = ?`,
      args: [id],
    });

    return toUserRecord(result.rows[0]);
  }

  /**
   * Creates the user on first sign-in, otherwise replaces the access token.
   * A missing refresh token keeps the stored one: Google only sends it on
   * the first offline grant.
   */
  async upsertFromSignIn(input: SignInUserInput): Promise<UserRecord> {
    const id = input.id.trim();
    const email = input.email.trim().toLowerCase();
    const name = input.name?.trim() || null;
    const now = new Date().toISOString();

    if (!id) {
      throw new Error("id is required");
    }
    if (!email) {
      throw new Error("email is required");
    }
    if (!input.encryptedAccessToken) {
      throw new Error("encryptedAccessToken is required");
    }

    await this.db.execute({
      sql: `INSERT INTO users (
        ${USER_COLUMNS}
      ) VALUES (?, ?, ?, ?, ?, ?, NULL, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        email = excluded.email,
        name = excluded.name,
        encrypted_access_token = excluded.encrypted_access_token,
        encrypted_refresh_token = COALESCE(excluded.encrypted_refresh_token, users.encrypted_refresh_token),
        access_token_expires_at = excluded.access_token_expires_at,
        updated_at = excluded.updated_at`,
      args: [
        id,
        email,
        name,
        input.encryptedAccessToken,
        input.encryptedRefreshToken,
        input.accessTokenExpiresAt,
        now,
        now,
      ],
    });

    const user = await this.getById(id);
    if (!user) {
      throw new Error("Failed to load signed-in user");
    }

    return user;
  }

  async saveRefreshedTokens(userId: string, update: RefreshedTokenUpdate): Promise<void> {
    if (!update.encryptedAccessToken) {
      throw new Error("encryptedAccessToken is required");
    }

    const result = await this.db.execute({
      sql: `UPDATE users
        SET encrypted_access_token = ?,
          access_token_expires_at = ?,
          encrypted_refresh_token = COALESCE(?, encrypted_refresh_token),
          updated_at = ?
        WHERE id = ?`,
      args: [
        update.encryptedAccessToken,
        update.accessTokenExpiresAt,
        update.encryptedRefreshToken ?? null,
        new Date().toISOString(),
        userId,
      ],
    });

    if (result.rowsAffected === 0) {
      throw new Error(`User '${userId}' not found while saving refreshed tokens.`);
    }
  }

  async setRootFolder(userId: string, folderId: string): Promise<void> {
    const result = await this.db.execute({
      sql: `UPDATE users
        SET drive_root_folder_id = ?, updated_at = ?
        WHERE id = ?`,
      args: [folderId, new Date().toISOString(), userId],
    });

    if (result.rowsAffected === 0) {
      throw new Error(`User '${userId}' not found while setting root folder.`);
    }
  }
}
