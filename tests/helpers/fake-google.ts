import { FOLDER_MIME_TYPE } from "../../src/drive/client";

export const TEST_TOKEN_URL = "https://oauth.test/token";
export const TEST_USERINFO_URL = "https://oauth.test/userinfo";
export const TEST_AUTHORIZATION_URL = "https://accounts.test/o/oauth2/auth";
export const TEST_DRIVE_BASE_URL = "https://drive.test/drive/v3";

const DRIVE_FILES_PATH = "/drive/v3/files";
const PARENT_QUERY = /^'(.+)' in parents and trashed = false$/;

export interface FakeDriveNode {
  id: string;
  name: string;
  mimeType: string;
  parentId: string;
  /** Sent as-is in listings; omitted when undefined. */
  size?: string;
  content?: Uint8Array;
}

export interface FakeProfile {
  sub: string;
  email: string;
  name: string;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/**
 * In-process stand-in for Google's token, userinfo and Drive v3 endpoints.
 * Install with `vi.stubGlobal("fetch", google.fetch)`.
 */
export class FakeGoogle {
  readonly nodes: FakeDriveNode[] = [];
  readonly validAccessTokens = new Set<string>(["access-current"]);
  readonly listCalls: string[] = [];
  readonly contentCalls: string[] = [];
  readonly tokenRequests: URLSearchParams[] = [];
  readonly driveTokensSeen: string[] = [];

  profile: FakeProfile = { sub: "google-sub-1", email: "Reader@Example.com", name: "Test Reader" };
  pageSize = 100;
  /** When set, refresh requests are refused with this OAuth error code. */
  refreshError: string | null = null;
  /** When set, refresh responses also carry this new refresh token. */
  rotatedRefreshToken: string | null = null;
  signInRefreshToken: string | null = "refresh-signin";
  /** When set, every authorized Drive call answers with this status. */
  driveFailureStatus: number | null = null;

  private issued = 0;

  addFolder(id: string, name: string, parentId: string): this {
    this.nodes.push({ id, name, mimeType: FOLDER_MIME_TYPE, parentId });
    return this;
  }

  addFile(node: FakeDriveNode): this {
    this.nodes.push(node);
    return this;
  }

  tokenRequestCount(grantType: string): number {
    return this.tokenRequests.filter((form) => form.get("grant_type") === grantType).length;
  }

  readonly fetch = async (...args: Parameters<typeof fetch>): Promise<Response> => {
    const request = new Request(...args);
    const url = new URL(request.url);
    const endpoint = `${url.origin}${url.pathname}`;

    if (endpoint === TEST_TOKEN_URL && request.method === "POST") {
      return this.handleToken(new URLSearchParams(await request.text()));
    }

    const bearer = request.headers.get("authorization")?.replace(/^Bearer /, "") ?? "";

    if (endpoint === TEST_USERINFO_URL) {
      if (!this.validAccessTokens.has(bearer)) {
        return json({ error: "invalid_token" }, 401);
      }
      return json(this.profile);
    }

    if (url.pathname.startsWith(DRIVE_FILES_PATH)) {
      this.driveTokensSeen.push(bearer);
      if (!this.validAccessTokens.has(bearer)) {
        return json({ error: { code: 401, message: "Invalid Credentials" } }, 401);
      }
      if (this.driveFailureStatus !== null) {
        return json({ error: { code: this.driveFailureStatus, message: "Backend Error" } }, this.driveFailureStatus);
      }
      return this.handleDrive(url);
    }

    return json({ error: "not_found" }, 404);
  };

  private issueAccessToken(): string {
    this.issued += 1;
    const token = `access-issued-${this.issued}`;
    this.validAccessTokens.add(token);
    return token;
  }

  private handleToken(form: URLSearchParams): Response {
    this.tokenRequests.push(form);
    const grantType = form.get("grant_type");

    if (grantType === "authorization_code") {
      const accessToken = this.issueAccessToken();
      return json({
        access_token: accessToken,
        expires_in: 3599,
        token_type: "Bearer",
        ...(this.signInRefreshToken ? { refresh_token: this.signInRefreshToken } : {}),
      });
    }

    if (grantType === "refresh_token") {
      if (this.refreshError) {
        return json({ error: this.refreshError }, 400);
      }
      return json({
        access_token: this.issueAccessToken(),
        expires_in: 3599,
        token_type: "Bearer",
        ...(this.rotatedRefreshToken ? { refresh_token: this.rotatedRefreshToken } : {}),
      });
    }

    return json({ error: "unsupported_grant_type" }, 400);
  }

  private handleDrive(url: URL): Response {
    if (url.pathname === DRIVE_FILES_PATH) {
      const match = PARENT_QUERY.exec(url.searchParams.get("q") ?? "");
      if (!match) {
        return json({ error: { code: 400, message: "Invalid query" } }, 400);
      }

      const parentId = match[1];
      this.listCalls.push(parentId);
      const children = this.nodes.filter((node) => node.parentId === parentId);
      const offset = Number(url.searchParams.get("pageToken") ?? "0");
      const page = children.slice(offset, offset + this.pageSize);
      const nextOffset = offset + this.pageSize;

      return json({
        files: page.map((node) => ({
          id: node.id,
          name: node.name,
          mimeType: node.mimeType,
          ...(node.size === undefined ? {} : { size: node.size }),
        })),
        ...(nextOffset < children.length ? { nextPageToken: String(nextOffset) } : {}),
      });
    }

    const fileId = decodeURIComponent(url.pathname.slice(DRIVE_FILES_PATH.length + 1));
    const node = this.nodes.find((candidate) => candidate.id === fileId);
    if (!node) {
      return json({ error: { code: 404, message: "File not found" } }, 404);
    }

    if (url.searchParams.get("alt") === "media") {
      this.contentCalls.push(fileId);
      return new Response(node.content ?? new Uint8Array(0), { status: 200 });
    }

    return json({ id: node.id, mimeType: node.mimeType });
  }
}
