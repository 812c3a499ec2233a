import { z } from "zod";

import type { DriveApiConfig } from "../config";
import { ProviderError } from "../core/errors";
import { logger } from "../utils/logger";
import { sanitizeProviderResponse } from "../utils/sanitize";

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

const LIST_FIELDS = "nextPageToken, files(id, name, mimeType, size)";

const driveEntrySchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  mimeType: z.string().optional(),
  size: z.union([z.string(), z.number()]).optional(),
});

const driveListSchema = z.object({
  files: z.array(driveEntrySchema).default([]),
  nextPageToken: z.string().optional(),
});

const driveMetadataSchema = z.object({
  id: z.string(),
  mimeType: z.string().optional(),
});

export type DriveEntry = z.infer<typeof driveEntrySchema>;
export type DriveFileMetadata = z.infer<typeof driveMetadataSchema>;

export interface DriveListPage {
  files: DriveEntry[];
  nextPageToken: string | null;
}

export interface DriveListingSource {
  listChildren(accessToken: string, folderId: string, pageToken?: string | null): Promise<DriveListPage>;
}

export interface DriveMetadataSource {
  getFileMetadata(accessToken: string, fileId: string): Promise<DriveFileMetadata | null>;
}

export interface DriveContentSource {
  streamContent(accessToken: string, fileId: string): AsyncIterable<Uint8Array>;
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

function escapeQueryValue(value: string): string {
  return value.replaceAll("\\", "\\\\").replaceAll("'", "\\'");
}

/**
 * Read-only Drive v3 REST calls with bearer auth and finite timeouts. Every
 * non-2xx answer becomes a ProviderError carrying the status; nothing here
 * retries.
 */
export class DriveClient implements DriveListingSource, DriveMetadataSource, DriveContentSource {
  constructor(private readonly config: DriveApiConfig) {}

  async listChildren(accessToken: string, folderId: string, pageToken?: string | null): Promise<DriveListPage> {
    const params = new URLSearchParams({
      q: `'${escapeQueryValue(folderId)}' in parents and trashed = false`,
      fields: LIST_FIELDS,
    });
    if (pageToken) {
      params.set("pageToken", pageToken);
    }

    const payload = await this.getJson(accessToken, `/files?${params.toString()}`, "list");
    const parsed = driveListSchema.safeParse(payload ?? {});
    if (!parsed.success) {
      throw new ProviderError(null, "Drive listing response is malformed");
    }

    return {
      files: parsed.data.files,
      nextPageToken: parsed.data.nextPageToken || null,
    };
  }

  /** Returns null when Drive answers 404. */
  async getFileMetadata(accessToken: string, fileId: string): Promise<DriveFileMetadata | null> {
    const params = new URLSearchParams({ fields: "id, mimeType" });

    let payload: unknown;
    try {
      payload = await this.getJson(
        accessToken,
        `/files/${encodeURIComponent(fileId)}?${params.toString()}`,
        "metadata",
      );
    } catch (error) {
      if (error instanceof ProviderError && error.status === 404) {
        return null;
      }
      throw error;
    }

    const parsed = driveMetadataSchema.safeParse(payload);
    return parsed.success ? parsed.data : null;
  }

  /**
   * Yields the file body as it arrives. The download timeout is an idle
   * timeout: it restarts with every chunk.
   */
  async *streamContent(accessToken: string, fileId: string): AsyncGenerator<Uint8Array> {
    const controller = new AbortController();
    let timedOut = false;
    const armTimer = () =>
      setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.config.downloadTimeoutMs);
    let timer = armTimer();

    try {
      const response = await fetch(`${this.config.baseUrl}/files/${encodeURIComponent(fileId)}?alt=media`, {
        method: "GET",
        headers: { authorization: `Bearer ${accessToken}` },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw await this.toProviderError(response, "content");
      }

      if (!response.body) {
        return;
      }

      const reader = response.body.getReader();
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          return;
        }

        clearTimeout(timer);
        timer = armTimer();
        yield value;
      }
    } catch (error) {
      if (timedOut) {
        throw new ProviderError(null, "Drive download timed out");
      }
      if (error instanceof ProviderError) {
        throw error;
      }
      throw new ProviderError(null, `Drive download failed: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      clearTimeout(timer);
      // Releases the connection when the consumer stops early.
      controller.abort();
    }
  }

  private async getJson(accessToken: string, pathAndQuery: string, operation: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}${pathAndQuery}`, {
        method: "GET",
        headers: {
          authorization: `Bearer ${accessToken}`,
          accept: "application/json",
        },
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (error) {
      logger.warn("drive_request_failed", { operation, timeout: isTimeoutError(error), error });
      throw new ProviderError(null, isTimeoutError(error) ? "Drive request timed out" : "Drive request failed");
    }

    if (!response.ok) {
      throw await this.toProviderError(response, operation);
    }

    const raw = await response.text();
    if (raw.trim() === "") {
      return null;
    }

    try {
      return JSON.parse(raw) as unknown;
    } catch {
      throw new ProviderError(response.status, "Drive response was not valid JSON");
    }
  }

  private async toProviderError(response: Response, operation: string): Promise<ProviderError> {
    const body = await response.text().catch(() => "");
    logger.warn("drive_request_rejected", {
      operation,
      status: response.status,
      body: sanitizeProviderResponse(body),
    });
    return new ProviderError(response.status, `Drive ${operation} request failed (${response.status})`);
  }
}
