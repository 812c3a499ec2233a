import { open, rm, type FileHandle } from "node:fs/promises";
import path from "node:path";

import { InvalidRequestError, SizeExceededError } from "../core/errors";
import { logger } from "../utils/logger";
import type { DriveContentSource } from "./client";

/**
 * Streams one Drive file to disk, counting bytes as they arrive. Declared
 * sizes can be absent or wrong, so the ceiling is enforced on every chunk.
 * On any failure the partial file is removed before the error propagates.
 */
function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

export class DownloadExecutor {
  constructor(private readonly source: DriveContentSource) {}

  async download(accessToken: string, fileId: string, destinationPath: string, byteCeiling: number): Promise<string> {
    let handle: FileHandle;
    try {
      handle = await open(destinationPath, "wx");
    } catch (error) {
      if (isAlreadyExists(error)) {
        logger.warn("drive_download_name_exhausted", { fileId, destinationPath });
        throw new InvalidRequestError(
          `No free file name left for ${path.basename(destinationPath)}; remove older downloads and retry`,
        );
      }
      throw error;
    }
    let total = 0;
    let completed = false;

    try {
      for await (const chunk of this.source.streamContent(accessToken, fileId)) {
        total += chunk.byteLength;
        if (total > byteCeiling) {
          throw new SizeExceededError(byteCeiling, total);
        }

        await handle.write(chunk);
      }

      completed = true;
    } finally {
      try {
        await handle.close();
      } finally {
        if (!completed) {
          await rm(destinationPath, { force: true });
          logger.warn("drive_download_aborted", { fileId, bytes: total, byteCeiling });
        }
      }
    }

    logger.info("drive_download_completed", { fileId, bytes: total });
    return path.basename(destinationPath);
  }
}
