import { ScanLimitExceededError } from "../core/errors";
import { logger } from "../utils/logger";
import { FOLDER_MIME_TYPE, type DriveEntry, type DriveListingSource } from "./client";

/** Book formats the downstream pipeline accepts. */
export const ELIGIBLE_MIME_TYPES: ReadonlySet<string> = new Set([
  "application/pdf",
  "application/epub+zip",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
]);

export interface EligibleFile {
  id: string;
  name: string;
  mimeType: string;
  /** Declared size; null when Drive did not report one. */
  size: number | null;
}

export interface ScanLimits {
  maxFolders: number;
  maxFiles: number;
  maxFileBytes: number;
}

const INTEGER_PATTERN = /^\+?\d+$/;

type SizeCheck = { eligible: true; size: number | null } | { eligible: false };

function checkDeclaredSize(raw: DriveEntry["size"], maxFileBytes: number): SizeCheck {
  if (raw === undefined) {
    // Unknown size passes here; the download enforces the ceiling on actual bytes.
    return { eligible: true, size: null };
  }

  const size = typeof raw === "number" ? raw : INTEGER_PATTERN.test(raw.trim()) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(size) || size < 0) {
    return { eligible: false };
  }

  return size <= maxFileBytes ? { eligible: true, size } : { eligible: false };
}

/**
 * Walks the folder graph under a root with an explicit stack. Folder ids are
 * enqueued once, so shared parents and cycles are visited a single time.
 * The folder ceiling is checked before each listing, which bounds API calls.
 */
export class RecursiveScanner {
  constructor(
    private readonly source: DriveListingSource,
    private readonly limits: ScanLimits,
  ) {}

  async scan(accessToken: string, rootFolderId: string): Promise<EligibleFile[]> {
    const { maxFolders, maxFiles, maxFileBytes } = this.limits;
    const eligible: EligibleFile[] = [];
    const stack: string[] = [rootFolderId];
    const visited = new Set<string>([rootFolderId]);
    let foldersProcessed = 0;

    while (stack.length > 0) {
      if (foldersProcessed >= maxFolders) {
        logger.warn("drive_scan_folder_limit", { maxFolders, pending: stack.length });
        throw new ScanLimitExceededError("folders", maxFolders, foldersProcessed);
      }

      const folderId = stack.pop();
      if (folderId === undefined) {
        break;
      }
      foldersProcessed += 1;

      let pageToken: string | null = null;
      do {
        const page = await this.source.listChildren(accessToken, folderId, pageToken);

        for (const entry of page.files) {
          if (!entry.id) {
            continue;
          }

          const mimeType = entry.mimeType ?? "";
          if (mimeType === FOLDER_MIME_TYPE) {
            if (!visited.has(entry.id)) {
              visited.add(entry.id);
              stack.push(entry.id);
            }
            continue;
          }

          if (!ELIGIBLE_MIME_TYPES.has(mimeType)) {
            continue;
          }

          const sizeCheck = checkDeclaredSize(entry.size, maxFileBytes);
          if (!sizeCheck.eligible) {
            continue;
          }

          if (eligible.length >= maxFiles) {
            logger.warn("drive_scan_file_limit", { maxFiles, foldersProcessed });
            throw new ScanLimitExceededError("files", maxFiles, eligible.length + 1);
          }

          eligible.push({
            id: entry.id,
            name: entry.name ?? "unknown",
            mimeType,
            size: sizeCheck.size,
          });
        }

        pageToken = page.nextPageToken;
      } while (pageToken);
    }

    logger.debug("drive_scan_completed", {
      rootFolderId,
      foldersProcessed,
      eligibleFiles: eligible.length,
    });

    return eligible;
  }
}
