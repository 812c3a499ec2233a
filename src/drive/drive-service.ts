import type { DriveLimits } from "../config";
import { InvalidRequestError } from "../core/errors";
import type { UserRecord } from "../db/users";
import { logger } from "../utils/logger";
import type { AccessTokenProvider } from "../vault/token-broker";
import { FOLDER_MIME_TYPE, type DriveMetadataSource } from "./client";
import type { DownloadExecutor } from "./download";
import type { EligibleFile, RecursiveScanner } from "./scanner";
import { resolveDownloadPath, safeFilename, userStoragePath } from "./storage";
import { RequestTokenScope } from "./token-scope";

export const ROOT_FOLDER_REQUIRED_MESSAGE = "Set a root folder first (POST /drive/root-folder)";

export interface RootFolderStore {
  setRootFolder(userId: string, folderId: string): Promise<void>;
}

export interface DriveServiceOptions {
  broker: AccessTokenProvider;
  rootFolders: RootFolderStore;
  metadata: DriveMetadataSource;
  scanner: RecursiveScanner;
  downloader: DownloadExecutor;
  storageRoot: string;
  limits: DriveLimits;
}

export class DriveService {
  constructor(private readonly options: DriveServiceOptions) {}

  /** True when the id names an accessible folder; 404 and non-folders are false. */
  async validateFolder(accessToken: string, folderId: string): Promise<boolean> {
    const metadata = await this.options.metadata.getFileMetadata(accessToken, folderId);
    return metadata?.mimeType === FOLDER_MIME_TYPE;
  }

  async setRootFolder(user: UserRecord, folderId: string): Promise<string> {
    const normalized = folderId.trim();
    if (!normalized) {
      throw new InvalidRequestError("folder_id cannot be empty");
    }

    const scope = new RequestTokenScope(this.options.broker, user);
    const valid = await scope.run((accessToken) => this.validateFolder(accessToken, normalized));
    if (!valid) {
      throw new InvalidRequestError("Folder not found or not a folder; check the ID and your Drive access");
    }

    await this.options.rootFolders.setRootFolder(user.id, normalized);
    user.driveRootFolderId = normalized;
    logger.info("drive_root_folder_set", { userId: user.id, folderId: normalized });
    return normalized;
  }

  /** Null when the user has not chosen a root folder yet. */
  async listEligibleFiles(user: UserRecord): Promise<EligibleFile[] | null> {
    const rootFolderId = user.driveRootFolderId;
    if (!rootFolderId) {
      return null;
    }

    const scope = new RequestTokenScope(this.options.broker, user);
    return scope.run((accessToken) => this.options.scanner.scan(accessToken, rootFolderId));
  }

  /**
   * Downloads the requested files one after another into the user's raw
   * directory. Every id must be eligible under the root folder at the time
   * of the request; the first failure aborts the rest of the batch.
   */
  async downloadFiles(user: UserRecord, fileIds: string[]): Promise<string[]> {
    if (fileIds.length === 0) {
      return [];
    }

    const { maxDownloadFiles, maxEligibleFileBytes } = this.options.limits;
    if (fileIds.length > maxDownloadFiles) {
      throw new InvalidRequestError(`At most ${maxDownloadFiles} files per request`);
    }

    const rootFolderId = user.driveRootFolderId;
    if (!rootFolderId) {
      throw new InvalidRequestError(ROOT_FOLDER_REQUIRED_MESSAGE);
    }

    const scope = new RequestTokenScope(this.options.broker, user);
    const eligible = await scope.run((accessToken) => this.options.scanner.scan(accessToken, rootFolderId));
    const nameById = new Map(eligible.map((file) => [file.id, file.name]));

    for (const fileId of fileIds) {
      if (!nameById.has(fileId)) {
        throw new InvalidRequestError(`File ${fileId} is not an eligible file under your root folder`);
      }
    }

    const rawDirectory = await userStoragePath(this.options.storageRoot, user.id, "drive", "raw");
    const downloaded: string[] = [];

    for (const fileId of fileIds) {
      const name = safeFilename(nameById.get(fileId) ?? fileId);
      const destinationPath = await resolveDownloadPath(rawDirectory, name);
      const basename = await scope.run((accessToken) =>
        this.options.downloader.download(accessToken, fileId, destinationPath, maxEligibleFileBytes),
      );
      downloaded.push(basename);
    }

    logger.info("drive_download_batch_completed", { userId: user.id, count: downloaded.length });
    return downloaded;
  }
}
