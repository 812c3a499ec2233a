import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";

import { ROOT_FOLDER_REQUIRED_MESSAGE, type DriveService } from "../drive/drive-service";
import { requireUser } from "../middleware/session";
import { parseJsonBody } from "../utils/json-body";

const setRootFolderSchema = z.object({
  folder_id: z.string().min(1).max(255),
});

const downloadSchema = z.object({
  file_ids: z.array(z.string().min(1).max(255)),
});

export interface DriveRoutesOptions {
  drive: DriveService;
  requireSession: MiddlewareHandler;
}

export function createDriveRoutes(options: DriveRoutesOptions): Hono {
  const app = new Hono();
  app.use("*", options.requireSession);

  app.post("/root-folder", async (c) => {
    const user = requireUser(c);
    const body = await parseJsonBody(c, setRootFolderSchema);
    if (!body.ok) {
      return body.response;
    }

    const folderId = await options.drive.setRootFolder(user, body.data.folder_id);
    return c.json({ ok: true, folder_id: folderId });
  });

  app.get("/root-folder", (c) => {
    const user = requireUser(c);
    return c.json({ folder_id: user.driveRootFolderId });
  });

  app.get("/files", async (c) => {
    const user = requireUser(c);
    const files = await options.drive.listEligibleFiles(user);
    if (files === null) {
      return c.json({ files: [], message: ROOT_FOLDER_REQUIRED_MESSAGE });
    }

    return c.json({ files });
  });

  app.post("/download", async (c) => {
    const user = requireUser(c);
    const body = await parseJsonBody(c, downloadSchema);
    if (!body.ok) {
      return body.response;
    }

    if (body.data.file_ids.length === 0) {
      return c.json({ downloaded: [], message: "No file_ids provided" });
    }

    const downloaded = await options.drive.downloadFiles(user, body.data.file_ids);
    return c.json({ downloaded });
  });

  return app;
}
