import { createClient, type Client } from "@libsql/client";
import fs from "node:fs";
import path from "node:path";

function ensureParentDirectory(url: string): void {
  if (!url.startsWith("file:")) {
    return;
  }

  const filePath = url.slice("file:".length);
  if (filePath === "" || filePath === ":memory:") {
    return;
  }

  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
}

// Opened once at startup and handed to the stores.
export function openDb(url: string): Client {
  ensureParentDirectory(url);
  return createClient({ url });
}
