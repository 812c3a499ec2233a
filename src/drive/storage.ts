import { access, mkdir } from "node:fs/promises";
import path from "node:path";

const MAX_FILENAME_LENGTH = 200;
const MAX_COLLISION_SUFFIX = 99;
const UNSAFE_FILENAME_CHARACTERS = /[\\/:*?"<>|\s]+/g;

export function safeFilename(name: string): string {
  const safe = name.replace(UNSAFE_FILENAME_CHARACTERS, "_").slice(0, MAX_FILENAME_LENGTH);
  if (safe === "" || safe === "." || safe === "..") {
    return "unnamed";
  }

  return safe;
}

/** `<root>/users/user_<id>/<parts...>`, created when missing. */
export async function userStoragePath(storageRoot: string, userId: string, ...parts: string[]): Promise<string> {
  const directory = path.join(storageRoot, "users", `user_${safeFilename(userId)}`, ...parts);
  await mkdir(directory, { recursive: true });
  return directory;
}

async function pathExists(candidate: string): Promise<boolean> {
  try {
    await access(candidate);
    return true;
  } catch {
    return false;
  }
}

/**
 * First free name among `name.ext`, `name_1.ext` … `name_99.ext`. When all
 * are taken the last candidate is returned anyway and the exclusive open in
 * the download reports the clash.
 */
export async function resolveDownloadPath(directory: string, baseName: string): Promise<string> {
  const direct = path.join(directory, baseName);
  if (!(await pathExists(direct))) {
    return direct;
  }

  const extension = path.extname(baseName);
  const stem = extension ? baseName.slice(0, -extension.length) : baseName;
  for (let suffix = 1; suffix <= MAX_COLLISION_SUFFIX; suffix += 1) {
    const candidate = path.join(directory, `${stem}_${suffix}${extension}`);
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }

  return path.join(directory, `${stem}_${MAX_COLLISION_SUFFIX}${extension}`);
}
