import { access, stat } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a regular file the current user may execute
 * Windows has no execute bit, so any regular file passes there.
 */
export async function isExecutable(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return false;
    if (process.platform !== "win32") {
      await access(path, constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}
