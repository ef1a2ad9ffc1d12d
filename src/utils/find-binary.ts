/**
 * Locate an executable
 * Looks on PATH first, then searches the given directories with fast-glob
 */

import glob from "fast-glob";
import { homedir } from "node:os";
import path from "node:path";
import { isExecutable } from "./file-exists";

function candidateNames(name: string): string[] {
  if (process.platform === "win32" && !name.toLowerCase().endsWith(".exe")) {
    return [name, `${name}.exe`];
  }
  return [name];
}

function expandHome(directory: string): string {
  return directory.replace(/^~(?=$|[\\/])/, homedir());
}

async function findOnPath(names: string[]): Promise<string | null> {
  const directories = (process.env.PATH ?? "")
    .split(path.delimiter)
    .filter((directory) => directory.length > 0);

  for (const directory of directories) {
    for (const name of names) {
      const candidate = path.join(directory, name);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

async function findInDirectory(
  directory: string,
  names: string[],
): Promise<string | null> {
  const matches = await glob(
    names.map((name) => `**/${name}`),
    {
      cwd: expandHome(directory),
      absolute: true,
      onlyFiles: true,
      suppressErrors: true,
      caseSensitiveMatch: process.platform !== "win32",
    },
  );

  // Shortest path first, then alphabetical, so the result is stable
  const sorted = matches.sort((a, b) => a.length - b.length || a.localeCompare(b));
  for (const match of sorted) {
    if (await isExecutable(match)) {
      return path.normalize(match);
    }
  }
  return null;
}

/**
 * Resolve a binary name or path to an executable file
 * Returns null when nothing is found.
 */
export async function findBinary(
  binary: string,
  searchDirectories: string[] = [],
): Promise<string | null> {
  if (path.isAbsolute(binary) || binary.includes("/") || binary.includes("\\")) {
    const resolved = path.resolve(expandHome(binary));
    return (await isExecutable(resolved)) ? resolved : null;
  }

  const names = candidateNames(binary);
  const onPath = await findOnPath(names);
  if (onPath) {
    return onPath;
  }

  for (const directory of searchDirectories) {
    const found = await findInDirectory(directory, names);
    if (found) {
      return found;
    }
  }
  return null;
}
