/**
 * Path and environment helpers.
 */

import { existsSync, mkdirSync, statSync } from "fs";
import { homedir } from "os";
import { delimiter, join, sep } from "path";

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandUser(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Create a directory (and parents) if it does not exist.
 */
export function ensureDir(path: string): string {
  if (!existsSync(path)) {
    mkdirSync(path, { recursive: true });
  }
  return path;
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Whether a binary can be found. Names containing a path separator are
 * checked as file paths; bare names are searched on PATH.
 */
export function binOnPath(bin: string, pathEnv: string = process.env.PATH || ""): boolean {
  if (bin.includes("/") || bin.includes(sep)) {
    return isFile(bin);
  }

  return pathEnv
    .split(delimiter)
    .map((dir) => dir.trim())
    .filter((dir) => dir.length > 0)
    .some((dir) => isFile(join(dir, bin)));
}

/**
 * Today's local date as YYYY-MM-DD.
 */
export function todayDate(now: Date = new Date()): string {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
