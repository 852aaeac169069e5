/**
 * Path validation and manipulation utilities
 */

import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(normalizedDir + path.sep) ||
    normalizedPath === normalizedDir
  );
}

/**
 * Ensure a path ends with a separator. rsync copies the directory contents,
 * not the directory itself, when the source ends in one.
 */
export function ensureTrailingSep(dirPath: string): string {
  return dirPath.endsWith(path.sep) ? dirPath : dirPath + path.sep;
}

/**
 * True for a bare file name that cannot escape its directory.
 */
export function isSafeFileComponent(name: string): boolean {
  return name !== "." && name !== ".." && !name.includes("/") && !name.includes("\\") && !name.includes("\0");
}
