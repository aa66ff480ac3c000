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
 * Resolve a path stored relative to `baseDir`. Returns null when the result
 * escapes the directory or names the directory itself.
 */
export function resolveWithin(baseDir: string, relativePath: string): string | null {
  const trimmed = relativePath.trim();
  if (trimmed === "") return null;

  const resolved = path.resolve(baseDir, trimmed);
  if (resolved === path.resolve(baseDir)) return null;
  return isPathWithinDir(resolved, baseDir) ? resolved : null;
}

/**
 * Resolve a configured path against `cwd` unless it is already absolute
 */
export function resolveFrom(cwd: string, target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(cwd, target);
}

/**
 * Relative path with forward slashes, as stored in archives
 */
export function toPosixPath(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}
