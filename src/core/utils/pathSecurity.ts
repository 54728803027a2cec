/**
 * Secure path resolution for files keyed by caller-supplied ids
 */

import path from "path";
import { PathTraversalError } from "../errors";

/**
 * Resolve `fileName` inside `baseDir`, rejecting anything that could land
 * outside it: separators, "..", encoded traversal, null bytes.
 *
 * @returns Absolute path inside baseDir
 * @throws PathTraversalError
 */
export function resolveInside(baseDir: string, fileName: string): string {
  if (!fileName || typeof fileName !== "string") {
    throw new PathTraversalError("Empty or invalid path");
  }

  if (fileName.includes("\0")) {
    throw new PathTraversalError("Path contains null bytes");
  }

  if (/[/\\]/.test(fileName) || fileName.includes("..") || /%2e|%2f|%5c/i.test(fileName)) {
    throw new PathTraversalError(fileName);
  }

  const base = path.resolve(baseDir);
  const resolved = path.resolve(base, fileName);

  const relative = path.relative(base, resolved);
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new PathTraversalError(fileName);
  }

  return resolved;
}

/**
 * Validate path length
 */
export function validatePathLength(userPath: string, maxLength: number = 255): void {
  if (userPath.length > maxLength) {
    throw new PathTraversalError(`Path exceeds maximum length of ${maxLength} characters`);
  }
}
