/**
 * Artifact writer contract.
 *
 * The writer is the only collaborator through which steps touch the
 * destination tree. Paths are always relative to the writer's root and use
 * forward slashes.
 *
 * @module
 */

import * as path from "node:path";
import { ArtifactPathError } from "../errors/errors.js";

// =============================================================================
// Types
// =============================================================================

export interface WriteOptions {
  /**
   * Replace an existing artifact. When false, an existing path fails the
   * write with ArtifactConflictError.
   */
  readonly overwrite: boolean;
}

export interface ArtifactWriter {
  /**
   * Writes an artifact, creating parent directories as needed.
   *
   * @returns The resolved path of the artifact
   * @throws ArtifactConflictError when the path exists and overwrite is false
   * @throws ArtifactPathError when the path is absolute or escapes the root
   */
  write(relativePath: string, content: string, options: WriteOptions): Promise<string>;

  /**
   * Checks whether an artifact exists at the given path.
   */
  exists(relativePath: string): Promise<boolean>;
}

// =============================================================================
// Path Validation
// =============================================================================

/**
 * Normalizes a relative artifact path to forward slashes.
 *
 * @throws ArtifactPathError for empty, absolute or escaping paths
 */
export function normalizeArtifactPath(relativePath: string): string {
  if (relativePath.trim().length === 0) {
    throw new ArtifactPathError(relativePath, "path is empty");
  }

  const posixPath = relativePath.replace(/\\/g, "/");
  if (path.posix.isAbsolute(posixPath) || path.win32.isAbsolute(relativePath)) {
    throw new ArtifactPathError(relativePath, "path must be relative");
  }

  const normalized = path.posix.normalize(posixPath);
  if (normalized === "." || normalized.endsWith("/")) {
    throw new ArtifactPathError(relativePath, "path must name a file");
  }
  if (normalized === ".." || normalized.startsWith("../")) {
    throw new ArtifactPathError(relativePath, "path escapes the destination root");
  }

  return normalized;
}

/**
 * Resolves a relative artifact path against a root directory.
 *
 * @throws ArtifactPathError when the result would leave the root
 */
export function resolveArtifactPath(root: string, relativePath: string): string {
  const normalized = normalizeArtifactPath(relativePath);
  const resolvedRoot = path.resolve(root);
  const absolute = path.resolve(resolvedRoot, normalized);

  const relative = path.relative(resolvedRoot, absolute);
  if (relative === "" || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ArtifactPathError(relativePath, "path escapes the destination root");
  }
  return absolute;
}
