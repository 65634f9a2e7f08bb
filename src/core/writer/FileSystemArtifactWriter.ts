/**
 * Filesystem-backed artifact writer.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ArtifactConflictError, ForgeError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { resolveArtifactPath, type ArtifactWriter, type WriteOptions } from "./ArtifactWriter.js";

export interface FileSystemArtifactWriterOptions {
  /** Treat every write as an overwrite (CLI `--force`) */
  readonly force?: boolean;
}

/**
 * Writes artifacts under a destination root directory.
 *
 * @example
 * ```typescript
 * const writer = new FileSystemArtifactWriter("./orders", { force: false });
 * await writer.write("app/main.py", source, { overwrite: true });
 * ```
 */
export class FileSystemArtifactWriter implements ArtifactWriter {
  readonly root: string;
  private readonly force: boolean;

  constructor(root: string, options: FileSystemArtifactWriterOptions = {}) {
    this.root = path.resolve(root);
    this.force = options.force ?? false;
  }

  async write(relativePath: string, content: string, options: WriteOptions): Promise<string> {
    const absolutePath = resolveArtifactPath(this.root, relativePath);
    const overwrite = options.overwrite || this.force;

    await this.createParent(relativePath, absolutePath);

    try {
      // "wx" fails with EEXIST when the file is already there
      await fs.writeFile(absolutePath, content, { encoding: "utf-8", flag: overwrite ? "w" : "wx" });
    } catch (err) {
      if (isErrnoCode(err, "EEXIST")) {
        throw new ArtifactConflictError(relativePath, absolutePath);
      }
      throw writeFailed(relativePath, absolutePath, err);
    }

    return absolutePath;
  }

  async exists(relativePath: string): Promise<boolean> {
    const absolutePath = resolveArtifactPath(this.root, relativePath);
    try {
      await fs.access(absolutePath);
      return true;
    } catch {
      return false;
    }
  }

  private async createParent(relativePath: string, absolutePath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    } catch (err) {
      throw writeFailed(relativePath, absolutePath, err);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function writeFailed(relativePath: string, absolutePath: string, err: unknown): ForgeError {
  const cause = toError(err);
  return new ForgeError(
    `Failed to write artifact: ${relativePath}`,
    ErrorCode.ARTIFACT_WRITE_FAILED,
    { relativePath, absolutePath },
    undefined,
    `Check that the destination directory is writable: ${cause.message}`,
    cause,
    false,
  );
}
