/**
 * In-memory artifact writer.
 *
 * Records every write instead of touching the filesystem. Used by tests and
 * by `--dry-run`, where the report lists the artifacts that would be written.
 *
 * @module
 */

import { ArtifactConflictError } from "../errors/errors.js";
import { normalizeArtifactPath, type ArtifactWriter, type WriteOptions } from "./ArtifactWriter.js";

/**
 * A single recorded write.
 */
export interface RecordedWrite {
  readonly path: string;
  readonly content: string;
  readonly overwrite: boolean;
}

export class MemoryArtifactWriter implements ArtifactWriter {
  private readonly store = new Map<string, string>();
  private readonly log: RecordedWrite[] = [];

  /**
   * @param initialFiles - Files present before any write, keyed by relative path
   */
  constructor(initialFiles: Readonly<Record<string, string>> = {}) {
    for (const [file, content] of Object.entries(initialFiles)) {
      this.store.set(normalizeArtifactPath(file), content);
    }
  }

  /** Current contents, keyed by normalized relative path. */
  get files(): ReadonlyMap<string, string> {
    return this.store;
  }

  /** Successful writes, in order. */
  get writes(): readonly RecordedWrite[] {
    return this.log;
  }

  async write(relativePath: string, content: string, options: WriteOptions): Promise<string> {
    const normalized = normalizeArtifactPath(relativePath);

    if (!options.overwrite && this.store.has(normalized)) {
      throw new ArtifactConflictError(relativePath, normalized);
    }

    this.store.set(normalized, content);
    this.log.push({ path: normalized, content, overwrite: options.overwrite });
    return normalized;
  }

  async exists(relativePath: string): Promise<boolean> {
    return this.store.has(normalizeArtifactPath(relativePath));
  }

  /**
   * Reads a stored artifact.
   */
  read(relativePath: string): string | undefined {
    return this.store.get(normalizeArtifactPath(relativePath));
  }
}
