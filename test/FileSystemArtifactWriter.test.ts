/**
 * Tests for the file system artifact writer.
 *
 * Writes into temporary directories and checks overwrite and conflict handling.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { FileSystemArtifactWriter } from "../src/core/writer/FileSystemArtifactWriter.js";
import { ArtifactConflictError } from "../src/core/errors/errors.js";
import { cleanupTestDir, createTestDir } from "./helpers/testUtils.js";

describe("FileSystemArtifactWriter", () => {
  let root: string;

  beforeEach(async () => {
    root = await createTestDir("writer");
  });

  afterEach(async () => {
    await cleanupTestDir(root);
  });

  it("creates parent directories and returns the absolute path", async () => {
    const writer = new FileSystemArtifactWriter(root);

    const written = await writer.write("app/core/config.py", "X = 1\n", { overwrite: false });

    expect(written).toBe(path.join(root, "app", "core", "config.py"));
    expect(await fs.readFile(written, "utf-8")).toBe("X = 1\n");
  });

  it("fails with a conflict when the file exists and overwrite is off", async () => {
    const writer = new FileSystemArtifactWriter(root);
    await writer.write(".env", "SECRET_KEY=test-secret\n", { overwrite: false });

    await expect(writer.write(".env", "changed", { overwrite: false })).rejects.toBeInstanceOf(
      ArtifactConflictError,
    );
    expect(await fs.readFile(path.join(root, ".env"), "utf-8")).toBe("SECRET_KEY=test-secret\n");
  });

  it("overwrites when asked", async () => {
    const writer = new FileSystemArtifactWriter(root);
    await writer.write("README.md", "one", { overwrite: false });

    await writer.write("README.md", "two", { overwrite: true });

    expect(await fs.readFile(path.join(root, "README.md"), "utf-8")).toBe("two");
  });

  it("treats every write as an overwrite when forced", async () => {
    await fs.writeFile(path.join(root, ".env"), "old", "utf-8");
    const writer = new FileSystemArtifactWriter(root, { force: true });

    await writer.write(".env", "new", { overwrite: false });

    expect(await fs.readFile(path.join(root, ".env"), "utf-8")).toBe("new");
  });

  it("reports existence", async () => {
    const writer = new FileSystemArtifactWriter(root);

    expect(await writer.exists("alembic/env.py")).toBe(false);
    await writer.write("alembic/env.py", "", { overwrite: false });
    expect(await writer.exists("alembic/env.py")).toBe(true);
  });

  it("fails with ARTIFACT_WRITE_FAILED when a parent is a file", async () => {
    const writer = new FileSystemArtifactWriter(root);
    await writer.write("app", "not a directory", { overwrite: false });

    await expect(writer.write("app/main.py", "", { overwrite: false })).rejects.toMatchObject({
      code: "ARTIFACT_WRITE_FAILED",
    });
  });
});
