/**
 * Tests for the generate command handler.
 *
 * @module
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  assertSuccess,
  formatGenerateOutput,
  handleGenerate,
} from "../src/cli/handlers/generateHandler.js";
import { handleDocker } from "../src/cli/handlers/dockerHandler.js";
import { ConfigStore } from "../src/core/config/ConfigStore.js";
import { TemplateLibrary } from "../src/core/render/TemplateLibrary.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";
import { ForgeError } from "../src/core/errors/errors.js";
import { cleanupTestDir, createTestDir, fullConfig, minimalConfig } from "./helpers/testUtils.js";

describe("generate handlers", () => {
  let templates: TemplateLibrary;
  let dir: string;
  const store = new ConfigStore();

  beforeAll(async () => {
    templates = await TemplateLibrary.load();
  });

  beforeEach(async () => {
    dir = await createTestDir("handlers");
  });

  afterEach(async () => {
    await cleanupTestDir(dir);
  });

  // ===========================================================================
  // handleGenerate
  // ===========================================================================

  describe("handleGenerate", () => {
    it("fails when the project has no configuration", async () => {
      await expect(
        handleGenerate({ projectDir: dir, force: false, dryRun: false }, { templates }),
      ).rejects.toMatchObject({ code: ErrorCode.CONFIG_NOT_FOUND });
    });

    it("generates from the saved configuration", async () => {
      await store.save(dir, minimalConfig());

      const result = await handleGenerate({ projectDir: dir, force: false, dryRun: false }, { templates });

      expect(result.config.getProjectName()).toBe("demo");
      expect(result.report.success).toBe(true);
      await expect(fs.access(path.join(dir, "app", "main.py"))).resolves.toBeUndefined();
    });

    it("reports progress through the callbacks", async () => {
      await store.save(dir, minimalConfig());
      const started: string[] = [];

      await handleGenerate(
        { projectDir: dir, force: false, dryRun: true },
        { templates, onStepStart: (step, position, total) => started.push(`${position}/${total} ${step.id}`) },
      );

      expect(started[0]).toBe("1/12 structure.packages");
      expect(started[11]).toBe("12/12 app.main");
    });
  });

  // ===========================================================================
  // assertSuccess
  // ===========================================================================

  describe("assertSuccess", () => {
    it("accepts a successful run", async () => {
      await store.save(dir, minimalConfig());
      const result = await handleGenerate({ projectDir: dir, force: false, dryRun: true }, { templates });

      expect(() => assertSuccess(result)).not.toThrow();
    });

    it("turns failed steps into EXECUTION_INCOMPLETE", async () => {
      await store.save(dir, minimalConfig());
      await handleGenerate({ projectDir: dir, force: false, dryRun: false }, { templates });

      const rerun = await handleGenerate({ projectDir: dir, force: false, dryRun: false }, { templates });

      let error: unknown;
      try {
        assertSuccess(rerun);
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(ForgeError);
      expect(error).toMatchObject({
        code: ErrorCode.EXECUTION_INCOMPLETE,
        message: "1 step(s) failed: 11 succeeded, 0 skipped",
        details: { failed: ["config.env"], skipped: [] },
        hint: "Resolve the listed conflicts, or re-run with --force to overwrite existing files.",
      });
    });

    it("reports a cancelled run", async () => {
      await store.save(dir, minimalConfig());
      const controller = new AbortController();
      controller.abort();

      const result = await handleGenerate(
        { projectDir: dir, force: false, dryRun: true },
        { templates, signal: controller.signal },
      );

      expect(() => assertSuccess(result)).toThrow("Generation was cancelled: 0 succeeded, 0 skipped");
    });
  });

  // ===========================================================================
  // formatGenerateOutput
  // ===========================================================================

  describe("formatGenerateOutput", () => {
    it("lists written files relative to the destination", async () => {
      await store.save(dir, minimalConfig());
      const result = await handleGenerate({ projectDir: dir, force: false, dryRun: false }, { templates });
      const count = result.report.artifacts.length;

      const lines = formatGenerateOutput(result);

      expect(lines.slice(0, 4)).toEqual([`Destination: ${dir}`, `${count} files written`, "", "  app/__init__.py"]);
      expect(lines).toContain("  app/main.py");
      expect(lines[lines.length - 2]).toBe("");
      expect(lines[lines.length - 1]).toMatch(/^Steps: 12 succeeded, 0 skipped, 0 failed \(\d+(ms|\.\d\ds)\)$/);
    });

    it("marks planned files on a dry run", async () => {
      await store.save(dir, minimalConfig());
      const result = await handleGenerate({ projectDir: dir, force: false, dryRun: true }, { templates });

      const lines = formatGenerateOutput(result);

      expect(lines.slice(0, 6)).toEqual([
        "Dry run: no files were written.",
        "",
        `Destination: ${dir}`,
        `${result.report.artifacts.length} files would be written`,
        "",
        "  (planned) app/__init__.py",
      ]);
    });

    it("shortens long file lists", async () => {
      await store.save(dir, fullConfig());
      const result = await handleGenerate({ projectDir: dir, force: false, dryRun: true }, { templates });
      const count = result.report.artifacts.length;

      const lines = formatGenerateOutput(result);

      expect(count).toBeGreaterThan(20);
      expect(lines.filter((l) => l.startsWith("  (planned) "))).toHaveLength(15);
      expect(lines).toContain(`  ... and ${count - 15} more`);
    });

    it("lists failed and skipped steps", async () => {
      await store.save(dir, fullConfig());
      await fs.mkdir(path.join(dir, "alembic"), { recursive: true });
      await fs.writeFile(path.join(dir, "alembic", "env.py"), "# custom\n", "utf-8");
      await fs.writeFile(path.join(dir, ".env"), "SECRET_KEY=test-secret\n", "utf-8");

      const result = await handleGenerate({ projectDir: dir, force: false, dryRun: false }, { templates });
      const lines = formatGenerateOutput(result);

      expect(lines).toContain("  failed  config.env: Artifact already exists: .env");
      expect(lines).toContain("  skipped database.migrations: Alembic is already initialized");
    });
  });

  // ===========================================================================
  // handleDocker
  // ===========================================================================

  describe("handleDocker", () => {
    it("regenerates only the deployment files", async () => {
      await store.save(dir, fullConfig());
      await fs.writeFile(path.join(dir, "Dockerfile"), "FROM scratch\n", "utf-8");

      const result = await handleDocker({ projectDir: dir }, { templates });

      expect(result.report.succeeded).toEqual(["deploy.dockerfile", "deploy.compose", "deploy.dockerignore"]);
      expect(await fs.readFile(path.join(dir, "Dockerfile"), "utf-8")).not.toBe("FROM scratch\n");
      await expect(fs.access(path.join(dir, "app"))).rejects.toThrow();
    });

    it("keeps existing files without force", async () => {
      await store.save(dir, fullConfig());
      await fs.writeFile(path.join(dir, "Dockerfile"), "FROM scratch\n", "utf-8");

      const result = await handleDocker({ projectDir: dir, force: false }, { templates });

      expect(result.report.failed).toEqual(["deploy.dockerfile"]);
      expect(await fs.readFile(path.join(dir, "Dockerfile"), "utf-8")).toBe("FROM scratch\n");
    });

    it("refuses a project without Docker", async () => {
      await store.save(dir, minimalConfig());

      await expect(handleDocker({ projectDir: dir }, { templates })).rejects.toMatchObject({
        code: ErrorCode.CONFIG_INVALID,
        message: "Docker is not enabled for this project",
      });
    });
  });
});
