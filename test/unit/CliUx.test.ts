/**
 * Tests for CLI UX messaging module.
 *
 * Tests consistent messaging, colors, and log levels.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { createCliUx, parseUxLevel, type UxLevel } from "../../src/cli/ux/CliUx.js";
import { createCliSpinner } from "../../src/cli/ux/CliSpinner.js";
import { formatJsonError, formatJsonOutput } from "../../src/cli/ux/CliJson.js";
import { ConfigurationError, UnsatisfiedDependencyError } from "../../src/core/errors/errors.js";
import { OutputCapture } from "../helpers/testUtils.js";

function setup(level: UxLevel = "info") {
  const stdout = new OutputCapture();
  const stderr = new OutputCapture();
  const ux = createCliUx({ level, colors: false, stdout: stdout.write, stderr: stderr.write });
  return { ux, stdout, stderr };
}

// =============================================================================
// CliUx
// =============================================================================

describe("CliUx", () => {
  it("prints results with symbols", () => {
    const { ux, stdout } = setup();

    ux.success("Generated demo", { destination: "./demo", files: 12 });
    ux.info("Loading configuration");
    ux.step(3, 12, "config.pyproject");
    ux.skipped("database.migrations", "Alembic is already initialized");
    ux.listItem("cd demo");

    expect(stdout.text.split("\n")).toEqual([
      "✓ Generated demo",
      "  destination: ./demo",
      "  files: 12",
      "→ Loading configuration",
      "[3/12] config.pyproject",
      "- database.migrations (Alembic is already initialized)",
      "  • cd demo",
      "",
    ]);
  });

  it("sends errors and warnings to stderr", () => {
    const { ux, stdout, stderr } = setup();

    ux.error("Configuration file not found", { code: "CONFIG_NOT_FOUND", hint: "Run apiforge init" });
    ux.warn("Generation was cancelled");

    expect(stdout.text).toBe("");
    expect(stderr.lines).toEqual([
      "✗ CONFIG_NOT_FOUND: Configuration file not found",
      "  Hint: Run apiforge init",
      "⚠ Generation was cancelled",
    ]);
  });

  it("prints only errors and raw output when silent", () => {
    const { ux, stdout, stderr } = setup("silent");

    ux.success("done");
    ux.info("info");
    ux.warn("warn");
    ux.header("Next steps");
    ux.error("failed");
    ux.errorBlock(["Error [X]: y"]);
    ux.raw('{"ok":true}');

    expect(stdout.text).toBe('{"ok":true}\n');
    expect(stderr.lines).toEqual(["✗ failed", "Error [X]: y"]);
  });

  it("shows verbose and debug lines only at those levels", () => {
    const info = setup("info");
    info.ux.verbose("v");
    info.ux.debug("d");
    expect(info.stdout.text).toBe("");

    const verbose = setup("verbose");
    verbose.ux.verbose("v");
    verbose.ux.debug("d");
    expect(verbose.stdout.text).toBe("  v\n");

    const debug = setup("debug");
    debug.ux.debug("d");
    expect(debug.stdout.text).toBe("  [debug] d\n");
  });

  it("does not double the trailing newline of raw output", () => {
    const { ux, stdout } = setup();

    ux.raw("line\n");

    expect(stdout.text).toBe("line\n");
  });

  it("prints headers after a blank line", () => {
    const { ux, stdout } = setup();

    ux.header("Next steps");
    ux.newline();
    ux.detail("indented");

    expect(stdout.text).toBe("\nNext steps\n\n  indented\n");
  });
});

describe("parseUxLevel", () => {
  it("maps the global flags", () => {
    expect(parseUxLevel({ verbose: false, debug: false, silent: false })).toBe("info");
    expect(parseUxLevel({ verbose: true, debug: false, silent: false })).toBe("verbose");
    expect(parseUxLevel({ verbose: true, debug: false, silent: true })).toBe("silent");
    expect(parseUxLevel({ verbose: false, debug: true, silent: true })).toBe("debug");
  });
});

// =============================================================================
// CliSpinner
// =============================================================================

describe("CliSpinner without a TTY", () => {
  it("prints start and success lines", async () => {
    const { ux, stdout } = setup();
    const spinner = createCliSpinner({ ux, isTTY: false });

    const result = await spinner.wrap("Generating demo", async () => 42, "Generated demo");

    expect(result).toBe(42);
    expect(stdout.lines).toEqual(["→ Generating demo", "✓ Generated demo"]);
    expect(spinner.isRunning).toBe(false);
  });

  it("prints updates only at the verbose level", () => {
    const quiet = setup("info");
    const quietSpinner = createCliSpinner({ ux: quiet.ux, isTTY: false });
    quietSpinner.start("Generating");
    quietSpinner.update("[1/12] structure.packages");
    expect(quiet.stdout.lines).toEqual(["→ Generating"]);

    const loud = setup("verbose");
    const loudSpinner = createCliSpinner({ ux: loud.ux, isTTY: false });
    loudSpinner.start("Generating");
    loudSpinner.update("[1/12] structure.packages");
    expect(loud.stdout.lines).toEqual(["→ Generating", "  [1/12] structure.packages"]);
  });

  it("reports failure on stderr and rethrows", async () => {
    const { ux, stderr } = setup();
    const spinner = createCliSpinner({ ux, isTTY: false });

    await expect(
      spinner.wrap("Generating demo", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(stderr.lines).toEqual(["✗ Generating demo"]);
    expect(spinner.isRunning).toBe(false);
  });

  it("stops without output", () => {
    const { ux, stdout } = setup();
    const spinner = createCliSpinner({ ux, isTTY: false });

    spinner.start("Working");
    spinner.stop();

    expect(spinner.isRunning).toBe(false);
    expect(stdout.lines).toEqual(["→ Working"]);
  });
});

// =============================================================================
// CliJson
// =============================================================================

describe("CliJson", () => {
  it("pretty-prints data", () => {
    expect(formatJsonOutput({ steps: [] })).toBe('{\n  "steps": []\n}');
    expect(formatJsonOutput(1, { trailingNewline: true })).toBe("1\n");
  });

  it("flattens error details into the error document", () => {
    const parsed: unknown = JSON.parse(
      formatJsonError(new UnsatisfiedDependencyError("auth.user-model", "database.connection")),
    );

    expect(parsed).toEqual({
      error: {
        message:
          "Step 'auth.user-model' requires 'database.connection', which is not active for this configuration",
        code: "PLAN_UNSATISFIED_DEPENDENCY",
        stepId: "auth.user-model",
        dependencyId: "database.connection",
        hint: "Enable the feature that activates 'database.connection', or disable the feature behind 'auth.user-model'.",
      },
    });
  });

  it("reports unknown errors as INTERNAL_ERROR", () => {
    expect(JSON.parse(formatJsonError("oops"))).toEqual({
      error: { message: "oops", code: "INTERNAL_ERROR" },
    });
  });

  it("adds the stack only in debug mode", () => {
    const error = new ConfigurationError("bad");

    expect(JSON.parse(formatJsonError(error)).error).not.toHaveProperty("stack");
    expect(JSON.parse(formatJsonError(error, { debug: true })).error).toHaveProperty("stack");
  });
});
