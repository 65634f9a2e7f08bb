/**
 * Unit tests for the interactive init wizard.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_PROJECT_NAME,
  promptProjectName,
  runInitWizard,
  type ConfirmPrompt,
  type SelectPrompt,
  type TextPrompt,
  type WizardPrompter,
} from "../../src/cli/prompts/InitWizard.js";
import { ForgeError } from "../../src/core/errors/errors.js";
import { ErrorCode } from "../../src/core/errors/ErrorCode.js";
import { ScriptedPrompter } from "../helpers/ScriptedPrompter.js";

describe("runInitWizard", () => {
  it("asks every question when a database is chosen", async () => {
    const prompter = new ScriptedPrompter(["orders", "postgresql", "sqlalchemy", false, "basic", true, false, true, false]);

    const input = await runInitWizard({ prompter });

    expect(input).toEqual({
      projectName: "orders",
      database: "postgresql",
      orm: "sqlalchemy",
      migrations: false,
      auth: "basic",
      refreshToken: false,
      cors: true,
      devTools: false,
      testing: true,
      docker: false,
    });
    expect(prompter.asked).toEqual([
      "Project name:",
      "Database:",
      "ORM:",
      "Enable database migrations (Alembic)?",
      "Authentication:",
      "Enable CORS?",
      "Include dev tools (Black + Ruff)?",
      "Include testing setup (pytest)?",
      "Include Docker configs?",
    ]);
    expect(prompter.notes).toEqual([]);
  });

  it("skips persistence and auth questions without a database", async () => {
    const prompter = new ScriptedPrompter(["none", true, true, true, true]);

    const input = await runInitWizard({ projectName: "svc", prompter });

    expect(input).toMatchObject({ database: "none", orm: null, migrations: false, auth: "none", refreshToken: false });
    expect(prompter.asked).not.toContain("ORM:");
    expect(prompter.notes).toEqual(["Authentication skipped (requires a database)."]);
  });

  it("enables the refresh token with complete auth", async () => {
    const prompter = new ScriptedPrompter(["mysql", "sqlmodel", true, "complete", true, true, true, true]);

    const input = await runInitWizard({ projectName: "svc", prompter });

    expect(input).toMatchObject({ auth: "complete", refreshToken: true });
    expect(prompter.notes).toHaveLength(1);
  });

  it("offers the recommended defaults first", async () => {
    const prompter = new ScriptedPrompter(["postgresql", "sqlmodel", true, "complete", true, true, true, true]);

    await runInitWizard({ projectName: "svc", prompter });

    expect(prompter.initialValues.slice(0, 4)).toEqual(["postgresql", "sqlmodel", true, "complete"]);
  });

  it("propagates cancellation", async () => {
    const prompter: WizardPrompter = {
      text: async () => "svc",
      select: async () => {
        throw new ForgeError("Operation cancelled by user", ErrorCode.USER_CANCELLED);
      },
      confirm: async () => true,
      note: () => {},
    };

    await expect(runInitWizard({ prompter })).rejects.toMatchObject({ code: "USER_CANCELLED" });
  });
});

describe("promptProjectName", () => {
  it("defaults to the standard name and validates input", async () => {
    let seen: TextPrompt | undefined;
    const prompter: WizardPrompter = {
      text: async (prompt) => {
        seen = prompt;
        return "orders";
      },
      select: async <T extends string>(prompt: SelectPrompt<T>) => prompt.options[0].value,
      confirm: async (prompt: ConfirmPrompt) => prompt.initialValue,
      note: () => {},
    };

    expect(await promptProjectName(prompter)).toBe("orders");
    expect(seen?.defaultValue).toBe(DEFAULT_PROJECT_NAME);
    expect(seen?.validate?.("1bad")).toBe(
      "projectName must start with a letter and contain only letters, digits, '-' or '_'",
    );
    expect(seen?.validate?.("good")).toBeUndefined();
  });
});
