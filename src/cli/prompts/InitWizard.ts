/**
 * Interactive `init` wizard.
 *
 * Asks for the project name, the persistence stack, authentication and the
 * feature toggles, in that order, and returns a configuration input ready for
 * {@link createConfiguration}. Authentication is only offered once a database
 * has been chosen.
 *
 * Prompts go through a {@link WizardPrompter}; the default implementation
 * uses @clack/prompts and turns a cancelled prompt into USER_CANCELLED.
 *
 * @module
 */

import * as clack from "@clack/prompts";
import { ForgeError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import {
  validateProjectName,
  type AuthMode,
  type ConfigurationInput,
  type DatabaseKind,
  type OrmKind,
} from "../../core/config/Configuration.js";

// =============================================================================
// Types
// =============================================================================

export interface SelectOption<T extends string> {
  readonly value: T;
  readonly label: string;
  readonly hint?: string;
}

export interface TextPrompt {
  readonly message: string;
  readonly defaultValue?: string;
  readonly validate?: (value: string) => string | undefined;
}

export interface SelectPrompt<T extends string> {
  readonly message: string;
  readonly options: readonly SelectOption<T>[];
  readonly initialValue?: T;
}

export interface ConfirmPrompt {
  readonly message: string;
  readonly initialValue: boolean;
}

/**
 * The prompt primitives the wizard needs.
 */
export interface WizardPrompter {
  text(prompt: TextPrompt): Promise<string>;
  select<T extends string>(prompt: SelectPrompt<T>): Promise<T>;
  confirm(prompt: ConfirmPrompt): Promise<boolean>;
  note(message: string): void;
}

export interface InitWizardOptions {
  /** Skips the name prompt when given */
  readonly projectName?: string;

  /** Default: {@link ClackPrompter} */
  readonly prompter?: WizardPrompter;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_PROJECT_NAME = "forge-project";

const DATABASE_OPTIONS: readonly SelectOption<DatabaseKind>[] = [
  { value: "postgresql", label: "PostgreSQL", hint: "recommended" },
  { value: "mysql", label: "MySQL" },
  { value: "none", label: "None", hint: "skip database" },
];

const ORM_OPTIONS: readonly SelectOption<OrmKind>[] = [
  { value: "sqlmodel", label: "SQLModel", hint: "recommended" },
  { value: "sqlalchemy", label: "SQLAlchemy" },
];

const AUTH_OPTIONS: readonly SelectOption<AuthMode>[] = [
  { value: "complete", label: "Complete JWT Auth", hint: "recommended" },
  { value: "basic", label: "Basic JWT Auth", hint: "login/register only" },
  { value: "none", label: "None", hint: "skip authentication" },
];

// =============================================================================
// ClackPrompter
// =============================================================================

function cancelled(): ForgeError {
  return new ForgeError("Operation cancelled by user", ErrorCode.USER_CANCELLED);
}

/**
 * {@link WizardPrompter} backed by @clack/prompts.
 */
export class ClackPrompter implements WizardPrompter {
  async text(prompt: TextPrompt): Promise<string> {
    const result = await clack.text({
      message: prompt.message,
      placeholder: prompt.defaultValue,
      defaultValue: prompt.defaultValue,
      validate: (value) => prompt.validate?.(value === "" ? (prompt.defaultValue ?? "") : value),
    });

    if (clack.isCancel(result)) {
      throw cancelled();
    }
    return result;
  }

  async select<T extends string>(prompt: SelectPrompt<T>): Promise<T> {
    const result = await clack.select<{ value: string; label: string; hint: string | undefined }[], string>({
      message: prompt.message,
      options: prompt.options.map((o) => ({ value: o.value, label: o.label, hint: o.hint })),
      initialValue: prompt.initialValue,
    });

    if (clack.isCancel(result)) {
      throw cancelled();
    }

    const chosen = prompt.options.find((o) => o.value === result);
    if (!chosen) {
      throw new ForgeError(`Unexpected selection: ${String(result)}`, ErrorCode.INTERNAL_ERROR);
    }
    return chosen.value;
  }

  async confirm(prompt: ConfirmPrompt): Promise<boolean> {
    const result = await clack.confirm({
      message: prompt.message,
      initialValue: prompt.initialValue,
    });

    if (clack.isCancel(result)) {
      throw cancelled();
    }
    return result;
  }

  note(message: string): void {
    clack.log.info(message);
  }
}

// =============================================================================
// Wizard
// =============================================================================

/**
 * Asks for the project name alone.
 */
export function promptProjectName(prompter: WizardPrompter): Promise<string> {
  return prompter.text({
    message: "Project name:",
    defaultValue: DEFAULT_PROJECT_NAME,
    validate: validateProjectName,
  });
}

/**
 * Runs the wizard.
 *
 * @throws ForgeError USER_CANCELLED when a prompt is cancelled
 */
export async function runInitWizard(options: InitWizardOptions = {}): Promise<ConfigurationInput> {
  const prompter = options.prompter ?? new ClackPrompter();

  const projectName = options.projectName ?? (await promptProjectName(prompter));

  const database = await prompter.select({
    message: "Database:",
    options: DATABASE_OPTIONS,
    initialValue: "postgresql",
  });

  let orm: OrmKind | null = null;
  let migrations = false;
  let auth: AuthMode = "none";

  if (database !== "none") {
    orm = await prompter.select<OrmKind>({
      message: "ORM:",
      options: ORM_OPTIONS,
      initialValue: "sqlmodel",
    });
    migrations = await prompter.confirm({
      message: "Enable database migrations (Alembic)?",
      initialValue: true,
    });
    auth = await prompter.select({
      message: "Authentication:",
      options: AUTH_OPTIONS,
      initialValue: "complete",
    });
    if (auth === "complete") {
      prompter.note("Complete JWT Auth adds email verification, password reset and refresh tokens.");
    }
  } else {
    prompter.note("Authentication skipped (requires a database).");
  }

  const cors = await prompter.confirm({ message: "Enable CORS?", initialValue: true });
  const devTools = await prompter.confirm({
    message: "Include dev tools (Black + Ruff)?",
    initialValue: true,
  });
  const testing = await prompter.confirm({
    message: "Include testing setup (pytest)?",
    initialValue: true,
  });
  const docker = await prompter.confirm({
    message: "Include Docker configs?",
    initialValue: true,
  });

  return {
    projectName,
    database,
    orm,
    migrations,
    auth,
    refreshToken: auth === "complete",
    cors,
    devTools,
    testing,
    docker,
  };
}
