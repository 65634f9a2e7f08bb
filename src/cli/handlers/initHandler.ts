/**
 * Handler for the `init` CLI command.
 *
 * ## Process
 *
 * 1. Settle the project name (argument, prompt, or the default with `--yes`)
 * 2. Refuse when `<parentDir>/<name>` already holds a configuration, unless forced
 * 3. Collect the selection from the wizard, or from flags with `--yes`
 * 4. Validate it and check that it can be planned
 * 5. Save `.apiforge/config.json`, then generate the project
 *
 * Nothing is written before step 5, so a refused, cancelled or unplannable
 * init leaves the disk untouched.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigurationError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import { ConfigStore } from "../../core/config/ConfigStore.js";
import {
  createConfiguration,
  validateProjectName,
  type Configuration,
} from "../../core/config/Configuration.js";
import { Phase } from "../../core/logging/Phase.js";
import { PhaseTimer } from "../../core/logging/PhaseTimer.js";
import { createSilentLogger } from "../../core/logging/ContextualLogger.js";
import { resolve } from "../../core/plan/DependencyResolver.js";
import { createDefaultRegistry } from "../../core/steps/index.js";
import {
  DEFAULT_PROJECT_NAME,
  promptProjectName,
  runInitWizard,
  ClackPrompter,
  type WizardPrompter,
} from "../prompts/InitWizard.js";
import { runGeneration, type GenerateDependencies } from "./generateHandler.js";
import { CLI_VERSION } from "../version.js";
import type { GenerateResult } from "../../core/generate/generate.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Selection flags for non-interactive init. Values are validated together
 * with the rest of the configuration.
 */
export interface InitFlags {
  readonly database?: string;
  readonly orm?: string;
  readonly migrations?: boolean;
  readonly auth?: string;
  readonly cors?: boolean;
  readonly devTools?: boolean;
  readonly testing?: boolean;
  readonly docker?: boolean;
}

export interface InitInput {
  readonly projectName?: string;

  /** The project is created in `<parentDir>/<projectName>` */
  readonly parentDir: string;

  /** Take the selection from flags instead of prompting */
  readonly yes: boolean;

  /** Replace an existing configuration and overwrite existing artifacts */
  readonly force: boolean;

  readonly flags: InitFlags;
}

export interface InitDependencies extends GenerateDependencies {
  readonly prompter?: WizardPrompter;
  readonly now?: () => Date;
}

export interface InitResult {
  readonly projectDir: string;
  readonly configPath: string;
  readonly config: Configuration;
  readonly generation: GenerateResult;
}

// =============================================================================
// Handler Implementation
// =============================================================================

export async function handleInit(input: InitInput, deps: InitDependencies = {}): Promise<InitResult> {
  const store = deps.store ?? new ConfigStore();
  const logger = deps.logger ?? createSilentLogger();
  const timer = new PhaseTimer(logger, deps.trace);
  const prompter = deps.prompter ?? new ClackPrompter();

  const projectName =
    input.projectName ?? (input.yes ? DEFAULT_PROJECT_NAME : await promptProjectName(prompter));

  const nameProblem = validateProjectName(projectName);
  if (nameProblem) {
    throw new ConfigurationError(`Invalid project name '${projectName}': ${nameProblem}`, {
      code: ErrorCode.CONFIG_INVALID,
      details: { projectName },
      hint: "Use a name that starts with a letter, e.g. `apiforge init orders-api`.",
    });
  }

  const projectDir = path.resolve(input.parentDir, projectName.trim());

  if (!input.force && (await store.exists(projectDir))) {
    throw new ConfigurationError(`Project already initialized: ${projectDir}`, {
      code: ErrorCode.CONFIG_ALREADY_EXISTS,
      details: { path: store.getConfigPath(projectDir) },
      hint: "Run `apiforge generate` to regenerate it, or `apiforge init --force` to start over.",
    });
  }

  const config = await timer.run(Phase.CONFIG_COLLECT, async () => {
    const raw = input.yes
      ? selectionFromFlags(projectName, input.flags)
      : await runInitWizard({ projectName, prompter });
    return createConfiguration(raw, { now: deps.now, toolVersion: CLI_VERSION });
  });

  // A selection that cannot be planned is never saved.
  resolve(deps.registry ?? createDefaultRegistry(), config);

  const configPath = await timer.run(Phase.CONFIG_SAVE, () => store.save(projectDir, config));
  logger.info("Configuration saved", { event: "config.saved", path: configPath });

  const generation = await runGeneration(
    config,
    projectDir,
    { force: input.force, dryRun: false },
    { ...deps, store, logger },
  );

  return { projectDir, configPath, config, generation };
}

/**
 * Builds the configuration input for `--yes`.
 *
 * Unset flags take the wizard's defaults. Without a database, the ORM and
 * authentication default to none; an explicit `--auth` is kept so the
 * resolver can report it.
 */
export function selectionFromFlags(projectName: string, flags: InitFlags): Record<string, unknown> {
  const database = flags.database ?? "postgresql";
  const hasDatabase = database !== "none";
  const auth = flags.auth ?? (hasDatabase ? "complete" : "none");

  return {
    projectName,
    database,
    orm: flags.orm ?? (hasDatabase ? "sqlmodel" : null),
    migrations: hasDatabase ? (flags.migrations ?? true) : undefined,
    auth,
    refreshToken: auth === "complete" ? true : undefined,
    cors: flags.cors ?? true,
    devTools: flags.devTools ?? true,
    testing: flags.testing ?? true,
    docker: flags.docker ?? true,
  };
}
