/**
 * Handler for the `docker` CLI command.
 *
 * Regenerates only the deployment artifacts of an existing project. The rest
 * of the plan is still resolved, so an inconsistent configuration is reported
 * here as it would be by `generate`.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigurationError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import { ConfigStore } from "../../core/config/ConfigStore.js";
import { Category } from "../../core/steps/index.js";
import {
  runGeneration,
  type GenerateDependencies,
  type GenerateHandlerResult,
} from "./generateHandler.js";

export interface DockerInput {
  readonly projectDir: string;

  /** Default: true. Existing Docker files are replaced. */
  readonly force?: boolean;
}

/**
 * @throws ConfigurationError when Docker is disabled in the configuration
 */
export async function handleDocker(
  input: DockerInput,
  deps: GenerateDependencies = {},
): Promise<GenerateHandlerResult> {
  const projectDir = path.resolve(input.projectDir);
  const store = deps.store ?? new ConfigStore();
  const config = await store.load(projectDir);

  if (!config.getFeature("docker")) {
    throw new ConfigurationError("Docker is not enabled for this project", {
      code: ErrorCode.CONFIG_INVALID,
      details: { path: store.getConfigPath(projectDir) },
      hint: 'Set "docker": true under "features" in .apiforge/config.json, then re-run.',
    });
  }

  const result = await runGeneration(
    config,
    projectDir,
    { force: input.force ?? true, dryRun: false, only: [Category.DEPLOYMENT] },
    deps,
  );
  return { ...result, config };
}
