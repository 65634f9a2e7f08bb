/**
 * Handler for the `generate` CLI command.
 *
 * Loads the persisted configuration of a project and runs the full plan
 * against the project directory. The handler is separated from the CLI
 * wiring so it can be driven directly from tests.
 *
 * @module
 */

import * as path from "node:path";
import { ForgeError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import { ConfigStore } from "../../core/config/ConfigStore.js";
import { Phase } from "../../core/logging/Phase.js";
import { PhaseTimer } from "../../core/logging/PhaseTimer.js";
import { createSilentLogger, type ContextualLogger } from "../../core/logging/ContextualLogger.js";
import { generate, type GenerateResult } from "../../core/generate/generate.js";
import { formatDuration, type EngineTrace } from "../../core/observability/EngineTrace.js";
import type { Configuration } from "../../core/config/Configuration.js";
import type { StepOutcome } from "../../core/engine/ExecutionReport.js";
import type { GeneratorRegistry } from "../../core/registry/GeneratorRegistry.js";
import type { StepDescriptor } from "../../core/registry/StepDescriptor.js";
import type { TemplateLibrary } from "../../core/render/TemplateLibrary.js";

// =============================================================================
// Types
// =============================================================================

export interface GenerateInput {
  /** Directory holding `.apiforge/config.json`; artifacts are written here */
  readonly projectDir: string;

  readonly force: boolean;
  readonly dryRun: boolean;

  /** Restrict the plan to these categories */
  readonly only?: readonly string[];
}

/**
 * Collaborators shared by every handler that generates.
 */
export interface GenerateDependencies {
  readonly store?: ConfigStore;
  readonly logger?: ContextualLogger;
  readonly trace?: EngineTrace;
  readonly registry?: GeneratorRegistry;
  readonly templates?: TemplateLibrary;
  readonly signal?: AbortSignal;
  readonly onStepStart?: (step: StepDescriptor, position: number, total: number) => void;
  readonly onStepEnd?: (step: StepDescriptor, outcome: StepOutcome) => void;
}

export interface GenerateHandlerResult extends GenerateResult {
  readonly config: Configuration;
}

// =============================================================================
// Handler Implementation
// =============================================================================

/**
 * Handles `apiforge generate [path]`.
 *
 * @throws ConfigurationError when the configuration is missing or invalid
 * @throws planning errors and StepExecutionError from {@link generate}
 */
export async function handleGenerate(
  input: GenerateInput,
  deps: GenerateDependencies = {},
): Promise<GenerateHandlerResult> {
  const projectDir = path.resolve(input.projectDir);
  const store = deps.store ?? new ConfigStore();
  const logger = deps.logger ?? createSilentLogger();

  const config = await new PhaseTimer(logger, deps.trace).run(Phase.CONFIG_LOAD, () =>
    store.load(projectDir),
  );

  const result = await runGeneration(config, projectDir, input, deps);
  return { ...result, config };
}

/**
 * Runs {@link generate} with the handler dependencies wired in.
 */
export function runGeneration(
  config: Configuration,
  projectDir: string,
  input: Pick<GenerateInput, "force" | "dryRun" | "only">,
  deps: GenerateDependencies,
): Promise<GenerateResult> {
  return generate(config, projectDir, {
    force: input.force,
    dryRun: input.dryRun,
    only: input.only,
    signal: deps.signal,
    logger: deps.logger,
    trace: deps.trace,
    registry: deps.registry,
    templates: deps.templates,
    onStepStart: deps.onStepStart,
    onStepEnd: deps.onStepEnd,
  });
}

/**
 * Turns an unsuccessful report into an error carrying the exit code.
 *
 * Recoverable failures leave the run complete but unsuccessful; the command
 * still prints the report before exiting non-zero.
 */
export function assertSuccess(result: GenerateResult): void {
  const { report } = result;
  if (report.success) {
    return;
  }

  const reason = report.cancelled
    ? "Generation was cancelled"
    : `${report.failed.length} step(s) failed`;

  throw new ForgeError(
    `${reason}: ${report.succeeded.length} succeeded, ${report.skipped.length} skipped`,
    ErrorCode.EXECUTION_INCOMPLETE,
    { failed: [...report.failed], skipped: [...report.skipped] },
    undefined,
    report.cancelled
      ? "Re-run the command to finish generating."
      : "Resolve the listed conflicts, or re-run with --force to overwrite existing files.",
  );
}

// =============================================================================
// Output Formatting
// =============================================================================

/** Longest artifact list printed in full. */
const MAX_LISTED_ARTIFACTS = 20;

/**
 * Human summary of a generation run.
 */
export function formatGenerateOutput(result: GenerateResult): string[] {
  const { report } = result;
  const lines: string[] = [];

  if (result.dryRun) {
    lines.push("Dry run: no files were written.");
    lines.push("");
  }

  lines.push(`Destination: ${result.destinationRoot}`);

  const count = report.artifacts.length;
  const noun = count === 1 ? "file" : "files";
  lines.push(`${count} ${noun} ${result.dryRun ? "would be written" : "written"}`);

  const artifacts = report.artifacts.map((a) => displayPath(result, a));
  if (artifacts.length > 0) {
    lines.push("");
    const prefix = result.dryRun ? "  (planned) " : "  ";
    if (artifacts.length <= MAX_LISTED_ARTIFACTS) {
      for (const artifact of artifacts) {
        lines.push(`${prefix}${artifact}`);
      }
    } else {
      for (const artifact of artifacts.slice(0, 10)) {
        lines.push(`${prefix}${artifact}`);
      }
      lines.push(`  ... and ${artifacts.length - 15} more`);
      for (const artifact of artifacts.slice(-5)) {
        lines.push(`${prefix}${artifact}`);
      }
    }
  }

  const notes: string[] = [];
  for (const outcome of report.steps) {
    if (outcome.status === "skipped") {
      notes.push(`  skipped ${outcome.stepId}: ${outcome.reason}`);
    } else if (outcome.status === "failed") {
      notes.push(`  failed  ${outcome.stepId}: ${outcome.error.message}`);
    }
  }
  if (notes.length > 0) {
    lines.push("");
    lines.push(...notes);
  }

  lines.push("");
  lines.push(
    `Steps: ${report.succeeded.length} succeeded, ${report.skipped.length} skipped, ` +
      `${report.failed.length} failed (${formatDuration(report.durationMs)})`,
  );

  return lines;
}

/**
 * Writer paths are absolute on disk and relative in memory; both print relative.
 */
function displayPath(result: GenerateResult, artifact: string): string {
  return path.isAbsolute(artifact)
    ? path.relative(result.destinationRoot, artifact).split(path.sep).join("/")
    : artifact;
}
