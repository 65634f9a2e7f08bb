/**
 * Generation entry point.
 *
 * Resolves the plan for a configuration and executes it against the
 * destination directory (or, for a dry run, against an in-memory writer).
 *
 * ## Phases
 *
 * 1. `plan.resolve`: pure, planning errors are thrown before anything is written
 * 2. `templates.load`: skipped when a library is supplied
 * 3. `plan.execute`: sequential step execution
 *
 * @module
 */

import * as path from "node:path";
import { Phase } from "../logging/Phase.js";
import { PhaseTimer } from "../logging/PhaseTimer.js";
import { createSilentLogger, type ContextualLogger } from "../logging/ContextualLogger.js";
import { resolve, type ExecutionPlan } from "../plan/DependencyResolver.js";
import { execute } from "../engine/ExecutionEngine.js";
import { TemplateLibrary } from "../render/TemplateLibrary.js";
import { FileSystemArtifactWriter } from "../writer/FileSystemArtifactWriter.js";
import { MemoryArtifactWriter } from "../writer/MemoryArtifactWriter.js";
import { createDefaultRegistry } from "../steps/index.js";
import type { Configuration } from "../config/Configuration.js";
import type { ExecutionReport, StepOutcome } from "../engine/ExecutionReport.js";
import type { EngineTrace } from "../observability/EngineTrace.js";
import type { GeneratorRegistry } from "../registry/GeneratorRegistry.js";
import type { StepDescriptor } from "../registry/StepDescriptor.js";
import type { ArtifactWriter } from "../writer/ArtifactWriter.js";

// =============================================================================
// Types
// =============================================================================

export interface GenerateOptions {
  /** Overwrite every existing artifact */
  force?: boolean;

  /** Execute against an empty in-memory writer; nothing touches the disk */
  dryRun?: boolean;

  /** Restrict the plan to these step categories */
  only?: readonly string[];

  signal?: AbortSignal;

  logger?: ContextualLogger;

  /** Phase and step timings are recorded here when given */
  trace?: EngineTrace;

  onStepStart?: (step: StepDescriptor, position: number, total: number) => void;
  onStepEnd?: (step: StepDescriptor, outcome: StepOutcome) => void;

  /** Default: {@link createDefaultRegistry} */
  registry?: GeneratorRegistry;

  /** Default: the bundled templates */
  templates?: TemplateLibrary;
}

export interface GenerateResult {
  readonly destinationRoot: string;
  readonly dryRun: boolean;
  readonly plan: ExecutionPlan;
  readonly report: ExecutionReport;
  /** The writer the plan ran against; a MemoryArtifactWriter on dry runs */
  readonly writer: ArtifactWriter;
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Generates the service for a configuration.
 *
 * @throws UnsatisfiedDependencyError / CyclicDependencyError before any write
 * @throws StepExecutionError when a step fails structurally
 */
export async function generate(
  config: Configuration,
  destinationRoot: string,
  options: GenerateOptions = {},
): Promise<GenerateResult> {
  const root = path.resolve(destinationRoot);
  const dryRun = options.dryRun ?? false;
  const logger = (options.logger ?? createSilentLogger()).withContext({
    project: config.getProjectName(),
  });
  const timer = new PhaseTimer(logger, options.trace);
  const registry = options.registry ?? createDefaultRegistry();

  const plan = timer.runSync(Phase.PLAN_RESOLVE, () => resolve(registry, config, { only: options.only }));
  logger.info("Plan resolved", {
    event: "plan.resolved",
    steps: plan.steps.length,
    inactive: plan.inactive.length,
    excluded: plan.excluded.length,
  });

  const templates =
    options.templates ?? (await timer.run(Phase.TEMPLATES_LOAD, () => TemplateLibrary.load()));

  const writer: ArtifactWriter = dryRun
    ? new MemoryArtifactWriter()
    : new FileSystemArtifactWriter(root, { force: options.force ?? false });

  const report = await timer.run(
    Phase.PLAN_EXECUTE,
    () =>
      execute(plan, config, writer, {
        signal: options.signal,
        logger,
        render: (name, data) => templates.render(name, data),
        onStepStart: options.onStepStart,
        onStepEnd: (step, outcome) => {
          if (outcome.status !== "skipped") {
            options.trace?.record(step.id, outcome.durationMs, { status: outcome.status });
          }
          options.onStepEnd?.(step, outcome);
        },
      }),
    { destinationRoot: root, dryRun },
  );

  return { destinationRoot: root, dryRun, plan, report, writer };
}
