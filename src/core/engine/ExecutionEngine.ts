/**
 * Execution Engine.
 *
 * Runs a resolved plan one step at a time, in plan order, awaiting each
 * action before starting the next.
 *
 * ## Failure Policy
 *
 * | Failure | Step outcome | Rest of the plan |
 * |---------|--------------|------------------|
 * | `skip(reason)` returned | skipped | continues |
 * | recoverable ForgeError (e.g. ArtifactConflictError) | failed | continues; dependents skipped |
 * | any other error | failed | abandoned, StepExecutionError thrown |
 * | abort signal | (not started) | abandoned, report marked cancelled |
 *
 * Artifacts written before an abort or a structural failure are left in
 * place. The engine touches storage only through the writer.
 *
 * @module
 */

import { ForgeError, StepExecutionError, TemplateNotFoundError, toError } from "../errors/errors.js";
import { Phase } from "../logging/Phase.js";
import { createSilentLogger, type ContextualLogger } from "../logging/ContextualLogger.js";
import { ExecutionReportBuilder, type ExecutionReport, type StepOutcome } from "./ExecutionReport.js";
import type { Configuration } from "../config/Configuration.js";
import type { ExecutionPlan } from "../plan/DependencyResolver.js";
import type { StepContext, StepDescriptor } from "../registry/StepDescriptor.js";
import type { RenderFn } from "../render/TemplateLibrary.js";
import type { ArtifactWriter, WriteOptions } from "../writer/ArtifactWriter.js";

// =============================================================================
// Types
// =============================================================================

export interface ExecuteOptions {
  /** Checked before every step */
  signal?: AbortSignal;

  logger?: ContextualLogger;

  /** Template rendering for step actions */
  render?: RenderFn;

  /** Called before a step's action runs, with its 1-based position in the plan */
  onStepStart?: (step: StepDescriptor, position: number, total: number) => void;

  /** Called once a step has an outcome, including dependency skips */
  onStepEnd?: (step: StepDescriptor, outcome: StepOutcome) => void;

  /** Millisecond clock (default: Date.now) */
  now?: () => number;
}

// =============================================================================
// Engine
// =============================================================================

/**
 * Executes a plan against a writer.
 *
 * @returns The report, also when steps failed recoverably or the run was cancelled
 * @throws StepExecutionError when a step fails structurally; the error carries the report
 */
export async function execute(
  plan: ExecutionPlan,
  config: Configuration,
  writer: ArtifactWriter,
  options: ExecuteOptions = {},
): Promise<ExecutionReport> {
  const now = options.now ?? Date.now;
  const logger = (options.logger ?? createSilentLogger()).withContext({ phase: Phase.PLAN_EXECUTE });
  const render = options.render ?? missingTemplates;
  const report = new ExecutionReportBuilder(plan.steps.length, now);

  // failed step id -> itself; dependents of a failure -> the failed step id
  const failedRoots = new Map<string, string>();
  const total = plan.steps.length;

  for (const [position, step] of plan.steps.entries()) {
    if (options.signal?.aborted) {
      report.markCancelled();
      logger.warn("Execution cancelled", {
        event: "execution.cancelled",
        remaining: plan.steps.slice(position).map((s) => s.id),
      });
      break;
    }

    const stepLogger = logger.withContext({ stepId: step.id });

    const blockedBy = step.requires
      .map((dependencyId) => failedRoots.get(dependencyId))
      .find((root): root is string => root !== undefined);
    if (blockedBy !== undefined) {
      const reason = `dependency "${blockedBy}" failed`;
      failedRoots.set(step.id, blockedBy);
      report.skipped(step.id, reason);
      stepLogger.info("Step skipped", { event: "step.end", status: "skipped", reason });
      options.onStepEnd?.(step, { status: "skipped", stepId: step.id, reason, artifacts: [] });
      continue;
    }

    options.onStepStart?.(step, position + 1, total);
    stepLogger.info("Step started", { event: "step.start", category: step.category });

    const recorder = new RecordingWriter(writer);
    const context: StepContext = {
      config,
      writer: recorder,
      step,
      render: (templateName, data) => render(templateName, data ?? config.toTemplateData()),
    };
    const startedAt = now();

    let outcome: StepOutcome;
    try {
      const result = await step.action(context);
      const durationMs = now() - startedAt;

      if (result.kind === "skipped") {
        report.skipped(step.id, result.reason, recorder.written);
        outcome = { status: "skipped", stepId: step.id, reason: result.reason, artifacts: recorder.written };
      } else {
        report.succeeded(step.id, recorder.written, durationMs);
        outcome = { status: "succeeded", stepId: step.id, artifacts: recorder.written, durationMs };
      }
      stepLogger.info("Step completed", {
        event: "step.end",
        status: outcome.status,
        durationMs,
        artifacts: recorder.written.length,
      });
    } catch (err) {
      const error = toError(err);
      const durationMs = now() - startedAt;
      const recoverable = error instanceof ForgeError && error.recoverable;

      report.failed(step.id, error, recoverable, recorder.written, durationMs);
      outcome = {
        status: "failed",
        stepId: step.id,
        error,
        recoverable,
        artifacts: recorder.written,
        durationMs,
      };
      stepLogger.error("Step failed", {
        event: "step.end",
        status: "failed",
        recoverable,
        durationMs,
        error,
      });
      options.onStepEnd?.(step, outcome);

      if (!recoverable) {
        report.markAborted();
        throw new StepExecutionError(step.id, error, report.build());
      }
      failedRoots.set(step.id, step.id);
      continue;
    }

    options.onStepEnd?.(step, outcome);
  }

  const result = report.build();
  logger.info("Execution finished", {
    event: "execution.end",
    success: result.success,
    succeeded: result.succeeded.length,
    skipped: result.skipped.length,
    failed: result.failed.length,
    cancelled: result.cancelled,
  });
  return result;
}

// =============================================================================
// Internals
// =============================================================================

/**
 * Forwards to the real writer and remembers which paths were written.
 */
class RecordingWriter implements ArtifactWriter {
  readonly written: string[] = [];

  constructor(private readonly inner: ArtifactWriter) {}

  async write(relativePath: string, content: string, options: WriteOptions): Promise<string> {
    const written = await this.inner.write(relativePath, content, options);
    this.written.push(written);
    return written;
  }

  exists(relativePath: string): Promise<boolean> {
    return this.inner.exists(relativePath);
  }
}

function missingTemplates(templateName: string): string {
  throw new TemplateNotFoundError(templateName, "(no template library)");
}
