/**
 * Execution report produced by the engine.
 *
 * The report records one outcome per planned step, in plan order. Outcomes
 * are appended by an {@link ExecutionReportBuilder} as the engine walks the
 * plan and frozen once execution ends, whether it completed, was aborted or
 * was cancelled.
 *
 * @module
 */

import { ForgeError } from "../errors/errors.js";

// =============================================================================
// Types
// =============================================================================

export interface SucceededOutcome {
  readonly status: "succeeded";
  readonly stepId: string;
  /** Paths written by the step, as returned by the writer */
  readonly artifacts: readonly string[];
  readonly durationMs: number;
}

export interface SkippedOutcome {
  readonly status: "skipped";
  readonly stepId: string;
  readonly reason: string;
  /** Paths the step wrote before skipping itself; empty for blocked dependents */
  readonly artifacts: readonly string[];
}

export interface FailedOutcome {
  readonly status: "failed";
  readonly stepId: string;
  readonly error: Error;
  /** True when the rest of the plan kept running after this failure */
  readonly recoverable: boolean;
  /** Paths the step wrote before it failed */
  readonly artifacts: readonly string[];
  readonly durationMs: number;
}

export type StepOutcome = SucceededOutcome | SkippedOutcome | FailedOutcome;

export type StepStatus = StepOutcome["status"];

/**
 * Result of executing a plan.
 */
export interface ExecutionReport {
  /** Outcomes in plan order. Steps never started have no outcome. */
  readonly steps: readonly StepOutcome[];
  readonly succeeded: readonly string[];
  readonly skipped: readonly string[];
  readonly failed: readonly string[];
  /** Every path written, in write order */
  readonly artifacts: readonly string[];
  /** True when every planned step ran and none failed */
  readonly success: boolean;
  /** A structural failure abandoned the rest of the plan */
  readonly aborted: boolean;
  /** The abort signal fired before the plan completed */
  readonly cancelled: boolean;
  readonly durationMs: number;
}

/**
 * Plain-data view of a report, for JSON output.
 */
export interface ExecutionReportJson {
  success: boolean;
  aborted: boolean;
  cancelled: boolean;
  durationMs: number;
  succeeded: string[];
  skipped: Array<{ id: string; reason: string }>;
  failed: Array<{ id: string; code?: string; message: string; recoverable: boolean }>;
  artifacts: string[];
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Accumulates step outcomes during execution.
 */
export class ExecutionReportBuilder {
  private readonly outcomes: StepOutcome[] = [];
  private readonly startedAt: number;
  private aborted = false;
  private cancelled = false;

  constructor(
    private readonly plannedCount: number,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAt = now();
  }

  succeeded(stepId: string, artifacts: readonly string[], durationMs: number): void {
    this.outcomes.push({ status: "succeeded", stepId, artifacts: [...artifacts], durationMs });
  }

  skipped(stepId: string, reason: string, artifacts: readonly string[] = []): void {
    this.outcomes.push({ status: "skipped", stepId, reason, artifacts: [...artifacts] });
  }

  failed(
    stepId: string,
    error: Error,
    recoverable: boolean,
    artifacts: readonly string[],
    durationMs: number,
  ): void {
    this.outcomes.push({
      status: "failed",
      stepId,
      error,
      recoverable,
      artifacts: [...artifacts],
      durationMs,
    });
  }

  markAborted(): void {
    this.aborted = true;
  }

  markCancelled(): void {
    this.cancelled = true;
  }

  /**
   * Snapshot of the outcomes recorded so far.
   */
  build(): ExecutionReport {
    const steps = [...this.outcomes];
    const idsWith = (status: StepStatus): string[] =>
      steps.filter((o) => o.status === status).map((o) => o.stepId);

    const artifacts = steps.flatMap((o) => o.artifacts);

    const failed = idsWith("failed");
    const complete = steps.length === this.plannedCount;

    return Object.freeze({
      steps: Object.freeze(steps),
      succeeded: Object.freeze(idsWith("succeeded")),
      skipped: Object.freeze(idsWith("skipped")),
      failed: Object.freeze(failed),
      artifacts: Object.freeze(artifacts),
      success: complete && failed.length === 0 && !this.aborted && !this.cancelled,
      aborted: this.aborted,
      cancelled: this.cancelled,
      durationMs: this.now() - this.startedAt,
    });
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Finds the outcome recorded for a step.
 */
export function getOutcome(report: ExecutionReport, stepId: string): StepOutcome | undefined {
  return report.steps.find((o) => o.stepId === stepId);
}

/**
 * Converts a report into plain data.
 */
export function reportToJson(report: ExecutionReport): ExecutionReportJson {
  const skipped: ExecutionReportJson["skipped"] = [];
  const failed: ExecutionReportJson["failed"] = [];

  for (const outcome of report.steps) {
    if (outcome.status === "skipped") {
      skipped.push({ id: outcome.stepId, reason: outcome.reason });
    } else if (outcome.status === "failed") {
      failed.push({
        id: outcome.stepId,
        code: errorCodeOf(outcome.error),
        message: outcome.error.message,
        recoverable: outcome.recoverable,
      });
    }
  }

  return {
    success: report.success,
    aborted: report.aborted,
    cancelled: report.cancelled,
    durationMs: report.durationMs,
    succeeded: [...report.succeeded],
    skipped,
    failed,
    artifacts: [...report.artifacts],
  };
}

function errorCodeOf(error: Error): string | undefined {
  return error instanceof ForgeError ? error.code : undefined;
}
