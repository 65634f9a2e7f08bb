/**
 * Error taxonomy for apiforge.
 *
 * Every error raised by the engine is a {@link ForgeError} with a stable
 * {@link ErrorCode}. Planning errors are thrown before any artifact is
 * written; execution errors are captured in the execution report and, when
 * structural, thrown as {@link StepExecutionError}.
 *
 * @module
 */

import { ErrorCode, isRecoverableCode } from "./ErrorCode.js";
import type { ExecutionReport } from "../engine/ExecutionReport.js";

export class ForgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    public readonly data?: Record<string, unknown>,
    public readonly hint?: string,
    public readonly cause?: Error,
    public readonly isOperational: boolean = true,
    public readonly timestamp: Date = new Date(),
  ) {
    super(message);
    this.name = "ForgeError";
  }

  /**
   * Whether a step failing with this error leaves the rest of the plan runnable.
   */
  get recoverable(): boolean {
    return isRecoverableCode(this.code);
  }
}

export function toUserMessage(err: unknown): { message: string; code?: string } {
  if (err instanceof ForgeError) {
    return { message: err.message, code: err.code };
  } else if (err instanceof Error) {
    return { message: err.message };
  } else {
    return { message: String(err) };
  }
}

/**
 * Normalizes a thrown value into an Error instance.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * A required configuration field is missing or invalid.
 *
 * Raised before planning completes, so no artifact has been written.
 */
export class ConfigurationError extends ForgeError {
  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      details?: Record<string, unknown>;
      hint?: string;
      cause?: Error;
    } = {},
  ) {
    super(
      message,
      options.code ?? ErrorCode.CONFIG_INVALID,
      options.details,
      undefined,
      options.hint,
      options.cause,
      true,
    );
    this.name = "ConfigurationError";
  }
}

// =============================================================================
// Registry integrity
// =============================================================================

export class DuplicateStepError extends ForgeError {
  constructor(readonly stepId: string) {
    super(
      `Step '${stepId}' is already registered`,
      ErrorCode.STEP_DUPLICATE,
      { stepId },
      undefined,
      `Step ids must be unique within a registry. Rename one of the '${stepId}' steps.`,
      undefined,
      false,
    );
    this.name = "DuplicateStepError";
  }
}

export class UnknownDependencyError extends ForgeError {
  constructor(
    readonly stepId: string,
    readonly dependencyId: string,
  ) {
    super(
      `Step '${stepId}' requires unknown step '${dependencyId}'`,
      ErrorCode.STEP_UNKNOWN_DEPENDENCY,
      { stepId, dependencyId },
      undefined,
      `Register '${dependencyId}' before '${stepId}', or register both in the same batch.`,
      undefined,
      false,
    );
    this.name = "UnknownDependencyError";
  }
}

// =============================================================================
// Plan integrity
// =============================================================================

export class CyclicDependencyError extends ForgeError {
  /**
   * @param cycle - Step ids along the cycle; the first id is repeated at the end.
   */
  constructor(readonly cycle: readonly string[]) {
    super(
      `Dependency cycle detected: ${cycle.join(" -> ")}`,
      ErrorCode.PLAN_CYCLE,
      { cycle: [...cycle] },
      undefined,
      `Steps cannot require each other, directly or transitively. Break the cycle by removing one requirement.`,
      undefined,
      false,
    );
    this.name = "CyclicDependencyError";
  }
}

export class UnsatisfiedDependencyError extends ForgeError {
  constructor(
    readonly stepId: string,
    readonly dependencyId: string,
  ) {
    super(
      `Step '${stepId}' requires '${dependencyId}', which is not active for this configuration`,
      ErrorCode.PLAN_UNSATISFIED_DEPENDENCY,
      { stepId, dependencyId },
      undefined,
      `Enable the feature that activates '${dependencyId}', or disable the feature behind '${stepId}'.`,
      undefined,
      true,
    );
    this.name = "UnsatisfiedDependencyError";
  }
}

// =============================================================================
// Artifacts
// =============================================================================

/**
 * The target artifact exists and overwrite was not requested.
 *
 * Recoverable: the engine records the step as failed and keeps going.
 */
export class ArtifactConflictError extends ForgeError {
  constructor(
    readonly relativePath: string,
    readonly absolutePath: string,
  ) {
    super(
      `Artifact already exists: ${relativePath}`,
      ErrorCode.ARTIFACT_CONFLICT,
      { relativePath, absolutePath },
      undefined,
      `Delete or rename the existing file, or re-run with --force to overwrite it.`,
      undefined,
      true,
    );
    this.name = "ArtifactConflictError";
  }
}

export class ArtifactPathError extends ForgeError {
  constructor(
    readonly relativePath: string,
    reason: string,
  ) {
    super(
      `Invalid artifact path '${relativePath}': ${reason}`,
      ErrorCode.ARTIFACT_PATH_INVALID,
      { relativePath, reason },
      undefined,
      `Artifact paths must be relative and stay inside the destination directory.`,
      undefined,
      false,
    );
    this.name = "ArtifactPathError";
  }
}

// =============================================================================
// Templates
// =============================================================================

export class TemplateNotFoundError extends ForgeError {
  constructor(
    readonly templateName: string,
    templatesDir: string,
  ) {
    super(
      `Template not found: ${templateName}`,
      ErrorCode.TEMPLATE_NOT_FOUND,
      { templateName, templatesDir },
      undefined,
      `Expected '${templateName}.hbs' under ${templatesDir}. The installation may be incomplete.`,
      undefined,
      false,
    );
    this.name = "TemplateNotFoundError";
  }
}

export class TemplateRenderError extends ForgeError {
  constructor(readonly templateName: string, cause: Error) {
    super(
      `Failed to render template: ${templateName}`,
      ErrorCode.TEMPLATE_RENDER_FAILED,
      { templateName },
      undefined,
      `Template '${templateName}' could not be rendered: ${cause.message}`,
      cause,
      false,
    );
    this.name = "TemplateRenderError";
  }
}

// =============================================================================
// Execution
// =============================================================================

/**
 * A step's action failed structurally. The rest of the plan was abandoned.
 *
 * Artifacts written by earlier steps stay on disk; {@link report} lists them.
 */
export class StepExecutionError extends ForgeError {
  constructor(
    readonly stepId: string,
    cause: Error,
    readonly report: ExecutionReport,
  ) {
    super(
      `Step '${stepId}' failed: ${cause.message}`,
      ErrorCode.STEP_EXECUTION_FAILED,
      {
        stepId,
        completed: [...report.succeeded],
        artifactsWritten: [...report.artifacts],
      },
      undefined,
      `Generation stopped at '${stepId}'. Files written by earlier steps were kept; ` +
        `fix the problem and re-run with --force to regenerate them.`,
      cause,
      false,
    );
    this.name = "StepExecutionError";
  }
}
