/**
 * Standardized error codes for apiforge.
 *
 * Error codes are stable public API contracts. They should be:
 * - SCREAMING_SNAKE_CASE
 * - Grouped by domain
 *
 * @module
 */

// =============================================================================
// Error Code Enum
// =============================================================================

/**
 * All official apiforge error codes.
 *
 * Codes are grouped by domain:
 * - CONFIG_* : Configuration loading and validation
 * - STEP_* : Step registration (registry integrity)
 * - PLAN_* : Plan resolution (graph integrity)
 * - ARTIFACT_* : Artifact writes
 * - TEMPLATE_* : Template loading and rendering
 * - EXECUTION_* / STEP_EXECUTION_* : Plan execution
 * - USER_* : Interactive session
 * - INTERNAL_* : Internal errors
 */
export const ErrorCode = {
  // Configuration errors (10-19)
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  CONFIG_INVALID: "CONFIG_INVALID",
  CONFIG_PARSE_FAILED: "CONFIG_PARSE_FAILED",
  CONFIG_ALREADY_EXISTS: "CONFIG_ALREADY_EXISTS",

  // Registry errors (20-29)
  STEP_DUPLICATE: "STEP_DUPLICATE",
  STEP_UNKNOWN_DEPENDENCY: "STEP_UNKNOWN_DEPENDENCY",
  STEP_INVALID: "STEP_INVALID",

  // Plan errors (20-29, same category as registry)
  PLAN_CYCLE: "PLAN_CYCLE",
  PLAN_UNSATISFIED_DEPENDENCY: "PLAN_UNSATISFIED_DEPENDENCY",

  // Artifact errors (30-39)
  ARTIFACT_CONFLICT: "ARTIFACT_CONFLICT",
  ARTIFACT_PATH_INVALID: "ARTIFACT_PATH_INVALID",
  ARTIFACT_WRITE_FAILED: "ARTIFACT_WRITE_FAILED",

  // Template errors (40-49)
  TEMPLATE_NOT_FOUND: "TEMPLATE_NOT_FOUND",
  TEMPLATE_RENDER_FAILED: "TEMPLATE_RENDER_FAILED",

  // Execution errors (50-59)
  STEP_EXECUTION_FAILED: "STEP_EXECUTION_FAILED",
  EXECUTION_INCOMPLETE: "EXECUTION_INCOMPLETE",

  // Session errors
  USER_CANCELLED: "USER_CANCELLED",

  // Internal errors (1)
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Error Categories
// =============================================================================

/**
 * Error category for grouping related errors.
 */
export type ErrorCategory =
  | "config"
  | "registry"
  | "plan"
  | "artifact"
  | "template"
  | "execution"
  | "session"
  | "internal";

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (code.startsWith("CONFIG_")) return "config";
  if (code === ErrorCode.STEP_EXECUTION_FAILED || code.startsWith("EXECUTION_")) {
    return "execution";
  }
  if (code.startsWith("STEP_")) return "registry";
  if (code.startsWith("PLAN_")) return "plan";
  if (code.startsWith("ARTIFACT_")) return "artifact";
  if (code.startsWith("TEMPLATE_")) return "template";
  if (code.startsWith("USER_")) return "session";
  return "internal";
}

// =============================================================================
// Recoverability
// =============================================================================

/**
 * Codes a step may fail with while the rest of the plan keeps running.
 */
const RECOVERABLE_CODES: ReadonlySet<string> = new Set<string>([ErrorCode.ARTIFACT_CONFLICT]);

/**
 * Whether a step failing with this code leaves the plan runnable.
 */
export function isRecoverableCode(code: string): boolean {
  return RECOVERABLE_CODES.has(code);
}

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Exit code ranges by category:
 * - 1: Internal/generic error
 * - 10-19: Configuration errors
 * - 20-29: Registry/plan errors
 * - 30-39: Artifact errors
 * - 40-49: Template errors
 * - 50-59: Execution errors
 * - 130: Cancelled by user
 */
const EXIT_CODE_MAP: Record<ErrorCode, number> = {
  [ErrorCode.CONFIG_NOT_FOUND]: 10,
  [ErrorCode.CONFIG_INVALID]: 11,
  [ErrorCode.CONFIG_PARSE_FAILED]: 12,
  [ErrorCode.CONFIG_ALREADY_EXISTS]: 13,

  [ErrorCode.STEP_DUPLICATE]: 20,
  [ErrorCode.STEP_UNKNOWN_DEPENDENCY]: 21,
  [ErrorCode.STEP_INVALID]: 22,
  [ErrorCode.PLAN_CYCLE]: 23,
  [ErrorCode.PLAN_UNSATISFIED_DEPENDENCY]: 24,

  [ErrorCode.ARTIFACT_CONFLICT]: 30,
  [ErrorCode.ARTIFACT_PATH_INVALID]: 31,
  [ErrorCode.ARTIFACT_WRITE_FAILED]: 32,

  [ErrorCode.TEMPLATE_NOT_FOUND]: 40,
  [ErrorCode.TEMPLATE_RENDER_FAILED]: 41,

  [ErrorCode.STEP_EXECUTION_FAILED]: 50,
  [ErrorCode.EXECUTION_INCOMPLETE]: 51,

  [ErrorCode.USER_CANCELLED]: 130,

  [ErrorCode.INTERNAL_ERROR]: 1,
};

/**
 * Type guard for known error codes.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(EXIT_CODE_MAP, code);
}

/**
 * Gets the exit code for an error code. Unknown codes map to 1.
 */
export function getExitCode(code: string): number {
  return isErrorCode(code) ? EXIT_CODE_MAP[code] : 1;
}
