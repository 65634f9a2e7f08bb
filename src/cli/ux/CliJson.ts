/**
 * JSON output for `--json` mode.
 *
 * With `--json`, a command prints exactly one JSON document on stdout: its
 * result on success, or an `{ "error": { ... } }` wrapper on failure.
 *
 * @module
 */

import { ForgeError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

export interface JsonOutputOptions {
  /** Default: false */
  readonly trailingNewline?: boolean;
}

export interface JsonErrorOptions extends JsonOutputOptions {
  /** Adds the stack trace */
  readonly debug?: boolean;
}

// =============================================================================
// Output Functions
// =============================================================================

/**
 * Pretty-prints data with 2-space indentation.
 *
 * @example
 * ```typescript
 * formatJsonOutput({ steps: [] });
 * // => '{\n  "steps": []\n}'
 * ```
 */
export function formatJsonOutput(data: unknown, options?: JsonOutputOptions): string {
  const json = JSON.stringify(data, null, 2);
  return options?.trailingNewline ? json + "\n" : json;
}

/**
 * Formats a thrown value as an error document.
 *
 * ```json
 * {
 *   "error": {
 *     "message": "Step 'auth.user-model' requires 'database.connection', ...",
 *     "code": "PLAN_UNSATISFIED_DEPENDENCY",
 *     "stepId": "auth.user-model",
 *     "dependencyId": "database.connection",
 *     "hint": "..."
 *   }
 * }
 * ```
 *
 * Non-ForgeError values are reported as INTERNAL_ERROR.
 */
export function formatJsonError(error: unknown, options?: JsonErrorOptions): string {
  const errorObj: Record<string, unknown> = {};

  if (error instanceof ForgeError) {
    errorObj.message = error.message;
    errorObj.code = error.code;
    for (const [key, value] of Object.entries(error.details ?? {})) {
      errorObj[key] = value;
    }
    if (error.hint) {
      errorObj.hint = error.hint;
    }
  } else {
    errorObj.message = error instanceof Error ? error.message : String(error);
    errorObj.code = ErrorCode.INTERNAL_ERROR;
  }

  if (options?.debug && error instanceof Error && error.stack) {
    errorObj.stack = error.stack;
  }

  return formatJsonOutput({ error: errorObj }, options);
}
