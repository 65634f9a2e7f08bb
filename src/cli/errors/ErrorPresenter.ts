/**
 * Error presentation for CLI output.
 *
 * Turns a {@link ForgeError} (or anything else that was thrown) into the
 * block printed on stderr:
 *
 * ```
 * Error [PLAN_UNSATISFIED_DEPENDENCY]: Step 'auth.user-model' requires ...
 *
 * Step Id: auth.user-model
 * Dependency Id: database.connection
 *
 * Hint:
 *   Enable the feature that activates 'database.connection', ...
 * ```
 *
 * Stack traces and the cause chain appear only in debug mode.
 *
 * @module
 */

import { ForgeError, toError } from "../../core/errors/errors.js";
import { ErrorCode, getExitCode } from "../../core/errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

export interface FormatErrorOptions {
  /** Include stack traces and the cause chain (default: false) */
  debug?: boolean;
}

export interface ErrorPresenterOptions {
  /** Default: console.error */
  output?: (line: string) => void;
  debug?: boolean;
}

// =============================================================================
// ErrorPresenter Class
// =============================================================================

export class ErrorPresenter {
  private readonly output: (line: string) => void;
  private readonly debug: boolean;

  constructor(options: ErrorPresenterOptions = {}) {
    this.output = options.output ?? console.error;
    this.debug = options.debug ?? false;
  }

  /**
   * Prints the error and returns the process exit code for it.
   */
  present(error: unknown): number {
    const normalized = normalizeError(error);
    for (const line of formatError(normalized, { debug: this.debug }).split("\n")) {
      this.output(line);
    }
    return getExitCode(normalized.code);
  }
}

// =============================================================================
// Format Functions
// =============================================================================

export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const forgeError = normalizeError(error);

  const sections: string[][] = [
    [`Error [${forgeError.code}]: ${forgeError.message}`],
    formatDetails(forgeError.details ?? {}),
    forgeError.hint ? ["Hint:", ...forgeError.hint.split("\n").map((l) => `  ${l}`)] : [],
  ];
  if (options.debug) {
    sections.push(...debugSections(forgeError));
  }

  return sections
    .filter((section) => section.length > 0)
    .flatMap((section) => [...section, ""])
    .join("\n")
    .trimEnd();
}

/** Stack frames without the message line */
function frames(error: Error): string[] {
  return error.stack ? error.stack.split("\n").slice(1) : [];
}

function debugSections(error: ForgeError): string[][] {
  const sections: string[][] = [];
  if (error.stack) {
    sections.push(["Stack trace:", ...frames(error)]);
  }
  for (let cause = error.cause; cause; cause = cause instanceof ForgeError ? cause.cause : undefined) {
    sections.push(["Caused by:", `  ${cause.message}`, ...frames(cause)]);
  }
  return sections;
}

/**
 * Wraps anything that is not a ForgeError as INTERNAL_ERROR.
 */
export function normalizeError(error: unknown): ForgeError {
  if (error instanceof ForgeError) {
    return error;
  }

  const cause = toError(error);
  const wrapped = new ForgeError(
    cause.message,
    ErrorCode.INTERNAL_ERROR,
    undefined,
    undefined,
    undefined,
    error instanceof Error ? error : undefined,
    false,
  );
  wrapped.stack = cause.stack;
  return wrapped;
}

/**
 * One line per scalar or object detail; arrays become a bulleted list.
 * Undefined values and empty arrays are left out.
 */
function formatDetails(details: Readonly<Record<string, unknown>>): string[] {
  return Object.entries(details).flatMap(([key, value]): string[] => {
    const label = formatKey(key);
    if (Array.isArray(value)) {
      return value.length > 0 ? [`${label}:`, ...value.map((item) => `  - ${formatItem(item)}`)] : [];
    }
    if (value === undefined) {
      return [];
    }
    return [`${label}: ${typeof value === "object" && value !== null ? JSON.stringify(value) : String(value)}`];
  });
}

/**
 * Validation issues arrive as `{ path, message }`; everything else is stringified.
 */
function formatItem(item: unknown): string {
  if (typeof item === "object" && item !== null && "path" in item && "message" in item) {
    return `${String(item.path)}: ${String(item.message)}`;
  }
  return typeof item === "object" && item !== null ? JSON.stringify(item) : String(item);
}

/**
 * camelCase -> Title Case.
 */
export function formatKey(key: string): string {
  return key
    .replace(/([A-Z])/g, " $1")
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
