/**
 * Execution context for structured logging.
 *
 * One context per CLI invocation (or per `generate()` call when used as a
 * library). Its correlation id is stamped on every log entry.
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import type { Phase } from "./Phase.js";

export interface ExecutionContext {
  /** Stamped on every log entry of the run */
  readonly correlationId: string;

  readonly phase?: Phase;

  readonly metadata?: Record<string, unknown>;
}

/**
 * Starts a context for one run; the correlation id defaults to a random UUID.
 *
 * @example
 * ```typescript
 * const ctx = createExecutionContext({ phase: Phase.CLI_INIT });
 * const logger = createLogger().withContext({ correlationId: ctx.correlationId });
 * ```
 */
export function createExecutionContext({
  correlationId = randomUUID(),
  phase,
  metadata,
}: Partial<ExecutionContext> = {}): ExecutionContext {
  return { correlationId, phase, metadata };
}
