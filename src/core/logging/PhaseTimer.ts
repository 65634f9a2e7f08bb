/**
 * Phase timer.
 *
 * Wraps a phase of the invocation with `phase.start` / `phase.end` log
 * events and, when given one, an {@link EngineTrace} entry.
 *
 * @module
 */

import type { ContextualLogger } from "./ContextualLogger.js";
import type { Phase } from "./Phase.js";
import type { EngineTrace } from "../observability/EngineTrace.js";

export class PhaseTimer {
  constructor(
    private readonly logger: ContextualLogger,
    private readonly trace?: EngineTrace,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Runs a phase, logging its duration whether it succeeds or throws.
   */
  async run<T>(
    phase: Phase,
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    const log = this.logger.withContext({ phase });
    const startedAt = this.now();

    log.debug("Phase started", { event: "phase.start", ...context });
    this.trace?.start(phase, context);

    try {
      const result = await fn();
      log.debug("Phase completed", { event: "phase.end", durationMs: this.now() - startedAt });
      return result;
    } catch (error) {
      log.error("Phase failed", {
        event: "phase.end",
        durationMs: this.now() - startedAt,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    } finally {
      this.trace?.end(phase);
    }
  }

  /**
   * Synchronous variant of {@link run}.
   */
  runSync<T>(phase: Phase, fn: () => T, context?: Record<string, unknown>): T {
    const log = this.logger.withContext({ phase });
    const startedAt = this.now();

    log.debug("Phase started", { event: "phase.start", ...context });
    this.trace?.start(phase, context);

    try {
      const result = fn();
      log.debug("Phase completed", { event: "phase.end", durationMs: this.now() - startedAt });
      return result;
    } catch (error) {
      log.error("Phase failed", {
        event: "phase.end",
        durationMs: this.now() - startedAt,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    } finally {
      this.trace?.end(phase);
    }
  }
}
