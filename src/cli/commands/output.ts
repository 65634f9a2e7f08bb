/**
 * Output helpers shared by the generating commands.
 *
 * @module
 */

import type { CliUx } from "../ux/CliUx.js";
import type { EngineTrace } from "../../core/observability/EngineTrace.js";

/**
 * Prints formatted handler output: blank lines stay blank, indented lines
 * become details.
 */
export function printLines(ux: CliUx, lines: readonly string[]): void {
  for (const line of lines) {
    if (line.trim() === "") {
      ux.newline();
    } else if (line.startsWith("  ")) {
      ux.detail(line.trim());
    } else {
      ux.info(line);
    }
  }
}

/**
 * Phase and step timings, at the verbose level only.
 */
export function printTrace(ux: CliUx, trace: EngineTrace): void {
  if (!ux.isEnabled("verbose") || trace.toArray().length === 0) {
    return;
  }
  ux.header("Trace:");
  for (const line of trace.toHumanString().split("\n")) {
    ux.verbose(line.trimStart());
  }
}

/**
 * Runs an operation with Ctrl-C wired to an abort signal. The engine stops
 * at the next step boundary and reports the run as cancelled.
 */
export async function withInterrupt<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    return await operation(controller.signal);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
