/**
 * Per-invocation CLI runtime.
 *
 * Built from the global flags when a command runs: the {@link CliUx} for
 * human output, a {@link ContextualLogger} for structured entries on stderr,
 * and the presenter that turns a thrown error into output and an exit code.
 *
 * The logger is quiet by default (`warn`). `APIFORGE_LOG_LEVEL` lowers or
 * raises it; `--debug` forces `debug` and adds stacks to logged errors.
 *
 * @module
 */

import { createLogger, parseLogLevelName, type ContextualLogger } from "../core/logging/ContextualLogger.js";
import { createExecutionContext, type ExecutionContext } from "../core/logging/ExecutionContext.js";
import { Phase } from "../core/logging/Phase.js";
import { ErrorPresenter } from "./errors/ErrorPresenter.js";
import { createCliUx, parseUxLevel, type CliUx } from "./ux/CliUx.js";

export type GlobalOptions = {
  readonly verbose?: boolean;
  readonly debug?: boolean;
  readonly silent?: boolean;
};

export interface CliRuntime {
  readonly ux: CliUx;
  readonly logger: ContextualLogger;
  readonly context: ExecutionContext;
  readonly debug: boolean;
}

export const LOG_LEVEL_ENV = "APIFORGE_LOG_LEVEL";

export function createCliRuntime(
  globals: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
  ux?: CliUx,
): CliRuntime {
  const debug = globals.debug === true;
  const context = createExecutionContext({ phase: Phase.CLI_INIT });

  const logger = createLogger({
    minLevel: debug ? "debug" : (parseLogLevelName(env[LOG_LEVEL_ENV]) ?? "warn"),
    debug,
  }).withContext({ correlationId: context.correlationId });

  return {
    ux:
      ux ??
      createCliUx({
        level: parseUxLevel({
          verbose: globals.verbose === true,
          debug,
          silent: globals.silent === true,
        }),
      }),
    logger,
    context,
    debug,
  };
}

/**
 * Prints an error through the runtime's UX and records the exit code.
 */
export function reportError(runtime: Pick<CliRuntime, "ux" | "debug">, error: unknown): number {
  const lines: string[] = [];
  const exitCode = new ErrorPresenter({
    debug: runtime.debug,
    output: (line) => lines.push(line),
  }).present(error);

  runtime.ux.errorBlock(lines);
  process.exitCode = exitCode;
  return exitCode;
}
