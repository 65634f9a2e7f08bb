/**
 * Plan CLI command: prints the steps `generate` would run, in order.
 *
 * Usage:
 *   apiforge plan [path] [--json]
 *
 * @module
 */

import { Command } from "commander";
import { formatPlanJson, formatPlanOutput, handlePlan } from "../handlers/planHandler.js";
import { getExitCode } from "../../core/errors/ErrorCode.js";
import { normalizeError } from "../errors/ErrorPresenter.js";
import { createCliRuntime } from "../runtime.js";
import { formatJsonError } from "../ux/CliJson.js";

export function buildPlanCommand(): Command {
  return new Command("plan")
    .description("Show the execution plan for a project")
    .argument("[path]", "Project directory", ".")
    .option("--json", "Output as JSON for scripting", false)
    .action(async (projectDir: string, options: { json: boolean }, command: Command) => {
      const runtime = createCliRuntime(command.optsWithGlobals());

      try {
        const result = await handlePlan({ projectDir });

        if (options.json) {
          runtime.ux.raw(formatPlanJson(result));
        } else {
          for (const line of formatPlanOutput(result)) {
            runtime.ux.raw(line);
          }
        }
      } catch (err) {
        if (!options.json) {
          throw err;
        }
        runtime.ux.raw(formatJsonError(err, { debug: runtime.debug }));
        process.exitCode = getExitCode(normalizeError(err).code);
      }
    });
}

