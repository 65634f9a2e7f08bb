/**
 * Steps CLI command: lists every registered generation step.
 *
 * Usage:
 *   apiforge steps [--json]
 *
 * @module
 */

import { Command } from "commander";
import { formatStepsJson, formatStepsOutput, handleSteps } from "../handlers/stepsHandler.js";
import { createCliRuntime } from "../runtime.js";

export function buildStepsCommand(): Command {
  return new Command("steps")
    .description("List the registered generation steps")
    .option("--json", "Output as JSON for scripting", false)
    .action((options: { json: boolean }, command: Command) => {
      const { ux } = createCliRuntime(command.optsWithGlobals());
      const result = handleSteps();

      if (options.json) {
        ux.raw(formatStepsJson(result));
        return;
      }
      for (const line of formatStepsOutput(result)) {
        ux.raw(line);
      }
    });
}
