/**
 * Commander program for the `apiforge` binary.
 *
 * @module
 */

import { Command } from "commander";
import { buildInitCommand } from "./commands/init.js";
import { buildGenerateCommand } from "./commands/generate.js";
import { buildPlanCommand } from "./commands/plan.js";
import { buildStepsCommand } from "./commands/steps.js";
import { buildDockerCommand } from "./commands/docker.js";
import { createCliUx, parseUxLevel, setDefaultCliUx } from "./ux/CliUx.js";
import { CLI_VERSION } from "./version.js";

export function buildProgram(): Command {
  const program = new Command()
    .name("apiforge")
    .description("apiforge - scaffold FastAPI services from composable generation steps")
    .version(CLI_VERSION)
    .option("--verbose", "Show additional context and the phase trace", false)
    .option("--debug", "Show everything, including stack traces", false)
    .option("--silent", "Suppress all output except errors", false);

  // main() prints errors escaping a command through this instance
  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    setDefaultCliUx(
      createCliUx({
        level: parseUxLevel({
          verbose: opts.verbose === true,
          debug: opts.debug === true,
          silent: opts.silent === true,
        }),
      }),
    );
  });

  program.addCommand(buildInitCommand());
  program.addCommand(buildGenerateCommand());
  program.addCommand(buildPlanCommand());
  program.addCommand(buildStepsCommand());
  program.addCommand(buildDockerCommand());

  return program;
}
