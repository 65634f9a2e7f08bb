/**
 * Generate CLI command.
 *
 * Regenerates a project from its saved configuration.
 *
 * Usage:
 *   apiforge generate [path] [--force] [--dry-run]
 *
 * Examples:
 *   apiforge generate
 *   apiforge generate ./orders-api --dry-run
 *   apiforge --verbose generate ./orders-api --force
 *
 * @module
 */

import { Command } from "commander";
import { EngineTrace } from "../../core/observability/EngineTrace.js";
import { assertSuccess, formatGenerateOutput, handleGenerate } from "../handlers/generateHandler.js";
import { createCliRuntime } from "../runtime.js";
import { createCliSpinner } from "../ux/CliSpinner.js";
import { printLines, printTrace, withInterrupt } from "./output.js";

export function buildGenerateCommand(): Command {
  return new Command("generate")
    .alias("g")
    .description("Generate the project from .apiforge/config.json")
    .argument("[path]", "Project directory", ".")
    .option("--force", "Overwrite existing files", false)
    .option("--dry-run", "List what would be written without touching the disk", false)
    .action(
      async (projectDir: string, options: { force: boolean; dryRun: boolean }, command: Command) => {
        const runtime = createCliRuntime(command.optsWithGlobals());
        const { ux } = runtime;
        const trace = new EngineTrace();
        const spinner = createCliSpinner({ ux });

        if (options.dryRun) {
          ux.info("Dry run: nothing will be written");
        }
        spinner.start("Generating project");

        const result = await withInterrupt((signal) =>
          handleGenerate(
            { projectDir, force: options.force, dryRun: options.dryRun },
            {
              logger: runtime.logger,
              trace,
              signal,
              onStepStart: (step, position, total) =>
                spinner.update(`[${position}/${total}] ${step.id}`),
            },
          ),
        ).catch((err: unknown) => {
          spinner.stop();
          throw err;
        });

        if (result.report.success) {
          spinner.succeed(`Generated ${result.config.getProjectName()}`);
        } else {
          spinner.stop();
        }

        printLines(ux, formatGenerateOutput(result));
        printTrace(ux, trace);
        assertSuccess(result);
      },
    );
}
