/**
 * Init CLI command.
 *
 * Creates a new project: collects the selection, saves it to
 * `.apiforge/config.json` and generates every artifact.
 *
 * Usage:
 *   apiforge init [name] [--yes] [--database <kind>] [--orm <kind>] [--auth <mode>] ...
 *
 * Examples:
 *   apiforge init
 *   apiforge init orders-api --yes --database mysql --orm sqlalchemy --auth basic
 *   apiforge init gateway --yes --database none --no-docker
 *
 * @module
 */

import { Command, Option } from "commander";
import { DATABASE_KINDS, ORM_KINDS, AUTH_MODES } from "../../core/config/Configuration.js";
import { EngineTrace } from "../../core/observability/EngineTrace.js";
import { handleInit } from "../handlers/initHandler.js";
import { assertSuccess, formatGenerateOutput } from "../handlers/generateHandler.js";
import { createCliRuntime } from "../runtime.js";
import { createCliSpinner } from "../ux/CliSpinner.js";
import { printLines, printTrace, withInterrupt } from "./output.js";

interface InitOptions {
  yes: boolean;
  database?: string;
  orm?: string;
  migrations: boolean;
  auth?: string;
  cors: boolean;
  devTools: boolean;
  testing: boolean;
  docker: boolean;
  force: boolean;
  dir: string;
}

export function buildInitCommand(): Command {
  return new Command("init")
    .description("Create a new API project")
    .argument("[name]", "Project name (also the directory name)")
    .option("-y, --yes", "Non-interactive: take the selection from flags and defaults", false)
    .addOption(new Option("--database <kind>", "Database").choices([...DATABASE_KINDS]))
    .addOption(new Option("--orm <kind>", "ORM (requires a database)").choices([...ORM_KINDS]))
    .option("--no-migrations", "Skip Alembic migrations")
    .addOption(new Option("--auth <mode>", "Authentication").choices([...AUTH_MODES]))
    .option("--no-cors", "Skip CORS middleware")
    .option("--no-dev-tools", "Skip Black and Ruff")
    .option("--no-testing", "Skip the pytest setup")
    .option("--no-docker", "Skip Docker configs")
    .option("--force", "Replace an existing configuration and overwrite existing files", false)
    .option("--dir <path>", "Parent directory of the new project", ".")
    .action(async (name: string | undefined, options: InitOptions, command: Command) => {
      const runtime = createCliRuntime(command.optsWithGlobals());
      const { ux } = runtime;
      const trace = new EngineTrace();
      const spinner = createCliSpinner({ ux });

      const result = await withInterrupt((signal) =>
        handleInit(
          {
            projectName: name,
            parentDir: options.dir,
            yes: options.yes,
            force: options.force,
            flags: {
              database: options.database,
              orm: options.orm,
              migrations: options.migrations,
              auth: options.auth,
              cors: options.cors,
              devTools: options.devTools,
              testing: options.testing,
              docker: options.docker,
            },
          },
          {
            logger: runtime.logger,
            trace,
            signal,
            onStepStart: (step, position, total) => {
              if (position === 1) {
                spinner.start("Generating project");
              }
              spinner.update(`[${position}/${total}] ${step.id}`);
            },
          },
        ).finally(() => {
          if (spinner.isRunning) {
            spinner.stop();
          }
        }),
      );

      ux.success(`Created ${result.config.getProjectName()}`, { config: result.configPath });
      printLines(ux, formatGenerateOutput(result.generation));
      printTrace(ux, trace);
      assertSuccess(result.generation);

      ux.header("Next steps");
      ux.listItem(`cd ${result.projectDir}`);
      ux.listItem("uv sync");
      ux.listItem("uvicorn app.main:app --reload");
    });
}
