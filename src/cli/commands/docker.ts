/**
 * Docker CLI command.
 *
 * Regenerates the Dockerfile, docker-compose.yml and .dockerignore of a
 * project whose configuration enables Docker. Existing files are replaced.
 *
 * Usage:
 *   apiforge docker [path]
 *
 * @module
 */

import { Command } from "commander";
import { EngineTrace } from "../../core/observability/EngineTrace.js";
import { assertSuccess, formatGenerateOutput } from "../handlers/generateHandler.js";
import { handleDocker } from "../handlers/dockerHandler.js";
import { createCliRuntime } from "../runtime.js";
import { printLines, printTrace } from "./output.js";

export function buildDockerCommand(): Command {
  return new Command("docker")
    .description("Regenerate the Docker configs of an existing project")
    .argument("[path]", "Project directory", ".")
    .action(async (projectDir: string, _options: unknown, command: Command) => {
      const runtime = createCliRuntime(command.optsWithGlobals());
      const { ux } = runtime;
      const trace = new EngineTrace();

      const result = await handleDocker({ projectDir }, { logger: runtime.logger, trace });

      ux.success("Docker configs generated");
      printLines(ux, formatGenerateOutput(result));
      printTrace(ux, trace);
      assertSuccess(result);

      ux.header("Usage");
      ux.listItem("docker compose up -d");
      ux.listItem("docker compose logs -f");
      ux.listItem("docker compose down");
    });
}
