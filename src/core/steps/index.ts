/**
 * Built-in step catalog.
 *
 * @module
 */

import { GeneratorRegistry } from "../registry/GeneratorRegistry.js";
import type { StepDescriptor } from "../registry/StepDescriptor.js";
import { structureSteps } from "./structure.js";
import { projectFileSteps } from "./projectFiles.js";
import { appConfigSteps } from "./appConfig.js";
import { databaseSteps } from "./database.js";
import { authSteps } from "./auth.js";
import { emailSteps } from "./email.js";
import { routeSteps } from "./routes.js";
import { appSteps } from "./app.js";
import { deploymentSteps } from "./deployment.js";
import { testSteps } from "./tests.js";

export { Category } from "./categories.js";

/**
 * Every built-in step, in registration order.
 */
export function defaultSteps(): StepDescriptor[] {
  return [
    ...structureSteps,
    ...projectFileSteps,
    ...appConfigSteps,
    ...databaseSteps,
    ...authSteps,
    ...emailSteps,
    ...routeSteps,
    ...appSteps,
    ...deploymentSteps,
    ...testSteps,
  ];
}

/**
 * Creates a registry holding the built-in catalog.
 */
export function createDefaultRegistry(): GeneratorRegistry {
  return new GeneratorRegistry().registerAll(defaultSteps());
}
