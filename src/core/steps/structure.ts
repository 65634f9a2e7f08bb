/**
 * Package skeleton and shared utilities.
 *
 * @module
 */

import { defineStep, type StepDescriptor } from "../registry/StepDescriptor.js";
import type { Configuration } from "../config/Configuration.js";
import { Category } from "./categories.js";
import { emit, emitFor, type Emission } from "./emit.js";

/**
 * Python packages the service needs, given its features.
 */
export function packageModules(config: Configuration): string[] {
  const modules = ["app", "app/core", "app/core/config", "app/core/config/modules", "app/schemas", "app/utils"];

  if (config.hasDatabase()) {
    modules.push("app/crud", "app/models");
  }
  if (config.hasAuth()) {
    modules.push("app/services", "app/routers");
  }
  if (config.getFeature("testing")) {
    modules.push("tests", "tests/api");
  }
  return modules;
}

function initEmission(module: string): Emission {
  return {
    template: "structure/__init__.py",
    path: `${module}/__init__.py`,
    data: { module: module.replace(/\//g, ".") },
  };
}

export const structureSteps: StepDescriptor[] = [
  defineStep({
    id: "structure.packages",
    category: Category.STRUCTURE,
    priority: 0,
    description: "Package skeleton (__init__.py files)",
    action: emitFor(({ config }) => packageModules(config).map(initEmission)),
  }),
  defineStep({
    id: "structure.response-utils",
    category: Category.STRUCTURE,
    priority: 5,
    description: "Uniform JSON response helpers (app/utils/response.py)",
    action: emit({ template: "structure/response.py", path: "app/utils/response.py" }),
  }),
];
