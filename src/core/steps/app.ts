/**
 * Application entry point.
 *
 * @module
 */

import { defineStep, type StepDescriptor } from "../registry/StepDescriptor.js";
import { Category } from "./categories.js";
import { emit } from "./emit.js";

export const appSteps: StepDescriptor[] = [
  defineStep({
    id: "app.main",
    category: Category.APP,
    priority: 90,
    requires: ["app.config.settings", "app.logger"],
    description: "FastAPI application (app/main.py)",
    action: emit({ template: "app/main.py", path: "app/main.py" }),
  }),
];
