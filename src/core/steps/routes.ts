/**
 * HTTP routes for authentication and users.
 *
 * @module
 */

import { defineStep, type StepDescriptor } from "../registry/StepDescriptor.js";
import { Category } from "./categories.js";
import { emit } from "./emit.js";

export const routeSteps: StepDescriptor[] = [
  defineStep({
    id: "routes.auth",
    category: Category.ROUTES,
    priority: 60,
    requires: ["auth.service", "auth.deps"],
    activation: (config) => config.hasAuth(),
    description: "Authentication routes (app/routers/v1/auth.py)",
    action: emit({ template: "routes/auth.py", path: "app/routers/v1/auth.py" }),
  }),
  defineStep({
    id: "routes.users",
    category: Category.ROUTES,
    priority: 61,
    requires: ["auth.deps"],
    activation: (config) => config.hasAuth(),
    description: "User routes (app/routers/v1/users.py)",
    action: emit({ template: "routes/users.py", path: "app/routers/v1/users.py" }),
  }),
  defineStep({
    id: "routes.api-v1",
    category: Category.ROUTES,
    priority: 62,
    requires: ["routes.auth", "routes.users"],
    activation: (config) => config.hasAuth(),
    description: "Version 1 API router",
    action: emit({ template: "routes/api_v1.py", path: "app/routers/v1/__init__.py" }),
  }),
];
