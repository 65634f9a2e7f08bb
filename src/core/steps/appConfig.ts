/**
 * Application settings modules and the logger.
 *
 * @module
 */

import { defineStep, type StepDescriptor } from "../registry/StepDescriptor.js";
import { Category } from "./categories.js";
import { emit } from "./emit.js";

export const appConfigSteps: StepDescriptor[] = [
  defineStep({
    id: "app.config.base",
    category: Category.APP_CONFIG,
    priority: 20,
    description: "Settings base class (app/core/config/base.py)",
    action: emit({ template: "app/config/base.py", path: "app/core/config/base.py" }),
  }),
  defineStep({
    id: "app.config.app",
    category: Category.APP_CONFIG,
    priority: 21,
    description: "Application settings module",
    action: emit({ template: "app/config/app.py", path: "app/core/config/modules/app.py" }),
  }),
  defineStep({
    id: "app.config.logger",
    category: Category.APP_CONFIG,
    priority: 22,
    description: "Logger settings module",
    action: emit({ template: "app/config/logger.py", path: "app/core/config/modules/logger.py" }),
  }),
  defineStep({
    id: "app.logger",
    category: Category.APP_CONFIG,
    priority: 23,
    requires: ["app.config.logger"],
    description: "Logger manager (app/core/logger.py)",
    action: emit({ template: "app/logger.py", path: "app/core/logger.py" }),
  }),
  defineStep({
    id: "app.config.cors",
    category: Category.APP_CONFIG,
    priority: 24,
    activation: (config) => config.getFeature("cors"),
    description: "CORS settings module",
    action: emit({ template: "app/config/cors.py", path: "app/core/config/modules/cors.py" }),
  }),
  defineStep({
    id: "app.config.database",
    category: Category.APP_CONFIG,
    priority: 25,
    activation: (config) => config.hasDatabase(),
    description: "Database settings module",
    action: emit({ template: "app/config/database.py", path: "app/core/config/modules/database.py" }),
  }),
  defineStep({
    id: "app.config.jwt",
    category: Category.APP_CONFIG,
    priority: 26,
    activation: (config) => config.hasAuth(),
    description: "JWT settings module",
    action: emit({ template: "app/config/jwt.py", path: "app/core/config/modules/jwt.py" }),
  }),
  defineStep({
    id: "app.config.email",
    category: Category.APP_CONFIG,
    priority: 27,
    activation: (config) => config.getAuthMode() === "complete",
    description: "Email (SMTP) settings module",
    action: emit({ template: "app/config/email.py", path: "app/core/config/modules/email.py" }),
  }),
  defineStep({
    id: "app.config.settings",
    category: Category.APP_CONFIG,
    priority: 28,
    requires: ["app.config.base", "app.config.app", "app.config.logger"],
    description: "Aggregated settings object (app/core/config/settings.py)",
    action: emit({ template: "app/config/settings.py", path: "app/core/config/settings.py" }),
  }),
];
