/**
 * Authentication: security primitives, user and token persistence, services.
 *
 * Every step here is active whenever authentication is enabled, and several
 * require the persistence steps. Authentication without a database is
 * therefore rejected at plan time.
 *
 * @module
 */

import { defineStep, type StepDescriptor } from "../registry/StepDescriptor.js";
import type { Configuration } from "../config/Configuration.js";
import { Category } from "./categories.js";
import { emit } from "./emit.js";

const hasAuth = (config: Configuration): boolean => config.hasAuth();
const hasCompleteAuth = (config: Configuration): boolean => config.getAuthMode() === "complete";

export const authSteps: StepDescriptor[] = [
  defineStep({
    id: "auth.security",
    category: Category.AUTH,
    priority: 40,
    requires: ["app.config.jwt"],
    activation: hasAuth,
    description: "Password hashing and JWT helpers (app/core/security.py)",
    action: emit({ template: "auth/security.py", path: "app/core/security.py" }),
  }),
  defineStep({
    id: "auth.user-model",
    category: Category.AUTH,
    priority: 41,
    requires: ["database.connection"],
    activation: hasAuth,
    description: "User model",
    action: emit({ template: "auth/models/user.py", path: "app/models/user.py" }),
  }),
  defineStep({
    id: "auth.user-schema",
    category: Category.AUTH,
    priority: 42,
    activation: hasAuth,
    description: "User request and response schemas",
    action: emit({ template: "auth/schemas/user.py", path: "app/schemas/user.py" }),
  }),
  defineStep({
    id: "auth.user-crud",
    category: Category.AUTH,
    priority: 43,
    requires: ["auth.user-model", "auth.user-schema"],
    activation: hasAuth,
    description: "User persistence operations",
    action: emit({ template: "auth/crud/user.py", path: "app/crud/user.py" }),
  }),
  defineStep({
    id: "auth.token-model",
    category: Category.AUTH,
    priority: 44,
    requires: ["auth.user-model"],
    activation: hasCompleteAuth,
    description: "Verification, reset and refresh token model",
    action: emit({ template: "auth/models/token.py", path: "app/models/token.py" }),
  }),
  defineStep({
    id: "auth.token-schema",
    category: Category.AUTH,
    priority: 45,
    activation: hasCompleteAuth,
    description: "Token request and response schemas",
    action: emit({ template: "auth/schemas/token.py", path: "app/schemas/token.py" }),
  }),
  defineStep({
    id: "auth.token-crud",
    category: Category.AUTH,
    priority: 46,
    requires: ["auth.token-model", "auth.token-schema"],
    activation: hasCompleteAuth,
    description: "Token persistence operations",
    action: emit({ template: "auth/crud/token.py", path: "app/crud/token.py" }),
  }),
  defineStep({
    id: "auth.deps",
    category: Category.AUTH,
    priority: 47,
    requires: ["auth.security", "database.package", "auth.user-crud"],
    activation: hasAuth,
    description: "Request dependencies resolving the current user (app/core/deps.py)",
    action: emit({ template: "auth/deps.py", path: "app/core/deps.py" }),
  }),
  defineStep({
    id: "auth.service",
    category: Category.AUTH,
    priority: 48,
    requires: ["auth.user-crud", "auth.security"],
    activation: hasAuth,
    description: "Registration and login service",
    action: emit({ template: "auth/services/auth.py", path: "app/services/auth.py" }),
  }),
];
