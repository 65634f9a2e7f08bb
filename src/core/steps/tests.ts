/**
 * Test suite of the generated service.
 *
 * @module
 */

import { defineStep, type StepDescriptor } from "../registry/StepDescriptor.js";
import type { Configuration } from "../config/Configuration.js";
import { Category } from "./categories.js";
import { emit } from "./emit.js";

const testing = (config: Configuration): boolean => config.getFeature("testing");

export const testSteps: StepDescriptor[] = [
  defineStep({
    id: "tests.conftest",
    category: Category.TESTS,
    priority: 110,
    requires: ["app.main"],
    activation: testing,
    description: "Shared pytest fixtures (tests/conftest.py)",
    action: emit({ template: "tests/conftest.py", path: "tests/conftest.py" }),
  }),
  defineStep({
    id: "tests.main",
    category: Category.TESTS,
    priority: 111,
    requires: ["tests.conftest"],
    activation: testing,
    description: "Health and error handling tests",
    action: emit({ template: "tests/test_main.py", path: "tests/test_main.py" }),
  }),
  defineStep({
    id: "tests.auth",
    category: Category.TESTS,
    priority: 112,
    requires: ["tests.conftest", "routes.auth"],
    activation: (config) => testing(config) && config.hasAuth(),
    description: "Authentication route tests",
    action: emit({ template: "tests/test_auth.py", path: "tests/api/test_auth.py" }),
  }),
  defineStep({
    id: "tests.users",
    category: Category.TESTS,
    priority: 113,
    requires: ["tests.conftest", "routes.users"],
    activation: (config) => testing(config) && config.hasAuth(),
    description: "User route tests",
    action: emit({ template: "tests/test_users.py", path: "tests/api/test_users.py" }),
  }),
];
