/**
 * Unit tests for the built-in step catalog.
 *
 * Checks which steps sample configurations activate.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { resolve } from "../../src/core/plan/DependencyResolver.js";
import { Category, createDefaultRegistry, defaultSteps } from "../../src/core/steps/index.js";
import { packageModules } from "../../src/core/steps/structure.js";
import { createConfiguration } from "../../src/core/config/Configuration.js";
import { FIXED_DATE, fullConfig, minimalConfig } from "../helpers/testUtils.js";

function planIds(config = fullConfig()): string[] {
  return resolve(createDefaultRegistry(), config).steps.map((s) => s.id);
}

describe("built-in step catalog", () => {
  it("registers without integrity errors", () => {
    const registry = createDefaultRegistry();

    expect(registry.size).toBe(defaultSteps().length);
    expect(registry.categories()).toEqual([
      Category.STRUCTURE,
      Category.CONFIG,
      Category.APP_CONFIG,
      Category.DATABASE,
      Category.AUTH,
      Category.EMAIL,
      Category.ROUTES,
      Category.APP,
      Category.DEPLOYMENT,
      Category.TESTS,
    ]);
  });

  it("plans every feature of the full configuration", () => {
    expect(planIds()).toEqual([
      "structure.packages",
      "structure.response-utils",
      "config.pyproject",
      "config.readme",
      "config.gitignore",
      "config.env",
      "app.config.base",
      "app.config.app",
      "app.config.logger",
      "app.logger",
      "app.config.cors",
      "app.config.database",
      "app.config.jwt",
      "app.config.email",
      "app.config.settings",
      "database.connection",
      "database.postgresql",
      "database.package",
      "database.migrations",
      "auth.security",
      "auth.user-model",
      "auth.user-schema",
      "auth.user-crud",
      "auth.token-model",
      "auth.token-schema",
      "auth.token-crud",
      "auth.deps",
      "auth.service",
      "email.service",
      "email.templates",
      "routes.auth",
      "routes.users",
      "routes.api-v1",
      "app.main",
      "deploy.dockerfile",
      "deploy.compose",
      "deploy.dockerignore",
      "tests.conftest",
      "tests.main",
      "tests.auth",
      "tests.users",
    ]);
  });

  it("swaps the engine step for MySQL", () => {
    const ids = planIds(
      createConfiguration({ projectName: "svc", database: "mysql", orm: "sqlalchemy", migrations: false }),
    );

    expect(ids).toContain("database.mysql");
    expect(ids).not.toContain("database.postgresql");
    expect(ids).not.toContain("database.migrations");
  });

  it("leaves email and token steps out of basic auth", () => {
    const ids = planIds(
      createConfiguration({ projectName: "svc", database: "postgresql", orm: "sqlmodel", auth: "basic" }),
    );

    expect(ids).toContain("auth.user-crud");
    expect(ids).toContain("routes.auth");
    expect(ids).not.toContain("auth.token-model");
    expect(ids).not.toContain("app.config.email");
    expect(ids).not.toContain("email.service");
  });

  it("plans a database without auth", () => {
    const ids = planIds(
      createConfiguration(
        { projectName: "svc", database: "postgresql", orm: "sqlmodel", testing: true },
        { now: () => FIXED_DATE },
      ),
    );

    expect(ids).toContain("database.package");
    expect(ids).toContain("tests.main");
    expect(ids).not.toContain("auth.security");
    expect(ids).not.toContain("tests.auth");
  });

  it("gives the deployment category only the docker steps", () => {
    const plan = resolve(createDefaultRegistry(), fullConfig(), { only: [Category.DEPLOYMENT] });

    expect(plan.steps.map((s) => s.id)).toEqual(["deploy.dockerfile", "deploy.compose", "deploy.dockerignore"]);
  });
});

describe("packageModules", () => {
  it("lists the base packages", () => {
    expect(packageModules(minimalConfig())).toEqual([
      "app",
      "app/core",
      "app/core/config",
      "app/core/config/modules",
      "app/schemas",
      "app/utils",
    ]);
  });

  it("adds feature packages", () => {
    expect(packageModules(fullConfig()).slice(6)).toEqual([
      "app/crud",
      "app/models",
      "app/services",
      "app/routers",
      "tests",
      "tests/api",
    ]);
  });
});
