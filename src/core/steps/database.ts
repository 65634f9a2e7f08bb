/**
 * Persistence layer and migrations.
 *
 * @module
 */

import { defineStep, done, skip, type StepDescriptor } from "../registry/StepDescriptor.js";
import { Category } from "./categories.js";
import { emit, emitFor, writeEmission } from "./emit.js";

/** Written last by the migrations step; its presence means Alembic is set up. */
export const ALEMBIC_ENV_PATH = "alembic/env.py";

export const databaseSteps: StepDescriptor[] = [
  defineStep({
    id: "database.connection",
    category: Category.DATABASE,
    priority: 30,
    requires: ["app.config.database", "app.config.settings"],
    activation: (config) => config.hasDatabase(),
    description: "Connection manager (app/core/database/connection.py)",
    action: emit({ template: "database/connection.py", path: "app/core/database/connection.py" }),
  }),
  defineStep({
    id: "database.postgresql",
    category: Category.DATABASE,
    priority: 31,
    requires: ["database.connection"],
    activation: (config) => config.getDatabaseKind() === "postgresql",
    description: "PostgreSQL engine and session factory",
    action: emit({ template: "database/postgresql.py", path: "app/core/database/postgresql.py" }),
  }),
  defineStep({
    id: "database.mysql",
    category: Category.DATABASE,
    priority: 31,
    requires: ["database.connection"],
    activation: (config) => config.getDatabaseKind() === "mysql",
    description: "MySQL engine and session factory",
    action: emit({ template: "database/mysql.py", path: "app/core/database/mysql.py" }),
  }),
  defineStep({
    id: "database.package",
    category: Category.DATABASE,
    priority: 32,
    requires: ["database.connection"],
    activation: (config) => config.hasDatabase(),
    description: "Database package exports, session dependency and model base",
    action: emitFor(({ config }) => [
      { template: "database/__init__.py", path: "app/core/database/__init__.py" },
      { template: "database/dependencies.py", path: "app/core/database/dependencies.py" },
      ...(config.getOrm() === "sqlalchemy"
        ? [{ template: "database/model_base.py", path: "app/models/base.py" }]
        : []),
    ]),
  }),
  defineStep({
    id: "database.migrations",
    category: Category.DATABASE,
    priority: 35,
    requires: ["database.connection"],
    activation: (config) => config.hasMigrations(),
    description: "Alembic migration environment",
    action: async (ctx) => {
      if (await ctx.writer.exists(ALEMBIC_ENV_PATH)) {
        return skip("Alembic is already initialized");
      }
      await writeEmission(ctx, { template: "alembic/alembic.ini", path: "alembic.ini" });
      await writeEmission(ctx, { template: "alembic/script.py.mako", path: "alembic/script.py.mako" });
      await writeEmission(ctx, { template: "alembic/README.md", path: "alembic/README.md" });
      await ctx.writer.write("alembic/versions/.gitkeep", "", { overwrite: true });
      await writeEmission(ctx, { template: "alembic/env.py", path: ALEMBIC_ENV_PATH });
      return done();
    },
  }),
];
