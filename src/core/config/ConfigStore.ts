/**
 * Configuration Store.
 *
 * Persists the project configuration at `<projectDir>/.apiforge/config.json`.
 * The on-disk record keeps the snake_case layout written by the wizard:
 *
 * ```json
 * {
 *   "project_name": "orders",
 *   "database": { "type": "PostgreSQL", "orm": "SQLModel", "migration_tool": "Alembic" },
 *   "features": {
 *     "auth": { "type": "complete", "refresh_token": true, "features": ["Email Verification"] },
 *     "cors": true,
 *     "dev_tools": true,
 *     "testing": true,
 *     "docker": true
 *   },
 *   "metadata": { "created_at": "2026-01-01T00:00:00.000Z", "tool_version": "0.1.0" }
 * }
 * ```
 *
 * ## Atomic Writes
 *
 * 1. Write to temp file in same directory
 * 2. Rename temp to final (atomic on POSIX)
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import { z } from "zod";
import { ConfigurationError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import {
  createConfiguration,
  type Configuration,
  type DatabaseKind,
  type OrmKind,
  type AuthMode,
} from "./Configuration.js";

// =============================================================================
// Constants
// =============================================================================

/** Directory name for apiforge metadata inside a project. */
export const CONFIG_DIRNAME = ".apiforge";

/** Configuration file name. */
export const CONFIG_FILENAME = "config.json";

const DATABASE_TYPES = { postgresql: "PostgreSQL", mysql: "MySQL" } as const;
const ORM_TYPES = { sqlmodel: "SQLModel", sqlalchemy: "SQLAlchemy" } as const;
const MIGRATION_TOOL = "Alembic";

/** Feature list recorded for complete authentication. */
const COMPLETE_AUTH_FEATURES = ["Email Verification", "Password Reset", "Email Service"];

// =============================================================================
// Zod Schemas
// =============================================================================

/**
 * Schema for the persisted record.
 */
export const ConfigRecordSchema = z.object({
  project_name: z.string().min(1),
  database: z
    .object({
      type: z.enum(["PostgreSQL", "MySQL"]),
      orm: z.enum(["SQLModel", "SQLAlchemy"]),
      migration_tool: z.literal(MIGRATION_TOOL).nullable().optional(),
    })
    .nullable()
    .optional(),
  features: z.object({
    auth: z
      .object({
        type: z.enum(["none", "basic", "complete"]),
        refresh_token: z.boolean().default(false),
        features: z.array(z.string()).default([]),
      })
      .default({ type: "none", refresh_token: false, features: [] }),
    cors: z.boolean().default(false),
    dev_tools: z.boolean().default(false),
    testing: z.boolean().default(false),
    docker: z.boolean().default(false),
  }),
  metadata: z
    .object({
      created_at: z.string().optional(),
      tool_version: z.string().optional(),
    })
    .nullable()
    .optional(),
});

export type ConfigRecord = z.infer<typeof ConfigRecordSchema>;

// =============================================================================
// Converters
// =============================================================================

function databaseFromType(type: "PostgreSQL" | "MySQL"): DatabaseKind {
  return type === "PostgreSQL" ? "postgresql" : "mysql";
}

function ormFromType(type: "SQLModel" | "SQLAlchemy"): OrmKind {
  return type === "SQLModel" ? "sqlmodel" : "sqlalchemy";
}

/**
 * Converts a persisted record into a validated configuration.
 *
 * @throws ConfigurationError if the record violates a cross-field rule
 */
export function fromRecord(record: ConfigRecord): Configuration {
  const db = record.database ?? null;
  const auth: AuthMode = record.features.auth.type;

  return createConfiguration({
    projectName: record.project_name,
    database: db ? databaseFromType(db.type) : "none",
    orm: db ? ormFromType(db.orm) : null,
    migrations: db ? db.migration_tool === MIGRATION_TOOL : false,
    auth,
    refreshToken: record.features.auth.refresh_token,
    cors: record.features.cors,
    devTools: record.features.dev_tools,
    testing: record.features.testing,
    docker: record.features.docker,
    metadata: {
      createdAt: record.metadata?.created_at,
      toolVersion: record.metadata?.tool_version,
    },
  });
}

/**
 * Converts a configuration into its persisted record, keys in wizard order.
 */
export function toRecord(config: Configuration): ConfigRecord {
  const value = config.snapshot;
  const database: ConfigRecord["database"] =
    value.database !== "none" && value.orm !== null
      ? {
          type: DATABASE_TYPES[value.database],
          orm: ORM_TYPES[value.orm],
          migration_tool: value.migrations ? MIGRATION_TOOL : null,
        }
      : undefined;

  return {
    project_name: value.projectName,
    ...(database ? { database } : {}),
    features: {
      auth: {
        type: value.auth,
        refresh_token: value.refreshToken,
        features: value.auth === "complete" ? [...COMPLETE_AUTH_FEATURES] : [],
      },
      cors: value.features.cors,
      dev_tools: value.features.devTools,
      testing: value.features.testing,
      docker: value.features.docker,
    },
    metadata: {
      created_at: value.metadata.createdAt,
      tool_version: value.metadata.toolVersion,
    },
  };
}

// =============================================================================
// ConfigStore
// =============================================================================

/**
 * Reads and writes the persisted project configuration.
 *
 * ```typescript
 * const store = new ConfigStore();
 * await store.save(projectDir, config);
 * const loaded = await store.load(projectDir);
 * ```
 */
export class ConfigStore {
  /**
   * Gets the path of the configuration file for a project directory.
   */
  getConfigPath(projectDir: string): string {
    return path.join(path.resolve(projectDir), CONFIG_DIRNAME, CONFIG_FILENAME);
  }

  /**
   * Checks whether a project directory already holds a configuration.
   */
  async exists(projectDir: string): Promise<boolean> {
    try {
      await fs.access(this.getConfigPath(projectDir));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Loads and validates the configuration of a project.
   *
   * @throws ConfigurationError (CONFIG_NOT_FOUND, CONFIG_PARSE_FAILED, CONFIG_INVALID)
   */
  async load(projectDir: string): Promise<Configuration> {
    const configPath = this.getConfigPath(projectDir);

    let content: string;
    try {
      content = await fs.readFile(configPath, "utf-8");
    } catch (err) {
      throw new ConfigurationError(`Configuration file not found: ${configPath}`, {
        code: ErrorCode.CONFIG_NOT_FOUND,
        details: { path: configPath },
        hint: "Run `apiforge init` first to create the configuration.",
        cause: toError(err),
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new ConfigurationError(`Invalid JSON in configuration file`, {
        code: ErrorCode.CONFIG_PARSE_FAILED,
        details: { path: configPath },
        hint: `The file at ${configPath} is not valid JSON. Fix it or re-run \`apiforge init --force\`.`,
        cause: toError(err),
      });
    }

    const result = ConfigRecordSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");

      throw new ConfigurationError(`Invalid configuration file: ${issues}`, {
        code: ErrorCode.CONFIG_INVALID,
        details: { path: configPath, issues: result.error.issues.map((i) => i.message) },
        hint: `Missing or invalid fields in ${configPath}.`,
      });
    }

    return fromRecord(result.data);
  }

  /**
   * Writes the configuration atomically, creating `.apiforge/` if needed.
   *
   * @returns Absolute path of the written file
   */
  async save(projectDir: string, config: Configuration): Promise<string> {
    const configPath = this.getConfigPath(projectDir);
    const configDir = path.dirname(configPath);

    await fs.mkdir(configDir, { recursive: true });

    const content = JSON.stringify(toRecord(config), null, 2) + "\n";
    const tempPath = path.join(
      configDir,
      `${CONFIG_FILENAME}.tmp-${process.pid}-${crypto.randomBytes(8).toString("hex")}`,
    );

    try {
      await fs.writeFile(tempPath, content, "utf-8");
      await fs.rename(tempPath, configPath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw err;
    }

    return configPath;
  }
}
