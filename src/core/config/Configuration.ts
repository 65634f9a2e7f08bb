/**
 * Project configuration for apiforge.
 *
 * A {@link Configuration} is the single, validated-once view of the features a
 * user selected. It is deep-frozen on creation and handed by reference to the
 * resolver (activation predicates) and the engine (step actions), so every
 * step of one invocation observes the same values.
 *
 * ## Cross-field rules
 *
 * - An ORM is required when a database is selected, and forbidden otherwise
 * - Migrations require a database
 * - A refresh token requires authentication
 *
 * Authentication without a database is NOT rejected here: the authentication
 * steps require the persistence steps, and the resolver reports that as an
 * unsatisfied dependency.
 *
 * @module
 */

import { z } from "zod";
import { ConfigurationError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Enumerations
// =============================================================================

export const DATABASE_KINDS = ["none", "postgresql", "mysql"] as const;
export type DatabaseKind = (typeof DATABASE_KINDS)[number];

export const ORM_KINDS = ["sqlmodel", "sqlalchemy"] as const;
export type OrmKind = (typeof ORM_KINDS)[number];

export const AUTH_MODES = ["none", "basic", "complete"] as const;
export type AuthMode = (typeof AUTH_MODES)[number];

const DATABASE_LABELS: Record<Exclude<DatabaseKind, "none">, string> = {
  postgresql: "PostgreSQL",
  mysql: "MySQL",
};

const ORM_LABELS: Record<OrmKind, string> = {
  sqlmodel: "SQLModel",
  sqlalchemy: "SQLAlchemy",
};

/** Maximum length of a project name. */
const MAX_PROJECT_NAME_LENGTH = 64;

// =============================================================================
// Types
// =============================================================================

/**
 * Independent feature toggles.
 */
export interface FeatureToggles {
  readonly cors: boolean;
  readonly devTools: boolean;
  readonly testing: boolean;
  readonly docker: boolean;
}

/**
 * Creation metadata carried alongside the selection.
 */
export interface ConfigurationMetadata {
  /** ISO 8601 timestamp of when the configuration was first created */
  readonly createdAt: string;

  /** apiforge version that created the configuration */
  readonly toolVersion: string;
}

/**
 * The validated, immutable selection.
 */
export interface ProjectConfiguration {
  readonly projectName: string;
  readonly database: DatabaseKind;
  readonly orm: OrmKind | null;
  readonly migrations: boolean;
  readonly auth: AuthMode;
  readonly refreshToken: boolean;
  readonly features: FeatureToggles;
  readonly metadata: ConfigurationMetadata;
}

/**
 * Values reachable through {@link Configuration.getFeature}.
 */
export interface FeatureValues {
  readonly cors: boolean;
  readonly devTools: boolean;
  readonly testing: boolean;
  readonly docker: boolean;
  readonly migrations: boolean;
  readonly refreshToken: boolean;
  readonly database: DatabaseKind;
  readonly orm: OrmKind | null;
  readonly auth: AuthMode;
}

export type FeatureName = keyof FeatureValues;

/**
 * Plain data handed to templates.
 */
export interface TemplateData {
  readonly projectName: string;
  readonly packageName: string;
  readonly database: DatabaseKind;
  readonly databaseLabel: string | null;
  readonly hasDatabase: boolean;
  readonly isPostgres: boolean;
  readonly isMysql: boolean;
  readonly orm: OrmKind | null;
  readonly ormLabel: string | null;
  readonly isSqlModel: boolean;
  readonly isSqlAlchemy: boolean;
  readonly migrations: boolean;
  readonly auth: AuthMode;
  readonly hasAuth: boolean;
  readonly isBasicAuth: boolean;
  readonly isCompleteAuth: boolean;
  readonly refreshToken: boolean;
  readonly cors: boolean;
  readonly devTools: boolean;
  readonly testing: boolean;
  readonly docker: boolean;
  readonly createdAt: string;
  readonly toolVersion: string;
}

// =============================================================================
// Zod Schema
// =============================================================================

const ProjectNameSchema = z
  .string({ required_error: "projectName is required" })
  .transform((s) => s.trim())
  .refine((s) => s.length > 0, { message: "projectName cannot be empty" })
  .refine((s) => s.length <= MAX_PROJECT_NAME_LENGTH, {
    message: `projectName cannot exceed ${MAX_PROJECT_NAME_LENGTH} characters`,
  })
  .refine((s) => /^[A-Za-z][A-Za-z0-9_-]*$/.test(s), {
    message: "projectName must start with a letter and contain only letters, digits, '-' or '_'",
  });

/**
 * Checks a project name on its own, for interactive input.
 *
 * @returns The first problem found, or undefined when the name is usable
 */
export function validateProjectName(name: string): string | undefined {
  const result = ProjectNameSchema.safeParse(name);
  return result.success ? undefined : result.error.issues[0]?.message;
}

/**
 * Schema for the camelCase configuration input.
 *
 * Toggles default to off, except migrations which follow the database choice
 * and the refresh token which follows complete authentication.
 */
export const ConfigurationInputSchema = z
  .object({
    projectName: ProjectNameSchema,
    database: z.enum(DATABASE_KINDS).default("none"),
    orm: z.enum(ORM_KINDS).nullable().optional(),
    migrations: z.boolean().optional(),
    auth: z.enum(AUTH_MODES).default("none"),
    refreshToken: z.boolean().optional(),
    cors: z.boolean().default(false),
    devTools: z.boolean().default(false),
    testing: z.boolean().default(false),
    docker: z.boolean().default(false),
    metadata: z
      .object({
        createdAt: z.string().min(1).optional(),
        toolVersion: z.string().min(1).optional(),
      })
      .optional(),
  })
  .superRefine((data, ctx) => {
    const hasDatabase = data.database !== "none";
    const orm = data.orm ?? null;

    if (hasDatabase && orm === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `An ORM is required when database is '${data.database}'`,
        path: ["orm"],
      });
    }
    if (!hasDatabase && orm !== null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "An ORM cannot be selected without a database",
        path: ["orm"],
      });
    }
    if (!hasDatabase && data.migrations === true) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Migrations require a database",
        path: ["migrations"],
      });
    }
    if (data.auth === "none" && data.refreshToken === true) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "A refresh token requires authentication",
        path: ["refreshToken"],
      });
    }
  });

export type ConfigurationInput = z.input<typeof ConfigurationInputSchema>;

// =============================================================================
// Configuration Facade
// =============================================================================

/**
 * Read-only accessor over the user's selection.
 *
 * @example
 * ```typescript
 * const config = createConfiguration({
 *   projectName: "orders",
 *   database: "postgresql",
 *   orm: "sqlmodel",
 *   auth: "basic",
 * });
 *
 * config.getAuthMode();        // "basic"
 * config.getFeature("docker"); // false
 * ```
 */
export class Configuration {
  private readonly value: ProjectConfiguration;
  private readonly templateData: TemplateData;

  constructor(value: ProjectConfiguration) {
    this.value = deepFreeze(value);
    this.templateData = deepFreeze(buildTemplateData(this.value));
    Object.freeze(this);
  }

  /** The underlying frozen selection. */
  get snapshot(): ProjectConfiguration {
    return this.value;
  }

  getFeature<K extends FeatureName>(name: K): FeatureValues[K] {
    const values: FeatureValues = {
      ...this.value.features,
      migrations: this.value.migrations,
      refreshToken: this.value.refreshToken,
      database: this.value.database,
      orm: this.value.orm,
      auth: this.value.auth,
    };
    return values[name];
  }

  getProjectName(): string {
    return this.value.projectName;
  }

  /**
   * Project name as a Python identifier (`My-API` -> `my_api`).
   */
  getPackageName(): string {
    return this.templateData.packageName;
  }

  getDatabaseKind(): DatabaseKind {
    return this.value.database;
  }

  getOrm(): OrmKind | null {
    return this.value.orm;
  }

  getAuthMode(): AuthMode {
    return this.value.auth;
  }

  getMetadata(): ConfigurationMetadata {
    return this.value.metadata;
  }

  hasDatabase(): boolean {
    return this.value.database !== "none";
  }

  hasAuth(): boolean {
    return this.value.auth !== "none";
  }

  hasMigrations(): boolean {
    return this.value.migrations;
  }

  hasRefreshToken(): boolean {
    return this.value.refreshToken;
  }

  /**
   * Frozen plain object for template rendering.
   */
  toTemplateData(): TemplateData {
    return this.templateData;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Validates raw input and returns an immutable {@link Configuration}.
 *
 * @param input - camelCase configuration input
 * @param defaults - Values used for missing metadata
 * @throws ConfigurationError when a field is missing or invalid
 */
export function createConfiguration(
  input: unknown,
  defaults: { now?: () => Date; toolVersion?: string } = {},
): Configuration {
  const result = ConfigurationInputSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.join(".") || "(root)",
      message: i.message,
    }));
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join("; ");

    throw new ConfigurationError(`Invalid configuration: ${summary}`, {
      code: ErrorCode.CONFIG_INVALID,
      details: { issues },
      hint: "Fix the listed fields and try again.",
    });
  }

  const data = result.data;
  const hasDatabase = data.database !== "none";
  const now = defaults.now ?? (() => new Date());

  return new Configuration({
    projectName: data.projectName,
    database: data.database,
    orm: hasDatabase ? (data.orm ?? null) : null,
    migrations: hasDatabase ? (data.migrations ?? true) : false,
    auth: data.auth,
    refreshToken: data.refreshToken ?? data.auth === "complete",
    features: {
      cors: data.cors,
      devTools: data.devTools,
      testing: data.testing,
      docker: data.docker,
    },
    metadata: {
      createdAt: data.metadata?.createdAt ?? now().toISOString(),
      toolVersion: data.metadata?.toolVersion ?? defaults.toolVersion ?? "0.0.0",
    },
  });
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Converts a project name into a Python package identifier.
 */
export function toPackageName(projectName: string): string {
  return projectName
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}

function buildTemplateData(value: ProjectConfiguration): TemplateData {
  const database = value.database;
  return {
    projectName: value.projectName,
    packageName: toPackageName(value.projectName),
    database,
    databaseLabel: database === "none" ? null : DATABASE_LABELS[database],
    hasDatabase: database !== "none",
    isPostgres: database === "postgresql",
    isMysql: database === "mysql",
    orm: value.orm,
    ormLabel: value.orm === null ? null : ORM_LABELS[value.orm],
    isSqlModel: value.orm === "sqlmodel",
    isSqlAlchemy: value.orm === "sqlalchemy",
    migrations: value.migrations,
    auth: value.auth,
    hasAuth: value.auth !== "none",
    isBasicAuth: value.auth === "basic",
    isCompleteAuth: value.auth === "complete",
    refreshToken: value.refreshToken,
    cors: value.features.cors,
    devTools: value.features.devTools,
    testing: value.features.testing,
    docker: value.features.docker,
    createdAt: value.metadata.createdAt,
    toolVersion: value.metadata.toolVersion,
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
