/**
 * apiforge library entry point.
 *
 * ```typescript
 * import { createConfiguration, generate } from "apiforge";
 *
 * const config = createConfiguration({ projectName: "orders", database: "postgresql", orm: "sqlmodel" });
 * const { report } = await generate(config, "./orders");
 * ```
 *
 * @module
 */

export {
  Configuration,
  createConfiguration,
  toPackageName,
  validateProjectName,
  DATABASE_KINDS,
  ORM_KINDS,
  AUTH_MODES,
  type ConfigurationInput,
  type DatabaseKind,
  type OrmKind,
  type AuthMode,
  type FeatureName,
  type TemplateData,
} from "./core/config/Configuration.js";
export { ConfigStore, CONFIG_DIRNAME, CONFIG_FILENAME } from "./core/config/ConfigStore.js";

export { GeneratorRegistry } from "./core/registry/GeneratorRegistry.js";
export {
  defineStep,
  done,
  skip,
  type StepDescriptor,
  type StepDefinition,
  type StepContext,
  type StepResult,
} from "./core/registry/StepDescriptor.js";
export { createDefaultRegistry, defaultSteps, Category } from "./core/steps/index.js";

export { resolve, describePlan, type ExecutionPlan, type PlanEntry } from "./core/plan/DependencyResolver.js";
export { execute, type ExecuteOptions } from "./core/engine/ExecutionEngine.js";
export {
  getOutcome,
  reportToJson,
  type ExecutionReport,
  type StepOutcome,
} from "./core/engine/ExecutionReport.js";
export { generate, type GenerateOptions, type GenerateResult } from "./core/generate/generate.js";

export type { ArtifactWriter, WriteOptions } from "./core/writer/ArtifactWriter.js";
export { FileSystemArtifactWriter } from "./core/writer/FileSystemArtifactWriter.js";
export { MemoryArtifactWriter } from "./core/writer/MemoryArtifactWriter.js";
export { TemplateLibrary } from "./core/render/TemplateLibrary.js";

export { createLogger, createSilentLogger, type LogSink, type LogEntry } from "./core/logging/ContextualLogger.js";
export { EngineTrace } from "./core/observability/EngineTrace.js";

export * from "./core/errors/errors.js";
export { ErrorCode, getExitCode } from "./core/errors/ErrorCode.js";
