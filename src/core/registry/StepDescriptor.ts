/**
 * Generation step descriptors.
 *
 * A step is one conditionally activated unit of artifact synthesis. Its
 * metadata (id, category, priority, requirements, activation predicate) is
 * what the resolver plans with; its action is what the engine runs.
 *
 * @module
 */

import { ForgeError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { Configuration } from "../config/Configuration.js";
import type { ArtifactWriter } from "../writer/ArtifactWriter.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Decides whether a step participates in a plan. Must be pure.
 */
export type ActivationPredicate = (config: Configuration) => boolean;

/**
 * Everything an action may use. The writer is the only way to touch the
 * destination tree.
 */
export interface StepContext {
  readonly config: Configuration;
  readonly writer: ArtifactWriter;
  readonly step: StepDescriptor;

  /**
   * Renders a template. Data defaults to `config.toTemplateData()`.
   */
  render(templateName: string, data?: object): string;
}

export type StepResult =
  | { readonly kind: "done" }
  | { readonly kind: "skipped"; readonly reason: string };

export type StepAction = (ctx: StepContext) => Promise<StepResult>;

export interface StepDescriptor {
  readonly id: string;
  readonly category: string;
  readonly description: string;
  /** Tie-break between steps that are ready at the same time; lower runs first */
  readonly priority: number;
  readonly requires: readonly string[];
  readonly activation: ActivationPredicate;
  readonly action: StepAction;
}

/**
 * Step literal accepted by {@link defineStep}.
 */
export interface StepDefinition {
  id: string;
  category: string;
  action: StepAction;
  description?: string;
  priority?: number;
  requires?: readonly string[];
  activation?: ActivationPredicate;
}

// =============================================================================
// Builders
// =============================================================================

/** Dotted, lower-case segments: `auth.user-model`. */
const STEP_ID_PATTERN = /^[a-z][a-z0-9-]*(\.[a-z][a-z0-9-]*)*$/;

const ALWAYS: ActivationPredicate = () => true;

/**
 * Normalizes a step literal into a frozen descriptor.
 *
 * @throws ForgeError (STEP_INVALID) on a malformed id, category or priority,
 *   or on a self or repeated requirement
 */
export function defineStep(definition: StepDefinition): StepDescriptor {
  const { id } = definition;

  if (!STEP_ID_PATTERN.test(id)) {
    throw invalidStep(id, `id must match ${STEP_ID_PATTERN.source}`);
  }
  if (definition.category.trim().length === 0) {
    throw invalidStep(id, "category cannot be empty");
  }

  const priority = definition.priority ?? 0;
  if (!Number.isInteger(priority)) {
    throw invalidStep(id, `priority must be an integer, got ${priority}`);
  }

  const requires = [...(definition.requires ?? [])];
  if (requires.includes(id)) {
    throw invalidStep(id, "a step cannot require itself");
  }
  const repeated = requires.find((dep, i) => requires.indexOf(dep) !== i);
  if (repeated !== undefined) {
    throw invalidStep(id, `requirement '${repeated}' is listed twice`);
  }

  return Object.freeze({
    id,
    category: definition.category,
    description: definition.description ?? id,
    priority,
    requires: Object.freeze(requires),
    activation: definition.activation ?? ALWAYS,
    action: definition.action,
  });
}

/** The step did its work. */
export function done(): StepResult {
  return { kind: "done" };
}

/** The step decided, at run time, that it has nothing to do. */
export function skip(reason: string): StepResult {
  return { kind: "skipped", reason };
}

function invalidStep(stepId: string, reason: string): ForgeError {
  return new ForgeError(
    `Invalid step '${stepId}': ${reason}`,
    ErrorCode.STEP_INVALID,
    { stepId, reason },
    undefined,
    undefined,
    undefined,
    false,
  );
}
