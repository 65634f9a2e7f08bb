/**
 * Handler for the `plan` CLI command.
 *
 * Resolves the execution plan of a project without running it.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigStore } from "../../core/config/ConfigStore.js";
import { resolve, describePlan, type PlanEntry } from "../../core/plan/DependencyResolver.js";
import { createDefaultRegistry } from "../../core/steps/index.js";
import type { GeneratorRegistry } from "../../core/registry/GeneratorRegistry.js";
import { formatJsonOutput } from "../ux/CliJson.js";

// =============================================================================
// Types
// =============================================================================

export interface PlanInput {
  readonly projectDir: string;
}

export interface PlanDependencies {
  readonly store?: ConfigStore;
  readonly registry?: GeneratorRegistry;
}

export interface PlanResult {
  readonly projectName: string;
  readonly steps: PlanEntry[];
  /** Registered steps left out by this configuration */
  readonly inactive: string[];
}

// =============================================================================
// Handler Implementation
// =============================================================================

/**
 * @throws ConfigurationError when the configuration is missing or invalid
 * @throws UnsatisfiedDependencyError / CyclicDependencyError
 */
export async function handlePlan(input: PlanInput, deps: PlanDependencies = {}): Promise<PlanResult> {
  const store = deps.store ?? new ConfigStore();
  const config = await store.load(path.resolve(input.projectDir));
  const plan = resolve(deps.registry ?? createDefaultRegistry(), config);

  return {
    projectName: config.getProjectName(),
    steps: describePlan(plan),
    inactive: [...plan.inactive],
  };
}

// =============================================================================
// Output Formatting
// =============================================================================

/**
 * One numbered line per step, with its requirements indented beneath.
 */
export function formatPlanOutput(result: PlanResult): string[] {
  const lines: string[] = [`Plan for ${result.projectName}: ${result.steps.length} steps`, ""];
  const width = String(result.steps.length).length;

  result.steps.forEach((step, i) => {
    const position = String(i + 1).padStart(width);
    lines.push(`${position}. ${step.id}  [${step.category}, priority ${step.priority}]`);
    if (step.requires.length > 0) {
      lines.push(`${" ".repeat(width + 2)}requires ${step.requires.join(", ")}`);
    }
  });

  if (result.inactive.length > 0) {
    lines.push("");
    lines.push(`Inactive: ${result.inactive.length} steps`);
  }

  return lines;
}

export function formatPlanJson(result: PlanResult): string {
  return formatJsonOutput(result);
}
