/**
 * Handler for the `steps` CLI command: lists the registered catalog.
 *
 * @module
 */

import { createDefaultRegistry } from "../../core/steps/index.js";
import type { GeneratorRegistry } from "../../core/registry/GeneratorRegistry.js";
import { formatJsonOutput } from "../ux/CliJson.js";

export interface StepListing {
  id: string;
  category: string;
  priority: number;
  requires: string[];
  description: string;
}

export interface StepsResult {
  readonly categories: string[];
  readonly steps: StepListing[];
}

export function handleSteps(deps: { registry?: GeneratorRegistry } = {}): StepsResult {
  const registry = deps.registry ?? createDefaultRegistry();

  return {
    categories: registry.categories(),
    steps: registry.all().map((step) => ({
      id: step.id,
      category: step.category,
      priority: step.priority,
      requires: [...step.requires],
      description: step.description,
    })),
  };
}

/**
 * Steps grouped under their category, in registration order.
 */
export function formatStepsOutput(result: StepsResult): string[] {
  const lines: string[] = [];
  const width = Math.max(0, ...result.steps.map((s) => s.id.length));

  for (const category of result.categories) {
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(`${category}:`);
    for (const step of result.steps.filter((s) => s.category === category)) {
      lines.push(`  ${step.id.padEnd(width)}  ${step.description}`);
    }
  }

  return lines;
}

export function formatStepsJson(result: StepsResult): string {
  return formatJsonOutput(result);
}
