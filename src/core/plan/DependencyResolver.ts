/**
 * Dependency Resolver.
 *
 * Turns a registry and a configuration into a validated, totally ordered
 * execution plan. Resolution is pure: it evaluates activation predicates and
 * reads step metadata, and never touches a writer or the filesystem.
 *
 * ## Pipeline
 *
 * 1. Filter: keep the steps whose activation predicate holds
 * 2. Validate: every requirement of an active step must itself be active
 * 3. Graph: edges `dependency -> dependent`, restricted to active steps
 * 4. Cycle check: reject with the offending cycle
 * 5. Order: Kahn's algorithm, ready steps taken by (priority, registration index)
 *
 * Steps are visited in registration order and requirements in declaration
 * order throughout, so both the plan and the first error reported are the
 * same on every run.
 *
 * @module
 */

import { CyclicDependencyError, UnsatisfiedDependencyError } from "../errors/errors.js";
import type { Configuration } from "../config/Configuration.js";
import type { GeneratorRegistry } from "../registry/GeneratorRegistry.js";
import type { StepDescriptor } from "../registry/StepDescriptor.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Ordered, frozen list of the steps to run for one configuration.
 */
export interface ExecutionPlan {
  readonly steps: readonly StepDescriptor[];
  /** Registered steps whose activation predicate did not hold */
  readonly inactive: readonly string[];
  /** Active steps left out by the `only` option */
  readonly excluded: readonly string[];
}

export interface ResolveOptions {
  /**
   * Restrict the plan to these categories. Applied after validation, so the
   * full active set must still be consistent.
   */
  readonly only?: readonly string[];
}

/**
 * Plain-data view of one planned step.
 */
export interface PlanEntry {
  id: string;
  category: string;
  priority: number;
  requires: string[];
  description: string;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolves the execution plan.
 *
 * @throws UnsatisfiedDependencyError when an active step requires an inactive one
 * @throws CyclicDependencyError when active steps require each other
 */
export function resolve(
  registry: GeneratorRegistry,
  config: Configuration,
  options: ResolveOptions = {},
): ExecutionPlan {
  const registered = registry.all();

  const active: StepDescriptor[] = [];
  const inactive: string[] = [];
  for (const step of registered) {
    if (step.activation(config)) {
      active.push(step);
    } else {
      inactive.push(step.id);
    }
  }

  const activeById = new Map(active.map((s) => [s.id, s]));
  for (const step of active) {
    for (const dependencyId of step.requires) {
      if (!activeById.has(dependencyId)) {
        throw new UnsatisfiedDependencyError(step.id, dependencyId);
      }
    }
  }

  const cycle = findCycle(active, activeById);
  if (cycle) {
    throw new CyclicDependencyError(cycle);
  }

  const ordered = topologicalOrder(active, (id) => registry.indexOf(id));

  let steps = ordered;
  let excluded: string[] = [];
  if (options.only !== undefined) {
    const categories = new Set(options.only);
    steps = ordered.filter((s) => categories.has(s.category));
    excluded = ordered.filter((s) => !categories.has(s.category)).map((s) => s.id);
  }

  return Object.freeze({
    steps: Object.freeze(steps),
    inactive: Object.freeze(inactive),
    excluded: Object.freeze(excluded),
  });
}

/**
 * Plain data for printing or JSON output.
 */
export function describePlan(plan: ExecutionPlan): PlanEntry[] {
  return plan.steps.map((step) => ({
    id: step.id,
    category: step.category,
    priority: step.priority,
    requires: [...step.requires],
    description: step.description,
  }));
}

// =============================================================================
// Graph Algorithms
// =============================================================================

/**
 * Depth-first search along requirements.
 *
 * @returns The first cycle found, as `[a, b, ..., a]` where each id requires
 *   the next, or undefined when the graph is acyclic
 */
function findCycle(
  steps: readonly StepDescriptor[],
  byId: ReadonlyMap<string, StepDescriptor>,
): string[] | undefined {
  const done = new Set<string>();
  const onPath = new Set<string>();
  const path: string[] = [];

  const visit = (step: StepDescriptor): string[] | undefined => {
    onPath.add(step.id);
    path.push(step.id);

    for (const dependencyId of step.requires) {
      if (onPath.has(dependencyId)) {
        return [...path.slice(path.indexOf(dependencyId)), dependencyId];
      }
      const dependency = byId.get(dependencyId);
      if (dependency && !done.has(dependencyId)) {
        const cycle = visit(dependency);
        if (cycle) return cycle;
      }
    }

    path.pop();
    onPath.delete(step.id);
    done.add(step.id);
    return undefined;
  };

  for (const step of steps) {
    if (!done.has(step.id)) {
      const cycle = visit(step);
      if (cycle) return cycle;
    }
  }
  return undefined;
}

/**
 * Kahn's algorithm over an acyclic, closed set of steps.
 */
function topologicalOrder(
  steps: readonly StepDescriptor[],
  registrationIndex: (id: string) => number,
): StepDescriptor[] {
  const indegree = new Map<string, number>();
  const dependents = new Map<string, StepDescriptor[]>();

  for (const step of steps) {
    indegree.set(step.id, step.requires.length);
    for (const dependencyId of step.requires) {
      const list = dependents.get(dependencyId) ?? [];
      list.push(step);
      dependents.set(dependencyId, list);
    }
  }

  const ready = new MinHeap<StepDescriptor>(
    (a, b) => a.priority - b.priority || registrationIndex(a.id) - registrationIndex(b.id),
  );
  for (const step of steps) {
    if (step.requires.length === 0) {
      ready.push(step);
    }
  }

  const order: StepDescriptor[] = [];
  for (let step = ready.pop(); step !== undefined; step = ready.pop()) {
    order.push(step);
    for (const dependent of dependents.get(step.id) ?? []) {
      const remaining = (indegree.get(dependent.id) ?? 0) - 1;
      indegree.set(dependent.id, remaining);
      if (remaining === 0) {
        ready.push(dependent);
      }
    }
  }

  return order;
}

/**
 * Binary min-heap ordered by a comparator.
 */
class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  push(item: T): void {
    const items = this.items;
    items.push(item);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.compare(items[i], items[parent]) >= 0) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  pop(): T | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (items.length === 0 || last === undefined) {
      return top;
    }

    items[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < items.length && this.compare(items[left], items[smallest]) < 0) smallest = left;
      if (right < items.length && this.compare(items[right], items[smallest]) < 0) smallest = right;
      if (smallest === i) break;
      [items[i], items[smallest]] = [items[smallest], items[i]];
      i = smallest;
    }
    return top;
  }
}
