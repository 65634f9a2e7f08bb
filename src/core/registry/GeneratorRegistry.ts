/**
 * Generator Registry.
 *
 * Holds the descriptors of every known generation step, in registration
 * order. Registration order is the final tie-break of the plan, so it is
 * preserved exactly.
 *
 * ## Integrity Checks
 *
 * - Ids are unique (DuplicateStepError)
 * - Every required id is registered (UnknownDependencyError). `register()`
 *   needs requirements registered first; `registerAll()` also accepts ids
 *   from the same batch, so a batch can introduce a cycle, which the
 *   resolver rejects at plan time.
 *
 * Registration never evaluates activation predicates.
 *
 * @module
 */

import { DuplicateStepError, UnknownDependencyError } from "../errors/errors.js";
import type { StepDescriptor } from "./StepDescriptor.js";

export class GeneratorRegistry {
  private readonly steps: StepDescriptor[] = [];
  private readonly index = new Map<string, number>();

  /**
   * Appends one step.
   *
   * @throws DuplicateStepError when the id is already registered
   * @throws UnknownDependencyError when a requirement is not registered yet
   */
  register(step: StepDescriptor): this {
    return this.registerAll([step]);
  }

  /**
   * Appends a batch of steps. Either the whole batch is registered or none
   * of it is.
   *
   * @throws DuplicateStepError on an id seen in the registry or earlier in the batch
   * @throws UnknownDependencyError on a requirement found in neither
   */
  registerAll(batch: readonly StepDescriptor[]): this {
    const batchIds = new Set<string>();
    for (const step of batch) {
      if (this.index.has(step.id) || batchIds.has(step.id)) {
        throw new DuplicateStepError(step.id);
      }
      batchIds.add(step.id);
    }

    for (const step of batch) {
      for (const dependencyId of step.requires) {
        if (!this.index.has(dependencyId) && !batchIds.has(dependencyId)) {
          throw new UnknownDependencyError(step.id, dependencyId);
        }
      }
    }

    for (const step of batch) {
      this.index.set(step.id, this.steps.length);
      this.steps.push(step);
    }
    return this;
  }

  /**
   * Steps in registration order.
   */
  all(): readonly StepDescriptor[] {
    return [...this.steps];
  }

  get(id: string): StepDescriptor | undefined {
    const position = this.index.get(id);
    return position === undefined ? undefined : this.steps[position];
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  /**
   * Registration index of a step, or -1 when unknown.
   */
  indexOf(id: string): number {
    return this.index.get(id) ?? -1;
  }

  get size(): number {
    return this.steps.length;
  }

  /**
   * Distinct categories, in order of first registration.
   */
  categories(): string[] {
    return [...new Set(this.steps.map((s) => s.category))];
  }
}
