/**
 * Unit tests for GeneratorRegistry.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { GeneratorRegistry } from "../../src/core/registry/GeneratorRegistry.js";
import { defineStep, done, skip, type StepDefinition } from "../../src/core/registry/StepDescriptor.js";
import { DuplicateStepError, ForgeError, UnknownDependencyError } from "../../src/core/errors/errors.js";
import { minimalConfig } from "../helpers/testUtils.js";

function step(id: string, overrides: Partial<StepDefinition> = {}) {
  return defineStep({ id, category: "test", action: async () => done(), ...overrides });
}

function invalidReason(definition: StepDefinition): string {
  try {
    defineStep(definition);
  } catch (err) {
    if (err instanceof ForgeError && err.code === "STEP_INVALID") {
      return String(err.details?.reason);
    }
    throw err;
  }
  throw new Error("Expected defineStep to fail");
}

describe("defineStep", () => {
  it("fills defaults", () => {
    const descriptor = step("app.main");

    expect(descriptor.description).toBe("app.main");
    expect(descriptor.priority).toBe(0);
    expect(descriptor.requires).toEqual([]);
    expect(descriptor.activation(minimalConfig())).toBe(true);
    expect(Object.isFrozen(descriptor)).toBe(true);
  });

  it("rejects malformed ids", () => {
    const action = async () => done();

    expect(invalidReason({ id: "App.Main", category: "x", action })).toContain("id must match");
    expect(invalidReason({ id: "app..main", category: "x", action })).toContain("id must match");
    expect(invalidReason({ id: "", category: "x", action })).toContain("id must match");
  });

  it("rejects an empty category", () => {
    expect(invalidReason({ id: "a", category: " ", action: async () => done() })).toBe(
      "category cannot be empty",
    );
  });

  it("rejects a fractional priority", () => {
    expect(invalidReason({ id: "a", category: "x", priority: 1.5, action: async () => done() })).toBe(
      "priority must be an integer, got 1.5",
    );
  });

  it("rejects self and repeated requirements", () => {
    const action = async () => done();

    expect(invalidReason({ id: "a", category: "x", requires: ["a"], action })).toBe(
      "a step cannot require itself",
    );
    expect(invalidReason({ id: "a", category: "x", requires: ["b", "b"], action })).toBe(
      "requirement 'b' is listed twice",
    );
  });

  it("builds step results", () => {
    expect(done()).toEqual({ kind: "done" });
    expect(skip("nothing to do")).toEqual({ kind: "skipped", reason: "nothing to do" });
  });
});

describe("GeneratorRegistry", () => {
  it("keeps registration order", () => {
    const registry = new GeneratorRegistry().register(step("b")).register(step("a")).register(step("c"));

    expect(registry.all().map((s) => s.id)).toEqual(["b", "a", "c"]);
    expect(registry.indexOf("a")).toBe(1);
    expect(registry.indexOf("missing")).toBe(-1);
    expect(registry.size).toBe(3);
  });

  it("looks steps up by id", () => {
    const a = step("a");
    const registry = new GeneratorRegistry().register(a);

    expect(registry.get("a")).toBe(a);
    expect(registry.get("b")).toBeUndefined();
    expect(registry.has("a")).toBe(true);
  });

  it("rejects a duplicate id", () => {
    const registry = new GeneratorRegistry().register(step("a"));

    expect(() => registry.register(step("a"))).toThrow(DuplicateStepError);
    expect(() => registry.register(step("a"))).toThrow("Step 'a' is already registered");
  });

  it("rejects a duplicate inside one batch", () => {
    expect(() => new GeneratorRegistry().registerAll([step("a"), step("a")])).toThrow(DuplicateStepError);
  });

  it("rejects a requirement that is not registered yet", () => {
    const registry = new GeneratorRegistry();

    expect(() => registry.register(step("b", { requires: ["a"] }))).toThrow(
      "Step 'b' requires unknown step 'a'",
    );
  });

  it("accepts forward references inside one batch", () => {
    const registry = new GeneratorRegistry().registerAll([step("b", { requires: ["a"] }), step("a")]);

    expect(registry.all().map((s) => s.id)).toEqual(["b", "a"]);
  });

  it("registers nothing from a rejected batch", () => {
    const registry = new GeneratorRegistry().register(step("a"));

    expect(() => registry.registerAll([step("b"), step("c", { requires: ["missing"] })])).toThrow(
      UnknownDependencyError,
    );
    expect(registry.all().map((s) => s.id)).toEqual(["a"]);
  });

  it("lists categories in order of first registration", () => {
    const registry = new GeneratorRegistry().registerAll([
      step("a", { category: "config" }),
      step("b", { category: "app" }),
      step("c", { category: "config" }),
    ]);

    expect(registry.categories()).toEqual(["config", "app"]);
  });

  it("does not evaluate activation predicates", () => {
    let calls = 0;
    new GeneratorRegistry().register(
      step("a", {
        activation: () => {
          calls++;
          return true;
        },
      }),
    );

    expect(calls).toBe(0);
  });
});
