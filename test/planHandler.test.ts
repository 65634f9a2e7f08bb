/**
 * Tests for the plan and steps command handlers.
 *
 * Checks both the text listings and the JSON output.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { formatPlanJson, formatPlanOutput, handlePlan } from "../src/cli/handlers/planHandler.js";
import { formatStepsJson, formatStepsOutput, handleSteps } from "../src/cli/handlers/stepsHandler.js";
import { formatJsonOutput } from "../src/cli/ux/CliJson.js";
import { ConfigStore } from "../src/core/config/ConfigStore.js";
import { createConfiguration } from "../src/core/config/Configuration.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";
import { cleanupTestDir, createTestDir, fullConfig, minimalConfig } from "./helpers/testUtils.js";

describe("handlePlan", () => {
  let dir: string;
  const store = new ConfigStore();

  beforeEach(async () => {
    dir = await createTestDir("plan");
  });

  afterEach(async () => {
    await cleanupTestDir(dir);
  });

  it("resolves the plan of a saved project", async () => {
    await store.save(dir, minimalConfig());

    const result = await handlePlan({ projectDir: dir });

    expect(result.projectName).toBe("demo");
    expect(result.steps).toHaveLength(12);
    expect(result.inactive).toHaveLength(30);
    expect(result.steps[0]).toEqual({
      id: "structure.packages",
      category: "structure",
      priority: 0,
      requires: [],
      description: "Package skeleton (__init__.py files)",
    });
  });

  it("fails without a configuration", async () => {
    await expect(handlePlan({ projectDir: dir })).rejects.toMatchObject({ code: ErrorCode.CONFIG_NOT_FOUND });
  });

  it("reports an unplannable configuration", async () => {
    await store.save(dir, createConfiguration({ projectName: "svc", auth: "basic" }));

    await expect(handlePlan({ projectDir: dir })).rejects.toMatchObject({
      code: ErrorCode.PLAN_UNSATISFIED_DEPENDENCY,
    });
  });

  it("formats numbered steps with their requirements", async () => {
    await store.save(dir, minimalConfig());

    const lines = formatPlanOutput(await handlePlan({ projectDir: dir }));

    expect(lines.slice(0, 4)).toEqual([
      "Plan for demo: 12 steps",
      "",
      " 1. structure.packages  [structure, priority 0]",
      " 2. structure.response-utils  [structure, priority 5]",
    ]);
    expect(lines.slice(-8)).toEqual([
      "10. app.logger  [app-config, priority 23]",
      "    requires app.config.logger",
      "11. app.config.settings  [app-config, priority 28]",
      "    requires app.config.base, app.config.app, app.config.logger",
      "12. app.main  [app, priority 90]",
      "    requires app.config.settings, app.logger",
      "",
      "Inactive: 30 steps",
    ]);
  });

  it("omits the inactive line when every step runs", async () => {
    await store.save(dir, fullConfig());
    const result = await handlePlan({ projectDir: dir });

    const lines = formatPlanOutput(result);

    expect(result.inactive).toEqual(["database.mysql"]);
    expect(lines[lines.length - 1]).toBe("Inactive: 1 steps");
  });

  it("serializes the result as JSON", async () => {
    await store.save(dir, minimalConfig());
    const result = await handlePlan({ projectDir: dir });

    expect(JSON.parse(formatPlanJson(result))).toEqual(result);
    expect(formatPlanJson(result)).toBe(formatJsonOutput(result));
  });
});

describe("handleSteps", () => {
  it("lists every registered step by category", () => {
    const result = handleSteps();

    expect(result.steps).toHaveLength(42);
    expect(result.categories[0]).toBe("structure");
  });

  it("formats one aligned group per category", () => {
    const result = handleSteps();
    const width = Math.max(...result.steps.map((s) => s.id.length));

    const lines = formatStepsOutput(result);

    expect(lines[0]).toBe("structure:");
    expect(lines[1]).toBe(`  ${"structure.packages".padEnd(width)}  Package skeleton (__init__.py files)`);
    expect(lines.filter((l) => l.endsWith(":"))).toEqual(result.categories.map((c) => `${c}:`));
    expect(lines.filter((l) => l === "")).toHaveLength(result.categories.length - 1);
  });

  it("prints JSON the same way as the other commands", () => {
    const result = handleSteps();

    const json = formatStepsJson(result);

    expect(json).toBe(formatJsonOutput(result));
    expect(json.startsWith('{\n  "categories": [\n    "structure",')).toBe(true);
  });
});
