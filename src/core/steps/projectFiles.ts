/**
 * Project-level files: packaging, readme, ignore rules, environment.
 *
 * @module
 */

import { defineStep, type StepDescriptor } from "../registry/StepDescriptor.js";
import { Category } from "./categories.js";
import { emit } from "./emit.js";

export const projectFileSteps: StepDescriptor[] = [
  defineStep({
    id: "config.pyproject",
    category: Category.CONFIG,
    priority: 10,
    description: "Project metadata and dependencies (pyproject.toml)",
    action: emit({ template: "config/pyproject.toml", path: "pyproject.toml" }),
  }),
  defineStep({
    id: "config.readme",
    category: Category.CONFIG,
    priority: 11,
    description: "Project readme (README.md)",
    action: emit({ template: "config/README.md", path: "README.md" }),
  }),
  defineStep({
    id: "config.gitignore",
    category: Category.CONFIG,
    priority: 12,
    description: "Git ignore rules (.gitignore)",
    action: emit({ template: "config/gitignore", path: ".gitignore" }),
  }),
  defineStep({
    id: "config.env",
    category: Category.CONFIG,
    priority: 13,
    description: "Environment files (.env.example, .env)",
    // .env.example always tracks the configuration. An existing .env holds
    // local secrets and is kept unless --force; it goes last so its conflict
    // cannot leave .env.example stale.
    action: emit(
      { template: "config/env", path: ".env.example" },
      { template: "config/env", path: ".env", overwrite: false },
    ),
  }),
];
