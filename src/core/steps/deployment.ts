/**
 * Container deployment files.
 *
 * @module
 */

import { defineStep, type StepDescriptor } from "../registry/StepDescriptor.js";
import { Category } from "./categories.js";
import { emit } from "./emit.js";

export const deploymentSteps: StepDescriptor[] = [
  defineStep({
    id: "deploy.dockerfile",
    category: Category.DEPLOYMENT,
    priority: 100,
    activation: (config) => config.getFeature("docker"),
    description: "Container image (Dockerfile)",
    action: emit({ template: "deploy/Dockerfile", path: "Dockerfile" }),
  }),
  defineStep({
    id: "deploy.compose",
    category: Category.DEPLOYMENT,
    priority: 101,
    requires: ["deploy.dockerfile"],
    activation: (config) => config.getFeature("docker"),
    description: "Service stack (docker-compose.yml)",
    action: emit({ template: "deploy/docker-compose.yml", path: "docker-compose.yml" }),
  }),
  defineStep({
    id: "deploy.dockerignore",
    category: Category.DEPLOYMENT,
    priority: 102,
    activation: (config) => config.getFeature("docker"),
    description: "Build context exclusions (.dockerignore)",
    action: emit({ template: "deploy/dockerignore", path: ".dockerignore" }),
  }),
];
