/**
 * Transactional email for complete authentication.
 *
 * @module
 */

import { defineStep, type StepDescriptor } from "../registry/StepDescriptor.js";
import { Category } from "./categories.js";
import { emit } from "./emit.js";

export const emailSteps: StepDescriptor[] = [
  defineStep({
    id: "email.service",
    category: Category.EMAIL,
    priority: 50,
    requires: ["app.config.email"],
    activation: (config) => config.getAuthMode() === "complete",
    description: "SMTP email service",
    action: emit({ template: "email/service.py", path: "app/services/email.py" }),
  }),
  defineStep({
    id: "email.templates",
    category: Category.EMAIL,
    priority: 51,
    requires: ["email.service"],
    activation: (config) => config.getAuthMode() === "complete",
    description: "HTML email bodies",
    action: emit(
      { template: "email/verification.html", path: "app/templates/email/verification.html" },
      { template: "email/password_reset.html", path: "app/templates/email/password_reset.html" },
    ),
  }),
];
