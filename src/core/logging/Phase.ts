/**
 * Invocation phase identifiers for structured logging.
 *
 * Phases follow a dotted naming convention: `<domain>.<action>`. The
 * engine additionally tags per-step entries with the step id.
 *
 * @module
 */

export const Phase = {
  /** CLI initialization */
  CLI_INIT: "cli.init",

  /** Collecting answers from the wizard or flags */
  CONFIG_COLLECT: "config.collect",

  /** Reading `.apiforge/config.json` */
  CONFIG_LOAD: "config.load",

  /** Writing `.apiforge/config.json` */
  CONFIG_SAVE: "config.save",

  /** Loading the template library */
  TEMPLATES_LOAD: "templates.load",

  /** Resolving the execution plan */
  PLAN_RESOLVE: "plan.resolve",

  /** Running planned steps */
  PLAN_EXECUTE: "plan.execute",

  /** Invocation complete */
  DONE: "done",
} as const;

export type Phase = (typeof Phase)[keyof typeof Phase];
