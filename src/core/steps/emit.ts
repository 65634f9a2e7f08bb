/**
 * Shared step actions.
 *
 * Most steps render one or more templates to fixed paths; these helpers
 * build those actions.
 *
 * @module
 */

import { done, type StepAction, type StepContext } from "../registry/StepDescriptor.js";

export interface Emission {
  /** Template name, relative to `templates/` without `.hbs` */
  readonly template: string;
  /** Output path, relative to the destination root */
  readonly path: string;
  /** Default: true */
  readonly overwrite?: boolean;
  /** Extra fields merged over the configuration's template data */
  readonly data?: Readonly<Record<string, unknown>>;
}

/**
 * Renders and writes one emission.
 */
export async function writeEmission(ctx: StepContext, emission: Emission): Promise<string> {
  const data = emission.data
    ? { ...ctx.config.toTemplateData(), ...emission.data }
    : ctx.config.toTemplateData();
  const content = ctx.render(emission.template, data);
  return ctx.writer.write(emission.path, content, { overwrite: emission.overwrite ?? true });
}

/**
 * Action that writes the given emissions in order.
 */
export function emit(...emissions: Emission[]): StepAction {
  return async (ctx) => {
    for (const emission of emissions) {
      await writeEmission(ctx, emission);
    }
    return done();
  };
}

/**
 * Action whose emissions depend on the configuration.
 */
export function emitFor(select: (ctx: StepContext) => readonly Emission[]): StepAction {
  return async (ctx) => {
    for (const emission of select(ctx)) {
      await writeEmission(ctx, emission);
    }
    return done();
  };
}
