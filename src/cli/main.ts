#!/usr/bin/env node
import { buildProgram } from "./program.js";
import { reportError } from "./runtime.js";
import { getCliUx } from "./ux/CliUx.js";

async function main(): Promise<void> {
  const program = buildProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    reportError({ ux: getCliUx(), debug: program.opts().debug === true }, err);
  }
}

void main();
