#!/usr/bin/env node
/**
 * bastion-tunnels-inventory — entry point.
 */

import { createProgram } from "./src/cli/program.js";
import { defaultRuntime } from "./src/runtime.js";

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram(defaultRuntime).parseAsync(argv);
}

await main();
