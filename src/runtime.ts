/**
 * Process I/O seam for commands. Commands print through a RuntimeEnv so
 * tests can capture output and exit codes.
 */

import { formatErrorMessage, InventoryError } from "./errors.js";

export type RuntimeEnv = {
  log: (message: string) => void;
  error: (message: string) => void;
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (message) => {
    process.stdout.write(`${message}\n`);
  },
  error: (message) => {
    process.stderr.write(`${message}\n`);
  },
  exit: (code) => {
    process.exitCode = code;
  },
};

/**
 * Run a command; any error becomes one `error: ...` line and its exit code.
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    runtime.error(`error: ${formatErrorMessage(error)}`);
    runtime.exit(error instanceof InventoryError ? error.exitCode : 1);
  }
}
