/**
 * Stderr logger backed by `debug`.
 *
 * Each scope gets one namespace per level, e.g. `bastion-inventory:tunnels:warn`.
 * Nothing is ever written to stdout; the inventory JSON owns it.
 */

import createDebug from "debug";

export const LOG_NAMESPACE = "bastion-inventory";

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export function createLogger(scope: string): Logger {
  const base = createDebug(`${LOG_NAMESPACE}:${scope}`);
  const debug = base.extend("debug");
  const info = base.extend("info");
  const warn = base.extend("warn");
  const error = base.extend("error");

  return {
    debug: (msg) => debug(msg),
    info: (msg) => info(msg),
    warn: (msg) => warn(msg),
    error: (msg) => error(msg),
  };
}

/** Turn on every namespace of this tool, keeping whatever `DEBUG` already enables. */
export function enableVerboseLogging(): void {
  const current = createDebug.disable();
  const namespaces = current ? `${current},${LOG_NAMESPACE}:*` : `${LOG_NAMESPACE}:*`;
  createDebug.enable(namespaces);
}
