/**
 * Tunnel Process Correlator
 *
 * Finds tunnel processes by the shape of their command line. Nothing about
 * launched tunnels is persisted, so list and kill both work from one
 * snapshot of the process table.
 */

import { formatErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { KillResult, TunnelProcess } from "../types.js";
import type { ProcessTable } from "./process-table.js";

/** Every token must occur somewhere in a tunnel's command line. */
export const TUNNEL_COMMAND_TOKENS = [
  "network",
  "bastion",
  "tunnel",
  "--resource-group",
  "--target-resource-id",
] as const;

export function isTunnelCommandLine(commandLine: readonly string[]): boolean {
  return TUNNEL_COMMAND_TOKENS.every((token) => commandLine.some((arg) => arg.includes(token)));
}

function describeSignalError(error: unknown): string {
  const code = (error as { code?: unknown } | null)?.code;
  if (code === "ESRCH") return "no such process";
  if (code === "EPERM") return "permission denied";
  return formatErrorMessage(error);
}

export class TunnelProcessCorrelator {
  private table: ProcessTable;
  private logger: Logger;

  constructor(table: ProcessTable, logger: Logger) {
    this.table = table;
    this.logger = logger;
  }

  /** Matching processes from one snapshot, ordered by pid. */
  async listTunnelProcesses(): Promise<TunnelProcess[]> {
    const snapshot = await this.table.snapshot();
    return snapshot
      .filter((proc) => isTunnelCommandLine(proc.commandLine))
      .sort((a, b) => a.pid - b.pid);
  }

  /**
   * Send SIGTERM to every tunnel process in a fresh snapshot. A pid that
   * cannot be signalled is reported in `failed` and does not stop the rest.
   */
  async killTunnelProcesses(signal: NodeJS.Signals = "SIGTERM"): Promise<KillResult> {
    const tunnels = await this.listTunnelProcesses();
    const result: KillResult = { terminated: [], failed: [] };

    for (const tunnel of tunnels) {
      try {
        this.table.signal(tunnel.pid, signal);
        result.terminated.push(tunnel.pid);
      } catch (error) {
        const reason = describeSignalError(error);
        this.logger.warn(`could not terminate pid ${tunnel.pid}: ${reason}`);
        result.failed.push({ pid: tunnel.pid, reason });
      }
    }

    return result;
  }
}
