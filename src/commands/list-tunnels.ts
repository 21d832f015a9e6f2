import { createLogger } from "../logger.js";
import type { RuntimeEnv } from "../runtime.js";
import { createProcessTable, TunnelProcessCorrelator } from "../tunnels/index.js";
import type { TunnelProcess } from "../types.js";

export const NO_TUNNELS_MESSAGE = "No active tunnels found.";

export function formatTunnelLine(tunnel: TunnelProcess): string {
  return `Pid: ${tunnel.pid} Status: ${tunnel.status} Process: ${tunnel.commandLine.join(" ")}`;
}

export function createTunnelCorrelator(): TunnelProcessCorrelator {
  const logger = createLogger("tunnels");
  return new TunnelProcessCorrelator(createProcessTable(logger), logger);
}

export async function listTunnelsCommand(
  runtime: RuntimeEnv,
  correlator: Pick<TunnelProcessCorrelator, "listTunnelProcesses"> = createTunnelCorrelator(),
): Promise<void> {
  const tunnels = await correlator.listTunnelProcesses();
  if (tunnels.length === 0) {
    runtime.log(NO_TUNNELS_MESSAGE);
    return;
  }
  for (const tunnel of tunnels) {
    runtime.log(formatTunnelLine(tunnel));
  }
}
