/**
 * Tunnel Launcher
 *
 * Starts one `az network bastion tunnel` subprocess per host. The child is
 * detached and unreferenced: it outlives this process and is only found
 * again through the process table.
 */

import { spawn } from "node:child_process";

import { formatErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

/** Remote SSH port every tunnel forwards to. */
export const TUNNEL_RESOURCE_PORT = 22;

export type TunnelRequest = {
  bastionName: string;
  resourceGroup: string;
  targetResourceId: string;
  localPort: number;
};

export function buildTunnelArgs(request: TunnelRequest): string[] {
  return [
    "network",
    "bastion",
    "tunnel",
    "--name",
    request.bastionName,
    "--resource-group",
    request.resourceGroup,
    "--target-resource-id",
    request.targetResourceId,
    "--resource-port",
    String(TUNNEL_RESOURCE_PORT),
    "--port",
    String(request.localPort),
  ];
}

export class TunnelLauncher {
  private azPath: string;
  private logger: Logger;

  constructor(azPath: string, logger: Logger) {
    this.azPath = azPath;
    this.logger = logger;
  }

  /**
   * Spawn the tunnel and return immediately. The tunnel is not ready when
   * this returns; spawn failures are logged, not thrown.
   */
  launch(request: TunnelRequest): string[] {
    const args = buildTunnelArgs(request);
    const child = spawn(this.azPath, args, {
      detached: true,
      shell: false,
      stdio: "ignore",
    });

    child.on("error", (error) => {
      this.logger.warn(`tunnel to ${request.targetResourceId} failed to start: ${formatErrorMessage(error)}`);
    });
    child.unref();

    this.logger.debug(`launched tunnel pid=${child.pid ?? "?"} port=${request.localPort} via ${request.bastionName}`);
    return args;
  }
}
