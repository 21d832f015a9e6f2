/**
 * Azure Bastion Manager
 *
 * Reads Bastion hosts via @azure/arm-network (Bastion lives on the
 * NetworkManagementClient).
 */

import type { AzureCredentialsManager } from "../credentials/index.js";
import { instrumentedAzureCall } from "../diagnostics.js";
import type { BastionHost } from "./types.js";

export class AzureBastionManager {
  private credentialsManager: Pick<AzureCredentialsManager, "getCredential">;
  private subscriptionId: string;

  constructor(credentialsManager: Pick<AzureCredentialsManager, "getCredential">, subscriptionId: string) {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
  }

  private async getClient() {
    const { credential } = await this.credentialsManager.getCredential();
    const { NetworkManagementClient } = await import("@azure/arm-network");
    return new NetworkManagementClient(credential, this.subscriptionId);
  }

  /** List the Bastion hosts of a resource group, in listing order. */
  async listBastionHosts(resourceGroup: string): Promise<BastionHost[]> {
    const client = await this.getClient();
    return instrumentedAzureCall(
      "network",
      "bastionHosts.listByResourceGroup",
      async () => {
        const hosts: BastionHost[] = [];
        for await (const bh of client.bastionHosts.listByResourceGroup(resourceGroup)) {
          hosts.push({ name: bh.name ?? "", enableTunneling: bh.enableTunneling });
        }
        return hosts;
      },
      { subscriptionId: this.subscriptionId, resourceGroup },
    );
  }

  /**
   * Name of the bastion to tunnel through, or null.
   *
   * Null when the group has no bastion or when any listed bastion has
   * tunneling disabled, even if another one in the listing has it enabled.
   */
  async resolveTunnelingBastion(resourceGroup: string): Promise<string | null> {
    const hosts = await this.listBastionHosts(resourceGroup);
    if (hosts.length === 0) return null;
    if (hosts.some((host) => host.enableTunneling !== true)) return null;
    return hosts[0]?.name || null;
  }
}

export function createBastionManager(
  credentialsManager: Pick<AzureCredentialsManager, "getCredential">,
  subscriptionId: string,
): AzureBastionManager {
  return new AzureBastionManager(credentialsManager, subscriptionId);
}
