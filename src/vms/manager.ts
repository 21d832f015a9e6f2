/**
 * Azure VM Manager
 *
 * Looks up virtual machines via @azure/arm-compute.
 */

import type { AzureCredentialsManager } from "../credentials/index.js";
import { instrumentedAzureCall } from "../diagnostics.js";

const NOT_FOUND_CODES = new Set(["ResourceNotFound", "NotFound", "ResourceGroupNotFound"]);

/** Whether a control-plane error means the resource does not exist. */
export function isNotFoundError(error: unknown): boolean {
  if (error === null || typeof error !== "object") return false;
  const err = error as { statusCode?: unknown; code?: unknown };
  if (err.statusCode === 404) return true;
  return typeof err.code === "string" && NOT_FOUND_CODES.has(err.code);
}

export class AzureVMManager {
  private credentialsManager: Pick<AzureCredentialsManager, "getCredential">;
  private subscriptionId: string;

  constructor(credentialsManager: Pick<AzureCredentialsManager, "getCredential">, subscriptionId: string) {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
  }

  private async getComputeClient() {
    const { credential } = await this.credentialsManager.getCredential();
    const { ComputeManagementClient } = await import("@azure/arm-compute");
    return new ComputeManagementClient(credential, this.subscriptionId);
  }

  /**
   * Resource id of a VM, or null when it does not exist. Other errors propagate.
   */
  async getVMResourceId(resourceGroup: string, vmName: string): Promise<string | null> {
    const client = await this.getComputeClient();

    return instrumentedAzureCall(
      "compute",
      "virtualMachines.get",
      async () => {
        try {
          const vm = await client.virtualMachines.get(resourceGroup, vmName);
          return vm.id ?? null;
        } catch (error) {
          if (isNotFoundError(error)) return null;
          throw error;
        }
      },
      { subscriptionId: this.subscriptionId, resourceGroup },
    );
  }
}

export function createVMManager(
  credentialsManager: Pick<AzureCredentialsManager, "getCredential">,
  subscriptionId: string,
): AzureVMManager {
  return new AzureVMManager(credentialsManager, subscriptionId);
}
