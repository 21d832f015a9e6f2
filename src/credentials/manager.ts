/**
 * Azure Credentials Manager
 *
 * Resolves one Azure CLI TokenCredential per process via @azure/identity,
 * so whatever `az login` established is used for both the SDK lookups and
 * the tunnel subprocesses.
 */

import type { TokenCredential } from "@azure/identity";

import { CredentialUnavailableError, formatErrorMessage } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export type CredentialsManagerOptions = {
  tenantId?: string;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  tenantId?: string;
};

export const AZURE_MANAGEMENT_SCOPE = "https://management.azure.com/.default";

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private tenantId: string | undefined;
  private currentCredential: CredentialResolutionResult | null = null;

  constructor(options: CredentialsManagerOptions = {}) {
    this.tenantId = options.tenantId ?? process.env.AZURE_TENANT_ID;
  }

  /**
   * Get the process-wide credential, creating it on first use.
   */
  async getCredential(): Promise<CredentialResolutionResult> {
    if (this.currentCredential) return this.currentCredential;

    const { AzureCliCredential } = await import("@azure/identity");
    const credential = new AzureCliCredential(this.tenantId ? { tenantId: this.tenantId } : undefined);
    this.currentCredential = { credential, tenantId: this.tenantId };
    return this.currentCredential;
  }

  /**
   * Request a management-plane token so a missing `az login` fails before
   * any lookup or tunnel launch.
   */
  async verifyAccess(): Promise<void> {
    const { credential } = await this.getCredential();
    let token: Awaited<ReturnType<TokenCredential["getToken"]>>;
    try {
      token = await credential.getToken(AZURE_MANAGEMENT_SCOPE);
    } catch (error) {
      throw new CredentialUnavailableError(formatErrorMessage(error));
    }
    if (!token) {
      throw new CredentialUnavailableError("no access token was issued");
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(options?: CredentialsManagerOptions): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}
