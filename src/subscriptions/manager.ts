/**
 * Azure Subscription Manager
 *
 * Lists subscriptions via @azure/arm-subscriptions and picks the one the
 * control-plane lookups run against.
 */

import type { AzureCredentialsManager } from "../credentials/index.js";
import { instrumentedAzureCall } from "../diagnostics.js";
import { CredentialUnavailableError } from "../errors.js";

export type AzureSubscription = {
  subscriptionId: string;
};

export class AzureSubscriptionManager {
  private credentialsManager: Pick<AzureCredentialsManager, "getCredential">;

  constructor(credentialsManager: Pick<AzureCredentialsManager, "getCredential">) {
    this.credentialsManager = credentialsManager;
  }

  private async getClient() {
    const { SubscriptionClient } = await import("@azure/arm-subscriptions");
    const { credential } = await this.credentialsManager.getCredential();
    return new SubscriptionClient(credential);
  }

  async listSubscriptions(): Promise<AzureSubscription[]> {
    const client = await this.getClient();
    return instrumentedAzureCall("subscriptions", "list", async () => {
      const results: AzureSubscription[] = [];
      for await (const s of client.subscriptions.list()) {
        results.push({ subscriptionId: s.subscriptionId ?? "" });
      }
      return results;
    });
  }

  /**
   * An explicit id wins. Otherwise the last subscription of the caller's
   * listing is used; multiple subscriptions are not disambiguated.
   */
  async resolveSubscriptionId(explicit?: string): Promise<string> {
    if (explicit) return explicit;

    const subscriptions = (await this.listSubscriptions()).filter((s) => s.subscriptionId);
    const picked = subscriptions.at(-1);
    if (!picked) {
      throw new CredentialUnavailableError("the signed-in account has no subscriptions");
    }
    return picked.subscriptionId;
  }
}

export function createSubscriptionManager(
  credentialsManager: Pick<AzureCredentialsManager, "getCredential">,
): AzureSubscriptionManager {
  return new AzureSubscriptionManager(credentialsManager);
}
