/**
 * Run Context
 *
 * Everything a build needs from Azure, resolved once at the entry point and
 * passed explicitly to the resolvers and the tunnel launcher.
 */

import { CapabilityMissingError, ToolNotFoundError } from "../errors.js";
import { createCLIWrapper, DEFAULT_AZ_PATH, type AzureCLIWrapper } from "../cli/wrapper.js";
import { createCredentialsManager, type AzureCredentialsManager } from "../credentials/manager.js";
import { createSubscriptionManager } from "../subscriptions/manager.js";
import type { Logger } from "../logger.js";

export const BASTION_EXTENSION = "bastion";

export type RunContext = {
  cli: AzureCLIWrapper;
  credentials: AzureCredentialsManager;
  subscriptionId: string;
  logger: Logger;
};

export type RunContextOptions = {
  azPath?: string;
  subscriptionId?: string;
  tenantId?: string;
  logger: Logger;
};

/**
 * Check the az binary and its bastion extension, verify credentials, then
 * resolve the subscription. Each failure is a distinct fatal error.
 */
export async function createRunContext(options: RunContextOptions): Promise<RunContext> {
  const { logger } = options;
  const azPath = options.azPath ?? DEFAULT_AZ_PATH;
  const cli = createCLIWrapper({ azPath });

  if (!(await cli.isAvailable())) {
    throw new ToolNotFoundError(azPath);
  }
  if (!(await cli.hasExtension(BASTION_EXTENSION))) {
    throw new CapabilityMissingError(BASTION_EXTENSION);
  }

  const credentials = createCredentialsManager({ tenantId: options.tenantId });
  await credentials.verifyAccess();

  const subscriptionId = await createSubscriptionManager(credentials).resolveSubscriptionId(
    options.subscriptionId ?? process.env.AZURE_SUBSCRIPTION_ID,
  );
  logger.debug(`using subscription ${subscriptionId}`);

  return { cli, credentials, subscriptionId, logger };
}
