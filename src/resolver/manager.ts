/**
 * Target Resolver
 *
 * Turns a configured host into the bastion name and VM resource id needed to
 * open its tunnel.
 */

import { createBastionManager, type AzureBastionManager } from "../bastion/index.js";
import type { RunContext } from "../context/index.js";
import { BastionNotFoundError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { HostSpec, ResolvedTarget } from "../types.js";
import { createVMManager, type AzureVMManager } from "../vms/index.js";

export type TargetResolverDeps = {
  bastions: Pick<AzureBastionManager, "resolveTunnelingBastion">;
  vms: Pick<AzureVMManager, "getVMResourceId">;
  logger: Logger;
};

export class AzureTargetResolver {
  private deps: TargetResolverDeps;
  private bastionByGroup = new Map<string, string | null>();

  constructor(deps: TargetResolverDeps) {
    this.deps = deps;
  }

  /** Bastion lookups are cached per resource group for the lifetime of the resolver. */
  async resolveBastion(resourceGroup: string): Promise<string | null> {
    if (this.bastionByGroup.has(resourceGroup)) {
      return this.bastionByGroup.get(resourceGroup) ?? null;
    }
    const name = await this.deps.bastions.resolveTunnelingBastion(resourceGroup);
    this.bastionByGroup.set(resourceGroup, name);
    return name;
  }

  async resolveResourceId(resourceGroup: string, vmName: string): Promise<string | null> {
    return this.deps.vms.getVMResourceId(resourceGroup, vmName);
  }

  /**
   * Resolve one host. Throws BastionNotFoundError when the host's resource
   * group has no usable bastion; returns null when the VM does not exist.
   */
  async resolve(host: HostSpec): Promise<ResolvedTarget | null> {
    const bastionName = await this.resolveBastion(host.resourceGroup);
    if (!bastionName) {
      throw new BastionNotFoundError(host.resourceGroup);
    }

    const targetResourceId = await this.resolveResourceId(host.resourceGroup, host.hostName);
    if (!targetResourceId) {
      this.deps.logger.debug(`skipping ${host.hostName}: VM not found in ${host.resourceGroup}`);
      return null;
    }

    return { hostName: host.hostName, bastionName, targetResourceId, host };
  }
}

export function createTargetResolver(context: RunContext): AzureTargetResolver {
  return new AzureTargetResolver({
    bastions: createBastionManager(context.credentials, context.subscriptionId),
    vms: createVMManager(context.credentials, context.subscriptionId),
    logger: context.logger,
  });
}
