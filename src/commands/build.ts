/**
 * Default command: resolve hosts, launch tunnels, print the inventory JSON.
 */

import { loadInventoryConfig } from "../config.js";
import { createRunContext, type RunContext } from "../context/index.js";
import { InventoryBuilder, serializeInventory } from "../inventory/index.js";
import { createLogger } from "../logger.js";
import { createTargetResolver, type AzureTargetResolver } from "../resolver/index.js";
import type { RuntimeEnv } from "../runtime.js";
import { TunnelLauncher } from "../tunnels/index.js";
import type { InventoryOptions } from "../types.js";

export type BuildCommandDeps = {
  loadInventoryConfig: typeof loadInventoryConfig;
  createRunContext: typeof createRunContext;
  createTargetResolver: (context: RunContext) => Pick<AzureTargetResolver, "resolve">;
  createLauncher: (context: RunContext) => Pick<TunnelLauncher, "launch">;
};

const defaultDeps: BuildCommandDeps = {
  loadInventoryConfig,
  createRunContext,
  createTargetResolver,
  createLauncher: (context) => new TunnelLauncher(context.cli.azPath, createLogger("tunnels")),
};

export async function buildCommand(
  options: InventoryOptions,
  runtime: RuntimeEnv,
  deps: BuildCommandDeps = defaultDeps,
): Promise<void> {
  const logger = createLogger("build");

  const groups = await deps.loadInventoryConfig(options.configFile);
  logger.debug(`loaded ${groups.length} group(s) from ${options.configFile}`);

  const context = await deps.createRunContext({
    azPath: options.azPath,
    subscriptionId: options.subscriptionId,
    tenantId: options.tenantId,
    logger: createLogger("azure"),
  });

  const builder = new InventoryBuilder({
    resolver: deps.createTargetResolver(context),
    launcher: deps.createLauncher(context),
    logger,
  });
  const document = await builder.build(groups, options.group, options.configFile);

  runtime.log(serializeInventory(document, options.pretty));
}
