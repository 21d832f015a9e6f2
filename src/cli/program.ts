/**
 * Command-line surface. Exactly one of build (default), --list-tunnels,
 * --kill-tunnels or --host runs per invocation.
 */

import { Command } from "commander";

import { buildCommand, hostCommand, killTunnelsCommand, listTunnelsCommand } from "../commands/index.js";
import { DEFAULT_CONFIG_FILE } from "../config.js";
import { enableAzureDiagnostics, logAzureDiagnostics } from "../diagnostics.js";
import { UsageError } from "../errors.js";
import { createLogger, enableVerboseLogging } from "../logger.js";
import { runCommandWithRuntime, type RuntimeEnv } from "../runtime.js";
import type { InventoryOptions } from "../types.js";
import { VERSION } from "../version.js";

export const PROGRAM_NAME = "bastion-tunnels-inventory";

export type ProgramHandlers = {
  build: (options: InventoryOptions, runtime: RuntimeEnv) => Promise<void>;
  listTunnels: (runtime: RuntimeEnv) => Promise<void>;
  killTunnels: (runtime: RuntimeEnv) => Promise<void>;
  host: (runtime: RuntimeEnv) => void;
};

type CliFlags = {
  configFile: string;
  list?: boolean;
  listTunnels?: boolean;
  killTunnels?: boolean;
  host?: string;
  group?: string;
  subscription?: string;
  verbose?: boolean;
};

const defaultHandlers: ProgramHandlers = {
  build: (options, runtime) => buildCommand(options, runtime),
  listTunnels: (runtime) => listTunnelsCommand(runtime),
  killTunnels: (runtime) => killTunnelsCommand(runtime),
  host: hostCommand,
};

export function createProgram(runtime: RuntimeEnv, handlers: ProgramHandlers = defaultHandlers): Command {
  const program = new Command(PROGRAM_NAME);

  program
    .description("Ansible dynamic inventory for Azure VMs reached through Azure Bastion tunnels")
    .version(VERSION, "-V, --version")
    .option("-c, --config-file <path>", "inventory configuration file", DEFAULT_CONFIG_FILE)
    .option("-l, --list", "print the inventory (pretty-printed)")
    .option("-t, --list-tunnels", "list active tunnel processes")
    .option("-k, --kill-tunnels", "terminate active tunnel processes")
    .option("--host <name>", "print variables for one host (always empty; see _meta)")
    .option("-g, --group <name>", "build only this group")
    .option("-s, --subscription <id>", "Azure subscription ID (default: AZURE_SUBSCRIPTION_ID or the last listed)")
    .option("-v, --verbose", "log Azure calls and tunnel activity to stderr")
    .configureOutput({
      writeOut: (str) => runtime.log(str.trimEnd()),
      writeErr: (str) => runtime.error(str.trimEnd()),
    })
    .action(async () => {
      const flags = program.opts<CliFlags>();
      await runCommandWithRuntime(runtime, async () => {
        if (flags.verbose) {
          enableVerboseLogging();
          enableAzureDiagnostics();
          logAzureDiagnostics(createLogger("azure-calls"));
        }

        const selected = [flags.listTunnels, flags.killTunnels, flags.host !== undefined].filter(Boolean).length;
        if (selected > 1) {
          throw new UsageError("--list-tunnels, --kill-tunnels and --host are mutually exclusive");
        }

        if (flags.listTunnels) return handlers.listTunnels(runtime);
        if (flags.killTunnels) return handlers.killTunnels(runtime);
        if (flags.host !== undefined) return handlers.host(runtime);

        return handlers.build(
          {
            configFile: flags.configFile,
            pretty: Boolean(flags.list),
            group: flags.group,
            subscriptionId: flags.subscription,
            azPath: process.env.BASTION_INVENTORY_AZ_PATH,
            tenantId: process.env.AZURE_TENANT_ID,
          },
          runtime,
        );
      });
    });

  return program;
}
