/**
 * Inventory configuration document: TypeBox schema and YAML loader.
 *
 *   bastion_tunnels:
 *     hosts:
 *       db1:
 *         resource_group: rg1
 *         ansible_port: 50001
 *         ansible_user: azureuser
 */

import { readFile } from "node:fs/promises";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";

import { ConfigUnreadableError } from "./errors.js";
import type { HostGroup, HostSpec } from "./types.js";

export const DEFAULT_CONFIG_FILE = "ansible_bastion_tunnels.yml";

const RESERVED_GROUP_NAMES = ["_meta", "__proto__"];

export const hostSchema = Type.Object({
  resource_group: Type.String({ minLength: 1, description: "Resource group of the VM and its bastion" }),
  ansible_port: Type.Integer({ minimum: 1, maximum: 65535, description: "Local tunnel port" }),
  ansible_user: Type.Optional(Type.String({ description: "SSH user passed through to Ansible" })),
  ansible_host: Type.Optional(Type.String({ description: "Address Ansible connects to (default 127.0.0.1)" })),
});

export const groupSchema = Type.Object({
  hosts: Type.Optional(Type.Union([Type.Record(Type.String(), hostSchema), Type.Null()])),
});

export const configSchema = Type.Record(Type.String(), groupSchema);

export type HostConfig = Static<typeof hostSchema>;
export type InventoryConfig = Static<typeof configSchema>;

/**
 * Validate a parsed document and flatten it into host groups, keeping
 * declaration order.
 */
export function parseInventoryConfig(raw: unknown, source: string): HostGroup[] {
  if (raw === null || raw === undefined) {
    throw new ConfigUnreadableError(source, "the file is empty");
  }

  if (!Value.Check(configSchema, raw)) {
    const first = Value.Errors(configSchema, raw).First();
    const where = first?.path ? ` at ${first.path}` : "";
    throw new ConfigUnreadableError(source, `invalid configuration${where}: ${first?.message ?? "unexpected shape"}`);
  }

  const groups = Object.entries(raw).map(([name, group]): HostGroup => {
    const hosts: Record<string, HostConfig> = group.hosts ?? {};
    return {
      name,
      hosts: Object.entries(hosts).map(([hostName, host]) => toHostSpec(hostName, host)),
    };
  });

  const reserved = groups.find((group) => RESERVED_GROUP_NAMES.includes(group.name));
  if (reserved) {
    throw new ConfigUnreadableError(source, `'${reserved.name}' is reserved and cannot be used as a group name`);
  }
  if (groups.length === 0) {
    throw new ConfigUnreadableError(source, "no host groups are defined");
  }

  return groups;
}

function toHostSpec(hostName: string, host: HostConfig): HostSpec {
  const spec: HostSpec = {
    hostName,
    resourceGroup: host.resource_group,
    ansiblePort: host.ansible_port,
  };
  if (host.ansible_user !== undefined) spec.ansibleUser = host.ansible_user;
  if (host.ansible_host !== undefined) spec.ansibleHost = host.ansible_host;
  return spec;
}

/** Read, parse and validate the YAML configuration file. */
export async function loadInventoryConfig(path: string): Promise<HostGroup[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    const code = (error as { code?: unknown }).code;
    throw new ConfigUnreadableError(
      path,
      code === "ENOENT" ? "file not found" : error instanceof Error ? error.message : String(error),
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigUnreadableError(path, `invalid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseInventoryConfig(raw, path);
}
