/**
 * Inventory Builder
 *
 * Resolves every configured host, opens a tunnel per resolved host and
 * assembles the Ansible dynamic inventory document.
 */

import { ConfigUnreadableError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AzureTargetResolver } from "../resolver/index.js";
import type { TunnelLauncher } from "../tunnels/index.js";
import type { HostGroup, HostVars, InventoryDocument, ResolvedTarget } from "../types.js";

export const DEFAULT_ANSIBLE_HOST = "127.0.0.1";

export type InventoryBuilderDeps = {
  resolver: Pick<AzureTargetResolver, "resolve">;
  launcher: Pick<TunnelLauncher, "launch">;
  logger: Logger;
};

export function hostVarsFor(target: ResolvedTarget): HostVars {
  const { host } = target;
  const vars: HostVars = { ansible_host: host.ansibleHost ?? DEFAULT_ANSIBLE_HOST };
  if (host.ansibleUser !== undefined) vars.ansible_user = host.ansibleUser;
  vars.ansible_port = host.ansiblePort;
  return vars;
}

function sameHostSettings(a: ResolvedTarget, b: ResolvedTarget): boolean {
  return (
    a.host.resourceGroup === b.host.resourceGroup &&
    a.host.ansiblePort === b.host.ansiblePort &&
    a.host.ansibleUser === b.host.ansibleUser &&
    a.host.ansibleHost === b.host.ansibleHost
  );
}

// Plain assignment of a name such as `__proto__` would replace the prototype.
function setOwn(target: object, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export class InventoryBuilder {
  private deps: InventoryBuilderDeps;

  constructor(deps: InventoryBuilderDeps) {
    this.deps = deps;
  }

  /**
   * Build the document for every group, or only `groupName`.
   *
   * All hosts are resolved before any tunnel is launched, so a missing
   * bastion aborts the run with no tunnels started.
   */
  async build(groups: HostGroup[], groupName?: string, source = "configuration"): Promise<InventoryDocument> {
    const selected = groupName ? groups.filter((group) => group.name === groupName) : groups;
    if (groupName && selected.length === 0) {
      throw new ConfigUnreadableError(source, `group '${groupName}' is not defined`);
    }

    const resolved: Array<{ group: string; targets: ResolvedTarget[] }> = [];
    for (const group of selected) {
      const targets: ResolvedTarget[] = [];
      for (const host of group.hosts) {
        const target = await this.deps.resolver.resolve(host);
        if (target) targets.push(target);
      }
      resolved.push({ group: group.name, targets });
    }

    const document: InventoryDocument = { _meta: { hostvars: {} } };
    const launched = new Map<string, ResolvedTarget>();
    for (const { group, targets } of resolved) {
      const hostNames: string[] = [];
      for (const target of targets) {
        hostNames.push(target.hostName);

        const first = launched.get(target.hostName);
        if (first) {
          if (!sameHostSettings(first, target)) {
            this.deps.logger.warn(
              `host ${target.hostName} is listed with different settings in group ${group}; keeping the first entry`,
            );
          }
          continue;
        }

        this.deps.launcher.launch({
          bastionName: target.bastionName,
          resourceGroup: target.host.resourceGroup,
          targetResourceId: target.targetResourceId,
          localPort: target.host.ansiblePort,
        });
        launched.set(target.hostName, target);
        setOwn(document._meta.hostvars, target.hostName, hostVarsFor(target));
      }
      setOwn(document, group, hostNames);
      this.deps.logger.debug(`group ${group}: ${hostNames.length} host(s)`);
    }

    return document;
  }
}

// =============================================================================
// Serialization
// =============================================================================

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// Integer-like keys are always enumerated first by JS objects, so the sorted
// order has to be written out directly rather than rebuilt into an object.
function writeSorted(value: unknown, indent: string, depth: number): string {
  if (Array.isArray(value)) {
    const items = value.map((item) => writeSorted(item, indent, depth + 1));
    return wrap("[", "]", items, indent, depth);
  }
  if (value !== null && typeof value === "object") {
    const items = Object.entries(value)
      .filter(([, child]) => child !== undefined)
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([key, child]) => `${JSON.stringify(key)}:${indent ? " " : ""}${writeSorted(child, indent, depth + 1)}`);
    return wrap("{", "}", items, indent, depth);
  }
  return JSON.stringify(value);
}

function wrap(open: string, close: string, items: string[], indent: string, depth: number): string {
  if (items.length === 0) return `${open}${close}`;
  if (!indent) return `${open}${items.join(",")}${close}`;
  const inner = indent.repeat(depth + 1);
  return `${open}\n${items.map((item) => `${inner}${item}`).join(",\n")}\n${indent.repeat(depth)}${close}`;
}

/** Key-sorted JSON; two-space indentation when `pretty`, one line otherwise. */
export function serializeInventory(document: InventoryDocument, pretty: boolean): string {
  return writeSorted(document, pretty ? "  " : "", 0);
}
