/**
 * Inventory configuration — Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ConfigUnreadableError } from "./errors.js";
import { loadInventoryConfig, parseInventoryConfig } from "./config.js";

describe("parseInventoryConfig", () => {
  it("flattens groups and hosts in declaration order", () => {
    const groups = parseInventoryConfig(
      {
        web: {
          hosts: {
            web2: { resource_group: "rg1", ansible_port: 50002, ansible_user: "azureuser" },
            web1: { resource_group: "rg1", ansible_port: 50001, ansible_host: "localhost" },
          },
        },
        db: { hosts: { db1: { resource_group: "rg2", ansible_port: 50010 } } },
      },
      "hosts.yml",
    );

    expect(groups).toEqual([
      {
        name: "web",
        hosts: [
          { hostName: "web2", resourceGroup: "rg1", ansiblePort: 50002, ansibleUser: "azureuser" },
          { hostName: "web1", resourceGroup: "rg1", ansiblePort: 50001, ansibleHost: "localhost" },
        ],
      },
      { name: "db", hosts: [{ hostName: "db1", resourceGroup: "rg2", ansiblePort: 50010 }] },
    ]);
  });

  it("treats a group without hosts as empty", () => {
    expect(parseInventoryConfig({ web: {}, db: { hosts: null } }, "hosts.yml")).toEqual([
      { name: "web", hosts: [] },
      { name: "db", hosts: [] },
    ]);
  });

  it("rejects an empty document", () => {
    expect(() => parseInventoryConfig(null, "hosts.yml")).toThrow(
      "Cannot use configuration file hosts.yml: the file is empty",
    );
    expect(() => parseInventoryConfig({}, "hosts.yml")).toThrow(
      "Cannot use configuration file hosts.yml: no host groups are defined",
    );
  });

  it("rejects a non-integer port with the offending path", () => {
    expect(() =>
      parseInventoryConfig({ web: { hosts: { web1: { resource_group: "rg1", ansible_port: "22" } } } }, "hosts.yml"),
    ).toThrow(/^Cannot use configuration file hosts\.yml: invalid configuration at \/web\/hosts/);
  });

  it("rejects a missing resource group", () => {
    expect(() => parseInventoryConfig({ web: { hosts: { web1: { ansible_port: 50001 } } } }, "hosts.yml")).toThrow(
      ConfigUnreadableError,
    );
  });

  it("rejects ports outside 1-65535", () => {
    expect(() =>
      parseInventoryConfig({ web: { hosts: { web1: { resource_group: "rg1", ansible_port: 70000 } } } }, "hosts.yml"),
    ).toThrow(ConfigUnreadableError);
  });

  it("reserves the _meta group name", () => {
    expect(() => parseInventoryConfig({ _meta: { hosts: {} } }, "hosts.yml")).toThrow(
      "Cannot use configuration file hosts.yml: '_meta' is reserved and cannot be used as a group name",
    );
  });

  it("reserves the __proto__ group name", () => {
    const raw: unknown = JSON.parse('{"__proto__":{"hosts":{"h1":{"resource_group":"rg1","ansible_port":50001}}}}');
    expect(() => parseInventoryConfig(raw, "hosts.yml")).toThrow(
      "Cannot use configuration file hosts.yml: '__proto__' is reserved and cannot be used as a group name",
    );
  });
});

describe("loadInventoryConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "bastion-inventory-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a YAML document", async () => {
    const path = join(dir, "ansible_bastion_tunnels.yml");
    await writeFile(
      path,
      [
        "bastion_tunnels:",
        "  hosts:",
        "    db1:",
        "      resource_group: rg1",
        "      ansible_port: 50001",
        "",
      ].join("\n"),
    );

    await expect(loadInventoryConfig(path)).resolves.toEqual([
      { name: "bastion_tunnels", hosts: [{ hostName: "db1", resourceGroup: "rg1", ansiblePort: 50001 }] },
    ]);
  });

  it("reports a missing file", async () => {
    const path = join(dir, "missing.yml");

    await expect(loadInventoryConfig(path)).rejects.toThrow(`Cannot use configuration file ${path}: file not found`);
  });

  it("reports an empty file", async () => {
    const path = join(dir, "empty.yml");
    await writeFile(path, "");

    await expect(loadInventoryConfig(path)).rejects.toThrow(`Cannot use configuration file ${path}: the file is empty`);
  });

  it("reports invalid YAML", async () => {
    const path = join(dir, "broken.yml");
    await writeFile(path, "web: [unclosed\n");

    await expect(loadInventoryConfig(path)).rejects.toThrow(/invalid YAML/);
  });
});
