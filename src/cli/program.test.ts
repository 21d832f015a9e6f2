/**
 * CLI program — Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

import { createProgram, PROGRAM_NAME, type ProgramHandlers } from "./program.js";

function setup() {
  const out: string[] = [];
  const err: string[] = [];
  const runtime = {
    log: (message: string) => out.push(message),
    error: (message: string) => err.push(message),
    exit: vi.fn(),
  };
  const handlers = {
    build: vi.fn().mockResolvedValue(undefined),
    listTunnels: vi.fn().mockResolvedValue(undefined),
    killTunnels: vi.fn().mockResolvedValue(undefined),
    host: vi.fn(),
  } satisfies ProgramHandlers;
  const run = (...args: string[]) => createProgram(runtime, handlers).parseAsync(["node", PROGRAM_NAME, ...args]);
  return { runtime, handlers, out, err, run };
}

describe("createProgram", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("builds compact JSON from the default config file when given no flags", async () => {
    const { handlers, run } = setup();

    await run();

    expect(handlers.build).toHaveBeenCalledTimes(1);
    expect(handlers.build.mock.calls[0]?.[0]).toMatchObject({
      configFile: "ansible_bastion_tunnels.yml",
      pretty: false,
    });
  });

  it("pretty prints with --list", async () => {
    const { handlers, run } = setup();

    await run("--list");

    expect(handlers.build.mock.calls[0]?.[0]).toMatchObject({ pretty: true });
  });

  it("passes config file, group and subscription through", async () => {
    const { handlers, run } = setup();

    await run("-c", "hosts.yml", "-g", "web", "-s", "sub-123", "-l");

    expect(handlers.build.mock.calls[0]?.[0]).toMatchObject({
      configFile: "hosts.yml",
      pretty: true,
      group: "web",
      subscriptionId: "sub-123",
    });
  });

  it("lists tunnels without building", async () => {
    const { handlers, run } = setup();

    await run("--list-tunnels");

    expect(handlers.listTunnels).toHaveBeenCalledTimes(1);
    expect(handlers.build).not.toHaveBeenCalled();
  });

  it("kills tunnels with -k", async () => {
    const { handlers, run } = setup();

    await run("-k");

    expect(handlers.killTunnels).toHaveBeenCalledTimes(1);
    expect(handlers.build).not.toHaveBeenCalled();
  });

  it("answers --host without building", async () => {
    const { handlers, run } = setup();

    await run("--host", "db1");

    expect(handlers.host).toHaveBeenCalledTimes(1);
    expect(handlers.build).not.toHaveBeenCalled();
  });

  it("rejects more than one action flag", async () => {
    const { runtime, handlers, err, run } = setup();

    await run("-t", "-k");

    expect(err).toEqual(["error: --list-tunnels, --kill-tunnels and --host are mutually exclusive"]);
    expect(runtime.exit).toHaveBeenCalledWith(1);
    expect(handlers.listTunnels).not.toHaveBeenCalled();
    expect(handlers.killTunnels).not.toHaveBeenCalled();
  });

  it("reports handler failures as one error line", async () => {
    const { runtime, handlers, out, err, run } = setup();
    handlers.build.mockRejectedValue(new Error("no route"));

    await run();

    expect(out).toEqual([]);
    expect(err).toEqual(["error: no route"]);
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });
});
