/**
 * Azure CLI Wrapper — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AzureCLIWrapper, createCLIWrapper } from "./wrapper.js";

// ---------------------------------------------------------------------------
// Mock node:child_process — vi.hoisted ensures the fn is available at hoist time
// ---------------------------------------------------------------------------

const { mockExecFile } = vi.hoisted(() => ({
  mockExecFile: vi.fn(),
}));

vi.mock("node:child_process", () => ({
  execFile: mockExecFile,
}));

vi.mock("node:util", () => ({
  promisify: (_fn: unknown) => mockExecFile,
}));

describe("AzureCLIWrapper", () => {
  let cli: AzureCLIWrapper;

  beforeEach(() => {
    vi.clearAllMocks();
    cli = new AzureCLIWrapper();
  });

  describe("execute", () => {
    it("appends JSON output args and parses stdout", async () => {
      mockExecFile.mockResolvedValue({ stdout: '{"name":"test"}', stderr: "" });

      const result = await cli.execute(["group", "list"]);
      expect(result.success).toBe(true);
      expect(result.exitCode).toBe(0);
      expect(result.parsed).toEqual({ name: "test" });
      expect(mockExecFile).toHaveBeenCalledWith(
        "az",
        ["group", "list", "--output", "json"],
        expect.objectContaining({ timeout: 60000 }),
      );
    });

    it("leaves parsed undefined for plain-text output", async () => {
      mockExecFile.mockResolvedValue({ stdout: "plain text output", stderr: "" });

      const result = await cli.execute(["version"]);
      expect(result.success).toBe(true);
      expect(result.parsed).toBeUndefined();
      expect(result.stdout).toBe("plain text output");
    });

    it("returns a failure result with the numeric exit code", async () => {
      mockExecFile.mockRejectedValue({ stderr: "ERROR: unrecognized arguments", code: 2, message: "failed" });

      const result = await cli.execute(["invalid"]);
      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(2);
      expect(result.stderr).toBe("ERROR: unrecognized arguments");
    });

    it("treats a spawn error code as exit code 1", async () => {
      mockExecFile.mockRejectedValue({ code: "ENOENT", message: "spawn az ENOENT" });

      const result = await cli.execute(["version"]);
      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("spawn az ENOENT");
    });

    it("defaults to 'Unknown error' when error has no details", async () => {
      mockExecFile.mockRejectedValue({});

      const result = await cli.execute(["fail"]);
      expect(result.stderr).toBe("Unknown error");
      expect(result.exitCode).toBe(1);
    });
  });

  describe("isAvailable", () => {
    it("returns true when az version succeeds", async () => {
      mockExecFile.mockResolvedValue({ stdout: '{"azure-cli": "2.60.0"}', stderr: "" });
      await expect(cli.isAvailable()).resolves.toBe(true);
    });

    it("returns false when az cannot be spawned", async () => {
      mockExecFile.mockRejectedValue({ code: "ENOENT", message: "spawn az ENOENT" });
      await expect(cli.isAvailable()).resolves.toBe(false);
    });
  });

  describe("listExtensions", () => {
    it("returns extension names", async () => {
      mockExecFile.mockResolvedValue({
        stdout: JSON.stringify([
          { name: "bastion", version: "1.3.1" },
          { name: "ssh", version: "2.0.5" },
          { version: "0.0.1" },
        ]),
        stderr: "",
      });

      await expect(cli.listExtensions()).resolves.toEqual(["bastion", "ssh"]);
      expect(mockExecFile).toHaveBeenCalledWith(
        "az",
        ["extension", "list", "--output", "json"],
        expect.any(Object),
      );
    });

    it("returns an empty list when the command fails", async () => {
      mockExecFile.mockRejectedValue({ message: "boom" });
      await expect(cli.listExtensions()).resolves.toEqual([]);
    });

    it("returns an empty list for non-array output", async () => {
      mockExecFile.mockResolvedValue({ stdout: "{}", stderr: "" });
      await expect(cli.listExtensions()).resolves.toEqual([]);
    });
  });

  describe("hasExtension", () => {
    it("checks the extension list by name", async () => {
      mockExecFile.mockResolvedValue({ stdout: '[{"name":"bastion"}]', stderr: "" });

      await expect(cli.hasExtension("bastion")).resolves.toBe(true);
      await expect(cli.hasExtension("ssh")).resolves.toBe(false);
    });
  });

  describe("constructor options", () => {
    it("uses a custom az path and timeout", async () => {
      const custom = createCLIWrapper({ azPath: "/usr/local/bin/az", timeoutMs: 5000 });
      mockExecFile.mockResolvedValue({ stdout: "{}", stderr: "" });

      await custom.execute(["version"]);
      expect(custom.azPath).toBe("/usr/local/bin/az");
      expect(mockExecFile).toHaveBeenCalledWith(
        "/usr/local/bin/az",
        ["version", "--output", "json"],
        expect.objectContaining({ timeout: 5000 }),
      );
    });
  });
});
