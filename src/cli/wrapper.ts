/**
 * Azure CLI Wrapper
 *
 * Wraps the `az` binary for the checks the SDK cannot do: whether the CLI is
 * installed and which CLI extensions are present.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

// =============================================================================
// Types
// =============================================================================

export type AzureCLIOptions = {
  /** Path to az CLI binary. */
  azPath?: string;
  /** Timeout in ms. */
  timeoutMs?: number;
};

export type AzureCLIResult = {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  parsed?: unknown;
};

export type AzureCLIConfig = {
  azPath: string;
  defaultArgs: string[];
  timeoutMs: number;
};

export const DEFAULT_AZ_PATH = "az";

// =============================================================================
// AzureCLIWrapper
// =============================================================================

export class AzureCLIWrapper {
  private config: AzureCLIConfig;

  constructor(options?: AzureCLIOptions) {
    this.config = {
      azPath: options?.azPath ?? DEFAULT_AZ_PATH,
      defaultArgs: ["--output", "json"],
      timeoutMs: options?.timeoutMs ?? 60_000,
    };
  }

  get azPath(): string {
    return this.config.azPath;
  }

  /**
   * Execute an az CLI command with JSON output.
   */
  async execute(args: string[]): Promise<AzureCLIResult> {
    const fullArgs = [...args, ...this.config.defaultArgs];

    try {
      const { stdout, stderr } = await execFileAsync(this.config.azPath, fullArgs, {
        timeout: this.config.timeoutMs,
        env: process.env,
      });

      return { success: true, stdout, stderr, exitCode: 0, parsed: parseJson(stdout) };
    } catch (error) {
      const err = error as { stderr?: string; code?: unknown; message?: string };
      return {
        success: false,
        stdout: "",
        stderr: err.stderr || err.message || "Unknown error",
        exitCode: typeof err.code === "number" ? err.code : 1,
      };
    }
  }

  /**
   * Check if az CLI is installed and runnable.
   */
  async isAvailable(): Promise<boolean> {
    const result = await this.execute(["version"]);
    return result.success;
  }

  /**
   * Names of the installed az CLI extensions.
   */
  async listExtensions(): Promise<string[]> {
    const result = await this.execute(["extension", "list"]);
    if (!result.success || !Array.isArray(result.parsed)) return [];

    const names: string[] = [];
    for (const entry of result.parsed) {
      const name = (entry as { name?: unknown } | null)?.name;
      if (typeof name === "string") names.push(name);
    }
    return names;
  }

  async hasExtension(name: string): Promise<boolean> {
    const extensions = await this.listExtensions();
    return extensions.includes(name);
  }
}

function parseJson(stdout: string): unknown {
  if (!stdout.trim()) return undefined;
  try {
    return JSON.parse(stdout);
  } catch {
    // plain-text output
    return undefined;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCLIWrapper(options?: AzureCLIOptions): AzureCLIWrapper {
  return new AzureCLIWrapper(options);
}
