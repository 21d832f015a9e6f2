/**
 * Error types for fatal inventory failures.
 *
 * Every fatal condition maps to one subclass so the CLI can print a single
 * line and exit with the error's code.
 */

export type InventoryErrorKind =
  | "tool-not-found"
  | "capability-missing"
  | "credential-unavailable"
  | "config-unreadable"
  | "bastion-not-found"
  | "usage";

export class InventoryError extends Error {
  constructor(
    message: string,
    public readonly kind: InventoryErrorKind,
    public readonly exitCode = 1,
  ) {
    super(message);
    this.name = "InventoryError";
  }
}

export class ToolNotFoundError extends InventoryError {
  constructor(public readonly tool: string) {
    super(`The Azure CLI (${tool}) is not installed or not on PATH.`, "tool-not-found");
    this.name = "ToolNotFoundError";
  }
}

export class CapabilityMissingError extends InventoryError {
  constructor(public readonly extension: string) {
    super(
      `The Azure CLI extension '${extension}' is not installed. Run: az extension add --name ${extension}`,
      "capability-missing",
    );
    this.name = "CapabilityMissingError";
  }
}

export class CredentialUnavailableError extends InventoryError {
  constructor(detail?: string) {
    super(
      detail
        ? `Azure credentials are unavailable: ${detail}`
        : "Azure credentials are unavailable. Run 'az login' first.",
      "credential-unavailable",
    );
    this.name = "CredentialUnavailableError";
  }
}

export class ConfigUnreadableError extends InventoryError {
  constructor(
    public readonly path: string,
    detail: string,
  ) {
    super(`Cannot use configuration file ${path}: ${detail}`, "config-unreadable");
    this.name = "ConfigUnreadableError";
  }
}

export class BastionNotFoundError extends InventoryError {
  constructor(public readonly resourceGroup: string) {
    super(
      `No Azure Bastion host with tunneling enabled found in resource group ${resourceGroup}.`,
      "bastion-not-found",
    );
    this.name = "BastionNotFoundError";
  }
}

export class UsageError extends InventoryError {
  constructor(message: string) {
    super(message, "usage");
    this.name = "UsageError";
  }
}

/**
 * Format an unknown error as one line: `[code] (HTTP status) message`.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (error instanceof InventoryError) return error.message;
  if (typeof error !== "object") return String(error);

  const err = error as { code?: unknown; statusCode?: unknown; message?: unknown };
  const code = typeof err.code === "string" ? err.code : "";
  const statusCode =
    typeof err.statusCode === "number" || typeof err.statusCode === "string" ? err.statusCode : "";
  const message = typeof err.message === "string" && err.message ? err.message : "Unknown error";

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  // First line only.
  parts.push(message.split("\n")[0] ?? message);

  return parts.join(" ");
}
