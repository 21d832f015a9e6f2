/**
 * Azure Call Diagnostics
 *
 * Event emitter for Azure control-plane call tracing. Disabled unless the
 * CLI runs with --verbose.
 */

import { formatErrorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

// =============================================================================
// Types
// =============================================================================

export type AzureDiagnosticEventType = "azure.api.call" | "azure.api.error";

export type AzureDiagnosticEvent = {
  type: AzureDiagnosticEventType;
  timestamp: number;
  seq: number;
  service: string;
  operation: string;
  durationMs?: number;
  subscriptionId?: string;
  resourceGroup?: string;
  statusCode?: number;
  error?: string;
};

export type AzureDiagnosticListener = (event: AzureDiagnosticEvent) => void;

// =============================================================================
// Global State
// =============================================================================

const log = createLogger("diagnostics");

let diagnosticsEnabled = false;
let seq = 0;
const listeners = new Set<AzureDiagnosticListener>();

// =============================================================================
// Public API
// =============================================================================

export function enableAzureDiagnostics(): void {
  diagnosticsEnabled = true;
}

/** Subscribe to diagnostic events. Returns an unsubscribe function. */
export function onAzureDiagnosticEvent(listener: AzureDiagnosticListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function emitAzureDiagnosticEvent(event: Omit<AzureDiagnosticEvent, "timestamp" | "seq">): void {
  if (!diagnosticsEnabled) return;

  const fullEvent: AzureDiagnosticEvent = {
    ...event,
    timestamp: Date.now(),
    seq: ++seq,
  };

  for (const listener of listeners) {
    try {
      listener(fullEvent);
    } catch (error) {
      log.debug(`diagnostic listener failed: ${formatErrorMessage(error)}`);
    }
  }
}

/**
 * Wrap an Azure API call with timing and success/error events.
 */
export async function instrumentedAzureCall<T>(
  service: string,
  operation: string,
  fn: () => Promise<T>,
  options?: { subscriptionId?: string; resourceGroup?: string },
): Promise<T> {
  if (!diagnosticsEnabled) return fn();

  const start = Date.now();

  try {
    const result = await fn();
    emitAzureDiagnosticEvent({
      type: "azure.api.call",
      service,
      operation,
      durationMs: Date.now() - start,
      subscriptionId: options?.subscriptionId,
      resourceGroup: options?.resourceGroup,
    });
    return result;
  } catch (error) {
    const statusCode = (error as { statusCode?: unknown } | null)?.statusCode;
    emitAzureDiagnosticEvent({
      type: "azure.api.error",
      service,
      operation,
      durationMs: Date.now() - start,
      statusCode: typeof statusCode === "number" ? statusCode : undefined,
      error: formatErrorMessage(error),
      subscriptionId: options?.subscriptionId,
      resourceGroup: options?.resourceGroup,
    });
    throw error;
  }
}

/**
 * Forward diagnostic events to a logger, one line per call.
 */
export function logAzureDiagnostics(logger: Logger): () => void {
  return onAzureDiagnosticEvent((event) => {
    const where = event.resourceGroup ? ` rg=${event.resourceGroup}` : "";
    const took = event.durationMs !== undefined ? ` ${event.durationMs}ms` : "";
    if (event.type === "azure.api.error") {
      logger.debug(`#${event.seq} ${event.service}.${event.operation}${where}${took} failed: ${event.error ?? ""}`);
    } else {
      logger.debug(`#${event.seq} ${event.service}.${event.operation}${where}${took}`);
    }
  });
}

/**
 * Reset diagnostics state for tests.
 */
export function resetAzureDiagnosticsForTest(): void {
  diagnosticsEnabled = false;
  seq = 0;
  listeners.clear();
}
