/**
 * Bastion Tunnels Inventory — Shared Types
 *
 * Core type definitions used across the resolver, tunnel and inventory modules.
 */

// =============================================================================
// Hosts
// =============================================================================

/** One managed host as declared in the configuration document. */
export type HostSpec = {
  hostName: string;
  resourceGroup: string;
  ansiblePort: number;
  ansibleUser?: string;
  ansibleHost?: string;
};

/** A configured group of hosts, in declaration order. */
export type HostGroup = {
  name: string;
  hosts: HostSpec[];
};

/** Identifiers needed to open a tunnel to one host. */
export type ResolvedTarget = {
  hostName: string;
  bastionName: string;
  targetResourceId: string;
  host: HostSpec;
};

// =============================================================================
// Tunnel Processes
// =============================================================================

export type ProcessStatus =
  | "running"
  | "sleeping"
  | "disk-sleep"
  | "stopped"
  | "tracing-stop"
  | "zombie"
  | "dead"
  | "idle"
  | "unknown";

export type TunnelProcess = {
  pid: number;
  commandLine: string[];
  status: ProcessStatus;
};

export type KillFailure = {
  pid: number;
  reason: string;
};

export type KillResult = {
  terminated: number[];
  failed: KillFailure[];
};

// =============================================================================
// Inventory Document
// =============================================================================

export type HostVars = Record<string, string | number>;

export type InventoryMeta = {
  hostvars: Record<string, HostVars>;
};

/**
 * Ansible dynamic inventory document: one key per group listing its host
 * names, plus `_meta.hostvars`.
 */
export type InventoryDocument = {
  _meta: InventoryMeta;
  [group: string]: string[] | InventoryMeta;
};

// =============================================================================
// Tool Options
// =============================================================================

export type InventoryOptions = {
  configFile: string;
  pretty: boolean;
  group?: string;
  subscriptionId?: string;
  azPath?: string;
  tenantId?: string;
};
