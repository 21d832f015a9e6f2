/**
 * Process Table
 *
 * Best-effort snapshots of the OS process table. Linux reads /proc directly,
 * which keeps argv boundaries intact; other platforms fall back to `ps`.
 */

import { execFile } from "node:child_process";
import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";

import type { Logger } from "../logger.js";
import type { ProcessStatus, TunnelProcess } from "../types.js";

const execFileAsync = promisify(execFile);

export type ProcessTable = {
  /** Every process visible to this user that still exists at inspection time. */
  snapshot(): Promise<TunnelProcess[]>;
  /** Send a signal; throws the OS error (ESRCH, EPERM) on failure. */
  signal(pid: number, signal: NodeJS.Signals): void;
};

const STATE_LETTERS: Record<string, ProcessStatus> = {
  R: "running",
  S: "sleeping",
  D: "disk-sleep",
  U: "disk-sleep",
  T: "stopped",
  t: "tracing-stop",
  Z: "zombie",
  X: "dead",
  x: "dead",
  I: "idle",
};

export function statusFromStateLetter(letter: string): ProcessStatus {
  return STATE_LETTERS[letter.charAt(0)] ?? "unknown";
}

function signalPid(pid: number, signal: NodeJS.Signals): void {
  process.kill(pid, signal);
}

// =============================================================================
// /proc
// =============================================================================

export class LinuxProcessTable implements ProcessTable {
  private procRoot: string;
  private logger: Logger;

  constructor(logger: Logger, procRoot = "/proc") {
    this.logger = logger;
    this.procRoot = procRoot;
  }

  async snapshot(): Promise<TunnelProcess[]> {
    const entries = await readdir(this.procRoot);
    const pids = entries.filter((entry) => /^\d+$/.test(entry)).map(Number);

    const processes: TunnelProcess[] = [];
    for (const pid of pids) {
      const proc = await this.inspect(pid);
      if (proc) processes.push(proc);
    }
    return processes;
  }

  /** Null when the process exited since enumeration or cannot be read. */
  async inspect(pid: number): Promise<TunnelProcess | null> {
    const dir = join(this.procRoot, String(pid));
    let cmdline: string;
    let stat: string;
    try {
      cmdline = await readFile(join(dir, "cmdline"), "utf-8");
      stat = await readFile(join(dir, "stat"), "utf-8");
    } catch (error) {
      const code = (error as { code?: unknown }).code;
      this.logger.debug(`pid ${pid} vanished or is unreadable (${typeof code === "string" ? code : "unknown"})`);
      return null;
    }

    const commandLine = cmdline.split("\0");
    if (commandLine.at(-1) === "") commandLine.pop();
    // Kernel threads have an empty cmdline.
    if (commandLine.length === 0) return null;

    return { pid, commandLine, status: parseStatState(stat) };
  }

  signal(pid: number, signal: NodeJS.Signals): void {
    signalPid(pid, signal);
  }
}

/** State letter from /proc/<pid>/stat; the command name may itself contain ") ". */
export function parseStatState(stat: string): ProcessStatus {
  const end = stat.lastIndexOf(") ");
  if (end === -1) return "unknown";
  return statusFromStateLetter(stat.slice(end + 2, end + 3));
}

// =============================================================================
// ps
// =============================================================================

export class PsProcessTable implements ProcessTable {
  private psPath: string;

  constructor(psPath = "ps") {
    this.psPath = psPath;
  }

  async snapshot(): Promise<TunnelProcess[]> {
    const { stdout } = await execFileAsync(this.psPath, ["-axo", "pid=,stat=,command="], {
      maxBuffer: 16 * 1024 * 1024,
    });
    return parsePsOutput(stdout);
  }

  signal(pid: number, signal: NodeJS.Signals): void {
    signalPid(pid, signal);
  }
}

/** Parse `ps -o pid=,stat=,command=` lines. Arguments are split on whitespace. */
export function parsePsOutput(stdout: string): TunnelProcess[] {
  const processes: TunnelProcess[] = [];
  for (const line of stdout.split("\n")) {
    const match = line.match(/^\s*(\d+)\s+(\S+)\s+(.+?)\s*$/);
    if (!match) continue;
    const [, pid = "", state = "", command = ""] = match;
    processes.push({
      pid: Number(pid),
      commandLine: command.split(/\s+/),
      status: statusFromStateLetter(state),
    });
  }
  return processes;
}

export function createProcessTable(logger: Logger, platform: NodeJS.Platform = process.platform): ProcessTable {
  return platform === "linux" ? new LinuxProcessTable(logger) : new PsProcessTable();
}
