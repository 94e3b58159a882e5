// src/remote.ts
//
// The transport surface the sync engine consumes, and the shell commands it
// sends through it. Implementations: ssh-transport.ts, local-transport.ts.

import { posix } from "node:path";
import { RemoteCommandError } from "./errors.js";
import type { HashAlg } from "./hash.js";

export interface RunResult {
  exitStatus: number | null;
  stdout: string;
  stderr: string;
}

export interface RemoteTransport {
  /** Human readable target, e.g. "pi@nas:22" or "local". */
  readonly label: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  run(command: string, timeoutMs?: number): Promise<RunResult>;
  copy(localPath: string, remotePath: string, signal?: AbortSignal): Promise<void>;
  exists(remotePath: string): Promise<boolean>;
}

// default per-command timeout; copies have none beyond the signal
export const DEFAULT_COMMAND_TIMEOUT_MS = 300_000;
export const LONG_COMMAND_TIMEOUT_MS = 1_800_000;

// single-quote safe escape for sh -c
export function shellEscape(s: string): string {
  return `'${String(s).replace(/'/g, `'\\''`)}'`;
}

export function argsJoin(args: string[]): string {
  return args.map((x) => (x.includes(" ") ? `'${x}'` : x)).join(" ");
}

export function mkdirCommand(dir: string): string {
  return `mkdir -p -- ${shellEscape(dir)}`;
}

export function dirExistsCommand(dir: string): string {
  return `test -d ${shellEscape(dir)}`;
}

export function fileExistsCommand(path: string): string {
  return `test -e ${shellEscape(path)}`;
}

export function writableCommand(path: string): string {
  return `test -w ${shellEscape(path)}`;
}

export function hashCommand(alg: HashAlg, path: string): string {
  return `${alg}sum -- ${shellEscape(path)}`;
}

/**
 * `find` every regular file below root whose name ends in one of the
 * extensions (case-insensitive), one path per line.
 */
export function findMediaCommand(root: string, extensions: readonly string[]): string {
  const names = extensions
    .map((ext) => `-iname ${shellEscape(`*${ext}`)}`)
    .join(" -o ");
  const filter = names ? ` \\( ${names} \\)` : "";
  return `find ${shellEscape(root)} -type f${filter}`;
}

export function remoteParent(path: string): string {
  return posix.dirname(path);
}

/**
 * Expand a leading "~" against the far side's home directory (the shell's
 * own tilde expansion, symlinks resolved).
 */
export async function expandRemoteHome(
  transport: RemoteTransport,
  p: string,
): Promise<string> {
  if (p !== "~" && !p.startsWith("~/")) return p;
  const { exitStatus, stdout, stderr } = await transport.run(
    "cd ~ 2>/dev/null && pwd -P",
  );
  const home = stdout.trim();
  if (exitStatus !== 0 || !home) {
    throw new RemoteCommandError(
      `cannot resolve home directory on ${transport.label}`,
      exitStatus,
      stderr,
    );
  }
  return p === "~" ? home : posix.join(home, p.slice(2));
}
