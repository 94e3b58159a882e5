import fsp from "node:fs/promises";
import path from "node:path";
import { TransportConnectError } from "./errors.js";
import { spawnCapture, spawnInteractive } from "./exec.js";
import type { Logger } from "./logger.js";

export type SshTarget = {
  host: string;
  user?: string;
  port?: number;
  identityFile?: string;
};

export type SshControlOptions = SshTarget & {
  socketPath: string;
  persistSeconds?: number;
  connectTimeoutSeconds?: number;
  // let ssh prompt on the terminal (passwords, host keys) instead of BatchMode
  interactive?: boolean;
  logger?: Logger;
};

export type SshControlHandle = {
  socketPath: string;
  close: () => Promise<void>;
  pid: number | null;
};

export function sshDestination({ host, user }: SshTarget): string {
  return user ? `${user}@${host}` : host;
}

/** Options shared by every ssh invocation that rides on the master socket. */
export function buildBaseArgs(
  socketPath: string,
  { port, identityFile }: SshTarget,
  interactive = false,
): string[] {
  const args = ["-S", socketPath];
  if (!interactive) {
    args.push("-o", "BatchMode=yes");
  }
  if (port != null) {
    args.push("-p", String(port));
  }
  if (identityFile) {
    args.push("-i", identityFile);
  }
  return args;
}

function sanitizeSocketPath(p: string): string {
  if (p.length < 100) return p;
  // unix socket paths are limited to ~104 bytes; shrink but keep directory
  const dir = path.dirname(p);
  const hash = Buffer.from(p).toString("base64url").slice(0, 16);
  return path.join(dir, `ssh-${hash}.sock`);
}

export async function createSshControlMaster(
  opts: SshControlOptions,
): Promise<SshControlHandle> {
  const socketPath = sanitizeSocketPath(opts.socketPath);
  await fsp.mkdir(path.dirname(socketPath), { recursive: true });
  await fsp.rm(socketPath, { force: true });

  const baseArgs = buildBaseArgs(socketPath, opts, opts.interactive);
  const dest = sshDestination(opts);
  const persistSeconds = Math.max(5, opts.persistSeconds ?? 60);
  const masterArgs = [
    ...baseArgs,
    "-M",
    "-o",
    `ControlPersist=${persistSeconds}s`,
    "-o",
    `ConnectTimeout=${opts.connectTimeoutSeconds ?? 10}`,
    "-fNT",
    dest,
  ];

  opts.logger?.debug("starting ssh control master", { dest, socketPath });
  if (opts.interactive) {
    const code = await spawnInteractive("ssh", masterArgs);
    if (code !== 0) {
      throw new TransportConnectError(`ssh to ${dest} exited ${code}`, { dest });
    }
  } else {
    const { exitStatus, stderr } = await spawnCapture("ssh", masterArgs);
    if (exitStatus !== 0) {
      await fsp.rm(socketPath, { force: true });
      throw new TransportConnectError(
        `ssh to ${dest} failed (exit ${exitStatus}): ${stderr.trim() || "unknown error"}`,
        { dest },
      );
    }
  }

  const pid = await getControlMasterPid(socketPath, opts);

  const close = async () => {
    const { exitStatus, stderr } = await spawnCapture("ssh", [
      ...baseArgs,
      "-O",
      "exit",
      dest,
    ]);
    if (exitStatus !== 0) {
      opts.logger?.debug("ssh control master exit failed", {
        error: stderr.trim(),
        dest,
      });
    }
    await fsp.rm(socketPath, { force: true });
  };

  return { socketPath, close, pid };
}

async function getControlMasterPid(
  socketPath: string,
  target: SshTarget,
): Promise<number | null> {
  const args = buildBaseArgs(socketPath, target);
  args.push("-O", "check", sshDestination(target));
  const { stdout, stderr } = await spawnCapture("ssh", args);
  const match = `${stdout}\n${stderr}`.match(/pid=(\d+)/i);
  return match ? Number(match[1]) : null;
}
