// src/ssh-transport.ts
import os from "node:os";
import path from "node:path";
import { CopyError, TransportConnectError } from "./errors.js";
import { spawnCapture } from "./exec.js";
import { errorMessage, type Logger } from "./logger.js";
import {
  argsJoin,
  DEFAULT_COMMAND_TIMEOUT_MS,
  fileExistsCommand,
  type RemoteTransport,
  type RunResult,
} from "./remote.js";
import {
  buildBaseArgs,
  createSshControlMaster,
  sshDestination,
  type SshControlHandle,
  type SshTarget,
} from "./ssh-control.js";

export type SshTransportOptions = SshTarget & {
  interactive?: boolean;
  connectTimeoutSeconds?: number;
  socketDir?: string;
  logger?: Logger;
};

/**
 * One ssh ControlMaster per run; commands go through `ssh -S`, file bytes
 * through `rsync -e "ssh -S ..."` so both share the authenticated socket.
 */
export class SshTransport implements RemoteTransport {
  readonly label: string;
  private control: SshControlHandle | null = null;

  constructor(private readonly opts: SshTransportOptions) {
    const dest = sshDestination(opts);
    this.label = opts.port != null ? `${dest}:${opts.port}` : dest;
  }

  async connect(): Promise<void> {
    if (this.control) return;
    const socketDir = this.opts.socketDir ?? os.tmpdir();
    const socketPath = path.join(
      socketDir,
      `mediasync-${process.pid}-${Date.now().toString(36)}.sock`,
    );
    try {
      this.control = await createSshControlMaster({
        ...this.opts,
        socketPath,
      });
    } catch (err) {
      if (err instanceof TransportConnectError) throw err;
      throw new TransportConnectError(
        `cannot connect to ${this.label}: ${errorMessage(err)}`,
      );
    }
    this.opts.logger?.info("ssh connected", {
      target: this.label,
      pid: this.control.pid,
    });
  }

  async disconnect(): Promise<void> {
    const control = this.control;
    if (!control) return;
    this.control = null;
    await control.close();
    this.opts.logger?.info("ssh connection closed", { target: this.label });
  }

  async run(
    command: string,
    timeoutMs = DEFAULT_COMMAND_TIMEOUT_MS,
  ): Promise<RunResult> {
    const socketPath = this.socket();
    const args = [
      ...buildBaseArgs(socketPath, this.opts),
      "-T",
      sshDestination(this.opts),
      command,
    ];
    this.opts.logger?.debug("ssh exec", { command });
    return spawnCapture("ssh", args, { timeoutMs });
  }

  async copy(
    localPath: string,
    remotePath: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const sshCmd = argsJoin(["ssh", ...buildBaseArgs(this.socket(), this.opts)]);
    // -s keeps the remote shell from word-splitting the destination path
    const args = [
      "-s",
      "--times",
      "-e",
      sshCmd,
      localPath,
      `${sshDestination(this.opts)}:${remotePath}`,
    ];
    this.opts.logger?.debug("rsync", { args: argsJoin(args) });
    let result: RunResult;
    try {
      result = await spawnCapture("rsync", args, { signal });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new CopyError(`rsync could not start: ${errorMessage(err)}`, {
        localPath,
        remotePath,
      });
    }
    if (result.exitStatus !== 0) {
      throw new CopyError(
        `rsync ${localPath} -> ${remotePath} exited ${result.exitStatus}: ${result.stderr.trim()}`,
        { localPath, remotePath, exitStatus: result.exitStatus },
      );
    }
  }

  async exists(remotePath: string): Promise<boolean> {
    const { exitStatus } = await this.run(fileExistsCommand(remotePath));
    return exitStatus === 0;
  }

  private socket(): string {
    if (!this.control) {
      throw new Error(`ssh transport to ${this.label} is not connected`);
    }
    return this.control.socketPath;
  }
}
