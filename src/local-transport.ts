// src/local-transport.ts
//
// Destination on this machine (e.g. a mounted NAS share). Commands run under
// /bin/sh exactly as they would on an ssh host.

import { randomBytes } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { CopyError, TransportConnectError } from "./errors.js";
import { spawnCapture } from "./exec.js";
import { errorMessage, type Logger } from "./logger.js";
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  type RemoteTransport,
  type RunResult,
} from "./remote.js";

export class LocalTransport implements RemoteTransport {
  readonly label = "local";
  private connected = false;

  constructor(private readonly logger?: Logger) {}

  async connect(): Promise<void> {
    try {
      await fsp.access("/bin/sh");
    } catch (err) {
      throw new TransportConnectError(`no /bin/sh: ${errorMessage(err)}`);
    }
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async run(
    command: string,
    timeoutMs = DEFAULT_COMMAND_TIMEOUT_MS,
  ): Promise<RunResult> {
    this.assertConnected();
    this.logger?.debug("sh exec", { command });
    return spawnCapture("/bin/sh", ["-c", command], { timeoutMs });
  }

  /**
   * Writes to a hidden sibling and renames it into place, the way rsync
   * does, so a cancelled or failed copy never leaves a partial file under
   * the final name.
   */
  async copy(
    localPath: string,
    remotePath: string,
    signal?: AbortSignal,
  ): Promise<void> {
    this.assertConnected();
    const partial = partialPath(remotePath);
    try {
      await pipeline(
        createReadStream(localPath),
        createWriteStream(partial),
        { signal },
      );
      await fsp.rename(partial, remotePath);
    } catch (err) {
      await fsp.rm(partial, { force: true }).catch((rmErr: unknown) => {
        this.logger?.warn("cannot remove partial copy", {
          path: partial,
          error: errorMessage(rmErr),
        });
      });
      if (signal?.aborted) throw err;
      throw new CopyError(
        `copy ${localPath} -> ${remotePath} failed: ${errorMessage(err)}`,
        { localPath, remotePath },
      );
    }
  }

  async exists(remotePath: string): Promise<boolean> {
    this.assertConnected();
    try {
      await fsp.lstat(remotePath);
      return true;
    } catch {
      return false;
    }
  }

  private assertConnected() {
    if (!this.connected) {
      throw new Error("local transport is not connected");
    }
  }
}

export function partialPath(target: string): string {
  const dir = path.dirname(target);
  return path.join(dir, `.${path.basename(target)}.${randomBytes(3).toString("hex")}.part`);
}
