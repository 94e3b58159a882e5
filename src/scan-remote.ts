// src/scan-remote.ts
import type { DuplicateRegistry } from "./duplicate-registry.js";
import { RemoteCommandError } from "./errors.js";
import { hashRemote, type HashAlg } from "./hash.js";
import { errorMessage, type Logger } from "./logger.js";
import {
  findMediaCommand,
  LONG_COMMAND_TIMEOUT_MS,
  mkdirCommand,
  type RemoteTransport,
} from "./remote.js";

const PROGRESS_EVERY = 50;

export interface RemoteScanOptions {
  transport: RemoteTransport;
  destRoot: string;
  extensions: readonly string[];
  hashAlg: HashAlg;
  registry: DuplicateRegistry;
  simulate?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface RemoteScanResult {
  found: number;
  hashed: number;
  failed: number;
}

/** Parse `find` output: one path per line, blank lines dropped. */
export function parseFindOutput(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.replace(/\r$/, ""))
    .filter((line) => line.trim() !== "");
}

/**
 * Hash every media file already under destRoot into the registry. Failures
 * are logged and never abort the run: an unreadable destination only means
 * fewer duplicates are recognized.
 */
export async function scanDestination({
  transport,
  destRoot,
  extensions,
  hashAlg,
  registry,
  simulate = false,
  signal,
  logger,
}: RemoteScanOptions): Promise<RemoteScanResult> {
  const result: RemoteScanResult = { found: 0, hashed: 0, failed: 0 };
  logger?.info("scanning destination", { destRoot, simulate });

  if (!simulate) {
    const mk = await transport.run(mkdirCommand(destRoot));
    if (mk.exitStatus !== 0) {
      logger?.warn("cannot create destination root", {
        destRoot,
        stderr: mk.stderr.trim(),
      });
    }
  }

  const find = await transport.run(
    findMediaCommand(destRoot, extensions),
    LONG_COMMAND_TIMEOUT_MS,
  );
  if (find.exitStatus !== 0) {
    const err = new RemoteCommandError(
      `find under ${destRoot} failed`,
      find.exitStatus,
      find.stderr.trim(),
    );
    logger?.warn(err.message, { exitStatus: err.exitStatus, stderr: err.stderr });
    return result;
  }

  const paths = parseFindOutput(find.stdout);
  result.found = paths.length;
  logger?.info("existing destination files", { count: paths.length });

  for (let i = 0; i < paths.length; i++) {
    if (signal?.aborted) break;
    const remotePath = paths[i];
    if ((i + 1) % PROGRESS_EVERY === 0) {
      logger?.info("hashing destination files", { done: i + 1, total: paths.length });
    }
    try {
      const hash = await hashRemote(transport, hashAlg, remotePath);
      registry.registerRemote(hash, remotePath);
      result.hashed++;
    } catch (err) {
      result.failed++;
      logger?.warn("cannot hash destination file", {
        path: remotePath,
        error: errorMessage(err),
      });
    }
  }
  return result;
}
