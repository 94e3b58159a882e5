// src/transfer-pipeline.ts
//
// Per-file decision and copy: already processed? -> hash -> duplicate? ->
// destination name -> parent dir -> copy -> record. Every per-file error is
// turned into a "failed" outcome; only an abort escapes (as InterruptSignal).

import fsp from "node:fs/promises";
import { destinationFor, pickDuplicateName } from "./dest-path.js";
import type { DuplicateRegistry } from "./duplicate-registry.js";
import { InterruptSignal, isAbortError } from "./errors.js";
import { hashLocal, type HashAlg } from "./hash.js";
import { errorMessage, NullLogger, type Logger } from "./logger.js";
import {
  dirExistsCommand,
  mkdirCommand,
  remoteParent,
  type RemoteTransport,
} from "./remote.js";
import type { SyncReport } from "./report.js";
import type { SessionStore } from "./session-store.js";

export type Outcome =
  | {
      kind: "transferred";
      localPath: string;
      destPath: string;
      hash: string;
      size: number;
    }
  | {
      kind: "duplicate";
      localPath: string;
      destPath: string;
      canonicalPath: string;
      hash: string;
      size: number;
    }
  | { kind: "already-processed"; localPath: string; hash?: string }
  | { kind: "failed"; localPath: string; reason: string; hash?: string };

export type OutcomeKind = Outcome["kind"];

export interface TransferPipelineOptions {
  sessionId: number;
  sourceRoot: string;
  destRoot: string;
  transport: RemoteTransport;
  store: SessionStore;
  registry: DuplicateRegistry;
  report: SyncReport;
  hashAlg: HashAlg;
  simulate?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
}

export const HASH_FAILED_REASON = "hash computation failed";

// state of the file currently in flight, for the INTERRUPTED record
interface InFlight {
  destPath: string;
  hash: string;
  size: number;
}

export class TransferPipeline {
  private readonly logger: Logger;
  private readonly simulate: boolean;
  // parents already confirmed (or created) during this run
  private readonly knownDirs = new Set<string>();

  constructor(private readonly opts: TransferPipelineOptions) {
    this.logger = (opts.logger ?? new NullLogger()).child("pipeline");
    this.simulate = opts.simulate ?? false;
  }

  async processFile(localPath: string): Promise<Outcome> {
    const { registry, report } = this.opts;

    if (registry.alreadyProcessed(localPath)) {
      report.addAlreadyProcessed();
      this.logger.debug("already processed", { path: localPath });
      return { kind: "already-processed", localPath };
    }

    const flight: InFlight = { destPath: "", hash: "", size: 0 };
    try {
      return await this.process(localPath, flight);
    } catch (err) {
      if (err instanceof InterruptSignal || this.aborted() || isAbortError(err)) {
        this.recordInterrupted(localPath, flight);
        throw err instanceof InterruptSignal
          ? err
          : new InterruptSignal("sync interrupted", { path: localPath });
      }
      return this.fail(localPath, `transfer failed: ${errorMessage(err)}`, flight.hash);
    }
  }

  private async process(localPath: string, flight: InFlight): Promise<Outcome> {
    const { registry, report, sourceRoot, destRoot, transport } = this.opts;

    let hash: string;
    try {
      const st = await fsp.stat(localPath);
      flight.size = st.size;
      hash = await hashLocal(this.opts.hashAlg, localPath, st.size);
    } catch (err) {
      this.checkAbort();
      this.logger.warn(HASH_FAILED_REASON, {
        path: localPath,
        error: errorMessage(err),
      });
      return this.fail(localPath, HASH_FAILED_REASON);
    }
    flight.hash = hash;
    this.checkAbort();

    if (registry.alreadyProcessed(localPath, hash)) {
      report.addAlreadyProcessed();
      this.logger.debug("already processed (content match)", {
        path: localPath,
        hash,
      });
      return { kind: "already-processed", localPath, hash };
    }

    let destPath = destinationFor(localPath, sourceRoot, destRoot);
    flight.destPath = destPath;
    const canonicalPath = registry.canonicalPath(hash);
    if (canonicalPath != null) {
      destPath = await pickDuplicateName(
        destPath,
        this.simulate ? undefined : (candidate) => transport.exists(candidate),
      );
      flight.destPath = destPath;
      this.logger.info("duplicate content", {
        path: localPath,
        canonical: canonicalPath,
        dest: destPath,
      });
      this.checkAbort();
    }

    const parent = remoteParent(destPath);
    if (!(await this.ensureDir(parent))) {
      this.checkAbort();
      return this.fail(localPath, `cannot create directory ${parent}`, hash);
    }
    this.checkAbort();

    if (this.simulate) {
      this.logger.info("would copy", { path: localPath, dest: destPath, size: flight.size });
    } else {
      await transport.copy(localPath, destPath, this.opts.signal);
      this.checkAbort();
    }

    return this.recordSuccess(localPath, destPath, hash, flight.size, canonicalPath);
  }

  private recordSuccess(
    localPath: string,
    destPath: string,
    hash: string,
    size: number,
    canonicalPath: string | undefined,
  ): Outcome {
    const { registry, report, store, sessionId } = this.opts;
    registry.registerRemote(hash, destPath);
    registry.addProcessedPaths([localPath]);
    store.logTransfer(sessionId, {
      sourceFile: localPath,
      destFile: destPath,
      hash,
      size,
      isDuplicate: canonicalPath != null,
      status: this.simulate ? "DRY_RUN" : "COMPLETED",
    });
    if (canonicalPath != null) {
      report.addDuplicate(true);
      return { kind: "duplicate", localPath, destPath, canonicalPath, hash, size };
    }
    report.addTransferred(size);
    this.logger.info(this.simulate ? "would transfer" : "transferred", {
      path: localPath,
      dest: destPath,
      size,
    });
    return { kind: "transferred", localPath, destPath, hash, size };
  }

  private fail(localPath: string, reason: string, hash?: string): Outcome {
    const { report, store, sessionId } = this.opts;
    report.addError(`${reason}: ${localPath}`);
    report.addSkipped();
    store.logError(sessionId, reason, localPath);
    this.logger.error(reason, { path: localPath });
    return { kind: "failed", localPath, reason, hash };
  }

  private recordInterrupted(localPath: string, flight: InFlight): void {
    this.opts.store.logTransfer(this.opts.sessionId, {
      sourceFile: localPath,
      destFile: flight.destPath,
      hash: flight.hash,
      size: flight.size,
      isDuplicate: false,
      status: "INTERRUPTED",
    });
    this.logger.warn("interrupted mid-file", { path: localPath });
  }

  // test -d, then mkdir -p; simulated runs never touch the destination
  private async ensureDir(dir: string): Promise<boolean> {
    if (this.simulate || this.knownDirs.has(dir)) return true;
    const { transport } = this.opts;
    const probe = await transport.run(dirExistsCommand(dir));
    if (probe.exitStatus !== 0) {
      const mk = await transport.run(mkdirCommand(dir));
      if (mk.exitStatus !== 0) {
        this.logger.warn("mkdir failed", { dir, stderr: mk.stderr.trim() });
        return false;
      }
    }
    this.knownDirs.add(dir);
    return true;
  }

  private aborted(): boolean {
    return this.opts.signal?.aborted ?? false;
  }

  private checkAbort(): void {
    if (this.aborted()) throw new InterruptSignal();
  }
}
