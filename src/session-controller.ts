// src/session-controller.ts
//
// One sync run, start to finish:
//
//   resume check -> session row -> connect -> seed registry (history + scan
//   or cached hashes) -> enumerate -> pipeline per file -> post-process ->
//   final status
//
// Whatever happens after the session row exists, the row gets a terminal
// status and the transport is disconnected before runSync returns.

import path from "node:path";
import { DEFAULT_MEDIA_EXTENSIONS } from "./constants.js";
import { DuplicateRegistry } from "./duplicate-registry.js";
import { InterruptSignal, MediaSyncError } from "./errors.js";
import { defaultHashAlg, type HashAlg } from "./hash.js";
import { errorMessage, NullLogger, type Logger } from "./logger.js";
import type { PostProcessHook } from "./post-process.js";
import { preflight } from "./preflight.js";
import { expandRemoteHome, type RemoteTransport } from "./remote.js";
import { SyncReport } from "./report.js";
import { listLocalMediaFiles, normalizeExtensions } from "./scan-local.js";
import { scanDestination } from "./scan-remote.js";
import type { SessionStatus, SessionStore } from "./session-store.js";
import { TransferPipeline } from "./transfer-pipeline.js";

export interface SyncOptions {
  sourceRoot: string;
  /** Path on the destination side; a leading ~ is expanded there. */
  destRoot: string;
  /**
   * How the destination is recorded in the store (e.g. "pi@nas:/srv/media").
   * Sessions are matched for resume on (sourceRoot, destKey).
   */
  destKey?: string;
  transport: RemoteTransport;
  store: SessionStore;
  extensions?: readonly string[];
  ignore?: readonly string[];
  hashAlg?: HashAlg;
  simulate?: boolean;
  forceResumeId?: number;
  forceNew?: boolean;
  /** Asked when an incomplete session exists; declining starts fresh. */
  confirmResume?: (sessionId: number) => boolean | Promise<boolean>;
  postProcess?: PostProcessHook;
  signal?: AbortSignal;
  logger?: Logger;
  onSessionStarted?: (sessionId: number) => void;
  clock?: () => number;
}

export interface SyncResult {
  status: SessionStatus;
  sessionId: number;
  resumedFromId: number | null;
  report: SyncReport;
  durationSeconds: number;
  /** Destination root after ~ expansion, when the transport connected. */
  destRoot?: string;
}

const declineResume = () => false;

export async function runSync(opts: SyncOptions): Promise<SyncResult> {
  const {
    transport,
    store,
    simulate = false,
    signal,
    clock = Date.now,
  } = opts;
  const logger = (opts.logger ?? new NullLogger()).child("sync");
  const hashAlg = opts.hashAlg ?? defaultHashAlg();
  const sourceRoot = path.resolve(opts.sourceRoot);
  const destKey = opts.destKey ?? opts.destRoot;
  const started = clock();
  const elapsed = () => (clock() - started) / 1000;

  const resumedFromId = await resumeCheck(opts, sourceRoot, destKey, logger);

  const sessionId = store.startSession(sourceRoot, destKey, {
    resumedFrom: resumedFromId,
    simulated: simulate,
    hashAlg,
  });
  opts.onSessionStarted?.(sessionId);
  logger.info("session started", {
    sessionId,
    source: sourceRoot,
    dest: destKey,
    resumedFrom: resumedFromId,
    simulated: simulate,
    hashAlg,
  });

  const report = new SyncReport();
  const finish = (status: SessionStatus, destRoot?: string): SyncResult => {
    const durationSeconds = elapsed();
    store.updateSession(sessionId, report.toCounters(), durationSeconds, status);
    logger.info("session finished", { sessionId, status, durationSeconds });
    return { status, sessionId, resumedFromId, report, durationSeconds, destRoot };
  };
  const failWith = (message: string, destRoot?: string): SyncResult => {
    report.addError(message);
    store.logError(sessionId, message);
    logger.error(message);
    return finish("FAILED", destRoot);
  };

  try {
    let destRoot: string;
    try {
      if (simulate) {
        const pre = await preflight(transport, sourceRoot, opts.destRoot, logger);
        if (!pre.canProceed) {
          const failed = pre.checks.filter((c) => !c.ok);
          return failWith(
            `preflight failed: ${failed.map((c) => `${c.name} (${c.detail})`).join(", ")}`,
          );
        }
        destRoot = pre.destRoot;
      } else {
        await transport.connect();
        destRoot = await expandRemoteHome(transport, opts.destRoot);
      }
    } catch (err) {
      return failWith(`cannot connect to ${transport.label}: ${errorMessage(err)}`);
    }

    const registry = new DuplicateRegistry();
    registry.loadProcessed(
      store.allProcessedFilesForPath(sourceRoot, destKey, sessionId, hashAlg),
    );
    if (resumedFromId != null) {
      registry.addProcessedPaths(store.processedFiles([resumedFromId]));
    }

    const extensions = normalizeExtensions(
      opts.extensions?.length ? opts.extensions : DEFAULT_MEDIA_EXTENSIONS,
    );
    // resumed runs never happen in simulation (see resumeCheck)
    const resumedAlg =
      resumedFromId != null ? store.loadSession(resumedFromId)?.hash_alg : undefined;
    const cachedHashesUsable = resumedAlg === hashAlg;
    if (resumedFromId != null && !cachedHashesUsable) {
      logger.info("resumed session used another hash algorithm; scanning destination", {
        resumeId: resumedFromId,
        previous: resumedAlg,
        hashAlg,
      });
    }
    if (cachedHashesUsable) {
      for (const [hash, p] of store.remoteHashesForPath(sourceRoot, destKey, hashAlg)) {
        registry.registerRemote(hash, p);
      }
      logger.info("destination hashes from store", { count: registry.remoteCount });
    } else {
      await scanDestination({
        transport,
        destRoot,
        extensions,
        hashAlg,
        registry,
        simulate,
        signal,
        logger,
      });
    }
    if (signal?.aborted) return finish("INTERRUPTED", destRoot);

    const files = await listLocalMediaFiles({
      root: sourceRoot,
      extensions,
      ignore: opts.ignore,
      logger,
    });
    if (!files.length) {
      logger.info("no media files to sync", { source: sourceRoot });
      return finish("NO_FILES", destRoot);
    }

    const pipeline = new TransferPipeline({
      sessionId,
      sourceRoot,
      destRoot,
      transport,
      store,
      registry,
      report,
      hashAlg,
      simulate,
      signal,
      logger,
    });
    for (let i = 0; i < files.length; i++) {
      if (signal?.aborted) return finish("INTERRUPTED", destRoot);
      try {
        await pipeline.processFile(files[i]);
      } catch (err) {
        if (err instanceof InterruptSignal) {
          logger.warn("interrupted", { done: i, total: files.length });
          return finish("INTERRUPTED", destRoot);
        }
        throw err;
      }
    }

    const changed = report.filesTransferred + report.duplicatesRenamed > 0;
    if (opts.postProcess && (changed || simulate)) {
      await runPostProcess(opts.postProcess, destRoot, simulate, {
        report,
        store,
        sessionId,
        logger,
      });
    }

    const status: SessionStatus = simulate
      ? "DRY_RUN_COMPLETED"
      : report.errorCount
        ? "COMPLETED_WITH_ERRORS"
        : "COMPLETED";
    return finish(status, destRoot);
  } catch (err) {
    return failWith(`sync failed: ${errorMessage(err)}`);
  } finally {
    try {
      await transport.disconnect();
    } catch (err) {
      logger.warn("disconnect failed", { error: errorMessage(err) });
    }
  }
}

async function resumeCheck(
  opts: SyncOptions,
  sourceRoot: string,
  destKey: string,
  logger: Logger,
): Promise<number | null> {
  const { store } = opts;
  if (opts.simulate) {
    if (opts.forceResumeId != null) {
      logger.warn("dry runs never resume; ignoring resume id", {
        resumeId: opts.forceResumeId,
      });
    }
    return null;
  }

  if (opts.forceResumeId != null) {
    const prior = store.loadSession(opts.forceResumeId);
    if (!prior) {
      throw new MediaSyncError(`no sync session with id ${opts.forceResumeId}`);
    }
    if (prior.source_path !== sourceRoot || prior.dest_path !== destKey) {
      throw new MediaSyncError(
        `session ${prior.id} synced ${prior.source_path} -> ${prior.dest_path}, not ${sourceRoot} -> ${destKey}`,
      );
    }
    logger.info("resuming session", { resumeId: prior.id });
    return prior.id;
  }

  const incomplete = store.findIncompleteSession(sourceRoot, destKey);
  if (incomplete == null) return null;
  if (opts.forceNew) {
    logger.info("starting fresh; previous session marked interrupted", {
      sessionId: incomplete,
    });
    store.markInterrupted(incomplete);
    return null;
  }
  const confirm = opts.confirmResume ?? declineResume;
  if (await confirm(incomplete)) {
    logger.info("resuming session", { resumeId: incomplete });
    return incomplete;
  }
  store.markInterrupted(incomplete);
  return null;
}

async function runPostProcess(
  hook: PostProcessHook,
  destRoot: string,
  simulate: boolean,
  ctx: {
    report: SyncReport;
    store: SessionStore;
    sessionId: number;
    logger: Logger;
  },
): Promise<void> {
  let message: string | null = null;
  try {
    const result = await hook.run(destRoot, simulate);
    if (result !== "ok") message = `post-processing ${result === "fail" ? "failed" : "partially failed"}`;
  } catch (err) {
    message = `post-processing failed: ${errorMessage(err)}`;
  }
  if (message) {
    ctx.report.addError(message);
    ctx.store.logError(ctx.sessionId, message, destRoot);
    ctx.logger.error(message, { destRoot });
  }
}
