// src/sync-cli.ts
import readline from "node:readline";
import { Command, Option } from "commander";
import {
  ConfigError,
  resolveSyncConfig,
  type SyncCliOptions,
  type SyncConfig,
} from "./config.js";
import { CURATED_HASH_ALGOS } from "./hash.js";
import { collectListOption } from "./ignore.js";
import { LocalTransport } from "./local-transport.js";
import { StructuredLogger, errorMessage, type LogLevel, type Logger } from "./logger.js";
import { RemoteHousekeeping } from "./post-process.js";
import type { RemoteTransport } from "./remote.js";
import { renderReport } from "./report.js";
import { runSync, type SyncResult } from "./session-controller.js";
import { DeferredSessionSink } from "./session-logs.js";
import type { SessionStatus } from "./session-store.js";
import { SqliteSessionStore } from "./session-store.js";
import { SshTransport } from "./ssh-transport.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export function exitCodeForStatus(status: SessionStatus): number {
  switch (status) {
    case "COMPLETED":
    case "DRY_RUN_COMPLETED":
    case "NO_FILES":
      return EXIT_OK;
    case "INTERRUPTED":
      return EXIT_INTERRUPTED;
    default:
      return EXIT_FAILURE;
  }
}

export function configureSyncCommand(command: Command): Command {
  return command
    .description("push media files to a destination, skipping content it already has")
    .requiredOption("-s, --source <dir>", "local directory to read media from")
    .requiredOption(
      "-d, --dest <endpoint>",
      "destination: /path, or [user@]host[:port]:/path over ssh",
    )
    .option("--host <host>", "ssh host (when --dest is a bare path)")
    .option("--user <user>", "ssh user")
    .option("--port <port>", "ssh port")
    .option("-i, --identity <file>", "ssh private key")
    .option(
      "--interactive-auth",
      "let ssh prompt for passwords/host keys on this terminal",
      false,
    )
    .option(
      "--ext <exts>",
      "media extensions to sync, e.g. .jpg,.mp4 (repeatable; default: common photo/video/audio)",
      collectListOption,
      [],
    )
    .option(
      "--ignore <pattern>",
      "gitignore-style pattern, relative to the source (repeatable)",
      collectListOption,
      [],
    )
    .addOption(
      new Option("--hash <alg>", "content hash algorithm")
        .choices([...CURATED_HASH_ALGOS])
        .default("md5"),
    )
    .option("--dry-run", "decide everything, copy nothing", false)
    .option("--resume <id>", "resume this interrupted session")
    .option("--force-new", "never resume; close any incomplete session", false)
    .option("-y, --yes", "resume an incomplete session without asking", false)
    .option("--owner <user[:group]>", "chown the destination tree afterwards")
    .option("--rescan-cmd <cmd>", "command run on the destination host afterwards")
    .option("--no-post-process", "skip permission/ownership/rescan housekeeping");
}

/** y/N question on the controlling terminal; false when not interactive. */
export function askYesNo(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) return Promise.resolve(false);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  return new Promise((resolve) => {
    rl.question(`${question} [y/N] `, (answer) => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

export function createTransport(cfg: SyncConfig, logger: Logger): RemoteTransport {
  const { host, user, port } = cfg.dest;
  if (!host) return new LocalTransport(logger.child("local"));
  return new SshTransport({
    host,
    user,
    port,
    identityFile: cfg.identityFile,
    interactive: cfg.interactiveAuth,
    connectTimeoutSeconds: cfg.connectTimeoutSeconds,
    logger: logger.child("ssh"),
  });
}

export interface RunSyncCommandOptions extends SyncCliOptions {
  db: string;
  logLevel: LogLevel;
}

/** The `sync` command body; resolves to the process exit code. */
export async function runSyncCommand(opts: RunSyncCommandOptions): Promise<number> {
  let cfg: SyncConfig;
  try {
    cfg = resolveSyncConfig(opts);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return EXIT_FAILURE;
    }
    throw err;
  }

  const store = SqliteSessionStore.open(opts.db);
  const sessionSink = new DeferredSessionSink();
  const logger = new StructuredLogger({
    sink: sessionSink.sink,
    echo: { minLevel: opts.logLevel },
    minLevel: opts.logLevel,
  });
  const transport = createTransport(cfg, logger);
  const abort = new AbortController();
  const onSigint = () => {
    logger.warn("interrupt received; stopping after the current step");
    abort.abort();
  };
  process.once("SIGINT", onSigint);

  let result: SyncResult;
  try {
    result = await runSync({
      sourceRoot: cfg.source,
      destRoot: cfg.dest.root,
      destKey: cfg.destKey,
      transport,
      store,
      extensions: cfg.extensions,
      ignore: cfg.ignore,
      hashAlg: cfg.hashAlg,
      simulate: cfg.dryRun,
      forceResumeId: cfg.resumeId,
      forceNew: cfg.forceNew,
      confirmResume: (id) =>
        cfg.assumeYes ? true : askYesNo(`Incomplete session ${id} found. Resume it?`),
      postProcess: cfg.postProcess
        ? new RemoteHousekeeping(transport, {
            owner: cfg.owner,
            rescanCommand: cfg.rescanCommand,
            logger,
          })
        : undefined,
      signal: abort.signal,
      logger,
      onSessionStarted: (id) => sessionSink.attach(store.db, id),
    });
  } catch (err) {
    console.error(`sync failed: ${errorMessage(err)}`);
    return EXIT_FAILURE;
  } finally {
    process.removeListener("SIGINT", onSigint);
    sessionSink.detach();
    store.close();
  }

  console.log(
    renderReport(result.report, {
      status: result.status,
      sessionId: result.sessionId,
      resumedFromId: result.resumedFromId,
      durationSeconds: result.durationSeconds,
      simulated: cfg.dryRun,
    }),
  );
  return exitCodeForStatus(result.status);
}
