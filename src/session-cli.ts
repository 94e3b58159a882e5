// src/session-cli.ts
//
// Read-only views of the session store: `sessions`, `show <id>`, `logs <id>`.

import { Command } from "commander";
import { parseLogLevelOption, renderLogRows } from "./cli-log-output.js";
import { LOG_LEVELS } from "./logger.js";
import { fetchSessionLogs } from "./session-logs.js";
import { sessionDetailText, sessionsTable } from "./session-status.js";
import { SqliteSessionStore } from "./session-store.js";

const DEFAULT_LOG_LINES = 2_500;

interface GlobalOpts {
  db: string;
}

function clampPositive(value: number | undefined, fallback: number): number {
  if (value == null || !Number.isFinite(value) || value <= 0) return fallback;
  return Math.floor(value);
}

function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id < 1) {
    throw new Error(`invalid session id '${raw}'`);
  }
  return id;
}

function withStore<T>(command: Command, fn: (store: SqliteSessionStore) => T): T {
  const { db } = command.optsWithGlobals<GlobalOpts>();
  const store = SqliteSessionStore.open(db);
  try {
    return fn(store);
  } finally {
    store.close();
  }
}

export function registerSessionCommands(program: Command): void {
  program
    .command("sessions")
    .description("list recent sync sessions")
    .option("-n, --limit <n>", "how many sessions", (v: string) => Number.parseInt(v, 10))
    .option("--json", "emit JSON", false)
    .action((opts: { limit?: number; json: boolean }, command: Command) => {
      withStore(command, (store) => {
        const rows = store.recentSessions(clampPositive(opts.limit, 10));
        if (opts.json) {
          console.log(JSON.stringify(rows, null, 2));
          return;
        }
        console.log(sessionsTable(rows));
      });
    });

  program
    .command("show")
    .description("show one session with every recorded error")
    .argument("<id>", "session id")
    .option("--json", "emit JSON", false)
    .action((ref: string, opts: { json: boolean }, command: Command) => {
      const id = parseId(ref);
      withStore(command, (store) => {
        const detail = store.sessionDetail(id);
        if (!detail) {
          console.error(`no sync session with id ${id}`);
          process.exitCode = 1;
          return;
        }
        if (opts.json) {
          console.log(JSON.stringify(detail, null, 2));
          return;
        }
        console.log(sessionDetailText(detail));
      });
    });

  program
    .command("logs")
    .description("show the persisted log of a session")
    .argument("<id>", "session id")
    .option("-n, --limit <n>", "number of log entries to display", (v: string) =>
      Number.parseInt(v, 10),
    )
    .option(
      "--level <level>",
      `minimum log level (${LOG_LEVELS.join(", ")})`,
    )
    .option("--absolute", "show times as absolute timestamps", false)
    .option("--json", "emit newline-delimited JSON", false)
    .action(
      (
        ref: string,
        opts: { limit?: number; level?: string; absolute: boolean; json: boolean },
        command: Command,
      ) => {
        const id = parseId(ref);
        const minLevel = parseLogLevelOption(opts.level);
        withStore(command, (store) => {
          if (!store.loadSession(id)) {
            console.error(`no sync session with id ${id}`);
            process.exitCode = 1;
            return;
          }
          const rows = fetchSessionLogs(store.db, id, {
            limit: clampPositive(opts.limit, DEFAULT_LOG_LINES),
            minLevel,
            order: "desc",
          }).reverse();
          if (!rows.length) {
            console.log("no logs");
            return;
          }
          for (const line of renderLogRows(rows, opts)) console.log(line);
        });
      },
    );
}
