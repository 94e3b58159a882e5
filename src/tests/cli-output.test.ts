import { parseLogLevelOption, renderLogRows } from "../cli-log-output.js";
import { formatLogLine, StructuredLogger, type LogEntry } from "../logger.js";
import type { SessionLogRow } from "../session-logs.js";
import { fmtAgo, fmtDuplicates, fmtLocalPath, sessionsTable } from "../session-status.js";
import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK, exitCodeForStatus } from "../sync-cli.js";

describe("exitCodeForStatus", () => {
  test.each([
    ["COMPLETED", EXIT_OK],
    ["DRY_RUN_COMPLETED", EXIT_OK],
    ["NO_FILES", EXIT_OK],
    ["COMPLETED_WITH_ERRORS", EXIT_FAILURE],
    ["FAILED", EXIT_FAILURE],
    ["INTERRUPTED", EXIT_INTERRUPTED],
  ] as const)("%s -> %d", (status, code) => {
    expect(exitCodeForStatus(status)).toBe(code);
  });
});

describe("session status formatting", () => {
  test("relative times", () => {
    expect(fmtAgo(0, 90_000)).toBe("1 minute ago");
    expect(fmtAgo(1000, 1000)).toBe("now");
  });

  test("home directory is shortened", () => {
    expect(fmtLocalPath("/home/ana/Pictures", "/home/ana")).toBe("~/Pictures");
    expect(fmtLocalPath("/home/anabel", "/home/ana")).toBe("/home/anabel");
    expect(fmtLocalPath("/home/ana", "/home/ana")).toBe("~");
  });

  test("duplicates column", () => {
    expect(fmtDuplicates(0, 0)).toBe("0");
    expect(fmtDuplicates(3, 2)).toBe("3 (2 renamed)");
  });

  test("empty store", () => {
    expect(sessionsTable([])).toBe("no sync sessions recorded");
  });
});

describe("log rendering", () => {
  const row: SessionLogRow = {
    id: 7,
    sync_id: 1,
    ts: Date.UTC(2024, 0, 2, 3, 4, 5),
    level: "warn",
    scope: "sync.pipeline",
    message: "hash failed",
    meta: { path: "/p/a.jpg" },
  };

  test("text line with absolute time", () => {
    expect(renderLogRows([row], { json: false, absolute: true })).toEqual([
      '(2024-01-02T03:04:05.000Z) WARN [sync.pipeline] hash failed {"path":"/p/a.jpg"}',
    ]);
  });

  test("text line without scope or meta", () => {
    const bare = { ...row, scope: null, meta: null };
    expect(renderLogRows([bare], { json: false, absolute: false, now: row.ts + 2000 })).toEqual([
      "(2 seconds ago) WARN hash failed",
    ]);
  });

  test("json line", () => {
    const [line] = renderLogRows([row], { json: true, absolute: false });
    expect(JSON.parse(line)).toEqual({
      id: 7,
      ts: row.ts,
      level: "warn",
      scope: "sync.pipeline",
      message: "hash failed",
      meta: { path: "/p/a.jpg" },
    });
  });

  test("level option", () => {
    expect(parseLogLevelOption(undefined)).toBeUndefined();
    expect(parseLogLevelOption(" INFO ")).toBe("info");
    expect(() => parseLogLevelOption("loud")).toThrow("invalid level 'loud'");
  });
});

describe("StructuredLogger", () => {
  test("child scopes nest and entries below minLevel are dropped", () => {
    const entries: LogEntry[] = [];
    const echoed: string[] = [];
    const logger = new StructuredLogger({
      sink: (e) => entries.push(e),
      echo: { minLevel: "warn", writer: (e) => echoed.push(formatLogLine(e)) },
      clock: () => 42,
      minLevel: "info",
    });
    const child = logger.child("sync").child("pipeline");
    child.debug("hidden");
    child.info("hashing", { path: "/p/a.jpg" });
    child.warn("slow");

    expect(entries).toEqual([
      { ts: 42, level: "info", scope: "sync.pipeline", message: "hashing", meta: { path: "/p/a.jpg" } },
      { ts: 42, level: "warn", scope: "sync.pipeline", message: "slow", meta: undefined },
    ]);
    expect(echoed).toEqual(["WARN  [sync.pipeline] slow"]);
  });
});
