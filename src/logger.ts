// src/logger.ts
//
// Logging surface of the sync engine. The engine only ever receives a
// Logger; the CLI decides where entries end up (stderr, the session's
// sync_logs rows, or nowhere).

import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function levelAtOrAbove(threshold: LogLevel, level: LogLevel): boolean {
  return RANK[level] >= RANK[threshold];
}

export function levelsAtOrAbove(threshold: LogLevel): LogLevel[] {
  return LOG_LEVELS.filter((lvl) => levelAtOrAbove(threshold, lvl));
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  const wanted = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((lvl) => lvl === wanted) ?? fallback;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: LogMeta;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  child(scope: string): Logger;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/** `WARN  [sync.pipeline] message {"path":"..."}` */
export function formatLogLine({ level, scope, message, meta }: LogEntry): string {
  const head = `${level.toUpperCase().padEnd(5)} ${scope ? `[${scope}] ` : ""}${message}`;
  if (!meta) return head;
  let detail: string;
  try {
    detail = JSON.stringify(meta);
  } catch {
    detail = inspect(meta, { depth: 3, breakLength: Infinity });
  }
  return `${head} ${detail}`;
}

// MEDIASYNC_DISABLE_LOG_ECHO=1 keeps entries out of stderr (they still reach the sink)
function echoDisabled(): boolean {
  const raw = process.env.MEDIASYNC_DISABLE_LOG_ECHO?.trim().toLowerCase();
  return !!raw && raw !== "0" && raw !== "false";
}

function writeStderr(entry: LogEntry): void {
  if (!echoDisabled()) console.error(formatLogLine(entry));
}

export interface StructuredLoggerOptions {
  scope?: string;
  sink?: LogSink;
  /** Entries at or above echo.minLevel are also written out (stderr by default). */
  echo?: { minLevel: LogLevel; writer?: LogSink };
  /** Entries below this level are dropped entirely. */
  minLevel?: LogLevel;
  clock?: () => number;
}

/** State every logger derived from one root shares. */
export interface LoggerCore {
  sink?: LogSink;
  echoLevel?: LogLevel;
  echoWriter: LogSink;
  minLevel: LogLevel;
  clock: () => number;
}

export class StructuredLogger implements Logger {
  private readonly core: LoggerCore;
  private readonly scope?: string;

  constructor(opts: StructuredLoggerOptions = {}, core?: LoggerCore) {
    this.scope = opts.scope;
    this.core = core ?? {
      sink: opts.sink,
      echoLevel: opts.echo?.minLevel,
      echoWriter: opts.echo?.writer ?? writeStderr,
      minLevel: opts.minLevel ?? "debug",
      clock: opts.clock ?? Date.now,
    };
  }

  child(scope: string): Logger {
    return new StructuredLogger(
      { scope: this.scope ? `${this.scope}.${scope}` : scope },
      this.core,
    );
  }

  debug(message: string, meta?: LogMeta): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.emit("error", message, meta);
  }

  private emit(level: LogLevel, message: string, meta?: LogMeta): void {
    const { sink, echoLevel, echoWriter, minLevel, clock } = this.core;
    if (!levelAtOrAbove(minLevel, level)) return;
    const entry: LogEntry = { ts: clock(), level, scope: this.scope, message };
    if (meta && Object.keys(meta).length) entry.meta = meta;
    sink?.(entry);
    if (echoLevel && levelAtOrAbove(echoLevel, level)) echoWriter(entry);
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
