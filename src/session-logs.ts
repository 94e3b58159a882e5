import type { Database } from "./db.js";
import {
  levelsAtOrAbove,
  type LogEntry,
  type LogLevel,
  type LogSink,
} from "./logger.js";

export interface SessionLogRow {
  id: number;
  sync_id: number;
  ts: number;
  level: LogLevel;
  scope: string | null;
  message: string;
  meta: Record<string, unknown> | null;
}

export interface SessionLogQuery {
  afterId?: number;
  limit?: number;
  minLevel?: LogLevel;
  order?: "asc" | "desc";
}

type RawLogRow = Omit<SessionLogRow, "meta"> & { meta: string | null };

function parseMeta(raw: string | null): Record<string, unknown> | null {
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed && typeof parsed === "object" && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : { value: parsed };
  } catch {
    return { raw };
  }
}

export class SessionLogStore {
  private readonly insertStmt;

  constructor(
    private readonly db: Database,
    private readonly sessionId: number,
  ) {
    this.insertStmt = this.db.prepare(
      `INSERT INTO sync_logs(sync_id, ts, level, scope, message, meta)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
  }

  append(entry: LogEntry): void {
    this.insertStmt.run(
      this.sessionId,
      entry.ts,
      entry.level,
      entry.scope ?? null,
      entry.message,
      entry.meta ? safeStringify(entry.meta) : null,
    );
  }
}

function safeStringify(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return JSON.stringify({ unserializable: true });
  }
}

/**
 * Sink for a logger created before the session row exists: entries are held
 * until attach() names the session, then written through.
 */
export class DeferredSessionSink {
  private store: SessionLogStore | null = null;
  private pending: LogEntry[] = [];

  readonly sink: LogSink = (entry) => {
    if (this.store) {
      this.store.append(entry);
    } else {
      this.pending.push(entry);
    }
  };

  attach(db: Database, sessionId: number): void {
    this.store = new SessionLogStore(db, sessionId);
    const backlog = this.pending;
    this.pending = [];
    for (const entry of backlog) this.store.append(entry);
  }

  detach(): void {
    this.store = null;
  }

  get pendingCount(): number {
    return this.pending.length;
  }
}

export function fetchSessionLogs(
  db: Database,
  sessionId: number,
  { afterId, limit = 200, minLevel, order = "asc" }: SessionLogQuery = {},
): SessionLogRow[] {
  const where = ["sync_id = ?"];
  const params: (string | number)[] = [sessionId];
  if (afterId != null) {
    where.push("id > ?");
    params.push(afterId);
  }
  if (minLevel) {
    const levels = levelsAtOrAbove(minLevel);
    where.push(`level IN (${levels.map(() => "?").join(",")})`);
    params.push(...levels);
  }
  params.push(limit);
  const rows = db
    .prepare<(string | number)[], RawLogRow>(
      `SELECT id, sync_id, ts, level, scope, message, meta
         FROM sync_logs
        WHERE ${where.join(" AND ")}
        ORDER BY id ${order === "desc" ? "DESC" : "ASC"}
        LIMIT ?`,
    )
    .all(...params);
  return rows.map((row) => ({ ...row, meta: parseMeta(row.meta) }));
}
