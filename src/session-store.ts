// src/session-store.ts
//
// Durable record of sync sessions, per-file transfer outcomes and errors.
// The engine only talks to the SessionStore interface; SqliteSessionStore is
// the better-sqlite3 implementation used by the CLI and the tests.

import { getDb, type Database } from "./db.js";
import { defaultHashAlg } from "./hash.js";

export const SESSION_STATUSES = [
  "RUNNING",
  "COMPLETED",
  "COMPLETED_WITH_ERRORS",
  "FAILED",
  "INTERRUPTED",
  "NO_FILES",
  "DRY_RUN_COMPLETED",
  "SUPERSEDED",
] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

export type TransferStatus = "COMPLETED" | "DRY_RUN" | "INTERRUPTED";

export interface SessionCounters {
  filesTransferred: number;
  duplicatesFound: number;
  duplicatesRenamed: number;
  errors: number;
  skipped: number;
  alreadyProcessed: number;
  totalBytes: number;
}

export interface SyncSessionRow {
  id: number;
  started_at: number;
  finished_at: number | null;
  source_path: string;
  dest_path: string;
  status: SessionStatus;
  resumed_from_id: number | null;
  simulated: number;
  hash_alg: string;
  files_transferred: number;
  duplicates_found: number;
  duplicates_renamed: number;
  errors_count: number;
  skipped_files: number;
  already_processed: number;
  total_size_bytes: number;
  duration_seconds: number | null;
}

export interface TransferInput {
  sourceFile: string;
  destFile: string;
  hash: string;
  size: number;
  isDuplicate: boolean;
  status: TransferStatus;
}

export interface TransferRow {
  id: number;
  sync_id: number;
  source_file: string;
  dest_file: string;
  file_hash: string;
  file_size: number;
  is_duplicate: number;
  status: TransferStatus;
  transferred_at: number;
}

export interface ErrorRow {
  id: number;
  sync_id: number;
  message: string;
  file_path: string | null;
  created_at: number;
}

export interface SessionDetail {
  session: SyncSessionRow;
  fileCount: number;
  totalBytes: number;
  errors: ErrorRow[];
}

export interface StartSessionOptions {
  resumedFrom?: number | null;
  simulated?: boolean;
  hashAlg?: string;
}

export interface SessionStore {
  startSession(source: string, dest: string, opts?: StartSessionOptions): number;
  updateSession(
    sessionId: number,
    counters: SessionCounters,
    durationSeconds: number,
    status: SessionStatus,
  ): void;
  logTransfer(sessionId: number, record: TransferInput): void;
  logError(sessionId: number, message: string, path?: string | null): void;
  findIncompleteSession(source: string, dest: string): number | undefined;
  markInterrupted(sessionId: number): void;
  processedFiles(sessionIds: readonly number[]): Set<string>;
  allProcessedFilesForPath(
    source: string,
    dest: string,
    excludeSessionId?: number | null,
    hashAlg?: string,
  ): Map<string, string>;
  remoteHashesForPath(source: string, dest: string, hashAlg?: string): Map<string, string>;
  recentSessions(limit?: number): SyncSessionRow[];
  loadSession(sessionId: number): SyncSessionRow | undefined;
  sessionDetail(sessionId: number): SessionDetail | undefined;
  transfers(sessionId: number): TransferRow[];
}

export class SqliteSessionStore implements SessionStore {
  constructor(
    readonly db: Database,
    private readonly clock: () => number = Date.now,
  ) {}

  static open(dbPath: string): SqliteSessionStore {
    return new SqliteSessionStore(getDb(dbPath));
  }

  close(): void {
    this.db.close();
  }

  /**
   * Open a RUNNING session. A real session closes every other RUNNING or
   * INTERRUPTED real session on the same pair as SUPERSEDED, so at most one
   * resumable session exists per (source, dest).
   */
  startSession(
    source: string,
    dest: string,
    { resumedFrom, simulated = false, hashAlg }: StartSessionOptions = {},
  ): number {
    const now = this.clock();
    let id = 0;
    const tx = this.db.transaction(() => {
      if (!simulated) {
        this.db
          .prepare(
            `UPDATE sync_sessions
                SET status = 'SUPERSEDED', finished_at = ?
              WHERE source_path = ? AND dest_path = ?
                AND simulated = 0
                AND status IN ('RUNNING', 'INTERRUPTED')`,
          )
          .run(now, source, dest);
      }
      const info = this.db
        .prepare(
          `INSERT INTO sync_sessions
             (started_at, source_path, dest_path, status, resumed_from_id, simulated, hash_alg)
           VALUES (?, ?, ?, 'RUNNING', ?, ?, ?)`,
        )
        .run(
          now,
          source,
          dest,
          resumedFrom ?? null,
          simulated ? 1 : 0,
          hashAlg ?? defaultHashAlg(),
        );
      id = Number(info.lastInsertRowid);
    });
    tx();
    return id;
  }

  updateSession(
    sessionId: number,
    counters: SessionCounters,
    durationSeconds: number,
    status: SessionStatus,
  ): void {
    this.db
      .prepare(
        `UPDATE sync_sessions SET
           files_transferred = ?,
           duplicates_found = ?,
           duplicates_renamed = ?,
           errors_count = ?,
           skipped_files = ?,
           already_processed = ?,
           total_size_bytes = ?,
           duration_seconds = ?,
           status = ?,
           finished_at = ?
         WHERE id = ?`,
      )
      .run(
        counters.filesTransferred,
        counters.duplicatesFound,
        counters.duplicatesRenamed,
        counters.errors,
        counters.skipped,
        counters.alreadyProcessed,
        counters.totalBytes,
        durationSeconds,
        status,
        this.clock(),
        sessionId,
      );
  }

  logTransfer(sessionId: number, record: TransferInput): void {
    this.db
      .prepare(
        `INSERT INTO transferred_files
           (sync_id, source_file, dest_file, file_hash, file_size, is_duplicate, status, transferred_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        sessionId,
        record.sourceFile,
        record.destFile,
        record.hash,
        record.size,
        record.isDuplicate ? 1 : 0,
        record.status,
        this.clock(),
      );
  }

  logError(sessionId: number, message: string, path?: string | null): void {
    this.db
      .prepare(
        `INSERT INTO sync_errors (sync_id, message, file_path, created_at)
         VALUES (?, ?, ?, ?)`,
      )
      .run(sessionId, message, path ?? null, this.clock());
  }

  findIncompleteSession(source: string, dest: string): number | undefined {
    const row = this.db
      .prepare<[string, string], { id: number }>(
        `SELECT id FROM sync_sessions
          WHERE source_path = ? AND dest_path = ?
            AND simulated = 0
            AND status IN ('RUNNING', 'INTERRUPTED')
          ORDER BY started_at DESC, id DESC
          LIMIT 1`,
      )
      .get(source, dest);
    return row?.id;
  }

  markInterrupted(sessionId: number): void {
    this.db
      .prepare(`UPDATE sync_sessions SET status = 'INTERRUPTED' WHERE id = ?`)
      .run(sessionId);
  }

  processedFiles(sessionIds: readonly number[]): Set<string> {
    if (!sessionIds.length) return new Set();
    const placeholders = sessionIds.map(() => "?").join(",");
    const rows = this.db
      .prepare<number[], { source_file: string }>(
        `SELECT DISTINCT source_file FROM transferred_files
          WHERE sync_id IN (${placeholders}) AND status = 'COMPLETED'`,
      )
      .all(...sessionIds);
    return new Set(rows.map((r) => r.source_file));
  }

  allProcessedFilesForPath(
    source: string,
    dest: string,
    excludeSessionId?: number | null,
    hashAlg?: string,
  ): Map<string, string> {
    const rows = this.db
      .prepare<
        [string, string, number, string | null, string | null],
        { source_file: string; file_hash: string }
      >(
        `SELECT tf.source_file, tf.file_hash
           FROM transferred_files tf
           JOIN sync_sessions ss ON tf.sync_id = ss.id
          WHERE ss.source_path = ? AND ss.dest_path = ?
            AND tf.status = 'COMPLETED'
            AND tf.sync_id != ?
            AND (? IS NULL OR ss.hash_alg = ?)
          ORDER BY tf.id ASC`,
      )
      .all(source, dest, excludeSessionId ?? -1, hashAlg ?? null, hashAlg ?? null);
    const out = new Map<string, string>();
    for (const r of rows) out.set(r.source_file, r.file_hash);
    return out;
  }

  /**
   * hash -> first destination path confirmed for it on this pair. Digests
   * of different algorithms never compare equal, so callers pass the
   * algorithm of the run they seed.
   */
  remoteHashesForPath(
    source: string,
    dest: string,
    hashAlg?: string,
  ): Map<string, string> {
    const rows = this.db
      .prepare<
        [string, string, string | null, string | null],
        { file_hash: string; dest_file: string }
      >(
        `SELECT tf.file_hash, tf.dest_file
           FROM transferred_files tf
           JOIN sync_sessions ss ON tf.sync_id = ss.id
          WHERE ss.source_path = ? AND ss.dest_path = ?
            AND tf.status = 'COMPLETED'
            AND (? IS NULL OR ss.hash_alg = ?)
          ORDER BY tf.id ASC`,
      )
      .all(source, dest, hashAlg ?? null, hashAlg ?? null);
    const out = new Map<string, string>();
    for (const r of rows) {
      if (!out.has(r.file_hash)) out.set(r.file_hash, r.dest_file);
    }
    return out;
  }

  recentSessions(limit = 10): SyncSessionRow[] {
    return this.db
      .prepare<[number], SyncSessionRow>(
        `SELECT * FROM sync_sessions ORDER BY started_at DESC, id DESC LIMIT ?`,
      )
      .all(limit);
  }

  loadSession(sessionId: number): SyncSessionRow | undefined {
    return this.db
      .prepare<[number], SyncSessionRow>(`SELECT * FROM sync_sessions WHERE id = ?`)
      .get(sessionId);
  }

  sessionDetail(sessionId: number): SessionDetail | undefined {
    const session = this.loadSession(sessionId);
    if (!session) return undefined;
    const stats = this.db
      .prepare<[number], { n: number; bytes: number | null }>(
        `SELECT COUNT(*) AS n, SUM(file_size) AS bytes
           FROM transferred_files
          WHERE sync_id = ? AND status = 'COMPLETED'`,
      )
      .get(sessionId);
    const errors = this.db
      .prepare<[number], ErrorRow>(
        `SELECT * FROM sync_errors WHERE sync_id = ? ORDER BY id ASC`,
      )
      .all(sessionId);
    return {
      session,
      fileCount: stats?.n ?? 0,
      totalBytes: stats?.bytes ?? 0,
      errors,
    };
  }

  transfers(sessionId: number): TransferRow[] {
    return this.db
      .prepare<[number], TransferRow>(
        `SELECT * FROM transferred_files WHERE sync_id = ? ORDER BY id ASC`,
      )
      .all(sessionId);
  }
}
