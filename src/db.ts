import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import BetterSqlite3 from "better-sqlite3";

export type Database = BetterSqlite3.Database;

const PRAGMAS = [
  "busy_timeout = 5000",
  "journal_mode = WAL",
  "synchronous = NORMAL",
  "foreign_keys = ON",
];

export function getDb(dbPath: string): Database {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new BetterSqlite3(dbPath);
  for (const pragma of PRAGMAS) {
    db.pragma(pragma);
  }

  db.exec(`
  CREATE TABLE IF NOT EXISTS sync_sessions (
    id                 INTEGER PRIMARY KEY AUTOINCREMENT,
    started_at         INTEGER NOT NULL,   -- ms epoch
    finished_at        INTEGER,
    source_path        TEXT NOT NULL,
    dest_path          TEXT NOT NULL,
    status             TEXT NOT NULL,
    resumed_from_id    INTEGER,
    simulated          INTEGER NOT NULL DEFAULT 0,
    hash_alg           TEXT NOT NULL DEFAULT 'md5',
    files_transferred  INTEGER NOT NULL DEFAULT 0,
    duplicates_found   INTEGER NOT NULL DEFAULT 0,
    duplicates_renamed INTEGER NOT NULL DEFAULT 0,
    errors_count       INTEGER NOT NULL DEFAULT 0,
    skipped_files      INTEGER NOT NULL DEFAULT 0,
    already_processed  INTEGER NOT NULL DEFAULT 0,
    total_size_bytes   INTEGER NOT NULL DEFAULT 0,
    duration_seconds   REAL
  );
  CREATE INDEX IF NOT EXISTS sync_sessions_pair_idx
    ON sync_sessions(source_path, dest_path, status);
`);

  db.exec(`
  CREATE TABLE IF NOT EXISTS transferred_files (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    sync_id        INTEGER NOT NULL,
    source_file    TEXT NOT NULL,
    dest_file      TEXT NOT NULL,
    file_hash      TEXT NOT NULL,
    file_size      INTEGER NOT NULL DEFAULT 0,
    is_duplicate   INTEGER NOT NULL DEFAULT 0,
    status         TEXT NOT NULL,      -- COMPLETED | DRY_RUN | INTERRUPTED
    transferred_at INTEGER NOT NULL,
    FOREIGN KEY(sync_id) REFERENCES sync_sessions(id)
  );
  CREATE INDEX IF NOT EXISTS transferred_files_sync_idx
    ON transferred_files(sync_id, status);
`);

  db.exec(`
  CREATE TABLE IF NOT EXISTS sync_errors (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    sync_id    INTEGER NOT NULL,
    message    TEXT NOT NULL,
    file_path  TEXT,
    created_at INTEGER NOT NULL,
    FOREIGN KEY(sync_id) REFERENCES sync_sessions(id)
  );
  CREATE INDEX IF NOT EXISTS sync_errors_sync_idx ON sync_errors(sync_id, id);
`);

  db.exec(`
  CREATE TABLE IF NOT EXISTS sync_logs (
    id       INTEGER PRIMARY KEY,
    sync_id  INTEGER NOT NULL,
    ts       INTEGER NOT NULL,
    level    TEXT NOT NULL,
    scope    TEXT,
    message  TEXT NOT NULL,
    meta     TEXT,
    FOREIGN KEY(sync_id) REFERENCES sync_sessions(id)
  );
  CREATE INDEX IF NOT EXISTS sync_logs_sync_idx ON sync_logs(sync_id, id);
`);

  return db;
}
