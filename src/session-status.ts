// src/session-status.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { CLI_NAME } from "./constants.js";
import { formatDuration, formatSize } from "./report.js";
import type { SessionDetail, SyncSessionRow } from "./session-store.js";

const rtf = new Intl.RelativeTimeFormat("en", { numeric: "auto" });

export function fmtAgo(
  input: Date | number | string,
  now = Date.now(),
): string {
  const t = typeof input === "number" ? input : new Date(input).getTime();
  const diff = t - now; // negative for past, positive for future
  const units: [Intl.RelativeTimeFormatUnit, number][] = [
    ["year", 365 * 24 * 60 * 60 * 1000],
    ["month", 30 * 24 * 60 * 60 * 1000],
    ["week", 7 * 24 * 60 * 60 * 1000],
    ["day", 24 * 60 * 60 * 1000],
    ["hour", 60 * 60 * 1000],
    ["minute", 60 * 1000],
    ["second", 1000],
  ];

  for (const [unit, ms] of units) {
    const val = Math.trunc(diff / ms);
    if (Math.abs(val) >= 1) return rtf.format(val, unit);
  }
  return rtf.format(0, "second"); // "now"
}

export function fmtLocalPath(path: string, home = process.env.HOME): string {
  if (!home) return path;
  if (path === home || path.startsWith(`${home}/`)) {
    return `~${path.slice(home.length)}`;
  }
  return path;
}

function fmtSeconds(s: number | null): string {
  return s == null ? "-" : formatDuration(s);
}

/** "3 (2 renamed)" style duplicate summary. */
export function fmtDuplicates(found: number, renamed: number): string {
  return renamed ? `${found} (${renamed} renamed)` : String(found);
}

export function sessionsTable(rows: readonly SyncSessionRow[], now = Date.now()): string {
  if (!rows.length) return "no sync sessions recorded";
  const headings = [
    "ID",
    "Started",
    "Status",
    "Source -> Dest",
    "Sent",
    "Dups",
    "Skip",
    "Errors",
    "Size",
    "Took",
  ];
  const table = new AsciiTable3("Sync Sessions")
    .setHeading(...headings)
    .setStyle("unicode-round");
  headings.forEach((_, idx) => table.setAlign(idx, AlignmentEnum.LEFT));

  for (const r of rows) {
    const status = r.simulated ? `${r.status} (dry)` : r.status;
    const resumed = r.resumed_from_id != null ? ` <- ${r.resumed_from_id}` : "";
    table.addRow(
      `${r.id}${resumed}`,
      fmtAgo(r.started_at, now),
      status,
      `${fmtLocalPath(r.source_path)} -> ${r.dest_path}`,
      String(r.files_transferred),
      fmtDuplicates(r.duplicates_found, r.duplicates_renamed),
      String(r.already_processed),
      String(r.errors_count),
      formatSize(r.total_size_bytes),
      fmtSeconds(r.duration_seconds),
    );
  }
  return table.toString();
}

/** Field/value view of one session, with every recorded error below it. */
export function sessionDetailText(detail: SessionDetail, now = Date.now()): string {
  const s = detail.session;
  const table = new AsciiTable3(`Session ${s.id}`)
    .setHeading("Field", "Value")
    .setStyle("unicode-round");
  table.setAlign(0, AlignmentEnum.LEFT);
  table.setAlign(1, AlignmentEnum.LEFT);
  const add = (k: string, v: string | number | null | undefined) => {
    table.addRow(k, v == null || v === "" ? "-" : String(v));
  };

  add("status", s.status);
  add("mode", s.simulated ? "dry run" : "sync");
  add("source", fmtLocalPath(s.source_path));
  add("destination", s.dest_path);
  add("started", `${new Date(s.started_at).toISOString()} (${fmtAgo(s.started_at, now)})`);
  add("finished", s.finished_at != null ? new Date(s.finished_at).toISOString() : null);
  add("duration", fmtSeconds(s.duration_seconds));
  add("resumed from", s.resumed_from_id);
  add("hash", s.hash_alg);
  add("transferred", s.files_transferred);
  add("duplicates", fmtDuplicates(s.duplicates_found, s.duplicates_renamed));
  add("already processed", s.already_processed);
  add("skipped", s.skipped_files);
  add("errors", s.errors_count);
  add("size", formatSize(s.total_size_bytes));
  add("files recorded", `${detail.fileCount} (${formatSize(detail.totalBytes)})`);

  const out = [table.toString().trimEnd()];
  if (detail.errors.length) {
    out.push(`Errors (${detail.errors.length}):`);
    for (const e of detail.errors) {
      out.push(`  - ${e.message}${e.file_path ? `: ${e.file_path}` : ""}`);
    }
  }
  out.push(`Logs: ${CLI_NAME} logs ${s.id}`);
  return out.join("\n");
}
