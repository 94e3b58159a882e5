// src/report.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { CLI_NAME, REPORT_ERROR_TAIL } from "./constants.js";
import type { SessionCounters, SessionStatus } from "./session-store.js";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

export function formatSize(bytes: number): string {
  if (bytes === 0) return "0 B";
  let n = bytes;
  for (const unit of SIZE_UNITS) {
    if (n < 1024) return `${n.toFixed(2)} ${unit}`;
    n /= 1024;
  }
  return `${n.toFixed(2)} PB`;
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  if (seconds < 3600) return `${(seconds / 60).toFixed(1)}m`;
  return `${(seconds / 3600).toFixed(1)}h`;
}

/** Counters and error messages accumulated over one run. */
export class SyncReport {
  filesTransferred = 0;
  duplicatesFound = 0;
  duplicatesRenamed = 0;
  skipped = 0;
  alreadyProcessed = 0;
  totalBytes = 0;
  readonly errors: string[] = [];

  addTransferred(size: number): void {
    this.filesTransferred++;
    this.totalBytes += size;
  }

  addDuplicate(renamed: boolean): void {
    this.duplicatesFound++;
    if (renamed) this.duplicatesRenamed++;
  }

  addAlreadyProcessed(): void {
    this.alreadyProcessed++;
  }

  addSkipped(): void {
    this.skipped++;
  }

  addError(message: string): void {
    this.errors.push(message);
  }

  get errorCount(): number {
    return this.errors.length;
  }

  toCounters(): SessionCounters {
    return {
      filesTransferred: this.filesTransferred,
      duplicatesFound: this.duplicatesFound,
      duplicatesRenamed: this.duplicatesRenamed,
      errors: this.errors.length,
      skipped: this.skipped,
      alreadyProcessed: this.alreadyProcessed,
      totalBytes: this.totalBytes,
    };
  }

  summaryRows(simulated = false): [string, string][] {
    return [
      [simulated ? "Would transfer" : "Transferred", String(this.filesTransferred)],
      ["Duplicates found", String(this.duplicatesFound)],
      [simulated ? "Would rename" : "Duplicates renamed", String(this.duplicatesRenamed)],
      ["Already processed", String(this.alreadyProcessed)],
      ["Skipped (errors)", String(this.skipped)],
      [simulated ? "Would send" : "Total size", formatSize(this.totalBytes)],
    ];
  }
}

export interface RenderReportOptions {
  status: SessionStatus;
  sessionId?: number;
  resumedFromId?: number | null;
  durationSeconds: number;
  simulated?: boolean;
}

/**
 * Final text report: summary table, the last few error messages and a
 * pointer to the full list in the store.
 */
export function renderReport(
  report: SyncReport,
  {
    status,
    sessionId,
    resumedFromId,
    durationSeconds,
    simulated = false,
  }: RenderReportOptions,
): string {
  const title = simulated ? "Dry Run Report" : "Sync Report";
  const table = new AsciiTable3(title)
    .setHeading("Field", "Value")
    .setStyle("unicode-round");
  table.setAlign(0, AlignmentEnum.LEFT);
  table.setAlign(1, AlignmentEnum.RIGHT);
  table.addRow("Status", status);
  if (sessionId != null) table.addRow("Session", String(sessionId));
  if (resumedFromId != null) table.addRow("Resumed from", String(resumedFromId));
  table.addRow("Duration", formatDuration(durationSeconds));
  for (const [k, v] of report.summaryRows(simulated)) table.addRow(k, v);

  const lines = [table.toString().trimEnd()];
  lines.push(...errorTail(report.errors, sessionId));
  if (simulated) {
    lines.push("Dry run: nothing was copied. Run again without --dry-run to transfer.");
  }
  return lines.join("\n");
}

export function errorTail(errors: readonly string[], sessionId?: number): string[] {
  if (!errors.length) return [];
  const out = [`Errors (${errors.length}):`];
  for (const e of errors.slice(-REPORT_ERROR_TAIL)) out.push(`  - ${e}`);
  const hidden = errors.length - REPORT_ERROR_TAIL;
  if (hidden > 0) {
    const where =
      sessionId != null ? `see \`${CLI_NAME} show ${sessionId}\`` : "see the session store";
    out.push(`  ... and ${hidden} more (${where})`);
  }
  return out;
}
