import { fmtAgo } from "./session-status.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import type { SessionLogRow } from "./session-logs.js";

export function parseLogLevelOption(raw?: string): LogLevel | undefined {
  if (!raw) return undefined;
  const lvl = raw.trim().toLowerCase();
  const match = LOG_LEVELS.find((l) => l === lvl);
  if (!match) {
    throw new Error(
      `invalid level '${raw}', expected one of ${LOG_LEVELS.join(", ")}`,
    );
  }
  return match;
}

export function renderLogRows(
  rows: readonly SessionLogRow[],
  { json, absolute, now = Date.now() }: { json: boolean; absolute: boolean; now?: number },
): string[] {
  return rows.map((row) => {
    if (json) {
      return JSON.stringify({
        id: row.id,
        ts: row.ts,
        level: row.level,
        scope: row.scope,
        message: row.message,
        meta: row.meta ?? null,
      });
    }
    const scope = row.scope ? ` [${row.scope}]` : "";
    const meta =
      row.meta && Object.keys(row.meta).length
        ? ` ${JSON.stringify(row.meta)}`
        : "";
    const when = absolute ? new Date(row.ts).toISOString() : fmtAgo(row.ts, now);
    return `(${when}) ${row.level.toUpperCase()}${scope} ${row.message}${meta}`;
  });
}
