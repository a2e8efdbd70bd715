import type { JobLogRow } from "./job-logs.js";
import { fmtAgo } from "./job-status.js";
import { LOG_LEVELS, type LogLevel, isLogLevel } from "./logger.js";
import { ConfigError } from "./errors.js";

export function parseLogLevelOption(raw?: string): LogLevel | undefined {
  if (!raw) return undefined;
  const lvl = raw.toLowerCase();
  if (!isLogLevel(lvl)) {
    throw new ConfigError(
      `invalid level '${raw}', expected one of ${LOG_LEVELS.join(", ")}`,
      "invalid_option",
      { value: raw },
    );
  }
  return lvl;
}

export function formatLogRow(
  row: JobLogRow,
  { json, absolute }: { json: boolean; absolute: boolean },
  now = Date.now(),
): string {
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
}

export function renderLogRows(
  rows: JobLogRow[],
  opts: { json: boolean; absolute: boolean },
) {
  for (const row of rows) {
    console.log(formatLogRow(row, opts));
  }
}
