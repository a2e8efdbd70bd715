import type { Database } from "./db.js";
import {
  ConsoleLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
  StructuredLogger,
  isLogLevel,
  levelsAtOrAbove,
} from "./logger.js";
import { errorMessage } from "./util.js";

const DEFAULT_KEEP_MS = envNumber("LANECOPY_LOG_KEEP_MS", 7 * 24 * 60 * 60 * 1000);
const DEFAULT_KEEP_ROWS = envNumber("LANECOPY_LOG_KEEP_ROWS", 100_000);

function envNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export interface JobLogRow {
  id: number;
  job_id: string;
  ts: number;
  level: LogLevel;
  scope: string | null;
  message: string;
  meta: Record<string, unknown> | null;
}

export interface JobLogQuery {
  afterId?: number;
  sinceTs?: number;
  limit?: number;
  minLevel?: LogLevel;
  order?: "asc" | "desc";
  scope?: string;
}

export interface JobLogStoreOptions {
  keepMs?: number;
  keepRows?: number;
}

export class JobLogStore {
  private readonly insertStmt;
  private readonly pruneByTimeStmt;
  private readonly pruneByRowsStmt;
  private readonly keepMs: number;
  private readonly keepRows: number;

  constructor(
    private readonly db: Database,
    private readonly jobId: string,
    { keepMs, keepRows }: JobLogStoreOptions = {},
  ) {
    this.keepMs = keepMs ?? DEFAULT_KEEP_MS;
    this.keepRows = keepRows ?? DEFAULT_KEEP_ROWS;

    this.insertStmt = this.db.prepare<
      [string, number, string, string | null, string, string | null]
    >(
      `INSERT INTO job_logs(job_id, ts, level, scope, message, meta)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
    this.pruneByTimeStmt = this.db.prepare<[string, number]>(
      `DELETE FROM job_logs
        WHERE job_id = ?
          AND ts < ?`,
    );
    this.pruneByRowsStmt = this.db.prepare<[string, string, number]>(
      `DELETE FROM job_logs
        WHERE job_id = ?
          AND id < COALESCE((
            SELECT id FROM job_logs
             WHERE job_id = ?
             ORDER BY id DESC
             LIMIT 1 OFFSET ?
          ), -1)`,
    );
  }

  append(entry: LogEntry): void {
    const ts = entry.ts ?? Date.now();
    this.insertStmt.run(
      this.jobId,
      ts,
      entry.level,
      entry.scope ?? null,
      entry.message,
      entry.meta ? safeStringify(entry.meta) : null,
    );
    this.prune(ts);
  }

  private prune(now: number): void {
    if (this.keepMs > 0) {
      this.pruneByTimeStmt.run(this.jobId, now - this.keepMs);
    }
    if (this.keepRows > 0) {
      const offset = Math.max(0, this.keepRows - 1);
      this.pruneByRowsStmt.run(this.jobId, this.jobId, offset);
    }
  }
}

export interface JobLoggerOptions extends JobLogStoreOptions {
  scope?: string;
  echoLevel?: LogLevel;
}

/**
 * Logger whose entries land in the job's job_logs rows, optionally echoed to
 * stderr. A failing insert never breaks the run that is logging.
 */
export function createJobLogger(
  db: Database,
  jobId: string,
  options: JobLoggerOptions = {},
): Logger {
  const store = new JobLogStore(db, jobId, options);
  const sink = (entry: LogEntry) => {
    try {
      store.append(entry);
    } catch (err) {
      new ConsoleLogger("warn").warn("failed to persist job log entry", {
        error: errorMessage(err),
      });
    }
  };
  return new StructuredLogger({
    scope: options.scope,
    sink,
    echo: options.echoLevel ? { minLevel: options.echoLevel } : undefined,
  });
}

type RawLogRow = Omit<JobLogRow, "level" | "meta"> & {
  level: string;
  meta: string | null;
};

export function fetchJobLogs(
  db: Database,
  jobId: string,
  {
    afterId,
    sinceTs,
    limit = 200,
    minLevel,
    order = "asc",
    scope,
  }: JobLogQuery = {},
): JobLogRow[] {
  const where: string[] = ["job_id = ?"];
  const params: (string | number)[] = [jobId];
  if (typeof afterId === "number" && Number.isFinite(afterId)) {
    where.push("id > ?");
    params.push(afterId);
  }
  if (typeof sinceTs === "number" && Number.isFinite(sinceTs)) {
    where.push("ts >= ?");
    params.push(sinceTs);
  }
  if (minLevel) {
    const levels = levelsAtOrAbove(minLevel);
    where.push(`level IN (${levels.map(() => "?").join(",")})`);
    params.push(...levels);
  }
  if (scope) {
    where.push("scope = ?");
    params.push(scope);
  }
  params.push(Math.max(1, limit));

  const rows = db
    .prepare<(string | number)[], RawLogRow>(
      `SELECT id, job_id, ts, level, scope, message, meta
         FROM job_logs
        WHERE ${where.join(" AND ")}
        ORDER BY id ${order === "desc" ? "DESC" : "ASC"}
        LIMIT ?`,
    )
    .all(...params);
  return rows.map((row) => ({
    ...row,
    level: isLogLevel(row.level) ? row.level : "info",
    meta: parseMeta(row.meta),
  }));
}

function safeStringify(obj: Record<string, unknown>): string {
  try {
    return JSON.stringify(obj);
  } catch {
    return JSON.stringify({ __error: "failed to serialize meta" });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseMeta(meta: string | null): Record<string, unknown> | null {
  if (!meta) return null;
  try {
    const parsed: unknown = JSON.parse(meta);
    return isRecord(parsed) ? parsed : { value: parsed };
  } catch {
    return { __error: "failed to parse meta JSON" };
  }
}
