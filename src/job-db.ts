// job-db.ts
//
// Durable job records. One jobs.db holds every job, its per-phase worker
// assignments, item errors, queued control commands and log lines. Only the
// controller that owns a run writes to a job's row while it is active; other
// processes read, or enqueue commands.

import { randomUUID } from "node:crypto";
import type { WorkerAssignment } from "./batcher.js";
import { type Database, ensureColumn, openDatabase } from "./db.js";
import { LanecopyError } from "./errors.js";
import { type FilenameIssue, isFilenameIssueType } from "./filename-issues.js";
import {
  deserializeExcludePatterns,
  serializeExcludePatterns,
} from "./ignore.js";
import {
  type Direction,
  type JobState,
  type Phase,
  isDirection,
  isJobState,
} from "./job-state.js";
import type { Item } from "./scan.js";

// Types

export interface JobRow {
  id: string;
  name: string;
  created_at: number;
  updated_at: number;
  source_path: string;
  dest_path: string;
  direction: string;
  parallelism: number;
  exclude_patterns: string | null;
  rsync_options: string | null;
  state: string;
  phase: string | null;
  started_at: number | null;
  finished_at: number | null;
  failure_code: string | null;
  failure_message: string | null;
  owner_pid: number | null;
  last_heartbeat: number | null;
  total_files: number;
  files_done: number;
  total_bytes: number;
  bytes_done: number;
  run_count: number;
  last_run_ms: number | null;
  total_files_copied: number;
  total_bytes_copied: number;
}

export interface JobCreateInput {
  name: string;
  sourcePath: string;
  destPath: string;
  direction: Direction;
  parallelism: number;
  excludePatterns: string[];
  // null runs with the configured default options
  rsyncOptions: string[] | null;
}

// Column-level patch; values are written as given.
export interface JobPatch {
  name?: string;
  source_path?: string;
  dest_path?: string;
  direction?: Direction;
  parallelism?: number;
  exclude_patterns?: string | null;
  rsync_options?: string | null;
  state?: JobState;
  phase?: Phase | null;
  started_at?: number | null;
  finished_at?: number | null;
  failure_code?: string | null;
  failure_message?: string | null;
  owner_pid?: number | null;
  last_heartbeat?: number | null;
  total_files?: number;
  files_done?: number;
  total_bytes?: number;
  bytes_done?: number;
  run_count?: number;
  last_run_ms?: number | null;
  total_files_copied?: number;
  total_bytes_copied?: number;
}

const PATCH_COLUMNS = [
  "name",
  "source_path",
  "dest_path",
  "direction",
  "parallelism",
  "exclude_patterns",
  "rsync_options",
  "state",
  "phase",
  "started_at",
  "finished_at",
  "failure_code",
  "failure_message",
  "owner_pid",
  "last_heartbeat",
  "total_files",
  "files_done",
  "total_bytes",
  "bytes_done",
  "run_count",
  "last_run_ms",
  "total_files_copied",
  "total_bytes_copied",
] as const satisfies readonly (keyof JobPatch)[];

export interface PhaseAssignment extends WorkerAssignment {
  phase: Phase;
}

export interface JobErrorEntry {
  phase: Phase;
  workerIndex: number;
  item: string;
  message: string;
  exitCode: number | null;
  at: number;
}

export interface Job {
  id: string;
  name: string;
  sourcePath: string;
  destPath: string;
  direction: Direction;
  parallelism: number;
  excludePatterns: string[];
  rsyncOptions: string[] | null;
  state: JobState;
  phase: Phase | null;
  createdAt: number;
  updatedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  failure: { code: string; message: string } | null;
  ownerPid: number | null;
  lastHeartbeat: number | null;
  totalFiles: number;
  filesDone: number;
  totalBytes: number;
  bytesDone: number;
  runCount: number;
  lastRunMs: number | null;
  totalFilesCopied: number;
  totalBytesCopied: number;
  workerAssignments: PhaseAssignment[];
  errors: JobErrorEntry[];
}

export type JobSummary = Omit<Job, "workerAssignments" | "errors"> & {
  errorCount: number;
};

export type IssueStatus = "pending" | "renamed" | "skipped" | "failed";
export const ISSUE_STATUSES: readonly IssueStatus[] = [
  "pending",
  "renamed",
  "skipped",
  "failed",
];

export interface JobIssue extends FilenameIssue {
  id: number;
  phase: Phase;
  status: IssueStatus;
  // outcome of the last rename attempt
  message: string | null;
  foundAt: number;
  resolvedAt: number | null;
}

export type JobCommand = "pause" | "resume" | "cancel";
const JOB_COMMANDS: readonly JobCommand[] = ["pause", "resume", "cancel"];

export interface QueuedCommand {
  id: number;
  cmd: JobCommand;
  ts: number;
}

type AssignmentRow = {
  phase: string;
  worker_index: number;
  items: string;
  load_bytes: number;
};

type ErrorRow = {
  phase: string;
  worker_index: number;
  item: string;
  message: string;
  exit_code: number | null;
  ts: number;
};

type IssueRow = {
  id: number;
  phase: string;
  path: string;
  name: string;
  is_dir: number;
  issue_type: string;
  issue_char: string | null;
  suggested_name: string | null;
  status: string;
  message: string | null;
  ts: number;
  resolved_at: number | null;
};

type SqlValue = string | number | null;

// DB init

export function ensureJobDb(jobDbPath: string): Database {
  const db = openDatabase(jobDbPath);
  db.exec(`
    CREATE TABLE IF NOT EXISTS jobs(
      id                 TEXT PRIMARY KEY,
      name               TEXT NOT NULL UNIQUE,
      created_at         INTEGER NOT NULL,
      updated_at         INTEGER NOT NULL,
      source_path        TEXT NOT NULL,
      dest_path          TEXT NOT NULL,
      direction          TEXT NOT NULL CHECK (direction IN ('push','pull','bidirectional')),
      parallelism        INTEGER NOT NULL,
      exclude_patterns   TEXT,  -- JSON.stringify(string[])
      state              TEXT NOT NULL DEFAULT 'created',
      phase              TEXT,
      started_at         INTEGER,
      finished_at        INTEGER,
      failure_code       TEXT,
      failure_message    TEXT,
      owner_pid          INTEGER,
      last_heartbeat     INTEGER,
      total_files        INTEGER NOT NULL DEFAULT 0,
      files_done         INTEGER NOT NULL DEFAULT 0,
      total_bytes        INTEGER NOT NULL DEFAULT 0,
      bytes_done         INTEGER NOT NULL DEFAULT 0
    );
    CREATE INDEX IF NOT EXISTS idx_jobs_state ON jobs(state);

    CREATE TABLE IF NOT EXISTS job_assignments(
      job_id        TEXT NOT NULL,
      phase         TEXT NOT NULL,
      worker_index  INTEGER NOT NULL,
      items         TEXT NOT NULL,  -- JSON Item[] in execution order
      load_bytes    INTEGER NOT NULL,
      PRIMARY KEY(job_id, phase, worker_index),
      FOREIGN KEY(job_id) REFERENCES jobs(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS job_errors(
      id            INTEGER PRIMARY KEY,
      job_id        TEXT NOT NULL,
      phase         TEXT NOT NULL,
      worker_index  INTEGER NOT NULL,
      item          TEXT NOT NULL,
      message       TEXT NOT NULL,
      exit_code     INTEGER,
      ts            INTEGER NOT NULL,
      FOREIGN KEY(job_id) REFERENCES jobs(id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_job_errors_job ON job_errors(job_id, id);

    -- pause/resume/cancel issued by a process that does not own the run
    CREATE TABLE IF NOT EXISTS job_commands(
      id        INTEGER PRIMARY KEY,
      job_id    TEXT NOT NULL,
      ts        INTEGER NOT NULL,
      cmd       TEXT NOT NULL,
      acked     INTEGER NOT NULL DEFAULT 0,
      acked_at  INTEGER,
      FOREIGN KEY(job_id) REFERENCES jobs(id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_job_commands_pending
      ON job_commands(job_id, acked, ts);

    CREATE TABLE IF NOT EXISTS job_logs(
      id        INTEGER PRIMARY KEY,
      job_id    TEXT NOT NULL,
      ts        INTEGER NOT NULL,
      level     TEXT NOT NULL,
      scope     TEXT,
      message   TEXT NOT NULL,
      meta      TEXT,
      FOREIGN KEY(job_id) REFERENCES jobs(id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_job_logs_job_id ON job_logs(job_id, id);

    -- names found by the last scan that the destination may reject
    CREATE TABLE IF NOT EXISTS job_issues(
      id              INTEGER PRIMARY KEY,
      job_id          TEXT NOT NULL,
      phase           TEXT NOT NULL,
      path            TEXT NOT NULL,  -- relative to the phase's source root
      name            TEXT NOT NULL,
      is_dir          INTEGER NOT NULL,
      issue_type      TEXT NOT NULL,
      issue_char      TEXT,
      suggested_name  TEXT,
      status          TEXT NOT NULL DEFAULT 'pending',
      message         TEXT,
      ts              INTEGER NOT NULL,
      resolved_at     INTEGER,
      FOREIGN KEY(job_id) REFERENCES jobs(id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_job_issues_job ON job_issues(job_id, id);
  `);

  // run statistics arrived after the first schema
  ensureColumn(db, "jobs", "run_count", "INTEGER NOT NULL DEFAULT 0");
  ensureColumn(db, "jobs", "last_run_ms", "INTEGER");
  ensureColumn(db, "jobs", "total_files_copied", "INTEGER NOT NULL DEFAULT 0");
  ensureColumn(db, "jobs", "total_bytes_copied", "INTEGER NOT NULL DEFAULT 0");
  // JSON.stringify(string[]); NULL uses LANECOPY_RSYNC_OPTIONS
  ensureColumn(db, "jobs", "rsync_options", "TEXT");

  return db;
}

// Row mapping

function corrupt(id: string, column: string, value: unknown): LanecopyError {
  return new LanecopyError(
    `job ${id} has an unreadable ${column} (${String(value)})`,
    "corrupt_record",
    { id, column },
  );
}

function parsePhase(id: string, value: string): Phase {
  if (value === "push" || value === "pull") return value;
  throw corrupt(id, "phase", value);
}

function isItem(value: unknown): value is Item {
  if (!value || typeof value !== "object") return false;
  return (
    "relativePath" in value &&
    typeof value.relativePath === "string" &&
    "sizeBytes" in value &&
    typeof value.sizeBytes === "number" &&
    "isDirectory" in value &&
    typeof value.isDirectory === "boolean" &&
    "fileCount" in value &&
    typeof value.fileCount === "number"
  );
}

function parseItems(id: string, raw: string): Item[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw corrupt(id, "items", raw.slice(0, 40));
  }
  if (!Array.isArray(parsed) || !parsed.every(isItem)) {
    throw corrupt(id, "items", raw.slice(0, 40));
  }
  return parsed;
}

export function serializeRsyncOptions(options: readonly string[] | null): string | null {
  return options === null ? null : JSON.stringify(options);
}

function parseRsyncOptions(id: string, raw: string | null): string[] | null {
  if (raw === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw corrupt(id, "rsync_options", raw.slice(0, 40));
  }
  if (!Array.isArray(parsed) || !parsed.every((a): a is string => typeof a === "string")) {
    throw corrupt(id, "rsync_options", raw.slice(0, 40));
  }
  return parsed;
}

function issueFromRow(jobId: string, row: IssueRow): JobIssue {
  if (!isFilenameIssueType(row.issue_type)) {
    throw corrupt(jobId, "issue_type", row.issue_type);
  }
  const status = ISSUE_STATUSES.find((s) => s === row.status);
  if (!status) throw corrupt(jobId, "issue status", row.status);
  return {
    id: row.id,
    phase: parsePhase(jobId, row.phase),
    relativePath: row.path,
    name: row.name,
    isDirectory: row.is_dir === 1,
    type: row.issue_type,
    char: row.issue_char,
    suggestedName: row.suggested_name,
    status,
    message: row.message,
    foundAt: row.ts,
    resolvedAt: row.resolved_at,
  };
}

export function summaryFromRow(row: JobRow, errorCount = 0): JobSummary {
  if (!isJobState(row.state)) throw corrupt(row.id, "state", row.state);
  if (!isDirection(row.direction)) {
    throw corrupt(row.id, "direction", row.direction);
  }
  return {
    id: row.id,
    name: row.name,
    sourcePath: row.source_path,
    destPath: row.dest_path,
    direction: row.direction,
    parallelism: row.parallelism,
    excludePatterns: deserializeExcludePatterns(row.exclude_patterns),
    rsyncOptions: parseRsyncOptions(row.id, row.rsync_options),
    state: row.state,
    phase: row.phase === null ? null : parsePhase(row.id, row.phase),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    failure:
      row.failure_code === null
        ? null
        : { code: row.failure_code, message: row.failure_message ?? "" },
    ownerPid: row.owner_pid,
    lastHeartbeat: row.last_heartbeat,
    totalFiles: row.total_files,
    filesDone: row.files_done,
    totalBytes: row.total_bytes,
    bytesDone: row.bytes_done,
    runCount: row.run_count,
    lastRunMs: row.last_run_ms,
    totalFilesCopied: row.total_files_copied,
    totalBytesCopied: row.total_bytes_copied,
    errorCount,
  };
}

function isUuid(ref: string): boolean {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(
    ref,
  );
}

// Store

export class JobStore {
  private readonly getStmt;
  private readonly byNameStmt;
  private readonly byPrefixStmt;
  private readonly errorCountStmt;
  private readonly insertErrorStmt;

  constructor(readonly db: Database) {
    this.getStmt = db.prepare<[string], JobRow>(
      `SELECT * FROM jobs WHERE id = ?`,
    );
    this.byNameStmt = db.prepare<[string], JobRow>(
      `SELECT * FROM jobs WHERE name = ?`,
    );
    this.byPrefixStmt = db.prepare<[string], JobRow>(
      `SELECT * FROM jobs WHERE id LIKE ? || '%' LIMIT 2`,
    );
    this.errorCountStmt = db.prepare<[string], { n: number }>(
      `SELECT COUNT(*) AS n FROM job_errors WHERE job_id = ?`,
    );
    this.insertErrorStmt = db.prepare<
      [string, string, number, string, string, number | null, number]
    >(
      `INSERT INTO job_errors(job_id, phase, worker_index, item, message, exit_code, ts)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );
  }

  static open(jobDbPath: string): JobStore {
    return new JobStore(ensureJobDb(jobDbPath));
  }

  close(): void {
    this.db.close();
  }

  insertJob(input: JobCreateInput): string {
    const id = randomUUID();
    const now = Date.now();
    this.db
      .prepare<
        [string, string, number, number, string, string, string, number, string, string | null]
      >(
        `INSERT INTO jobs(
           id, name, created_at, updated_at,
           source_path, dest_path, direction, parallelism, exclude_patterns,
           rsync_options
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        input.name,
        now,
        now,
        input.sourcePath,
        input.destPath,
        input.direction,
        input.parallelism,
        serializeExcludePatterns(input.excludePatterns),
        serializeRsyncOptions(input.rsyncOptions),
      );
    return id;
  }

  getRow(id: string): JobRow | undefined {
    return this.getStmt.get(id);
  }

  getRowByName(name: string): JobRow | undefined {
    return this.byNameStmt.get(name);
  }

  // exact id, then name, then a unique id prefix
  resolve(ref: string): JobRow | undefined {
    const trimmed = ref.trim();
    if (!trimmed) return undefined;
    if (isUuid(trimmed)) {
      const row = this.getRow(trimmed.toLowerCase());
      if (row) return row;
    }
    const named = this.getRowByName(trimmed);
    if (named) return named;
    if (/^[0-9a-f-]{4,}$/i.test(trimmed)) {
      const matches = this.byPrefixStmt.all(trimmed.toLowerCase());
      if (matches.length === 1) return matches[0];
    }
    return undefined;
  }

  getJob(id: string): Job | undefined {
    const row = this.getRow(id);
    if (!row) return undefined;
    const errors = this.listErrors(id);
    return {
      ...summaryFromRow(row),
      workerAssignments: this.listAssignments(id),
      errors,
    };
  }

  listRows(): JobRow[] {
    return this.db
      .prepare<[], JobRow>(`SELECT * FROM jobs ORDER BY created_at ASC, rowid ASC`)
      .all();
  }

  listSummaries(): JobSummary[] {
    return this.listRows().map((row) =>
      summaryFromRow(row, this.countErrors(row.id)),
    );
  }

  listRowsInStates(states: readonly JobState[]): JobRow[] {
    if (!states.length) return [];
    const marks = states.map(() => "?").join(",");
    return this.db
      .prepare<JobState[], JobRow>(
        `SELECT * FROM jobs WHERE state IN (${marks}) ORDER BY created_at ASC, rowid ASC`,
      )
      .all(...states);
  }

  updateJob(id: string, patch: JobPatch): void {
    this.writePatch(id, patch);
  }

  /**
   * Compare-and-swap on the state column: applies the patch only while the
   * job is still in `expected`. Returns false when another writer got there
   * first.
   */
  updateJobIfState(id: string, expected: JobState, patch: JobPatch): boolean {
    return this.writePatch(id, patch, expected);
  }

  private writePatch(id: string, patch: JobPatch, expected?: JobState): boolean {
    const sets: string[] = [];
    const vals: SqlValue[] = [];
    for (const column of PATCH_COLUMNS) {
      const value = patch[column];
      if (value === undefined) continue;
      sets.push(`${column} = ?`);
      vals.push(value);
    }
    sets.push(`updated_at = ?`);
    vals.push(Date.now());
    vals.push(id);
    let where = "id = ?";
    if (expected !== undefined) {
      where += " AND state = ?";
      vals.push(expected);
    }
    const info = this.db
      .prepare<SqlValue[]>(`UPDATE jobs SET ${sets.join(", ")} WHERE ${where}`)
      .run(...vals);
    return info.changes > 0;
  }

  deleteJob(id: string): void {
    this.db.prepare<[string]>(`DELETE FROM jobs WHERE id = ?`).run(id);
  }

  // Assignments are written once per phase, before lanes start.
  replaceAssignments(
    id: string,
    phase: Phase,
    assignments: readonly WorkerAssignment[],
  ): void {
    const del = this.db.prepare<[string, string]>(
      `DELETE FROM job_assignments WHERE job_id = ? AND phase = ?`,
    );
    const ins = this.db.prepare<[string, string, number, string, number]>(
      `INSERT INTO job_assignments(job_id, phase, worker_index, items, load_bytes)
       VALUES (?, ?, ?, ?, ?)`,
    );
    const tx = this.db.transaction(() => {
      del.run(id, phase);
      for (const a of assignments) {
        ins.run(id, phase, a.workerIndex, JSON.stringify(a.items), a.loadBytes);
      }
    });
    tx();
  }

  listAssignments(id: string): PhaseAssignment[] {
    const rows = this.db
      .prepare<[string], AssignmentRow>(
        `SELECT phase, worker_index, items, load_bytes
           FROM job_assignments
          WHERE job_id = ?
          ORDER BY CASE phase WHEN 'push' THEN 0 ELSE 1 END, worker_index`,
      )
      .all(id);
    return rows.map((r) => ({
      phase: parsePhase(id, r.phase),
      workerIndex: r.worker_index,
      items: parseItems(id, r.items),
      loadBytes: r.load_bytes,
    }));
  }

  // A fresh start re-scans, so the previous run's plan and errors go.
  clearRun(id: string): void {
    const tx = this.db.transaction(() => {
      this.db
        .prepare<[string]>(`DELETE FROM job_assignments WHERE job_id = ?`)
        .run(id);
      this.db.prepare<[string]>(`DELETE FROM job_errors WHERE job_id = ?`).run(id);
      this.db.prepare<[string]>(`DELETE FROM job_issues WHERE job_id = ?`).run(id);
    });
    tx();
  }

  insertError(id: string, entry: JobErrorEntry): void {
    this.insertErrorStmt.run(
      id,
      entry.phase,
      entry.workerIndex,
      entry.item,
      entry.message.slice(0, 4096),
      entry.exitCode,
      entry.at,
    );
  }

  listErrors(id: string): JobErrorEntry[] {
    const rows = this.db
      .prepare<[string], ErrorRow>(
        `SELECT phase, worker_index, item, message, exit_code, ts
           FROM job_errors WHERE job_id = ? ORDER BY id ASC`,
      )
      .all(id);
    return rows.map((r) => ({
      phase: parsePhase(id, r.phase),
      workerIndex: r.worker_index,
      item: r.item,
      message: r.message,
      exitCode: r.exit_code,
      at: r.ts,
    }));
  }

  countErrors(id: string, phase?: Phase): number {
    if (phase === undefined) return this.errorCountStmt.get(id)?.n ?? 0;
    return (
      this.db
        .prepare<[string, string], { n: number }>(
          `SELECT COUNT(*) AS n FROM job_errors WHERE job_id = ? AND phase = ?`,
        )
        .get(id, phase)?.n ?? 0
    );
  }

  // Filename issues

  replaceIssues(id: string, phase: Phase, issues: readonly FilenameIssue[]): void {
    const del = this.db.prepare<[string, string]>(
      `DELETE FROM job_issues WHERE job_id = ? AND phase = ?`,
    );
    const ins = this.db.prepare<
      [string, string, string, string, number, string, string | null, string | null, number]
    >(
      `INSERT INTO job_issues(job_id, phase, path, name, is_dir, issue_type, issue_char, suggested_name, ts)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const now = Date.now();
    const tx = this.db.transaction(() => {
      del.run(id, phase);
      for (const issue of issues) {
        ins.run(
          id,
          phase,
          issue.relativePath,
          issue.name,
          issue.isDirectory ? 1 : 0,
          issue.type,
          issue.char,
          issue.suggestedName,
          now,
        );
      }
    });
    tx();
  }

  listIssues(id: string, status?: IssueStatus): JobIssue[] {
    const rows =
      status === undefined
        ? this.db
            .prepare<[string], IssueRow>(
              `SELECT * FROM job_issues WHERE job_id = ? ORDER BY id ASC`,
            )
            .all(id)
        : this.db
            .prepare<[string, string], IssueRow>(
              `SELECT * FROM job_issues WHERE job_id = ? AND status = ? ORDER BY id ASC`,
            )
            .all(id, status);
    return rows.map((r) => issueFromRow(id, r));
  }

  getIssue(id: string, issueId: number): JobIssue | undefined {
    const row = this.db
      .prepare<[string, number], IssueRow>(
        `SELECT * FROM job_issues WHERE job_id = ? AND id = ?`,
      )
      .get(id, issueId);
    return row ? issueFromRow(id, row) : undefined;
  }

  resolveIssue(
    issueId: number,
    status: IssueStatus,
    message: string | null = null,
  ): void {
    this.db
      .prepare<[string, string | null, number | null, number]>(
        `UPDATE job_issues SET status = ?, message = ?, resolved_at = ? WHERE id = ?`,
      )
      .run(status, message, status === "pending" ? null : Date.now(), issueId);
  }

  // Nested issues follow a renamed directory.
  moveIssuePaths(id: string, phase: Phase, fromDir: string, toDir: string): void {
    const prefix = `${fromDir}/`;
    // sqlite counts characters, not UTF-16 units
    const chars = Array.from(prefix).length;
    this.db
      .prepare<[string, number, string, string, number, string]>(
        `UPDATE job_issues
            SET path = ? || substr(path, ?)
          WHERE job_id = ? AND phase = ? AND substr(path, 1, ?) = ?`,
      )
      .run(`${toDir}/`, chars + 1, id, phase, chars, prefix);
  }

  // Commands

  enqueueCommand(id: string, cmd: JobCommand): number {
    const info = this.db
      .prepare<[string, number, string]>(
        `INSERT INTO job_commands(job_id, ts, cmd) VALUES (?, ?, ?)`,
      )
      .run(id, Date.now(), cmd);
    return Number(info.lastInsertRowid);
  }

  // Returns pending commands in order and marks them handled.
  takeCommands(id: string): QueuedCommand[] {
    const select = this.db.prepare<[string], { id: number; cmd: string; ts: number }>(
      `SELECT id, cmd, ts FROM job_commands
        WHERE job_id = ? AND acked = 0
        ORDER BY ts ASC, id ASC`,
    );
    const ack = this.db.prepare<[number, number]>(
      `UPDATE job_commands SET acked = 1, acked_at = ? WHERE id = ?`,
    );
    const tx = this.db.transaction((): QueuedCommand[] => {
      const out: QueuedCommand[] = [];
      const now = Date.now();
      for (const row of select.all(id)) {
        ack.run(now, row.id);
        const cmd = JOB_COMMANDS.find((c) => c === row.cmd);
        if (cmd) out.push({ id: row.id, cmd, ts: row.ts });
      }
      return out;
    });
    return tx();
  }

  // Pending commands are meaningless once the run they targeted is gone.
  discardCommands(id: string): void {
    this.db
      .prepare<[number, string]>(
        `UPDATE job_commands SET acked = 1, acked_at = ? WHERE job_id = ? AND acked = 0`,
      )
      .run(Date.now(), id);
  }
}
