/*
JobController owns every job's persisted state machine and drives runs:

  start -> mount probe -> scan -> batch -> worker pool -> final state

One controller per process writes a running job's row. Other processes reach
a run they do not own through the job_commands queue, which the owner polls.
A job left scanning, running or paused by a process that is gone is failed
with reason incomplete_on_restart, since its copies cannot be resumed.
*/

import { constants as fsConstants } from "node:fs";
import { access, lstat, mkdir, rename } from "node:fs/promises";
import path from "node:path";
import {
  assignItems,
  describeAssignments,
  makespan,
  type WorkerAssignment,
} from "./batcher.js";
import { expandHome, splitArgs, type LanecopyConfig } from "./config.js";
import { MAX_PARALLELISM } from "./constants.js";
import {
  type CopyOptions,
  type ItemExecutor,
  RsyncExecutor,
} from "./copy-tool.js";
import {
  ConfigError,
  DestinationError,
  InvalidTransitionError,
  JobNotFoundError,
  LanecopyError,
  MountUnavailableError,
  ScanError,
  failureReasonOf,
} from "./errors.js";
import { type FilenameIssue, checkFilename } from "./filename-issues.js";
import { normalizeExcludePatterns } from "./ignore.js";
import {
  type IssueStatus,
  type Job,
  type JobCommand,
  type JobIssue,
  type JobPatch,
  type JobRow,
  type JobSummary,
  JobStore,
  serializeRsyncOptions,
  summaryFromRow,
} from "./job-db.js";
import { createJobLogger } from "./job-logs.js";
import {
  type Direction,
  type JobEvent,
  type JobState,
  type Phase,
  isActive,
  isDirection,
  nextState,
  phaseEndpoints,
  phasesFor,
} from "./job-state.js";
import { type LogLevel, type Logger, NullLogger } from "./logger.js";
import { type MountMonitor, type MountStatus, PathMountMonitor } from "./mount.js";
import {
  ProgressAggregator,
  type ProgressSnapshot,
  emptySnapshot,
  percentOf,
} from "./progress.js";
import { scanRoot } from "./scan.js";
import { errnoCode, errorMessage, isPidAlive } from "./util.js";
import { RunControl, type WorkerEvent, runWorkerPool } from "./worker-pool.js";

const OK_EXIT_CODES = [0];
const ACTIVE_STATES: readonly JobState[] = ["scanning", "running", "paused"];

export interface CreateJobInput {
  name: string;
  sourcePath: string;
  destPath: string;
  direction?: string;
  parallelism?: number;
  excludePatterns?: Iterable<string>;
  // a string is split on whitespace; null or empty uses the configured options
  rsyncOptions?: string | readonly string[] | null;
}

export interface UpdateJobInput {
  name?: string;
  sourcePath?: string;
  destPath?: string;
  direction?: string;
  parallelism?: number;
  excludePatterns?: Iterable<string>;
  rsyncOptions?: string | readonly string[] | null;
}

type ProgressListener = (snapshot: ProgressSnapshot) => void;

export interface JobRunHandle {
  jobId: string;
  // settles once the run reached a terminal state
  done: Promise<Job>;
  progress(): ProgressSnapshot;
  subscribe(listener: ProgressListener): () => void;
}

export interface PhasePlan {
  phase: Phase;
  from: string;
  to: string;
  totalFiles: number;
  totalBytes: number;
  assignments: WorkerAssignment[];
  makespanBytes: number;
  issues: FilenameIssue[];
  // scan error for this phase, when the source side cannot be read yet
  error: string | null;
}

export interface SystemStatus {
  pid: number;
  jobDbPath: string;
  mount: MountStatus;
  jobsTotal: number;
  jobsActive: number;
  jobsOwnedHere: number;
}

export interface JobControllerOptions {
  config: LanecopyConfig;
  store?: JobStore;
  executor?: ItemExecutor;
  mount?: MountMonitor;
  logger?: Logger;
  // echo level for per-job log lines; unset keeps them in job_logs only
  logEchoLevel?: LogLevel;
}

interface ActiveRun {
  jobId: string;
  direction: Direction;
  sourcePath: string;
  destPath: string;
  parallelism: number;
  exclude: string[];
  rsyncArgs: string[];
  control: RunControl;
  logger: Logger;
  aggregator: ProgressAggregator | null;
  listeners: Set<ProgressListener>;
  cancelRequested: boolean;
  mountLost: boolean;
  filesCopied: number;
  bytesCopied: number;
  done?: Promise<Job>;
}

export class JobController {
  readonly store: JobStore;
  private readonly ownsStore: boolean;
  private readonly config: LanecopyConfig;
  private readonly executor: ItemExecutor;
  private readonly mount: MountMonitor;
  private readonly logger: Logger;
  private readonly logEchoLevel?: LogLevel;
  private readonly runs = new Map<string, ActiveRun>();

  constructor(opts: JobControllerOptions) {
    this.config = opts.config;
    this.ownsStore = !opts.store;
    this.store = opts.store ?? JobStore.open(opts.config.jobDbPath);
    this.logger = opts.logger ?? new NullLogger();
    this.executor = opts.executor ?? new RsyncExecutor(this.logger.child("copy"));
    this.mount = opts.mount ?? new PathMountMonitor(opts.config.mountPoint);
    this.logEchoLevel = opts.logEchoLevel;
  }

  // Opens the job database and applies the restart rule before anything else.
  static open(opts: JobControllerOptions): JobController {
    const controller = new JobController(opts);
    controller.reconcile();
    return controller;
  }

  // Cancels runs owned here, waits for them, then releases the database.
  async close(): Promise<void> {
    const pending: Promise<Job>[] = [];
    for (const run of this.runs.values()) {
      this.cancelLocal(run);
      if (run.done) pending.push(run.done);
    }
    await Promise.allSettled(pending);
    if (this.ownsStore) this.store.close();
  }

  // Management surface

  createJob(input: CreateJobInput): string {
    const name = validateName(input.name);
    if (this.store.getRowByName(name)) {
      throw new ConfigError(`a job named '${name}' already exists`, "invalid_name", {
        name,
      });
    }
    const { sourcePath, destPath } = validatePaths(input.sourcePath, input.destPath);
    const id = this.store.insertJob({
      name,
      sourcePath,
      destPath,
      direction: validateDirection(input.direction ?? "push"),
      parallelism: validateParallelism(
        input.parallelism ?? this.config.defaultParallelism,
      ),
      excludePatterns: normalizeExcludePatterns(input.excludePatterns ?? []),
      rsyncOptions: validateRsyncOptions(input.rsyncOptions ?? null),
    });
    this.logger.info("job created", { id, name });
    return id;
  }

  startJob(ref: string): JobRunHandle {
    let row = this.requireRow(ref);
    if (isActive(summaryFromRow(row).state) && !this.hasLiveOwner(row)) {
      this.failOrphan(row);
      row = this.requireRow(row.id);
    }
    const job = summaryFromRow(row);
    if (this.runs.has(job.id)) {
      throw new InvalidTransitionError(job.state, "start", { id: job.id });
    }
    const to = nextState(job.state, "start", { id: job.id });
    const phases = phasesFor(job.direction);
    const now = Date.now();
    const claimed = this.store.updateJobIfState(job.id, job.state, {
      state: to,
      phase: phases[0],
      started_at: now,
      finished_at: null,
      failure_code: null,
      failure_message: null,
      owner_pid: process.pid,
      last_heartbeat: now,
      total_files: 0,
      files_done: 0,
      total_bytes: 0,
      bytes_done: 0,
      run_count: row.run_count + 1,
    });
    if (!claimed) {
      // another process started or changed the job since it was read
      throw new InvalidTransitionError(this.currentState(job.id), "start", {
        id: job.id,
      });
    }
    this.store.clearRun(job.id);
    this.store.discardCommands(job.id);

    const logger = createJobLogger(this.store.db, job.id, {
      scope: "job",
      echoLevel: this.logEchoLevel,
    });
    logger.info("job started", {
      from: job.state,
      direction: job.direction,
      parallelism: job.parallelism,
      run: row.run_count + 1,
    });

    const run: ActiveRun = {
      jobId: job.id,
      direction: job.direction,
      sourcePath: job.sourcePath,
      destPath: job.destPath,
      parallelism: job.parallelism,
      exclude: normalizeExcludePatterns([
        ...this.config.defaultExclude,
        ...job.excludePatterns,
      ]),
      rsyncArgs: job.rsyncOptions ?? this.config.rsyncArgs,
      control: new RunControl(this.config.cancelPolicy),
      logger,
      aggregator: null,
      listeners: new Set(),
      cancelRequested: false,
      mountLost: false,
      filesCopied: 0,
      bytesCopied: 0,
    };
    this.runs.set(job.id, run);
    const done = this.execute(run);
    run.done = done;

    return {
      jobId: job.id,
      done,
      progress: () => this.snapshotFor(run),
      subscribe: (listener) => {
        run.listeners.add(listener);
        return () => {
          run.listeners.delete(listener);
        };
      },
    };
  }

  pauseJob(ref: string): Job {
    const row = this.requireRow(ref);
    const run = this.runs.get(row.id);
    if (run) {
      this.pauseLocal(run);
      return this.requireJob(row.id);
    }
    return this.enqueueRemote(row, "pause");
  }

  resumeJob(ref: string): Job {
    const row = this.requireRow(ref);
    const run = this.runs.get(row.id);
    if (run) {
      this.resumeLocal(run);
      return this.requireJob(row.id);
    }
    return this.enqueueRemote(row, "resume");
  }

  /**
   * Stops dispatching new items. For a run owned here this settles once every
   * lane stopped and the job is `cancelled`; for a run owned by another
   * process the request is queued and the current record is returned.
   */
  async cancelJob(ref: string): Promise<Job> {
    const row = this.requireRow(ref);
    const run = this.runs.get(row.id);
    if (run) {
      this.cancelLocal(run);
      if (run.done) return await run.done;
      return this.requireJob(row.id);
    }
    return this.enqueueRemote(row, "cancel");
  }

  getJobStatus(ref: string): Job {
    return this.requireJob(this.requireRow(ref).id);
  }

  getProgress(ref: string): ProgressSnapshot {
    const row = this.requireRow(ref);
    const run = this.runs.get(row.id);
    return run ? this.snapshotFor(run) : snapshotFromRow(row);
  }

  listJobs(): JobSummary[] {
    return this.store.listSummaries();
  }

  updateJob(ref: string, input: UpdateJobInput): Job {
    const row = this.requireRow(ref);
    if (isActive(summaryFromRow(row).state) || this.runs.has(row.id)) {
      throw new InvalidTransitionError(row.state, "edit", { id: row.id });
    }
    const patch: JobPatch = {};
    if (input.name !== undefined) {
      const name = validateName(input.name);
      const other = this.store.getRowByName(name);
      if (other && other.id !== row.id) {
        throw new ConfigError(`a job named '${name}' already exists`, "invalid_name", {
          name,
        });
      }
      patch.name = name;
    }
    if (input.sourcePath !== undefined || input.destPath !== undefined) {
      const { sourcePath, destPath } = validatePaths(
        input.sourcePath ?? row.source_path,
        input.destPath ?? row.dest_path,
      );
      patch.source_path = sourcePath;
      patch.dest_path = destPath;
    }
    if (input.direction !== undefined) {
      patch.direction = validateDirection(input.direction);
    }
    if (input.parallelism !== undefined) {
      patch.parallelism = validateParallelism(input.parallelism);
    }
    if (input.excludePatterns !== undefined) {
      patch.exclude_patterns = JSON.stringify(
        normalizeExcludePatterns(input.excludePatterns),
      );
    }
    if (input.rsyncOptions !== undefined) {
      patch.rsync_options = serializeRsyncOptions(
        validateRsyncOptions(input.rsyncOptions),
      );
    }
    if (!this.store.updateJobIfState(row.id, summaryFromRow(row).state, patch)) {
      throw new InvalidTransitionError(this.currentState(row.id), "edit", {
        id: row.id,
      });
    }
    this.logger.info("job updated", { id: row.id, fields: Object.keys(patch) });
    return this.requireJob(row.id);
  }

  deleteJob(ref: string): void {
    const row = this.requireRow(ref);
    if (isActive(summaryFromRow(row).state) || this.runs.has(row.id)) {
      throw new InvalidTransitionError(row.state, "delete", { id: row.id });
    }
    this.store.deleteJob(row.id);
    this.logger.info("job deleted", { id: row.id, name: row.name });
  }

  // Filename issues found by the last scan

  listIssues(ref: string, status?: IssueStatus): JobIssue[] {
    return this.store.listIssues(this.requireRow(ref).id, status);
  }

  skipIssue(ref: string, issueId: number): JobIssue {
    const { row, issue } = this.requireIssue(ref, issueId, "skip");
    this.store.resolveIssue(issue.id, "skipped");
    return this.requireIssueById(row.id, issue.id);
  }

  /**
   * Renames the offending entry in the phase's source tree, to `newName` or
   * the suggested name. A failed rename is recorded on the issue, not thrown.
   */
  async renameIssue(ref: string, issueId: number, newName?: string): Promise<JobIssue> {
    const { row, issue } = this.requireIssue(ref, issueId, "rename");
    const target = validateReplacementName(newName ?? issue.suggestedName, issue.name);
    const job = summaryFromRow(row);
    const { from } = phaseEndpoints(issue.phase, job.sourcePath, job.destPath);
    const oldAbs = path.join(from, ...issue.relativePath.split("/"));
    const newAbs = path.join(path.dirname(oldAbs), target);
    const parent = path.posix.dirname(issue.relativePath);
    const newRel = parent === "." ? target : `${parent}/${target}`;
    try {
      if (await pathExists(newAbs)) {
        throw new Error(`${newRel} already exists`);
      }
      await rename(oldAbs, newAbs);
    } catch (err) {
      this.store.resolveIssue(issue.id, "failed", errorMessage(err));
      this.logger.warn("rename failed", {
        id: row.id,
        path: issue.relativePath,
        to: target,
        error: errorMessage(err),
      });
      return this.requireIssueById(row.id, issue.id);
    }
    this.store.resolveIssue(issue.id, "renamed", `renamed to ${newRel}`);
    if (issue.isDirectory) {
      this.store.moveIssuePaths(row.id, issue.phase, issue.relativePath, newRel);
    }
    this.logger.info("renamed entry", { id: row.id, from: issue.relativePath, to: newRel });
    return this.requireIssueById(row.id, issue.id);
  }

  /**
   * Fails every scanning, running or paused job that no live process owns.
   * Jobs in terminal states are never touched. Returns the ids reconciled.
   */
  reconcile(): string[] {
    const out: string[] = [];
    for (const row of this.store.listRowsInStates(ACTIVE_STATES)) {
      if (this.hasLiveOwner(row)) continue;
      if (this.failOrphan(row)) out.push(row.id);
    }
    return out;
  }

  // Scan and batch without copying anything or touching the job's state.
  async planJob(ref: string, parallelism?: number): Promise<PhasePlan[]> {
    const job = summaryFromRow(this.requireRow(ref));
    const workers = validateParallelism(parallelism ?? job.parallelism);
    const exclude = normalizeExcludePatterns([
      ...this.config.defaultExclude,
      ...job.excludePatterns,
    ]);
    const plans: PhasePlan[] = [];
    for (const phase of phasesFor(job.direction)) {
      const { from, to } = phaseEndpoints(phase, job.sourcePath, job.destPath);
      try {
        const scan = await scanRoot(from, { exclude, logger: this.logger });
        const assignments = assignItems(scan.items, workers);
        plans.push({
          phase,
          from,
          to,
          totalFiles: scan.totalFiles,
          totalBytes: scan.totalBytes,
          assignments,
          makespanBytes: makespan(assignments),
          issues: scan.issues,
          error: null,
        });
      } catch (err) {
        if (!(err instanceof ScanError)) throw err;
        plans.push({
          phase,
          from,
          to,
          totalFiles: 0,
          totalBytes: 0,
          assignments: [],
          makespanBytes: 0,
          issues: [],
          error: err.message,
        });
      }
    }
    return plans;
  }

  async systemStatus(): Promise<SystemStatus> {
    const rows = this.store.listRows();
    return {
      pid: process.pid,
      jobDbPath: this.config.jobDbPath,
      mount: await this.mount.status(),
      jobsTotal: rows.length,
      jobsActive: rows.filter((r) => ACTIVE_STATES.some((s) => s === r.state))
        .length,
      jobsOwnedHere: this.runs.size,
    };
  }

  // Lookups

  private requireRow(ref: string): JobRow {
    const row = this.store.resolve(ref);
    if (!row) throw new JobNotFoundError(ref);
    return row;
  }

  private requireJob(id: string): Job {
    const job = this.store.getJob(id);
    if (!job) throw new JobNotFoundError(id);
    return job;
  }

  private requireIssue(
    ref: string,
    issueId: number,
    action: string,
  ): { row: JobRow; issue: JobIssue } {
    const row = this.requireRow(ref);
    if (isActive(summaryFromRow(row).state) || this.runs.has(row.id)) {
      throw new InvalidTransitionError(row.state, action, { id: row.id });
    }
    const issue = this.requireIssueById(row.id, issueId);
    if (issue.status === "renamed" || issue.status === "skipped") {
      throw new LanecopyError(
        `issue ${issueId} is already ${issue.status}`,
        "issue_resolved",
        { id: row.id, issueId },
      );
    }
    return { row, issue };
  }

  private requireIssueById(jobId: string, issueId: number): JobIssue {
    const issue = this.store.getIssue(jobId, issueId);
    if (!issue) {
      throw new LanecopyError(`issue ${issueId} not found`, "issue_not_found", {
        id: jobId,
        issueId,
      });
    }
    return issue;
  }

  private currentState(jobId: string): JobState {
    return summaryFromRow(this.requireRow(jobId)).state;
  }

  private hasLiveOwner(row: JobRow): boolean {
    if (row.owner_pid === process.pid) return this.runs.has(row.id);
    return isPidAlive(row.owner_pid);
  }

  // false when the row moved on since it was read
  private failOrphan(row: JobRow): boolean {
    const from = summaryFromRow(row).state;
    const to = nextState(from, "fail", { id: row.id });
    const changed = this.store.updateJobIfState(row.id, from, {
      state: to,
      failure_code: "incomplete_on_restart",
      failure_message: `job was ${from} when its owner (pid ${row.owner_pid ?? "unknown"}) stopped`,
      finished_at: Date.now(),
      owner_pid: null,
    });
    if (!changed) return false;
    this.store.discardCommands(row.id);
    this.logger.warn("reconciled orphaned job", {
      id: row.id,
      from,
      ownerPid: row.owner_pid,
    });
    return true;
  }

  // Commands for runs owned by another process

  private enqueueRemote(row: JobRow, cmd: JobCommand): Job {
    const state = summaryFromRow(row).state;
    nextState(state, cmd, { id: row.id });
    if (!this.hasLiveOwner(row)) {
      this.failOrphan(row);
      throw new InvalidTransitionError("failed", cmd, {
        id: row.id,
        reason: "incomplete_on_restart",
      });
    }
    this.store.enqueueCommand(row.id, cmd);
    this.logger.info("queued job command", {
      id: row.id,
      cmd,
      ownerPid: row.owner_pid,
    });
    return this.requireJob(row.id);
  }

  private applyCommand(run: ActiveRun, cmd: JobCommand): void {
    try {
      if (cmd === "pause") this.pauseLocal(run);
      else if (cmd === "resume") this.resumeLocal(run);
      else this.cancelLocal(run);
    } catch (err) {
      run.logger.warn("ignored job command", { cmd, error: errorMessage(err) });
    }
  }

  // Local control

  private transition(
    run: ActiveRun,
    event: JobEvent,
    extra: JobPatch = {},
  ): JobState {
    const from = this.currentState(run.jobId);
    const to = nextState(from, event, { id: run.jobId });
    if (!this.store.updateJobIfState(run.jobId, from, { ...extra, state: to })) {
      throw new InvalidTransitionError(this.currentState(run.jobId), event, {
        id: run.jobId,
        expected: from,
      });
    }
    run.logger.info("state changed", { from, to, event });
    return to;
  }

  private pauseLocal(run: ActiveRun): void {
    nextState(this.currentState(run.jobId), "pause", { id: run.jobId });
    // a run that is already stopping has nothing left to pause
    if (!run.control.pause()) return;
    this.transition(run, "pause");
  }

  private resumeLocal(run: ActiveRun): void {
    nextState(this.currentState(run.jobId), "resume", { id: run.jobId });
    this.transition(run, "resume");
    run.control.resume();
  }

  private cancelLocal(run: ActiveRun): void {
    if (run.cancelRequested) return;
    run.cancelRequested = true;
    run.control.cancel();
    run.logger.info("cancel requested", {
      policy: run.control.cancelPolicy,
    });
  }

  // Run

  private async execute(run: ActiveRun): Promise<Job> {
    const started = Date.now();
    const stopTimers = this.startTimers(run);
    let failure: unknown = null;
    try {
      for (const phase of phasesFor(run.direction)) {
        await this.runPhase(run, phase);
        if (run.control.isCancelled) break;
      }
    } catch (err) {
      failure = err;
    } finally {
      stopTimers();
    }
    try {
      return await this.finishRun(run, failure, started);
    } finally {
      this.runs.delete(run.jobId);
      this.store.discardCommands(run.jobId);
    }
  }

  private async runPhase(run: ActiveRun, phase: Phase): Promise<void> {
    const { from, to } = phaseEndpoints(phase, run.sourcePath, run.destPath);
    const log = run.logger.child(phase);
    this.store.updateJob(run.jobId, { phase });

    const mount = await this.mount.status();
    if (mount.state === "unavailable") {
      throw new MountUnavailableError(
        `mount ${mount.mountPoint} is unavailable (${mount.reason}): ${mount.message}`,
        { mountPoint: mount.mountPoint, reason: mount.reason },
      );
    }

    const scan = await scanRoot(from, { exclude: run.exclude, logger: log });
    log.info("scan finished", {
      from,
      items: scan.items.length,
      totalFiles: scan.totalFiles,
      totalBytes: scan.totalBytes,
    });
    this.store.replaceIssues(run.jobId, phase, scan.issues);
    if (scan.issues.length) {
      log.warn("names the destination may reject", {
        count: scan.issues.length,
        first: scan.issues.slice(0, 5).map((i) => i.relativePath),
      });
    }
    if (run.control.isCancelled) return;
    if (scan.empty) return;

    await ensureWritableDir(to);

    const assignments = assignItems(scan.items, run.parallelism);
    // the plan is fixed before any lane starts
    this.store.replaceAssignments(run.jobId, phase, assignments);
    const patch: JobPatch = {
      total_files: scan.totalFiles,
      total_bytes: scan.totalBytes,
      files_done: 0,
      bytes_done: 0,
    };
    if (this.currentState(run.jobId) === "scanning") {
      this.transition(run, "scan_ok", patch);
    } else {
      this.store.updateJob(run.jobId, patch);
    }
    log.info("lanes assigned", {
      makespanBytes: makespan(assignments),
      lanes: describeAssignments(assignments),
    });

    const aggregator = new ProgressAggregator(run.jobId, phase, assignments);
    run.aggregator = aggregator;
    const unsubscribe = aggregator.subscribe((snapshot) => {
      for (const listener of run.listeners) {
        try {
          listener(snapshot);
        } catch (err) {
          log.warn("progress listener failed", { error: errorMessage(err) });
        }
      }
    });
    try {
      await runWorkerPool({
        jobId: run.jobId,
        phase,
        sourceRoot: from,
        destRoot: to,
        assignments,
        executor: this.executor,
        copyOptions: this.copyOptions(run),
        control: run.control,
        onEvent: (event) => {
          aggregator.apply(event);
          this.onWorkerEvent(run, event);
        },
        logger: log,
      });
    } finally {
      unsubscribe();
      this.persistCounters(run);
    }

    if (run.mountLost) {
      throw new MountUnavailableError(
        `mount became unavailable during the ${phase} phase`,
        { phase },
      );
    }
  }

  private onWorkerEvent(run: ActiveRun, event: WorkerEvent): void {
    if (event.type === "item_completed") {
      run.filesCopied += event.item.fileCount;
      run.bytesCopied += event.item.sizeBytes;
      return;
    }
    if (event.type !== "item_failed") return;
    this.store.insertError(run.jobId, {
      phase: event.phase,
      workerIndex: event.workerIndex,
      item: event.item.relativePath,
      message: event.error.message,
      exitCode: event.error.exitCode,
      at: event.ts,
    });
    if (event.mountLost && !run.mountLost) {
      run.mountLost = true;
      run.logger.error("mount lost during copy; stopping lanes", {
        worker: event.workerIndex,
        item: event.item.relativePath,
      });
      run.control.cancel();
    }
  }

  private async finishRun(
    run: ActiveRun,
    failure: unknown,
    started: number,
  ): Promise<Job> {
    if (failure === null && !run.control.isCancelled) {
      // a paused run stays paused until someone resumes or cancels it
      while (run.control.isPaused) await run.control.waitWhilePaused();
    }
    const state = this.currentState(run.jobId);
    const elapsed = Date.now() - started;
    const row = this.requireRow(run.jobId);
    const base: JobPatch = {
      finished_at: Date.now(),
      owner_pid: null,
      last_heartbeat: Date.now(),
      last_run_ms: elapsed,
      total_files_copied: row.total_files_copied + run.filesCopied,
      total_bytes_copied: row.total_bytes_copied + run.bytesCopied,
    };

    let event: JobEvent;
    if (failure !== null) {
      event = "fail";
      const reason = failureReasonOf(failure);
      base.failure_code = reason;
      base.failure_message = errorMessage(failure);
      if (failure instanceof LanecopyError) {
        run.logger.error("job failed", { reason, error: failure.message });
      } else {
        run.logger.error("job failed unexpectedly", {
          error: errorMessage(failure),
          stack: failure instanceof Error ? failure.stack : undefined,
        });
      }
    } else if (run.cancelRequested) {
      event = "cancel";
    } else if (state === "scanning") {
      // every phase scanned empty: nothing to do
      event = "scan_empty";
    } else {
      event =
        this.store.countErrors(run.jobId) > 0 ? "finish_with_errors" : "finish";
    }
    const to = this.transition(run, event, base);
    run.logger.info("job finished", {
      state: to,
      elapsedMs: elapsed,
      filesCopied: run.filesCopied,
      bytesCopied: run.bytesCopied,
    });
    return this.requireJob(run.jobId);
  }

  private copyOptions(run: ActiveRun): CopyOptions {
    return {
      command: this.config.rsyncPath,
      baseArgs: run.rsyncArgs,
      exclude: run.exclude,
      okCodes: OK_EXIT_CODES,
      killGraceMs: this.config.killGraceMs,
      progressMaxHz: this.config.progressMaxHz,
    };
  }

  private persistCounters(run: ActiveRun): void {
    const snapshot = run.aggregator?.snapshot();
    this.store.updateJob(run.jobId, {
      last_heartbeat: Date.now(),
      ...(snapshot
        ? { files_done: snapshot.filesDone, bytes_done: snapshot.bytesDone }
        : {}),
    });
  }

  private startTimers(run: ActiveRun): () => void {
    const timers: NodeJS.Timeout[] = [];
    if (this.config.persistIntervalMs > 0) {
      const flusher = setInterval(() => {
        try {
          this.persistCounters(run);
        } catch (err) {
          run.logger.warn("persisting progress failed", {
            error: errorMessage(err),
          });
        }
      }, this.config.persistIntervalMs);
      flusher.unref();
      timers.push(flusher);
    }
    if (this.config.commandPollMs > 0) {
      // not unref'd: a paused run waits on these commands
      timers.push(
        setInterval(() => {
          try {
            for (const { cmd } of this.store.takeCommands(run.jobId)) {
              run.logger.info("applying queued command", { cmd });
              this.applyCommand(run, cmd);
            }
          } catch (err) {
            run.logger.warn("reading job commands failed", {
              error: errorMessage(err),
            });
          }
        }, this.config.commandPollMs),
      );
    }
    return () => {
      for (const t of timers) clearInterval(t);
    };
  }

  private snapshotFor(run: ActiveRun): ProgressSnapshot {
    if (run.aggregator) return run.aggregator.snapshot();
    return snapshotFromRow(this.requireRow(run.jobId));
  }
}

// Validation

function validateName(raw: string): string {
  const name = raw.trim();
  if (!name) {
    throw new ConfigError("job name must not be empty", "invalid_name");
  }
  if (/\s/.test(name)) {
    throw new ConfigError(`job name '${name}' must not contain whitespace`, "invalid_name", {
      name,
    });
  }
  return name;
}

function validateDirection(raw: string): Direction {
  const value = raw.trim().toLowerCase();
  if (!isDirection(value)) {
    throw new ConfigError(
      `invalid direction '${raw}' (expected push, pull or bidirectional)`,
      "invalid_direction",
      { value: raw },
    );
  }
  return value;
}

export function validateParallelism(n: number): number {
  if (!Number.isInteger(n) || n < 1 || n > MAX_PARALLELISM) {
    throw new ConfigError(
      `parallelism must be an integer between 1 and ${MAX_PARALLELISM} (got ${n})`,
      "invalid_parallelism",
      { value: n },
    );
  }
  return n;
}

function validatePaths(
  source: string,
  dest: string,
): { sourcePath: string; destPath: string } {
  if (!source.trim() || !dest.trim()) {
    throw new ConfigError("source and destination paths are required", "invalid_path");
  }
  const sourcePath = path.resolve(expandHome(source.trim()));
  const destPath = path.resolve(expandHome(dest.trim()));
  if (sourcePath === destPath) {
    throw new ConfigError("source and destination must differ", "invalid_path", {
      path: sourcePath,
    });
  }
  return { sourcePath, destPath };
}

function validateRsyncOptions(
  raw: string | readonly string[] | null,
): string[] | null {
  if (raw === null) return null;
  const args = typeof raw === "string" ? splitArgs(raw) : raw.filter((a) => a.trim());
  return args.length ? [...args] : null;
}

function validateReplacementName(name: string | null, current: string): string {
  if (name === null) {
    throw new ConfigError(
      `no safe name to suggest for '${current}'; pass one explicitly`,
      "invalid_name",
      { name: current },
    );
  }
  const trimmed = name.trim();
  if (!trimmed || trimmed === "." || trimmed === ".." || /[/\\]/.test(trimmed)) {
    throw new ConfigError(`'${name}' is not a valid file name`, "invalid_name", {
      name,
    });
  }
  const problem = checkFilename(trimmed);
  if (problem) {
    throw new ConfigError(
      `'${trimmed}' has the same kind of problem (${problem.type})`,
      "invalid_name",
      { name: trimmed, issue: problem.type },
    );
  }
  if (trimmed === current) {
    throw new ConfigError(`'${trimmed}' is the current name`, "invalid_name", {
      name: trimmed,
    });
  }
  return trimmed;
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await lstat(p);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw err;
  }
}

async function ensureWritableDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
    await access(dir, fsConstants.W_OK);
  } catch (err) {
    throw new DestinationError(`destination ${dir} is not writable: ${errorMessage(err)}`, {
      dest: dir,
    });
  }
}

function snapshotFromRow(row: JobRow): ProgressSnapshot {
  const job = summaryFromRow(row);
  const counts = {
    totalFiles: job.totalFiles,
    filesDone: Math.min(job.filesDone, job.totalFiles),
    totalBytes: job.totalBytes,
    bytesDone: Math.min(job.bytesDone, job.totalBytes),
  };
  return {
    ...emptySnapshot(job.id, job.phase),
    ...counts,
    percent: percentOf(counts),
    updatedAt: job.lastHeartbeat ?? job.updatedAt,
  };
}
