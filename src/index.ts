export {
  JobController,
  validateParallelism,
  type CreateJobInput,
  type UpdateJobInput,
  type JobRunHandle,
  type JobControllerOptions,
  type PhasePlan,
  type SystemStatus,
} from "./job-controller.js";

export {
  JobStore,
  ensureJobDb,
  type Job,
  type JobSummary,
  type JobErrorEntry,
  type JobCommand,
  type JobIssue,
  type IssueStatus,
  type PhaseAssignment,
} from "./job-db.js";

export {
  checkFilename,
  suggestFilename,
  type FilenameIssue,
  type FilenameIssueType,
} from "./filename-issues.js";

export { copyFilterArgs, createExcluder } from "./ignore.js";

export {
  JOB_STATES,
  DIRECTIONS,
  canTransition,
  isTerminal,
  nextState,
  phasesFor,
  type JobState,
  type JobEvent,
  type Direction,
  type Phase,
} from "./job-state.js";

export { scanRoot, type Item, type ScanResult, type ScanOptions } from "./scan.js";

export {
  assignItems,
  makespan,
  totalLoad,
  type WorkerAssignment,
} from "./batcher.js";

export {
  RsyncExecutor,
  buildCopyArgs,
  parseProgressLine,
  type CopyOptions,
  type ItemExecutor,
  type ItemOutcome,
  type ItemRequest,
} from "./copy-tool.js";

export {
  RunControl,
  runWorkerPool,
  type PoolOptions,
  type PoolResult,
  type WorkerEvent,
} from "./worker-pool.js";

export {
  ProgressAggregator,
  type ProgressSnapshot,
  type WorkerProgress,
} from "./progress.js";

export {
  PathMountMonitor,
  isMountAvailable,
  type MountMonitor,
  type MountStatus,
} from "./mount.js";

export { loadConfig, type LanecopyConfig, type CancelPolicy } from "./config.js";

export { fetchJobLogs, type JobLogRow, type JobLogQuery } from "./job-logs.js";

export * from "./errors.js";

export {
  ConsoleLogger,
  StructuredLogger,
  NullLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
