// src/job-status.ts
import { AlignmentEnum, AsciiTable3 } from "ascii-table3";
import type { PhasePlan, SystemStatus } from "./job-controller.js";
import type { FilenameIssue } from "./filename-issues.js";
import type { Job, JobIssue, JobSummary } from "./job-db.js";
import type { ProgressSnapshot } from "./progress.js";
import { truncateMiddle } from "./util.js";

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

export function fmtMs(ms?: number | null): string {
  if (ms == null || ms < 0) return "-";
  if (ms < 1000) return `${ms} ms`;
  const s = ms / 1000;
  if (s < 60) return `${s.toFixed(2)} s`;
  const m = Math.floor(s / 60);
  const rs = (s % 60).toFixed(0);
  return `${m}m ${rs}s`;
}

const BYTE_UNITS = ["B", "KiB", "MiB", "GiB", "TiB", "PiB"];

export function fmtBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) return "-";
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return unit === 0
    ? `${value} ${BYTE_UNITS[0]}`
    : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

export function fmtPercent(pct: number): string {
  return `${Math.max(0, Math.min(100, pct)).toFixed(1)}%`;
}

export function fmtLocalPath(path: string) {
  const home = process.env.HOME;
  if (!home) return path;
  if (path.startsWith(home)) {
    return `~${path.slice(home.length)}`;
  }
  return path;
}

export function shortId(id: string): string {
  return id.slice(0, 8);
}

export function jobListTable(jobs: JobSummary[], now = Date.now()): string {
  const table = new AsciiTable3("Copy Jobs")
    .setHeading("ID", "Name", "State", "Direction", "Workers", "Source", "Dest", "Errors", "Started")
    .setStyle("unicode-round");
  for (let i = 0; i < 9; i++) table.setAlign(i + 1, AlignmentEnum.LEFT);
  for (const job of jobs) {
    table.addRow(
      shortId(job.id),
      job.name,
      job.state,
      job.direction,
      job.parallelism,
      fmtLocalPath(job.sourcePath),
      fmtLocalPath(job.destPath),
      job.errorCount,
      job.startedAt ? fmtAgo(job.startedAt, now) : "-",
    );
  }
  return table.toString();
}

export function jobStatusTable(job: Job, now = Date.now()): string {
  const table = new AsciiTable3(`Job ${job.name}`)
    .setHeading("Field", "Value")
    .setStyle("unicode-round");
  table.setAlign(1, AlignmentEnum.LEFT);
  table.setAlign(2, AlignmentEnum.LEFT);
  const add = (k: string, v: string | number | null | undefined) => {
    table.addRow(k, v === undefined || v === null || v === "" ? "-" : String(v));
  };

  add("id", job.id);
  add("state", job.phase && job.direction === "bidirectional" ? `${job.state} (${job.phase})` : job.state);
  add("direction", job.direction);
  add("source", fmtLocalPath(job.sourcePath));
  add("dest", fmtLocalPath(job.destPath));
  add("parallelism", job.parallelism);
  if (job.excludePatterns.length) add("exclude", job.excludePatterns.join(", "));
  if (job.rsyncOptions) add("rsync options", job.rsyncOptions.join(" "));
  add("created", fmtAgo(job.createdAt, now));
  add("started", job.startedAt ? fmtAgo(job.startedAt, now) : null);
  add("finished", job.finishedAt ? fmtAgo(job.finishedAt, now) : null);
  if (job.ownerPid) add("owner pid", job.ownerPid);
  add(
    "files",
    `${job.filesDone} / ${job.totalFiles}`,
  );
  add("bytes", `${fmtBytes(job.bytesDone)} / ${fmtBytes(job.totalBytes)}`);
  add("runs", job.runCount);
  add("last run", fmtMs(job.lastRunMs));
  add("copied (all runs)", `${job.totalFilesCopied} files, ${fmtBytes(job.totalBytesCopied)}`);
  if (job.failure) add("failure", `${job.failure.code}: ${job.failure.message}`);
  add("errors", job.errors.length);
  return table.toString();
}

export function jobErrorsTable(job: Job, limit = 20): string {
  const table = new AsciiTable3("Item Errors")
    .setHeading("Phase", "Worker", "Item", "Exit", "Message")
    .setStyle("unicode-round");
  for (let i = 1; i <= 5; i++) table.setAlign(i, AlignmentEnum.LEFT);
  for (const e of job.errors.slice(0, limit)) {
    table.addRow(
      e.phase,
      e.workerIndex,
      e.item,
      e.exitCode ?? "-",
      truncateMiddle(e.message, 80),
    );
  }
  return table.toString();
}

export function progressTable(snapshot: ProgressSnapshot): string {
  const title = snapshot.phase
    ? `Progress (${snapshot.phase}) ${fmtPercent(snapshot.percent)}`
    : `Progress ${fmtPercent(snapshot.percent)}`;
  const table = new AsciiTable3(title)
    .setHeading("Worker", "State", "Items", "Failed", "Bytes", "Current")
    .setStyle("unicode-round");
  table.setAlign(6, AlignmentEnum.LEFT);
  for (const w of Object.values(snapshot.perWorker)) {
    table.addRow(
      w.workerIndex,
      w.state,
      `${w.itemsDone}/${w.itemsTotal}`,
      w.itemsFailed,
      `${fmtBytes(w.bytesDone)} / ${fmtBytes(w.loadBytes)}`,
      w.currentItem ?? "-",
    );
  }
  return table.toString();
}

export function progressLine(snapshot: ProgressSnapshot): string {
  const phase = snapshot.phase ? `${snapshot.phase} ` : "";
  return (
    `${phase}${fmtPercent(snapshot.percent)}  ` +
    `${snapshot.filesDone}/${snapshot.totalFiles} files  ` +
    `${fmtBytes(snapshot.bytesDone)}/${fmtBytes(snapshot.totalBytes)}  ` +
    `${snapshot.activeWorkers} active`
  );
}

export function planTable(plan: PhasePlan): string {
  const table = new AsciiTable3(
    `Plan (${plan.phase}): ${fmtLocalPath(plan.from)} -> ${fmtLocalPath(plan.to)}`,
  )
    .setHeading("Worker", "Items", "Load", "First items")
    .setStyle("unicode-round");
  table.setAlign(4, AlignmentEnum.LEFT);
  for (const a of plan.assignments) {
    table.addRow(
      a.workerIndex,
      a.items.length,
      fmtBytes(a.loadBytes),
      truncateMiddle(
        a.items
          .slice(0, 3)
          .map((i) => i.relativePath)
          .join(", ") || "-",
        60,
      ),
    );
  }
  return table.toString();
}

function isStored(issue: FilenameIssue | JobIssue): issue is JobIssue {
  return "status" in issue;
}

// A plan's fresh scan has no ids or statuses yet.
export function issuesTable(
  issues: readonly FilenameIssue[] | readonly JobIssue[],
  limit = 50,
): string {
  const stored = issues.length > 0 && isStored(issues[0]);
  const heading = stored
    ? ["ID", "Path", "Issue", "Suggested", "Status"]
    : ["Path", "Issue", "Suggested"];
  const table = new AsciiTable3(`Filename Issues (${issues.length})`)
    .setHeading(...heading)
    .setStyle("unicode-round");
  for (let i = 1; i <= heading.length; i++) table.setAlign(i, AlignmentEnum.LEFT);
  for (const issue of issues.slice(0, limit)) {
    const cells = [
      truncateMiddle(issue.relativePath, 60),
      issue.type,
      issue.suggestedName ?? "-",
    ];
    if (isStored(issue)) table.addRow(issue.id, ...cells, issue.status);
    else table.addRow(...cells);
  }
  return table.toString();
}

export function systemTable(status: SystemStatus): string {
  const table = new AsciiTable3("System")
    .setHeading("Field", "Value")
    .setStyle("unicode-round");
  table.setAlign(2, AlignmentEnum.LEFT);
  const mount =
    status.mount.state === "available"
      ? status.mount.mountPoint
        ? `available (${status.mount.mountPoint})`
        : "not configured"
      : `unavailable: ${status.mount.reason} (${status.mount.mountPoint})`;
  table.addRow("job db", fmtLocalPath(status.jobDbPath));
  table.addRow("mount", mount);
  table.addRow("jobs", status.jobsTotal);
  table.addRow("active jobs", status.jobsActive);
  return table.toString();
}
