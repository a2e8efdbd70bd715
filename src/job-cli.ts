// src/job-cli.ts

import { Command, Option } from "commander";
import { loadConfig } from "./config.js";
import { ISSUE_STATUSES, type IssueStatus } from "./job-db.js";
import { DIRECTIONS } from "./job-state.js";
import { JobController } from "./job-controller.js";
import { fetchJobLogs } from "./job-logs.js";
import {
  fmtBytes,
  issuesTable,
  jobErrorsTable,
  jobListTable,
  jobStatusTable,
  planTable,
  progressLine,
  progressTable,
  systemTable,
} from "./job-status.js";
import { parseLogLevelOption, renderLogRows } from "./cli-log-output.js";
import { collectExcludeOption } from "./ignore.js";
import { ConsoleLogger, LOG_LEVELS, parseLogLevel } from "./logger.js";
import { errorMessage } from "./util.js";

const DEFAULT_LOG_LINES = 2_500;
const PROGRESS_PRINT_MS = Number(process.env.LANECOPY_PROGRESS_PRINT_MS ?? 2000);

interface GlobalOpts {
  logLevel?: string;
  jobDb?: string;
}

interface CreateOpts {
  direction: string;
  parallelism?: number;
  exclude: string[];
  rsyncOptions?: string;
}

interface EditOpts {
  name?: string;
  source?: string;
  dest?: string;
  direction?: string;
  parallelism?: number;
  exclude: string[];
  clearExclude?: boolean;
  rsyncOptions?: string;
  clearRsyncOptions?: boolean;
}

interface JsonOpts {
  json?: boolean;
}

interface StartOpts {
  quiet?: boolean;
}

interface LogsOpts {
  tail?: number;
  since?: number;
  absolute?: boolean;
  level?: string;
  json?: boolean;
  scope?: string;
}

interface PlanOpts extends JsonOpts {
  parallelism?: number;
}

interface IssuesOpts extends JsonOpts {
  status?: IssueStatus;
  skip?: number;
  rename?: number;
  to?: string;
}

function parseIntOption(value: string): number {
  return Number.parseInt(value, 10);
}

function clampPositive(value: number | undefined, fallback: number): number {
  const n = Number(value);
  if (Number.isFinite(n) && n > 0) return n;
  return fallback;
}

export function registerJobCommands(program: Command) {
  const openController = (
    command: Command,
    reconcile: boolean,
  ): JobController => {
    const globals = command.optsWithGlobals<GlobalOpts>();
    const config = loadConfig();
    if (globals.jobDb) config.jobDbPath = globals.jobDb;
    const level = parseLogLevel(globals.logLevel, "info");
    const opts = { config, logger: new ConsoleLogger(level), logEchoLevel: level };
    return reconcile ? JobController.open(opts) : new JobController(opts);
  };

  // Runs `fn` with an open controller and reports failures the same way for
  // every command.
  const withController = async (
    label: string,
    command: Command,
    fn: (controller: JobController) => Promise<void> | void,
    { reconcile = true }: { reconcile?: boolean } = {},
  ) => {
    let controller: JobController | null = null;
    try {
      controller = openController(command, reconcile);
      await fn(controller);
    } catch (err) {
      console.error(`${label}: ${errorMessage(err)}`);
      process.exitCode = 1;
    } finally {
      await controller?.close();
    }
  };

  program
    .command("create")
    .description("Create a copy job (left in state created)")
    .argument("<name>", "unique job name")
    .argument("<source>", "source directory")
    .argument("<dest>", "destination directory")
    .addOption(
      new Option("-d, --direction <direction>", "copy direction")
        .choices([...DIRECTIONS])
        .default("push"),
    )
    .option("-p, --parallelism <n>", "number of copy workers", parseIntOption)
    .option(
      "-x, --exclude <pattern>",
      "gitignore-style exclude pattern (repeat or comma-separated)",
      collectExcludeOption,
      [] as string[],
    )
    .option(
      "--rsync-options <opts>",
      "rsync flags for this job instead of LANECOPY_RSYNC_OPTIONS",
    )
    .action(
      async (
        name: string,
        source: string,
        dest: string,
        opts: CreateOpts,
        command: Command,
      ) => {
        await withController("create", command, (controller) => {
          const id = controller.createJob({
            name,
            sourcePath: source,
            destPath: dest,
            direction: opts.direction,
            parallelism: opts.parallelism,
            excludePatterns: opts.exclude,
            rsyncOptions: opts.rsyncOptions,
          });
          console.log(`created job ${id} (${name})`);
        });
      },
    );

  program
    .command("list")
    .description("List copy jobs in creation order")
    .option("--json", "output JSON instead of a table", false)
    .action(async (opts: JsonOpts, command: Command) => {
      await withController("list", command, (controller) => {
        const jobs = controller.listJobs();
        if (opts.json) {
          console.log(JSON.stringify(jobs, null, 2));
          return;
        }
        console.log(jobs.length ? jobListTable(jobs) : "no jobs");
      });
    });

  program
    .command("status")
    .description("Show the persisted record of a job")
    .argument("<job>", "job id, id prefix or name")
    .option("--json", "output JSON instead of a table", false)
    .action(async (ref: string, opts: JsonOpts, command: Command) => {
      await withController("status", command, (controller) => {
        const job = controller.getJobStatus(ref);
        if (opts.json) {
          console.log(JSON.stringify(job, null, 2));
          return;
        }
        console.log(jobStatusTable(job));
        if (job.errors.length) console.log(jobErrorsTable(job));
      });
    });

  program
    .command("progress")
    .description("Show aggregate and per-worker progress of a job")
    .argument("<job>", "job id, id prefix or name")
    .option("--json", "output JSON instead of a table", false)
    .action(async (ref: string, opts: JsonOpts, command: Command) => {
      await withController("progress", command, (controller) => {
        const snapshot = controller.getProgress(ref);
        if (opts.json) {
          console.log(JSON.stringify(snapshot, null, 2));
          return;
        }
        if (Object.keys(snapshot.perWorker).length) {
          console.log(progressTable(snapshot));
        }
        console.log(progressLine(snapshot));
      });
    });

  program
    .command("start")
    .description(
      "Scan, batch and copy a job in the foreground (Ctrl-C cancels it)",
    )
    .argument("<job>", "job id, id prefix or name")
    .option("-q, --quiet", "do not print progress lines", false)
    .action(async (ref: string, opts: StartOpts, command: Command) => {
      await withController("start", command, async (controller) => {
        const handle = controller.startJob(ref);
        console.log(`started job ${handle.jobId}`);
        let lastPrint = 0;
        const unsubscribe = handle.subscribe((snapshot) => {
          if (opts.quiet) return;
          const now = Date.now();
          if (now - lastPrint < PROGRESS_PRINT_MS) return;
          lastPrint = now;
          console.log(progressLine(snapshot));
        });
        const onSignal = () => {
          console.error("cancelling; waiting for workers to stop");
          controller.cancelJob(handle.jobId).catch((err: unknown) => {
            console.error(`cancel: ${errorMessage(err)}`);
          });
        };
        process.once("SIGINT", onSignal);
        process.once("SIGTERM", onSignal);
        try {
          const job = await handle.done;
          console.log(jobStatusTable(job));
          if (job.errors.length) console.log(jobErrorsTable(job));
          if (job.state === "completed_with_errors") process.exitCode = 2;
          else if (job.state !== "completed") process.exitCode = 1;
        } finally {
          unsubscribe();
          process.off("SIGINT", onSignal);
          process.off("SIGTERM", onSignal);
        }
      });
    });

  program
    .command("pause")
    .description("Stop dispatching new items; running copies finish first")
    .argument("<job>", "job id, id prefix or name")
    .action(async (ref: string, _opts: object, command: Command) => {
      await withController("pause", command, (controller) => {
        const job = controller.pauseJob(ref);
        console.log(
          job.state === "paused"
            ? `paused job ${job.name}`
            : `queued pause for job ${job.name} (owner pid ${job.ownerPid ?? "-"})`,
        );
      });
    });

  program
    .command("resume")
    .description("Resume a paused job")
    .argument("<job>", "job id, id prefix or name")
    .action(async (ref: string, _opts: object, command: Command) => {
      await withController("resume", command, (controller) => {
        const job = controller.resumeJob(ref);
        console.log(
          job.state === "running"
            ? `resumed job ${job.name}`
            : `queued resume for job ${job.name} (owner pid ${job.ownerPid ?? "-"})`,
        );
      });
    });

  program
    .command("cancel")
    .description("Cancel a scanning, running or paused job")
    .argument("<job>", "job id, id prefix or name")
    .action(async (ref: string, _opts: object, command: Command) => {
      await withController("cancel", command, async (controller) => {
        const job = await controller.cancelJob(ref);
        console.log(
          job.state === "cancelled"
            ? `cancelled job ${job.name}`
            : `queued cancel for job ${job.name} (owner pid ${job.ownerPid ?? "-"})`,
        );
      });
    });

  program
    .command("edit")
    .description("Change the settings of a job that is not running")
    .argument("<job>", "job id, id prefix or name")
    .option("--name <name>", "new job name")
    .option("--source <path>", "new source directory")
    .option("--dest <path>", "new destination directory")
    .addOption(
      new Option("-d, --direction <direction>", "copy direction").choices([
        ...DIRECTIONS,
      ]),
    )
    .option("-p, --parallelism <n>", "number of copy workers", parseIntOption)
    .option(
      "-x, --exclude <pattern>",
      "replace exclude patterns (repeat or comma-separated)",
      collectExcludeOption,
      [] as string[],
    )
    .option("--clear-exclude", "remove all exclude patterns", false)
    .option("--rsync-options <opts>", "rsync flags for this job")
    .option(
      "--clear-rsync-options",
      "go back to LANECOPY_RSYNC_OPTIONS",
      false,
    )
    .action(async (ref: string, opts: EditOpts, command: Command) => {
      await withController("edit", command, (controller) => {
        const job = controller.updateJob(ref, {
          name: opts.name,
          sourcePath: opts.source,
          destPath: opts.dest,
          direction: opts.direction,
          parallelism: opts.parallelism,
          excludePatterns: opts.clearExclude
            ? []
            : opts.exclude.length
              ? opts.exclude
              : undefined,
          rsyncOptions: opts.clearRsyncOptions ? null : opts.rsyncOptions,
        });
        console.log(`updated job ${job.name}`);
      });
    });

  program
    .command("delete")
    .description("Delete a job that is not running, with its errors and logs")
    .argument("<job>", "job id, id prefix or name")
    .action(async (ref: string, _opts: object, command: Command) => {
      await withController("delete", command, (controller) => {
        const job = controller.getJobStatus(ref);
        controller.deleteJob(job.id);
        console.log(`deleted job ${job.name}`);
      });
    });

  program
    .command("plan")
    .description("Scan and batch a job without copying (dry run)")
    .argument("<job>", "job id, id prefix or name")
    .option("-p, --parallelism <n>", "override the job's worker count", parseIntOption)
    .option("--json", "output JSON instead of tables", false)
    .action(async (ref: string, opts: PlanOpts, command: Command) => {
      await withController("plan", command, async (controller) => {
        const plans = await controller.planJob(ref, opts.parallelism);
        if (opts.json) {
          console.log(JSON.stringify(plans, null, 2));
          return;
        }
        for (const plan of plans) {
          if (plan.error) {
            console.log(`${plan.phase}: cannot scan ${plan.from}: ${plan.error}`);
            continue;
          }
          console.log(planTable(plan));
          console.log(
            `${plan.phase}: ${plan.totalFiles} files, ${fmtBytes(plan.totalBytes)}, makespan ${fmtBytes(plan.makespanBytes)}`,
          );
          if (plan.issues.length) console.log(issuesTable(plan.issues));
        }
      });
    });

  program
    .command("issues")
    .description("List, skip or rename names the destination may reject")
    .argument("<job>", "job id, id prefix or name")
    .addOption(
      new Option("--status <status>", "only list issues in this status").choices([
        ...ISSUE_STATUSES,
      ]),
    )
    .option("--skip <id>", "mark an issue as skipped", parseIntOption)
    .option("--rename <id>", "rename the entry behind an issue", parseIntOption)
    .option("--to <name>", "new name for --rename (default: the suggestion)")
    .option("--json", "output JSON instead of a table", false)
    .action(async (ref: string, opts: IssuesOpts, command: Command) => {
      await withController("issues", command, async (controller) => {
        if (opts.skip !== undefined) {
          const issue = controller.skipIssue(ref, opts.skip);
          console.log(`skipped issue ${issue.id} (${issue.relativePath})`);
          return;
        }
        if (opts.rename !== undefined) {
          const issue = await controller.renameIssue(ref, opts.rename, opts.to);
          if (issue.status === "failed") {
            console.error(`rename of ${issue.relativePath} failed: ${issue.message ?? ""}`);
            process.exitCode = 1;
            return;
          }
          console.log(`${issue.relativePath}: ${issue.message ?? issue.status}`);
          return;
        }
        const issues = controller.listIssues(ref, opts.status);
        if (opts.json) {
          console.log(JSON.stringify(issues, null, 2));
          return;
        }
        console.log(issues.length ? issuesTable(issues) : "no filename issues");
      });
    });

  program
    .command("logs")
    .description("Show recent logs for a job")
    .argument("<job>", "job id, id prefix or name")
    .option("--tail <n>", "number of log entries to display", parseIntOption)
    .option("--since <ms>", "only show logs with ts >= ms since epoch", parseIntOption)
    .option("--absolute", "show times as absolute timestamps", false)
    .option(
      "--level <level>",
      `minimum log level (${LOG_LEVELS.join(", ")})`,
      (v: string) => v.trim().toLowerCase(),
    )
    .option("--json", "emit newline-delimited JSON", false)
    .option("--scope <scope>", "only include logs with matching scope")
    .action(async (ref: string, opts: LogsOpts, command: Command) => {
      await withController("logs", command, (controller) => {
        const job = controller.getJobStatus(ref);
        const rows = fetchJobLogs(controller.store.db, job.id, {
          limit: clampPositive(opts.tail, DEFAULT_LOG_LINES),
          minLevel: parseLogLevelOption(opts.level),
          sinceTs:
            opts.since != null && Number.isFinite(opts.since)
              ? opts.since
              : undefined,
          order: "desc",
          scope: opts.scope,
        }).reverse();
        if (!rows.length) {
          console.log("no logs");
          return;
        }
        renderLogRows(rows, { json: !!opts.json, absolute: !!opts.absolute });
      });
    });

  program
    .command("reconcile")
    .description("Fail jobs left active by a process that is no longer running")
    .action(async (_opts: object, command: Command) => {
      await withController(
        "reconcile",
        command,
        (controller) => {
          const ids = controller.reconcile();
          if (!ids.length) {
            console.log("no orphaned jobs");
            return;
          }
          for (const id of ids) {
            console.log(`${id}: failed (incomplete_on_restart)`);
          }
        },
        { reconcile: false },
      );
    });

  program
    .command("system")
    .description("Show mount status and job counts")
    .option("--json", "output JSON instead of a table", false)
    .action(async (opts: JsonOpts, command: Command) => {
      await withController("system", command, async (controller) => {
        const status = await controller.systemStatus();
        if (opts.json) {
          console.log(JSON.stringify(status, null, 2));
          return;
        }
        console.log(systemTable(status));
      });
    });
}
