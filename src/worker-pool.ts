/*
Run one phase of a job: one async lane per worker assignment, each lane
copying its items strictly in the order the batcher gave them. Lanes never
steal work from each other and an item failure never stops a lane.

Cancel and pause are cooperative and checked between items. With the
"terminate" cancel policy the in-flight copy is also aborted (SIGTERM, then
SIGKILL); with "drain" it runs to completion first.
*/

import type { WorkerAssignment } from "./batcher.js";
import type { CancelPolicy } from "./config.js";
import type {
  CopyOptions,
  CopyProgressEvent,
  ItemExecutor,
  ItemOutcome,
} from "./copy-tool.js";
import { ItemError } from "./errors.js";
import type { Phase } from "./job-state.js";
import type { Logger } from "./logger.js";
import type { Item } from "./scan.js";
import { errorMessage } from "./util.js";

interface EventBase {
  jobId: string;
  phase: Phase;
  workerIndex: number;
  ts: number;
}

export type WorkerEvent =
  | (EventBase & { type: "worker_started"; itemsTotal: number })
  | (EventBase & { type: "worker_waiting" })
  | (EventBase & { type: "item_started"; item: Item })
  | (EventBase & {
      type: "item_progress";
      item: Item;
      transferredBytes: number;
      percent: number;
      speed?: string;
    })
  | (EventBase & {
      type: "item_completed";
      item: Item;
      exitCode: number;
      elapsedMs: number;
    })
  | (EventBase & {
      type: "item_failed";
      item: Item;
      error: ItemError;
      mountLost: boolean;
    })
  | (EventBase & { type: "item_cancelled"; item: Item })
  | (EventBase & {
      type: "worker_finished";
      reason: "done" | "cancelled";
      notStarted: number;
    });

/**
 * Shared control for all lanes of a run: the cancel flag, the pause gate and,
 * under the terminate policy, the abort signal handed to every copy.
 */
export class RunControl {
  private cancelled = false;
  private paused = false;
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;
  private readonly abort = new AbortController();

  constructor(readonly cancelPolicy: CancelPolicy = "terminate") {}

  get signal(): AbortSignal {
    return this.abort.signal;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  pause(): boolean {
    if (this.cancelled || this.paused) return false;
    this.paused = true;
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
    return true;
  }

  resume(): boolean {
    if (!this.paused) return false;
    this.paused = false;
    this.release();
    return true;
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.paused = false;
    this.release();
    if (this.cancelPolicy === "terminate") {
      this.abort.abort();
    }
  }

  async waitWhilePaused(): Promise<void> {
    while (this.paused && !this.cancelled && this.gate) {
      await this.gate;
    }
  }

  private release() {
    const open = this.openGate;
    this.gate = null;
    this.openGate = null;
    open?.();
  }
}

export interface PoolOptions {
  jobId: string;
  phase: Phase;
  sourceRoot: string;
  destRoot: string;
  assignments: readonly WorkerAssignment[];
  executor: ItemExecutor;
  copyOptions: CopyOptions;
  control: RunControl;
  onEvent?: (event: WorkerEvent) => void;
  logger?: Logger;
}

export interface PoolResult {
  completed: number;
  failed: number;
  cancelled: number;
  notStarted: number;
  stopped: boolean;
}

type LaneResult = Omit<PoolResult, "stopped">;

export async function runWorkerPool(opts: PoolOptions): Promise<PoolResult> {
  const lanes = await Promise.all(
    opts.assignments.map((assignment) => runLane(assignment, opts)),
  );
  const result: PoolResult = {
    completed: 0,
    failed: 0,
    cancelled: 0,
    notStarted: 0,
    stopped: opts.control.isCancelled,
  };
  for (const lane of lanes) {
    result.completed += lane.completed;
    result.failed += lane.failed;
    result.cancelled += lane.cancelled;
    result.notStarted += lane.notStarted;
  }
  opts.logger?.info("worker pool finished", { phase: opts.phase, ...result });
  return result;
}

async function runLane(
  assignment: WorkerAssignment,
  opts: PoolOptions,
): Promise<LaneResult> {
  const { jobId, phase, control, executor } = opts;
  const workerIndex = assignment.workerIndex;
  const log = opts.logger?.child(`worker.${workerIndex}`);
  const base = (): EventBase => ({ jobId, phase, workerIndex, ts: Date.now() });
  const emit = (event: WorkerEvent) => {
    if (!opts.onEvent) return;
    try {
      opts.onEvent(event);
    } catch (err) {
      log?.warn("event handler failed", {
        type: event.type,
        error: errorMessage(err),
      });
    }
  };
  const gate = async () => {
    if (!control.isPaused) return;
    emit({ ...base(), type: "worker_waiting" });
    await control.waitWhilePaused();
  };

  const result: LaneResult = {
    completed: 0,
    failed: 0,
    cancelled: 0,
    notStarted: 0,
  };
  emit({ ...base(), type: "worker_started", itemsTotal: assignment.items.length });

  let next = 0;
  for (; next < assignment.items.length; next++) {
    await gate();
    if (control.isCancelled) break;
    const item = assignment.items[next];
    emit({ ...base(), type: "item_started", item });
    const outcome = await executeItem(opts, workerIndex, item, (p) =>
      emit({
        ...base(),
        type: "item_progress",
        item,
        transferredBytes: p.transferredBytes,
        percent: p.percent,
        speed: p.speed,
      }),
    );
    switch (outcome.status) {
      case "completed":
        result.completed += 1;
        emit({
          ...base(),
          type: "item_completed",
          item,
          exitCode: outcome.exitCode,
          elapsedMs: outcome.elapsedMs,
        });
        break;
      case "failed":
        result.failed += 1;
        log?.warn("item failed", {
          item: item.relativePath,
          exitCode: outcome.exitCode,
          message: outcome.message,
        });
        emit({
          ...base(),
          type: "item_failed",
          item,
          error: new ItemError(outcome.message, outcome.exitCode, {
            workerIndex,
            item: item.relativePath,
            phase,
          }),
          mountLost: outcome.mountLost,
        });
        break;
      case "cancelled":
        result.cancelled += 1;
        emit({ ...base(), type: "item_cancelled", item });
        break;
    }
  }

  // a paused run holds its lanes open so it cannot finish until resumed
  if (!control.isCancelled) await gate();

  result.notStarted = assignment.items.length - next;
  emit({
    ...base(),
    type: "worker_finished",
    reason: control.isCancelled ? "cancelled" : "done",
    notStarted: result.notStarted,
  });
  log?.debug("lane finished", { ...result });
  return result;
}

async function executeItem(
  opts: PoolOptions,
  workerIndex: number,
  item: Item,
  onProgress: (p: CopyProgressEvent) => void,
): Promise<ItemOutcome> {
  const started = Date.now();
  try {
    return await opts.executor.execute({
      jobId: opts.jobId,
      workerIndex,
      item,
      sourceRoot: opts.sourceRoot,
      destRoot: opts.destRoot,
      options: opts.copyOptions,
      signal: opts.control.signal,
      onProgress,
    });
  } catch (err) {
    return {
      status: "failed",
      exitCode: null,
      message: `copy failed: ${errorMessage(err)}`,
      mountLost: false,
      elapsedMs: Date.now() - started,
    };
  }
}
