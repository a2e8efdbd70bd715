import { EventEmitter } from "node:events";
import type { WorkerAssignment } from "./batcher.js";
import type { Phase } from "./job-state.js";
import type { WorkerEvent } from "./worker-pool.js";

export type WorkerRunState =
  | "pending"
  | "running"
  | "paused"
  | "finished"
  | "cancelled";

export interface WorkerProgress {
  workerIndex: number;
  state: WorkerRunState;
  currentItem: string | null;
  itemsDone: number;
  itemsFailed: number;
  itemsTotal: number;
  bytesDone: number;
  loadBytes: number;
}

export interface ProgressSnapshot {
  jobId: string;
  phase: Phase | null;
  totalFiles: number;
  filesDone: number;
  totalBytes: number;
  bytesDone: number;
  perWorker: Record<number, WorkerProgress>;
  activeWorkers: number;
  percent: number;
  updatedAt: number;
}

export function emptySnapshot(
  jobId: string,
  phase: Phase | null = null,
): ProgressSnapshot {
  return {
    jobId,
    phase,
    totalFiles: 0,
    filesDone: 0,
    totalBytes: 0,
    bytesDone: 0,
    perWorker: {},
    activeWorkers: 0,
    percent: 0,
    updatedAt: Date.now(),
  };
}

export function percentOf(s: {
  totalFiles: number;
  filesDone: number;
  totalBytes: number;
  bytesDone: number;
}): number {
  if (s.totalBytes > 0) return (s.bytesDone / s.totalBytes) * 100;
  if (s.totalFiles > 0) return (s.filesDone / s.totalFiles) * 100;
  return 0;
}

type Listener = (snapshot: ProgressSnapshot) => void;

/**
 * Folds worker events into one consistent progress view.
 *
 * Bytes of an item that is still copying are tracked per worker and replaced
 * by the item's scanned size when it completes, so partial progress is never
 * counted twice. Failed and cancelled items drop their partial bytes.
 * Each lane writes only its own slot; events are applied one at a time on the
 * event loop, so a snapshot always reflects whole events.
 */
export class ProgressAggregator {
  private readonly emitter = new EventEmitter();
  private readonly workers = new Map<number, WorkerProgress>();
  private readonly inflight = new Map<number, number>();
  private readonly totalFiles: number;
  private readonly totalBytes: number;
  private filesDone = 0;
  private completedBytes = 0;
  private updatedAt = Date.now();

  constructor(
    private readonly jobId: string,
    private readonly phase: Phase | null,
    assignments: readonly WorkerAssignment[],
  ) {
    let files = 0;
    let bytes = 0;
    for (const a of assignments) {
      for (const item of a.items) files += item.fileCount;
      bytes += a.loadBytes;
      this.workers.set(a.workerIndex, {
        workerIndex: a.workerIndex,
        state: "pending",
        currentItem: null,
        itemsDone: 0,
        itemsFailed: 0,
        itemsTotal: a.items.length,
        bytesDone: 0,
        loadBytes: a.loadBytes,
      });
    }
    this.totalFiles = files;
    this.totalBytes = bytes;
  }

  apply(event: WorkerEvent): void {
    const w = this.workers.get(event.workerIndex);
    if (!w) return;
    switch (event.type) {
      case "worker_started":
        w.state = "running";
        break;
      case "worker_waiting":
        w.state = "paused";
        break;
      case "item_started":
        w.state = "running";
        w.currentItem = event.item.relativePath;
        this.inflight.set(w.workerIndex, 0);
        break;
      case "item_progress":
        this.inflight.set(
          w.workerIndex,
          Math.max(0, Math.min(event.transferredBytes, event.item.sizeBytes)),
        );
        break;
      case "item_completed":
        this.inflight.delete(w.workerIndex);
        this.completedBytes += event.item.sizeBytes;
        this.filesDone += event.item.fileCount;
        w.itemsDone += 1;
        w.bytesDone += event.item.sizeBytes;
        w.currentItem = null;
        break;
      case "item_failed":
        this.inflight.delete(w.workerIndex);
        w.itemsFailed += 1;
        w.currentItem = null;
        break;
      case "item_cancelled":
        this.inflight.delete(w.workerIndex);
        w.currentItem = null;
        break;
      case "worker_finished":
        this.inflight.delete(w.workerIndex);
        w.currentItem = null;
        w.state = event.reason === "cancelled" ? "cancelled" : "finished";
        break;
    }
    this.updatedAt = event.ts;
    this.emitter.emit("snapshot", this.snapshot());
  }

  snapshot(): ProgressSnapshot {
    let inflight = 0;
    for (const bytes of this.inflight.values()) inflight += bytes;
    const bytesDone = Math.min(this.totalBytes, this.completedBytes + inflight);
    const filesDone = Math.min(this.totalFiles, this.filesDone);
    const perWorker: Record<number, WorkerProgress> = {};
    let activeWorkers = 0;
    for (const w of this.workers.values()) {
      perWorker[w.workerIndex] = { ...w };
      if (w.state === "running") activeWorkers += 1;
    }
    const counts = {
      totalFiles: this.totalFiles,
      filesDone,
      totalBytes: this.totalBytes,
      bytesDone,
    };
    return {
      jobId: this.jobId,
      phase: this.phase,
      ...counts,
      perWorker,
      activeWorkers,
      percent: percentOf(counts),
      updatedAt: this.updatedAt,
    };
  }

  subscribe(listener: Listener): () => void {
    this.emitter.on("snapshot", listener);
    return () => {
      this.emitter.off("snapshot", listener);
    };
  }
}
