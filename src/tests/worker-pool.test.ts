import type { WorkerAssignment } from "../batcher.js";
import type { CopyOptions, ItemExecutor } from "../copy-tool.js";
import { ItemError } from "../errors.js";
import {
  type PoolOptions,
  RunControl,
  type WorkerEvent,
  runWorkerPool,
} from "../worker-pool.js";
import { FakeExecutor, item, wait, waitFor } from "./util.js";

const copyOptions: CopyOptions = {
  command: "rsync",
  baseArgs: ["-a"],
  exclude: [],
  okCodes: [0],
  killGraceMs: 1000,
  progressMaxHz: 0,
};

function lanes(): WorkerAssignment[] {
  return [
    { workerIndex: 0, items: [item("a", 100), item("b", 50)], loadBytes: 150 },
    { workerIndex: 1, items: [item("c", 120)], loadBytes: 120 },
  ];
}

function poolOptions(
  executor: ItemExecutor,
  control: RunControl,
  events: WorkerEvent[] = [],
): PoolOptions {
  return {
    jobId: "job-1",
    phase: "push",
    sourceRoot: "/src",
    destRoot: "/dst",
    assignments: lanes(),
    executor,
    copyOptions,
    control,
    onEvent: (e) => events.push(e),
  };
}

describe("RunControl", () => {
  it("toggles pause and resume once each", () => {
    const control = new RunControl();
    expect(control.pause()).toBe(true);
    expect(control.pause()).toBe(false);
    expect(control.isPaused).toBe(true);
    expect(control.resume()).toBe(true);
    expect(control.resume()).toBe(false);
  });

  it("aborts in-flight copies only under the terminate policy", () => {
    const terminate = new RunControl("terminate");
    terminate.cancel();
    expect(terminate.signal.aborted).toBe(true);
    expect(terminate.pause()).toBe(false);

    const drain = new RunControl("drain");
    drain.cancel();
    expect(drain.isCancelled).toBe(true);
    expect(drain.signal.aborted).toBe(false);
  });

  it("releases waiters on cancel", async () => {
    const control = new RunControl();
    control.pause();
    const waiting = control.waitWhilePaused();
    control.cancel();
    await waiting;
    expect(control.isPaused).toBe(false);
  });
});

describe("runWorkerPool", () => {
  it("runs each lane in assignment order", async () => {
    const executor = new FakeExecutor();
    const events: WorkerEvent[] = [];
    const result = await runWorkerPool(poolOptions(executor, new RunControl(), events));

    expect(result).toEqual({
      completed: 3,
      failed: 0,
      cancelled: 0,
      notStarted: 0,
      stopped: false,
    });
    const lane0 = executor.calls
      .filter((c) => c.workerIndex === 0)
      .map((c) => c.item.relativePath);
    expect(lane0).toEqual(["a", "b"]);
    expect(events.filter((e) => e.workerIndex === 0).map((e) => e.type)).toEqual([
      "worker_started",
      "item_started",
      "item_progress",
      "item_completed",
      "item_started",
      "item_progress",
      "item_completed",
      "worker_finished",
    ]);
    expect(executor.calls[0]).toMatchObject({
      jobId: "job-1",
      sourceRoot: "/src",
      destRoot: "/dst",
      options: copyOptions,
    });
  });

  it("keeps going after a failed item", async () => {
    const executor = new FakeExecutor();
    executor.failures.set("a", { message: "boom" });
    const events: WorkerEvent[] = [];
    const result = await runWorkerPool(poolOptions(executor, new RunControl(), events));

    expect(result).toMatchObject({ completed: 2, failed: 1, stopped: false });
    expect(executor.started()).toContain("b");
    const failed = events.find((e) => e.type === "item_failed");
    expect(failed?.type === "item_failed" && failed.error).toBeInstanceOf(ItemError);
    if (failed?.type === "item_failed") {
      expect(failed.error.message).toBe("boom");
      expect(failed.error.exitCode).toBe(23);
      expect(failed.item.relativePath).toBe("a");
      expect(failed.mountLost).toBe(false);
    }
  });

  it("turns a throwing executor into a failed item", async () => {
    const executor: ItemExecutor = {
      execute: async () => {
        throw new Error("kaput");
      },
    };
    const events: WorkerEvent[] = [];
    const result = await runWorkerPool(poolOptions(executor, new RunControl(), events));
    expect(result).toMatchObject({ completed: 0, failed: 3 });
    const messages = events.flatMap((e) =>
      e.type === "item_failed" ? [e.error.message] : [],
    );
    expect(messages).toEqual(["copy failed: kaput", "copy failed: kaput", "copy failed: kaput"]);
  });

  it("survives a throwing event handler", async () => {
    const executor = new FakeExecutor();
    const opts = poolOptions(executor, new RunControl());
    opts.onEvent = () => {
      throw new Error("listener bug");
    };
    const result = await runWorkerPool(opts);
    expect(result.completed).toBe(3);
  });

  it("terminates in-flight items and skips the rest on cancel", async () => {
    const executor = new FakeExecutor();
    executor.hold = true;
    const control = new RunControl("terminate");
    const events: WorkerEvent[] = [];
    const run = runWorkerPool(poolOptions(executor, control, events));
    await waitFor(() => executor.inFlight === 2);
    control.cancel();
    const result = await run;

    expect(result).toEqual({
      completed: 0,
      failed: 0,
      cancelled: 2,
      notStarted: 1,
      stopped: true,
    });
    expect(executor.started()).not.toContain("b");
    const finished = events.flatMap((e) =>
      e.type === "worker_finished" ? [[e.workerIndex, e.reason, e.notStarted]] : [],
    );
    expect(finished).toEqual(
      expect.arrayContaining([
        [0, "cancelled", 1],
        [1, "cancelled", 0],
      ]),
    );
  });

  it("lets in-flight items finish under the drain policy", async () => {
    const executor = new FakeExecutor();
    executor.hold = true;
    const control = new RunControl("drain");
    const run = runWorkerPool(poolOptions(executor, control));
    await waitFor(() => executor.inFlight === 2);
    control.cancel();
    executor.releaseAll();
    const result = await run;
    expect(result).toEqual({
      completed: 2,
      failed: 0,
      cancelled: 0,
      notStarted: 1,
      stopped: true,
    });
  });

  it("holds lanes at the pause gate until resumed", async () => {
    const executor = new FakeExecutor();
    const control = new RunControl();
    control.pause();
    const events: WorkerEvent[] = [];
    let settled = false;
    const run = runWorkerPool(poolOptions(executor, control, events)).then((r) => {
      settled = true;
      return r;
    });
    await waitFor(
      () => events.filter((e) => e.type === "worker_waiting").length === 2,
    );
    await wait(20);
    expect(executor.calls).toHaveLength(0);
    expect(settled).toBe(false);

    control.resume();
    const result = await run;
    expect(result.completed).toBe(3);
  });

  it("pauses between items and does not finish while paused", async () => {
    const executor = new FakeExecutor();
    executor.hold = true;
    const control = new RunControl();
    let settled = false;
    const run = runWorkerPool(poolOptions(executor, control)).then((r) => {
      settled = true;
      return r;
    });
    await waitFor(() => executor.inFlight === 2);
    control.pause();
    executor.releaseAll();
    await wait(30);
    expect(executor.started().sort()).toEqual(["a", "c"]);
    expect(settled).toBe(false);

    control.resume();
    const result = await run;
    expect(result).toMatchObject({ completed: 3, stopped: false });
    expect(executor.started()).toContain("b");
  });

  it("cancels a paused run without starting anything", async () => {
    const executor = new FakeExecutor();
    const control = new RunControl();
    control.pause();
    const run = runWorkerPool(poolOptions(executor, control));
    await wait(10);
    control.cancel();
    const result = await run;
    expect(result).toEqual({
      completed: 0,
      failed: 0,
      cancelled: 0,
      notStarted: 3,
      stopped: true,
    });
  });
});
