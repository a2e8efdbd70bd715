import fsp from "node:fs/promises";
import { join } from "node:path";
import { formatLogRow, parseLogLevelOption } from "../cli-log-output.js";
import { ConfigError } from "../errors.js";
import { JobStore } from "../job-db.js";
import { JobLogStore, createJobLogger, fetchJobLogs } from "../job-logs.js";
import { mkTmp } from "./util.js";

describe("job logs", () => {
  let tmp: string;
  let store: JobStore;
  let jobId: string;

  beforeEach(async () => {
    tmp = await mkTmp("logs");
    store = JobStore.open(join(tmp, "jobs.db"));
    jobId = store.insertJob({
      name: "logs",
      sourcePath: "/a",
      destPath: "/b",
      direction: "push",
      parallelism: 1,
      excludePatterns: [],
      rsyncOptions: null,
    });
  });

  afterEach(async () => {
    store.close();
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  it("persists scoped entries and filters them", () => {
    const logger = createJobLogger(store.db, jobId, { scope: "job" });
    logger.info("job started", { run: 1 });
    logger.child("push").warn("item failed", { item: "a.bin" });
    logger.debug("noise");

    const rows = fetchJobLogs(store.db, jobId);
    expect(rows.map((r) => [r.level, r.scope, r.message, r.meta])).toEqual([
      ["info", "job", "job started", { run: 1 }],
      ["warn", "job.push", "item failed", { item: "a.bin" }],
      ["debug", "job", "noise", null],
    ]);

    expect(fetchJobLogs(store.db, jobId, { minLevel: "warn" }).map((r) => r.message)).toEqual([
      "item failed",
    ]);
    expect(fetchJobLogs(store.db, jobId, { scope: "job.push" })).toHaveLength(1);
    expect(
      fetchJobLogs(store.db, jobId, { order: "desc", limit: 1 }).map((r) => r.message),
    ).toEqual(["noise"]);
    expect(
      fetchJobLogs(store.db, jobId, { afterId: rows[0].id }).map((r) => r.message),
    ).toEqual(["item failed", "noise"]);
  });

  it("keeps only the newest rows", () => {
    const logs = new JobLogStore(store.db, jobId, { keepRows: 3, keepMs: 0 });
    for (let i = 0; i < 5; i++) {
      logs.append({ ts: Date.now(), level: "info", message: `line ${i}` });
    }
    expect(fetchJobLogs(store.db, jobId).map((r) => r.message)).toEqual([
      "line 2",
      "line 3",
      "line 4",
    ]);
  });

  it("drops entries older than the retention window", () => {
    const logs = new JobLogStore(store.db, jobId, { keepRows: 0, keepMs: 1000 });
    logs.append({ ts: 5, level: "info", message: "old" });
    logs.append({ ts: Date.now(), level: "info", message: "new" });
    expect(fetchJobLogs(store.db, jobId).map((r) => r.message)).toEqual(["new"]);
  });

  it("goes away with its job", () => {
    createJobLogger(store.db, jobId).info("hello");
    store.deleteJob(jobId);
    expect(fetchJobLogs(store.db, jobId)).toEqual([]);
  });
});

describe("log output", () => {
  const row = {
    id: 7,
    job_id: "job-1",
    ts: 0,
    level: "warn" as const,
    scope: "job.push",
    message: "item failed",
    meta: { item: "a.bin" },
  };

  it("formats text and JSON lines", () => {
    expect(formatLogRow(row, { json: false, absolute: true })).toBe(
      '(1970-01-01T00:00:00.000Z) WARN [job.push] item failed {"item":"a.bin"}',
    );
    expect(JSON.parse(formatLogRow(row, { json: true, absolute: false }))).toEqual({
      id: 7,
      ts: 0,
      level: "warn",
      scope: "job.push",
      message: "item failed",
      meta: { item: "a.bin" },
    });
  });

  it("parses log levels", () => {
    expect(parseLogLevelOption(undefined)).toBeUndefined();
    expect(parseLogLevelOption("WARN")).toBe("warn");
    expect(() => parseLogLevelOption("loud")).toThrow(ConfigError);
  });
});
