import {
  fmtAgo,
  fmtBytes,
  fmtMs,
  fmtPercent,
  issuesTable,
  jobListTable,
  progressLine,
  shortId,
} from "../job-status.js";
import type { JobIssue, JobSummary } from "../job-db.js";
import { emptySnapshot } from "../progress.js";

describe("formatting", () => {
  it("formats byte counts", () => {
    expect(fmtBytes(0)).toBe("0 B");
    expect(fmtBytes(512)).toBe("512 B");
    expect(fmtBytes(1536)).toBe("1.5 KiB");
    expect(fmtBytes(5 * 1024 ** 3)).toBe("5.0 GiB");
    expect(fmtBytes(-1)).toBe("-");
  });

  it("formats durations", () => {
    expect(fmtMs(null)).toBe("-");
    expect(fmtMs(500)).toBe("500 ms");
    expect(fmtMs(1500)).toBe("1.50 s");
    expect(fmtMs(125_000)).toBe("2m 5s");
  });

  it("formats relative times", () => {
    const now = 1_700_000_000_000;
    expect(fmtAgo(now, now)).toBe("now");
    expect(fmtAgo(now - 5000, now)).toBe("5 seconds ago");
    expect(fmtAgo(now - 2 * 60 * 60 * 1000, now)).toBe("2 hours ago");
  });

  it("clamps percentages", () => {
    expect(fmtPercent(120)).toBe("100.0%");
    expect(fmtPercent(-3)).toBe("0.0%");
    expect(fmtPercent(100 / 3)).toBe("33.3%");
  });

  it("shortens ids", () => {
    expect(shortId("0123456789abcdef")).toBe("01234567");
  });

  it("prints a one-line progress summary", () => {
    const snapshot = {
      ...emptySnapshot("job-1", "push"),
      totalFiles: 2,
      filesDone: 1,
      totalBytes: 1024,
      bytesDone: 512,
      activeWorkers: 1,
      percent: 50,
    };
    expect(progressLine(snapshot)).toBe(
      "push 50.0%  1/2 files  512 B/1.0 KiB  1 active",
    );
  });

  it("renders the job list", () => {
    const job: JobSummary = {
      id: "0123456789abcdef",
      name: "photos",
      sourcePath: "/data/photos",
      destPath: "/mnt/photos",
      direction: "push",
      parallelism: 4,
      excludePatterns: [],
      rsyncOptions: null,
      state: "running",
      phase: "push",
      createdAt: 0,
      updatedAt: 0,
      startedAt: null,
      finishedAt: null,
      failure: null,
      ownerPid: 42,
      lastHeartbeat: null,
      totalFiles: 0,
      filesDone: 0,
      totalBytes: 0,
      bytesDone: 0,
      runCount: 1,
      lastRunMs: null,
      totalFilesCopied: 0,
      totalBytesCopied: 0,
      errorCount: 3,
    };
    const table = jobListTable([job]);
    const line = table.split("\n").find((l) => l.includes("photos"));
    expect(line).toBeDefined();
    expect(line).toContain("01234567");
    expect(line).toContain("running");
    expect(table).toContain("Copy Jobs");
  });

  it("renders stored and freshly scanned filename issues", () => {
    const scanned = {
      relativePath: "dir/x:y",
      name: "x:y",
      isDirectory: false,
      type: "colon" as const,
      char: ":",
      suggestedName: "x-y",
    };
    const fresh = issuesTable([scanned]);
    expect(fresh).toContain("Filename Issues (1)");
    expect(fresh).not.toContain("Status");

    const stored: JobIssue = {
      ...scanned,
      id: 7,
      phase: "push",
      status: "skipped",
      message: null,
      foundAt: 0,
      resolvedAt: 1,
    };
    const line = issuesTable([stored])
      .split("\n")
      .find((l) => l.includes("dir/x:y"));
    expect(line).toContain("7");
    expect(line).toContain("skipped");
    expect(line).toContain("x-y");
  });
});
