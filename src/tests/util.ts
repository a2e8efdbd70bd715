import fsp from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { LanecopyConfig } from "../config.js";
import type { ItemExecutor, ItemOutcome, ItemRequest } from "../copy-tool.js";
import type { MountMonitor, MountStatus } from "../mount.js";
import type { Item } from "../scan.js";

export function wait(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export async function waitFor(
  predicate: () => boolean,
  { timeoutMs = 5000, intervalMs = 5 } = {},
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeoutMs} ms`);
    }
    await wait(intervalMs);
  }
}

// Fails fast with a named error instead of the runner's generic timeout.
export async function within<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`${label} did not finish within ${ms} ms`)),
      ms,
    );
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(join(tmpdir(), `lanecopy-${prefix}-`));
}

// Writes files under root. A number value writes that many bytes.
export async function makeTree(
  root: string,
  files: Record<string, string | number>,
): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = join(root, rel);
    await fsp.mkdir(dirname(abs), { recursive: true });
    await fsp.writeFile(
      abs,
      typeof content === "number" ? Buffer.alloc(content, 120) : content,
    );
  }
}

export function item(
  relativePath: string,
  sizeBytes: number,
  extra: Partial<Item> = {},
): Item {
  return {
    relativePath,
    sizeBytes,
    isDirectory: false,
    fileCount: 1,
    ...extra,
  };
}

export function testConfig(
  home: string,
  overrides: Partial<LanecopyConfig> = {},
): LanecopyConfig {
  return {
    home,
    jobDbPath: join(home, "jobs.db"),
    defaultParallelism: 4,
    rsyncPath: "rsync",
    rsyncArgs: ["-a"],
    defaultExclude: [],
    mountPoint: null,
    cancelPolicy: "terminate",
    killGraceMs: 1000,
    persistIntervalMs: 0,
    commandPollMs: 0,
    progressMaxHz: 0,
    ...overrides,
  };
}

export class StaticMountMonitor implements MountMonitor {
  constructor(
    public current: MountStatus = { state: "available", mountPoint: null },
  ) {}

  async status(): Promise<MountStatus> {
    return this.current;
  }
}

type Failure = { message: string; exitCode?: number; mountLost?: boolean };

/**
 * In-process stand-in for the copy tool. Items succeed unless listed in
 * `failures`; while `hold` is set every item blocks until released or
 * aborted.
 */
export class FakeExecutor implements ItemExecutor {
  readonly calls: ItemRequest[] = [];
  readonly failures = new Map<string, Failure>();
  hold = false;
  private waiting: (() => void)[] = [];

  get inFlight(): number {
    return this.waiting.length;
  }

  started(): string[] {
    return this.calls.map((c) => c.item.relativePath);
  }

  releaseAll(): void {
    this.hold = false;
    const waiting = this.waiting;
    this.waiting = [];
    for (const resolve of waiting) resolve();
  }

  async execute(req: ItemRequest): Promise<ItemOutcome> {
    this.calls.push(req);
    req.onProgress?.({
      transferredBytes: Math.floor(req.item.sizeBytes / 2),
      percent: 50,
    });
    if (this.hold && !req.signal?.aborted) {
      await new Promise<void>((resolve) => {
        const done = () => {
          this.waiting = this.waiting.filter((w) => w !== done);
          resolve();
        };
        this.waiting.push(done);
        req.signal?.addEventListener("abort", done, { once: true });
      });
    }
    if (req.signal?.aborted) {
      return { status: "cancelled", exitCode: null, signal: "SIGTERM", elapsedMs: 1 };
    }
    const failure = this.failures.get(req.item.relativePath);
    if (failure) {
      return {
        status: "failed",
        exitCode: failure.exitCode ?? 23,
        message: failure.message,
        mountLost: failure.mountLost ?? false,
        elapsedMs: 1,
      };
    }
    return { status: "completed", exitCode: 0, elapsedMs: 1 };
  }
}
