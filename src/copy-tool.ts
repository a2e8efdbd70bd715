// src/copy-tool.ts
//
// Runs the external copy tool (rsync) for exactly one scanned item and
// classifies how it ended. The tool is a black box: we only rely on its exit
// code and on best-effort parsing of --info=progress2 lines.

import { spawn } from "node:child_process";
import path from "node:path";
import { copyFilterArgs } from "./ignore.js";
import type { Logger } from "./logger.js";
import type { Item } from "./scan.js";
import { truncateMiddle } from "./util.js";

const PROGRESS_ARGS = [
  "--outbuf=L",
  "--no-inc-recursive",
  "--info=progress2",
  "--no-human-readable",
];

// rsync output that means the remote-backed mount went away under us
const MOUNT_LOST_MARKERS = [
  "Transport endpoint is not connected",
  "Stale file handle",
];

const MAX_ERROR_TEXT = 64 * 1024;

export interface CopyOptions {
  command: string;
  baseArgs: string[];
  exclude: string[];
  okCodes: number[];
  killGraceMs: number;
  progressMaxHz: number;
}

export type CopyProgressEvent = {
  transferredBytes: number;
  percent: number;
  speed?: string;
  etaMilliseconds?: number;
};

export interface ItemRequest {
  jobId: string;
  workerIndex: number;
  item: Item;
  sourceRoot: string;
  destRoot: string;
  options: CopyOptions;
  signal?: AbortSignal;
  onProgress?: (event: CopyProgressEvent) => void;
}

export type ItemOutcome =
  | { status: "completed"; exitCode: number; elapsedMs: number }
  | {
      status: "failed";
      exitCode: number | null;
      message: string;
      mountLost: boolean;
      elapsedMs: number;
    }
  | {
      status: "cancelled";
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      elapsedMs: number;
    };

export interface ItemExecutor {
  execute(request: ItemRequest): Promise<ItemOutcome>;
}

function withTrailingSlash(p: string): string {
  return p.endsWith("/") ? p : `${p}/`;
}

export function buildCopyArgs({
  item,
  sourceRoot,
  destRoot,
  options,
}: Pick<ItemRequest, "item" | "sourceRoot" | "destRoot" | "options">): string[] {
  const args = [
    ...options.baseArgs,
    ...PROGRESS_ARGS,
    ...copyFilterArgs(item.relativePath, item.isDirectory, options.exclude),
  ];
  const src = path.join(sourceRoot, item.relativePath);
  if (item.isDirectory) {
    // copy the directory's contents into the same-named directory
    args.push(
      withTrailingSlash(src),
      withTrailingSlash(path.join(destRoot, item.relativePath)),
    );
  } else {
    args.push(src, withTrailingSlash(destRoot));
  }
  return args;
}

export function parseProgressLine(line: string): CopyProgressEvent | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  const parts = trimmed.split(/\s+/);
  if (parts.length < 2) return null;
  const percentToken = parts[1];
  if (!percentToken.endsWith("%")) return null;
  const transferred = Number(parts[0].replace(/,/g, ""));
  if (!Number.isFinite(transferred)) return null;
  const percent = Number(percentToken.slice(0, -1));
  if (!Number.isFinite(percent)) return null;
  return {
    transferredBytes: transferred,
    percent,
    speed: parts[2],
    etaMilliseconds: parseEta(parts[3]),
  };
}

export function parseEta(token?: string): number | undefined {
  if (!token) return undefined;
  const segments = token.split(":").map((s) => Number(s));
  if (segments.some((n) => Number.isNaN(n))) return undefined;
  if (segments.length === 3) {
    const [h, m, s] = segments;
    return (h * 3600 + m * 60 + s) * 1000;
  }
  if (segments.length === 2) {
    const [m, s] = segments;
    return (m * 60 + s) * 1000;
  }
  if (segments.length === 1) {
    return segments[0] * 1000;
  }
  return undefined;
}

export function isToolErrorLine(line: string): boolean {
  const t = line.trim();
  return t.startsWith("rsync:") || t.startsWith("rsync error:");
}

export function indicatesMountLost(text: string): boolean {
  return MOUNT_LOST_MARKERS.some((marker) => text.includes(marker));
}

function failureMessage(
  exitCode: number | null,
  signal: NodeJS.Signals | null,
  errorText: string,
): string {
  const base =
    exitCode !== null
      ? `exit code ${exitCode}`
      : signal
        ? `killed by ${signal}`
        : "unknown exit status";
  const lines = errorText
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
  const last = lines[lines.length - 1];
  return last ? `copy failed (${base}): ${truncateMiddle(last, 400)}` : `copy failed (${base})`;
}

export class RsyncExecutor implements ItemExecutor {
  constructor(private readonly logger?: Logger) {}

  execute(request: ItemRequest): Promise<ItemOutcome> {
    const { options, signal, onProgress } = request;
    const started = Date.now();
    const elapsed = () => Date.now() - started;
    if (signal?.aborted) {
      return Promise.resolve({
        status: "cancelled",
        exitCode: null,
        signal: null,
        elapsedMs: 0,
      });
    }

    const args = buildCopyArgs(request);
    const log = this.logger;
    if (log?.isLevelEnabled("debug")) {
      log.debug("spawn copy tool", {
        worker: request.workerIndex,
        item: request.item.relativePath,
        command: options.command,
        args,
      });
    }
    const throttleMs =
      options.progressMaxHz > 0
        ? Math.max(10, Math.floor(1000 / options.progressMaxHz))
        : 0;

    return new Promise<ItemOutcome>((resolve) => {
      let settled = false;
      let aborted = false;
      let killTimer: NodeJS.Timeout | null = null;
      let stdoutBuffer = "";
      let errorText = "";
      let lastEmit = 0;
      let lastPercent = -1;

      const child = spawn(options.command, args, {
        stdio: ["ignore", "pipe", "pipe"],
      });

      const appendError = (text: string) => {
        errorText += text;
        if (errorText.length > MAX_ERROR_TEXT) {
          errorText = errorText.slice(-MAX_ERROR_TEXT);
        }
      };

      const onAbort = () => {
        aborted = true;
        if (child.exitCode !== null || child.signalCode !== null) return;
        child.kill("SIGTERM");
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            log?.warn("copy tool ignored SIGTERM; sending SIGKILL", {
              worker: request.workerIndex,
              item: request.item.relativePath,
              pid: child.pid,
            });
            child.kill("SIGKILL");
          }
        }, options.killGraceMs);
        killTimer.unref?.();
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const finish = (outcome: ItemOutcome) => {
        if (settled) return;
        settled = true;
        if (killTimer) clearTimeout(killTimer);
        signal?.removeEventListener("abort", onAbort);
        resolve(outcome);
      };

      child.stdout.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        stdoutBuffer += chunk;
        const pieces = stdoutBuffer.split(/[\r\n]+/);
        stdoutBuffer = pieces.pop() ?? "";
        for (const piece of pieces) {
          if (isToolErrorLine(piece)) {
            appendError(piece + "\n");
            continue;
          }
          const event = parseProgressLine(piece);
          if (!event || !onProgress) continue;
          const now = Date.now();
          if (event.percent < lastPercent) continue;
          if (event.percent === lastPercent && now - lastEmit < throttleMs) {
            continue;
          }
          lastPercent = event.percent;
          lastEmit = now;
          try {
            onProgress(event);
          } catch (err) {
            log?.warn("progress handler failed", {
              error: err instanceof Error ? err.message : String(err),
            });
          }
        }
      });

      child.stderr.setEncoding("utf8");
      child.stderr.on("data", (chunk: string) => appendError(chunk));

      child.on("error", (err) => {
        // spawn failure (missing binary, EACCES): no child to wait for
        finish({
          status: "failed",
          exitCode: null,
          message: `unable to run ${options.command}: ${err.message}`,
          mountLost: false,
          elapsedMs: elapsed(),
        });
      });

      // 'close' fires after the child exited and its pipes drained
      child.on("close", (code, sig) => {
        if (code !== null && options.okCodes.includes(code)) {
          finish({ status: "completed", exitCode: code, elapsedMs: elapsed() });
          return;
        }
        if (aborted) {
          finish({
            status: "cancelled",
            exitCode: code,
            signal: sig,
            elapsedMs: elapsed(),
          });
          return;
        }
        const message = failureMessage(code, sig, errorText);
        log?.warn("copy tool failed", {
          worker: request.workerIndex,
          item: request.item.relativePath,
          code,
          signal: sig,
          stderr: truncateMiddle(errorText, 400),
        });
        finish({
          status: "failed",
          exitCode: code,
          message,
          mountLost: indicatesMountLost(errorText),
          elapsedMs: elapsed(),
        });
      });
    });
  }
}
