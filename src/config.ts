import os from "node:os";
import { join } from "node:path";
import { CLI_NAME, DEFAULT_PARALLELISM, JOB_DB_FILE } from "./constants.js";
import { ConfigError } from "./errors.js";
import { normalizeExcludePatterns, splitPatternList } from "./ignore.js";

export type CancelPolicy = "terminate" | "drain";

export interface LanecopyConfig {
  home: string;
  jobDbPath: string;
  defaultParallelism: number;
  rsyncPath: string;
  rsyncArgs: string[];
  defaultExclude: string[];
  // remote-backed mount to probe before every scan; null disables the probe
  mountPoint: string | null;
  cancelPolicy: CancelPolicy;
  killGraceMs: number;
  persistIntervalMs: number;
  commandPollMs: number;
  progressMaxHz: number;
}

type Env = Record<string, string | undefined>;

export function resolveHome(env: Env = process.env): string {
  const explicit = env.LANECOPY_HOME?.trim();
  if (explicit) {
    return expandHome(explicit);
  }
  const xdg = env.XDG_DATA_HOME;
  if (xdg && xdg.trim()) {
    return join(expandHome(xdg), CLI_NAME);
  }
  const home = os.homedir();
  if (process.platform === "darwin") {
    return join(home, "Library", "Application Support", CLI_NAME);
  }
  if (process.platform === "win32") {
    const appData = env.APPDATA || join(home, "AppData", "Roaming");
    return join(appData, CLI_NAME);
  }
  return join(home, ".local", "share", CLI_NAME);
}

export function getJobDbPath(home = resolveHome()): string {
  return join(home, JOB_DB_FILE);
}

export function expandHome(p: string): string {
  if (!p) return p;
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return join(os.homedir(), p.slice(2));
  return p;
}

function envNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) {
    throw new ConfigError(`${key} must be a non-negative number`, "invalid_option", {
      key,
      value: raw,
    });
  }
  return n;
}

export function parseCancelPolicy(raw: string | undefined): CancelPolicy {
  const normalized = (raw ?? "").trim().toLowerCase();
  if (!normalized || normalized === "terminate") return "terminate";
  if (normalized === "drain") return "drain";
  throw new ConfigError(
    `invalid cancel policy '${raw}' (expected terminate or drain)`,
    "invalid_option",
    { value: raw },
  );
}

export function parseParallelism(raw: unknown): number {
  const n = typeof raw === "string" ? Number(raw.trim()) : raw;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 1) {
    throw new ConfigError(
      `parallelism must be a positive integer (got ${String(raw)})`,
      "invalid_parallelism",
      { value: raw },
    );
  }
  return n;
}

export function splitArgs(raw: string): string[] {
  return raw
    .split(/\s+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env): LanecopyConfig {
  const home = resolveHome(env);
  const mount = env.LANECOPY_MOUNT_POINT?.trim();
  return {
    home,
    jobDbPath: env.LANECOPY_JOB_DB?.trim() || getJobDbPath(home),
    defaultParallelism: env.LANECOPY_PARALLELISM
      ? parseParallelism(env.LANECOPY_PARALLELISM)
      : DEFAULT_PARALLELISM,
    rsyncPath: env.LANECOPY_RSYNC?.trim() || "rsync",
    rsyncArgs: splitArgs(env.LANECOPY_RSYNC_OPTIONS ?? "-a"),
    defaultExclude: normalizeExcludePatterns(
      splitPatternList(env.LANECOPY_EXCLUDE ?? ""),
    ),
    mountPoint: mount ? expandHome(mount) : null,
    cancelPolicy: parseCancelPolicy(env.LANECOPY_CANCEL_POLICY),
    killGraceMs: envNumber(env, "LANECOPY_KILL_GRACE_MS", 5000),
    persistIntervalMs: envNumber(env, "LANECOPY_PERSIST_INTERVAL_MS", 2000),
    commandPollMs: envNumber(env, "LANECOPY_COMMAND_POLL_MS", 1000),
    progressMaxHz: envNumber(env, "LANECOPY_PROGRESS_MAX_HZ", 3),
  };
}
