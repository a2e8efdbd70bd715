// The remote-backed mount is owned by something else (a FUSE daemon, a
// systemd unit). All we need is a typed answer to "is it usable right now".

import { readdir } from "node:fs/promises";
import { errnoCode, errorMessage } from "./util.js";

export type MountStatus =
  | { state: "available"; mountPoint: string | null }
  | {
      state: "unavailable";
      mountPoint: string;
      reason: "missing" | "disconnected" | "stale" | "unreadable";
      message: string;
    };

export interface MountMonitor {
  status(): Promise<MountStatus>;
}

export async function isMountAvailable(monitor: MountMonitor): Promise<boolean> {
  return (await monitor.status()).state === "available";
}

function reasonFor(code: string | undefined) {
  switch (code) {
    case "ENOENT":
    case "ENOTDIR":
      return "missing" as const;
    case "ENOTCONN":
      return "disconnected" as const;
    case "ESTALE":
      return "stale" as const;
    default:
      return "unreadable" as const;
  }
}

/**
 * Probes a mount point by listing it. A dead FUSE mount answers with ENOTCONN
 * ("Transport endpoint is not connected") and a dropped NFS handle with
 * ESTALE. A null mount point means nothing to probe.
 */
export class PathMountMonitor implements MountMonitor {
  constructor(readonly mountPoint: string | null) {}

  async status(): Promise<MountStatus> {
    const mountPoint = this.mountPoint;
    if (mountPoint === null) {
      return { state: "available", mountPoint: null };
    }
    try {
      await readdir(mountPoint);
      return { state: "available", mountPoint };
    } catch (err) {
      return {
        state: "unavailable",
        mountPoint,
        reason: reasonFor(errnoCode(err)),
        message: errorMessage(err),
      };
    }
  }
}
