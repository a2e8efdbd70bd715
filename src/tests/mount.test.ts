import fsp from "node:fs/promises";
import { join } from "node:path";
import { PathMountMonitor, isMountAvailable } from "../mount.js";
import { StaticMountMonitor, mkTmp } from "./util.js";

describe("PathMountMonitor", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkTmp("mount");
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  it("has nothing to probe without a mount point", async () => {
    expect(await new PathMountMonitor(null).status()).toEqual({
      state: "available",
      mountPoint: null,
    });
  });

  it("reports a readable directory as available", async () => {
    const monitor = new PathMountMonitor(tmp);
    expect(await monitor.status()).toEqual({ state: "available", mountPoint: tmp });
    expect(await isMountAvailable(monitor)).toBe(true);
  });

  it("reports a missing mount point", async () => {
    const mountPoint = join(tmp, "gone");
    const status = await new PathMountMonitor(mountPoint).status();
    expect(status).toMatchObject({
      state: "unavailable",
      mountPoint,
      reason: "missing",
    });
  });

  it("is driven by the static stand-in in controller tests", async () => {
    const monitor = new StaticMountMonitor();
    expect(await isMountAvailable(monitor)).toBe(true);
    monitor.current = {
      state: "unavailable",
      mountPoint: "/mnt/remote",
      reason: "disconnected",
      message: "Transport endpoint is not connected",
    };
    expect(await isMountAvailable(monitor)).toBe(false);
  });
});
