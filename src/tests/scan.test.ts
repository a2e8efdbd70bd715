import fsp from "node:fs/promises";
import { join } from "node:path";
import { buildCopyArgs } from "../copy-tool.js";
import { ScanError } from "../errors.js";
import { type ScanOptions, scanRoot } from "../scan.js";
import { makeTree, mkTmp, within } from "./util.js";

const SCAN_LIMIT_MS = 3000;

const scan = (root: string, opts?: ScanOptions) =>
  within(scanRoot(root, opts), SCAN_LIMIT_MS, "scanRoot");

describe("scanRoot", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkTmp("scan");
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  async function scanError(path: string): Promise<ScanError> {
    try {
      await scanRoot(path);
    } catch (err) {
      if (err instanceof ScanError) return err;
      throw err;
    }
    throw new Error("expected scan to fail");
  }

  it("reports a missing source as not_found", async () => {
    const err = await scanError(join(tmp, "nope"));
    expect(err.code).toBe("not_found");
  });

  it("reports a file source as not_a_directory", async () => {
    await makeTree(tmp, { "file.txt": "x" });
    const err = await scanError(join(tmp, "file.txt"));
    expect(err.code).toBe("not_a_directory");
  });

  it("returns an empty result for an empty directory", async () => {
    const result = await scan(tmp);
    expect(result).toEqual({
      root: tmp,
      items: [],
      totalFiles: 0,
      totalBytes: 0,
      empty: true,
      issues: [],
    });
  });

  it("lists top-level entries in name order with recursive directory sizes", async () => {
    await makeTree(tmp, {
      "b.bin": 10,
      "a/one.bin": 100,
      "a/deep/two.bin": 50,
      "c/three.bin": 7,
    });
    await fsp.mkdir(join(tmp, "d"));

    const result = await scan(tmp);
    expect(result.items).toEqual([
      { relativePath: "a", sizeBytes: 150, isDirectory: true, fileCount: 2 },
      { relativePath: "b.bin", sizeBytes: 10, isDirectory: false, fileCount: 1 },
      { relativePath: "c", sizeBytes: 7, isDirectory: true, fileCount: 1 },
      { relativePath: "d", sizeBytes: 0, isDirectory: true, fileCount: 0 },
    ]);
    expect(result.totalFiles).toBe(4);
    expect(result.totalBytes).toBe(167);
    expect(result.empty).toBe(false);
  });

  it("keeps zero-byte files", async () => {
    await makeTree(tmp, { "empty.txt": "" });
    const result = await scan(tmp);
    expect(result.items).toEqual([
      { relativePath: "empty.txt", sizeBytes: 0, isDirectory: false, fileCount: 1 },
    ]);
  });

  it("applies exclude patterns at the top level and inside directories", async () => {
    await makeTree(tmp, {
      "keep.txt": 3,
      "skip.log": 5,
      "src/main.ts": 20,
      "src/debug.log": 40,
      "src/cache/blob.bin": 80,
      "cache/top.bin": 9,
    });
    const result = await scan(tmp, { exclude: ["*.log", "cache/"] });
    expect(result.items.map((i) => [i.relativePath, i.sizeBytes, i.fileCount])).toEqual([
      ["keep.txt", 3, 1],
      ["src", 20, 1],
    ]);
    expect(result.totalBytes).toBe(23);
  });

  it("is empty when every entry is excluded", async () => {
    await makeTree(tmp, { "a.tmp": 1, "b.tmp": 2 });
    const result = await scan(tmp, { exclude: ["*.tmp"] });
    expect(result.empty).toBe(true);
    expect(result.items).toEqual([]);
  });

  it("finishes on nested directories", async () => {
    await makeTree(tmp, { "dir/a.bin": 10, "dir/x/y/z.bin": 1, "f.bin": 2 });
    const result = await scan(tmp);
    expect(result.totalFiles).toBe(3);
    expect(result.totalBytes).toBe(13);
  });

  it("counts what the copy args keep for the same exclude patterns", async () => {
    await makeTree(tmp, {
      "a/build/y.bin": 4,
      "a/raw/z.bin": 8,
      "a/keep.bin": 2,
      "build/top.bin": 1,
    });
    const exclude = ["/build", "a/raw"];
    const result = await scan(tmp, { exclude });
    expect(result.items).toEqual([
      { relativePath: "a", sizeBytes: 6, isDirectory: true, fileCount: 2 },
    ]);
    const args = buildCopyArgs({
      item: result.items[0],
      sourceRoot: tmp,
      destRoot: "/dst",
      options: {
        command: "rsync",
        baseArgs: [],
        exclude,
        okCodes: [0],
        killGraceMs: 1000,
        progressMaxHz: 0,
      },
    });
    expect(args.slice(4)).toEqual([
      "--exclude",
      "/raw",
      `${join(tmp, "a")}/`,
      "/dst/a/",
    ]);
  });

  it("reports names the destination may reject", async () => {
    await makeTree(tmp, {
      "ok.txt": 1,
      "what?.txt": 1,
      "dir:1/trailing. ": 1,
      "dir:1/fine.txt": 1,
      "skipped/bad|name": 1,
    });
    const result = await scan(tmp, { exclude: ["skipped/"] });
    expect(result.issues).toEqual([
      {
        relativePath: "dir:1",
        name: "dir:1",
        isDirectory: true,
        type: "colon",
        char: ":",
        suggestedName: "dir-1",
      },
      {
        relativePath: "dir:1/trailing. ",
        name: "trailing. ",
        isDirectory: false,
        type: "trailing_space",
        char: " ",
        suggestedName: "trailing",
      },
      {
        relativePath: "what?.txt",
        name: "what?.txt",
        isDirectory: false,
        type: "question_mark",
        char: "?",
        suggestedName: "what_.txt",
      },
    ]);
    expect(result.totalFiles).toBe(4);
  });
});
