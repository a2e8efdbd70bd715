// src/scan.ts
//
// Pre-scan of a copy source: one Item per top-level entry, with directory
// items sized by a full recursive walk so the batcher can balance lanes.

import type { Dirent, Stats } from "node:fs";
import { lstat, readdir, stat } from "node:fs/promises";
import path from "node:path";
import * as walk from "@nodelib/fs.walk";
import { ScanError } from "./errors.js";
import { type FilenameIssue, filenameIssue } from "./filename-issues.js";
import { createExcluder, type Excluder } from "./ignore.js";
import type { Logger } from "./logger.js";
import { errnoCode, errorMessage } from "./util.js";

export interface Item {
  relativePath: string;
  sizeBytes: number;
  isDirectory: boolean;
  // non-directory entries inside the item; 1 for a plain file
  fileCount: number;
}

export interface ScanResult {
  root: string;
  items: Item[];
  totalFiles: number;
  totalBytes: number;
  // a readable directory with nothing to copy
  empty: boolean;
  // names that the destination may reject, by path
  issues: FilenameIssue[];
}

export interface ScanOptions {
  exclude?: Iterable<string>;
  logger?: Logger;
}

type WalkEntry = { dirent: Dirent; name: string; path: string; stats?: Stats };

function toRel(abs: string, root: string): string {
  return path.relative(root, abs).split(path.sep).join("/");
}

function scanErrorFor(err: unknown, root: string): ScanError | null {
  const code = errnoCode(err);
  if (code === "ENOENT") {
    return new ScanError(`source path does not exist: ${root}`, "not_found", {
      root,
    });
  }
  if (code === "ENOTDIR") {
    return new ScanError(
      `source path is not a directory: ${root}`,
      "not_a_directory",
      { root },
    );
  }
  if (code === "EACCES" || code === "EPERM") {
    return new ScanError(
      `permission denied reading ${root}`,
      "permission_denied",
      { root, error: errorMessage(err) },
    );
  }
  return null;
}

// Consumed through events: the walker's stream never emits "close", so an
// async iterator over it would not finish.
function measureDirectory(
  absDir: string,
  absRoot: string,
  excluder: Excluder,
  issues: FilenameIssue[],
  logger?: Logger,
): Promise<{ files: number; bytes: number }> {
  let files = 0;
  let bytes = 0;
  return new Promise((resolve, reject) => {
    const stream = walk.walkStream(absDir, {
      stats: true,
      followSymbolicLinks: false,
      deepFilter: (e) =>
        !excluder.excludes(toRel(e.path, absRoot), e.dirent.isDirectory()),
      entryFilter: (e) =>
        !excluder.excludes(toRel(e.path, absRoot), e.dirent.isDirectory()),
      // entries that vanish or are unreadable mid-walk are skipped
      errorFilter: (err) => {
        logger?.debug("scan skipped unreadable entry", {
          error: err.message,
          code: err.code,
        });
        return true;
      },
    });
    stream.on("data", (entry: WalkEntry) => {
      const isDirectory = entry.dirent.isDirectory();
      const issue = filenameIssue(
        toRel(entry.path, absRoot),
        entry.name,
        isDirectory,
      );
      if (issue) issues.push(issue);
      if (isDirectory) return;
      files += 1;
      bytes += entry.stats?.size ?? 0;
    });
    stream.once("error", reject);
    stream.once("end", () => resolve({ files, bytes }));
  });
}

export async function scanRoot(
  rootPath: string,
  { exclude = [], logger }: ScanOptions = {},
): Promise<ScanResult> {
  const absRoot = path.resolve(rootPath);
  let rootStats: Stats;
  try {
    rootStats = await stat(absRoot);
  } catch (err) {
    throw scanErrorFor(err, absRoot) ?? err;
  }
  if (!rootStats.isDirectory()) {
    throw new ScanError(
      `source path is not a directory: ${absRoot}`,
      "not_a_directory",
      { root: absRoot },
    );
  }

  let entries: Dirent[];
  try {
    entries = await readdir(absRoot, { withFileTypes: true });
  } catch (err) {
    throw scanErrorFor(err, absRoot) ?? err;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const excluder = createExcluder(exclude);
  const items: Item[] = [];
  const issues: FilenameIssue[] = [];
  let totalFiles = 0;
  let totalBytes = 0;

  for (const dirent of entries) {
    const isDirectory = dirent.isDirectory();
    if (excluder.excludes(dirent.name, isDirectory)) continue;
    const abs = path.join(absRoot, dirent.name);
    let item: Item;
    if (isDirectory) {
      const { files, bytes } = await measureDirectory(
        abs,
        absRoot,
        excluder,
        issues,
        logger,
      );
      item = {
        relativePath: dirent.name,
        sizeBytes: bytes,
        isDirectory: true,
        fileCount: files,
      };
    } else {
      let size: number;
      try {
        size = (await lstat(abs)).size;
      } catch (err) {
        // removed between readdir and lstat
        logger?.debug("scan skipped vanished entry", {
          path: dirent.name,
          error: errorMessage(err),
        });
        continue;
      }
      item = {
        relativePath: dirent.name,
        sizeBytes: size,
        isDirectory: false,
        fileCount: 1,
      };
    }
    const issue = filenameIssue(dirent.name, dirent.name, isDirectory);
    if (issue) issues.push(issue);
    items.push(item);
    totalFiles += item.fileCount;
    totalBytes += item.sizeBytes;
  }

  issues.sort((a, b) =>
    a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0,
  );

  logger?.debug("scan complete", {
    root: absRoot,
    items: items.length,
    totalFiles,
    totalBytes,
    issues: issues.length,
  });

  return {
    root: absRoot,
    items,
    totalFiles,
    totalBytes,
    empty: items.length === 0,
    issues,
  };
}
