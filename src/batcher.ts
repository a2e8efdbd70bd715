/*
Split scanned items across a fixed number of copy lanes.

Longest-processing-time first: largest item goes to the least loaded lane.
The result is within 4/3 of the best possible makespan. A single item that is
bigger than everything else combined still bounds the whole run; split such
directories before copying if that matters.
*/

import { ConfigError } from "./errors.js";
import type { Item } from "./scan.js";

export interface WorkerAssignment {
  workerIndex: number;
  items: Item[];
  // always the sum of items[].sizeBytes
  loadBytes: number;
}

export function assignItems(
  items: readonly Item[],
  workerCount: number,
): WorkerAssignment[] {
  if (!Number.isInteger(workerCount) || workerCount <= 0) {
    throw new ConfigError(
      `worker count must be a positive integer (got ${workerCount})`,
      "invalid_parallelism",
      { workerCount },
    );
  }
  const lanes: WorkerAssignment[] = Array.from(
    { length: workerCount },
    (_, workerIndex) => ({ workerIndex, items: [], loadBytes: 0 }),
  );

  // stable: equal sizes keep scan order
  const order = items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => b.item.sizeBytes - a.item.sizeBytes || a.index - b.index);

  for (const { item } of order) {
    let target = lanes[0];
    for (const lane of lanes) {
      // strict < keeps the lowest index on ties
      if (lane.loadBytes < target.loadBytes) target = lane;
    }
    target.items.push(item);
    target.loadBytes += item.sizeBytes;
  }
  return lanes;
}

export function makespan(assignments: readonly WorkerAssignment[]): number {
  let max = 0;
  for (const a of assignments) {
    if (a.loadBytes > max) max = a.loadBytes;
  }
  return max;
}

export function totalLoad(assignments: readonly WorkerAssignment[]): number {
  return assignments.reduce((sum, a) => sum + a.loadBytes, 0);
}

export function describeAssignments(
  assignments: readonly WorkerAssignment[],
): { workerIndex: number; items: number; loadBytes: number }[] {
  return assignments.map((a) => ({
    workerIndex: a.workerIndex,
    items: a.items.length,
    loadBytes: a.loadBytes,
  }));
}
