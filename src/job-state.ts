import { InvalidTransitionError } from "./errors.js";

export type JobState =
  | "created"
  | "scanning"
  | "running"
  | "paused"
  | "completed"
  | "completed_with_errors"
  | "failed"
  | "cancelled";

export const JOB_STATES: readonly JobState[] = [
  "created",
  "scanning",
  "running",
  "paused",
  "completed",
  "completed_with_errors",
  "failed",
  "cancelled",
];

export type JobEvent =
  | "start"
  | "scan_ok"
  | "scan_empty"
  | "pause"
  | "resume"
  | "cancel"
  | "finish"
  | "finish_with_errors"
  | "fail";

export type Direction = "push" | "pull" | "bidirectional";
export const DIRECTIONS: readonly Direction[] = ["push", "pull", "bidirectional"];

// One copy pass of a job. Bidirectional jobs run push then pull.
export type Phase = "push" | "pull";

const TERMINAL: ReadonlySet<JobState> = new Set([
  "completed",
  "completed_with_errors",
  "failed",
  "cancelled",
]);

const restart = { start: "scanning" } as const;

const TRANSITIONS: Record<JobState, Partial<Record<JobEvent, JobState>>> = {
  created: { start: "scanning" },
  scanning: {
    scan_ok: "running",
    scan_empty: "completed",
    cancel: "cancelled",
    fail: "failed",
  },
  running: {
    pause: "paused",
    cancel: "cancelled",
    finish: "completed",
    finish_with_errors: "completed_with_errors",
    fail: "failed",
  },
  paused: {
    resume: "running",
    cancel: "cancelled",
    fail: "failed",
  },
  completed: restart,
  completed_with_errors: restart,
  failed: restart,
  cancelled: restart,
};

export function isJobState(value: string): value is JobState {
  return JOB_STATES.some((state) => state === value);
}

export function isDirection(value: string): value is Direction {
  return DIRECTIONS.some((direction) => direction === value);
}

export function isTerminal(state: JobState): boolean {
  return TERMINAL.has(state);
}

// Scanning, running and paused jobs own live lanes or are about to.
export function isActive(state: JobState): boolean {
  return state === "scanning" || state === "running" || state === "paused";
}

export function canTransition(from: JobState, event: JobEvent): boolean {
  return TRANSITIONS[from][event] !== undefined;
}

export function nextState(
  from: JobState,
  event: JobEvent,
  context?: Record<string, unknown>,
): JobState {
  const to = TRANSITIONS[from][event];
  if (to === undefined) {
    throw new InvalidTransitionError(from, event, context);
  }
  return to;
}

export function phasesFor(direction: Direction): Phase[] {
  if (direction === "bidirectional") return ["push", "pull"];
  return [direction];
}

// push copies source -> dest; pull copies dest -> source.
export function phaseEndpoints(
  phase: Phase,
  sourcePath: string,
  destPath: string,
): { from: string; to: string } {
  return phase === "push"
    ? { from: sourcePath, to: destPath }
    : { from: destPath, to: sourcePath };
}
