// Error taxonomy for job setup and execution. Every error carries a stable
// `code` so it can be persisted on the job row and matched by callers.

export class LanecopyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "LanecopyError";
  }
}

export type ConfigErrorCode =
  | "invalid_parallelism"
  | "invalid_direction"
  | "invalid_name"
  | "invalid_path"
  | "invalid_option";

export class ConfigError extends LanecopyError {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}

export type ScanErrorCode = "not_found" | "not_a_directory" | "permission_denied";

export class ScanError extends LanecopyError {
  constructor(
    message: string,
    public readonly code: ScanErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, code, context);
    this.name = "ScanError";
  }
}

export class MountUnavailableError extends LanecopyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "mount_unavailable", context);
    this.name = "MountUnavailableError";
  }
}

export class DestinationError extends LanecopyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "destination_unwritable", context);
    this.name = "DestinationError";
  }
}

export class ItemError extends LanecopyError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    context?: Record<string, unknown>,
  ) {
    super(message, "item_failed", context);
    this.name = "ItemError";
  }
}

export class JobNotFoundError extends LanecopyError {
  constructor(ref: string) {
    super(`job '${ref}' not found`, "job_not_found", { ref });
    this.name = "JobNotFoundError";
  }
}

export class InvalidTransitionError extends LanecopyError {
  constructor(
    public readonly from: string,
    public readonly event: string,
    context?: Record<string, unknown>,
  ) {
    super(`cannot ${event} a job that is ${from}`, "invalid_transition", {
      from,
      event,
      ...context,
    });
    this.name = "InvalidTransitionError";
  }
}

// Reasons persisted in jobs.failure_code when a job ends `failed`.
export type FailureReason =
  | "mount_unavailable"
  | "scan_failed"
  | "destination_unwritable"
  | "incomplete_on_restart"
  | "internal";

export function failureReasonOf(err: unknown): FailureReason {
  if (err instanceof MountUnavailableError) return "mount_unavailable";
  if (err instanceof ScanError) return "scan_failed";
  if (err instanceof DestinationError) return "destination_unwritable";
  return "internal";
}
