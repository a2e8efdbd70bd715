export const CLI_NAME = "lanecopy";

export const JOB_DB_FILE = "jobs.db";

export const DEFAULT_PARALLELISM = 4;
export const MAX_PARALLELISM = 64;
