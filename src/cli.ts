#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { getJobDbPath, resolveHome } from "./config.js";
import { CLI_NAME } from "./constants.js";
import { registerJobCommands } from "./job-cli.js";
import { LOG_LEVELS } from "./logger.js";

function readVersion(): string {
  try {
    const raw = fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8");
    const pkg: unknown = JSON.parse(raw);
    if (pkg && typeof pkg === "object" && "version" in pkg) {
      return String(pkg.version);
    }
  } catch {
    // no package.json beside the build output
  }
  return "0.0.0";
}

export function buildProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Split a bulk copy into balanced rsync lanes and track it as a resumable job",
    )
    .version(readVersion());

  program
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "info",
    )
    .option(
      "--job-db <file>",
      "override path to jobs.db",
      process.env.LANECOPY_JOB_DB || getJobDbPath(resolveHome()),
    );

  registerJobCommands(program);
  return program;
}

if (require.main === module) {
  const program = buildProgram();
  // Default help when no subcommand given
  if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
  }
  program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(`${CLI_NAME}: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
}
