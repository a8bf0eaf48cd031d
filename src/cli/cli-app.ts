/**
 * CLI App - Commander setup for all commands
 */

import { Command } from "commander";

import { loadConfig } from "../config.js";
import { VERSION } from "../runtime/app.js";
import { check } from "./commands/check.js";
import { dbImport } from "./commands/db/import.js";
import { start } from "./commands/runtime/start.js";
import { status } from "./commands/runtime/status.js";
import { stop } from "./commands/runtime/stop.js";
import { deleteTask } from "./commands/tasks/delete.js";
import { listTasks } from "./commands/tasks/list.js";
import { showTask } from "./commands/tasks/show.js";
import { withErrorHandling } from "./error-handler.js";

type GlobalOptions = {
  config?: string;
  json?: boolean;
  quiet?: boolean;
};

function globals(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>();
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("taskgate")
    .description("Issue-tracker webhook gate for a two-stage compliance pipeline")
    .version(VERSION)
    .option("-c, --config <path>", "Path to taskgate.config.json")
    .option("--json", "Output in JSON format")
    .option("--quiet", "Suppress non-essential output");

  // ==========================================================================
  // Runtime
  // ==========================================================================

  program
    .command("start")
    .description("Start the webhook service in the foreground")
    .action(
      withErrorHandling(async (_options: object, cmd: Command) => {
        const opts = globals(cmd);
        await start(await loadConfig(opts.config), opts);
      }),
    );

  program
    .command("stop")
    .description("Stop the running service")
    .action(
      withErrorHandling(async (_options: object, cmd: Command) => {
        const opts = globals(cmd);
        await stop(await loadConfig(opts.config), opts);
      }),
    );

  program
    .command("status")
    .description("Show whether the service is running and healthy")
    .action(
      withErrorHandling(async (_options: object, cmd: Command) => {
        const opts = globals(cmd);
        await status(await loadConfig(opts.config), opts);
      }),
    );

  program
    .command("check")
    .description("Run a task through the pipeline on the running service")
    .argument("<taskId>", "Task key, e.g. DEV-1234")
    .option("--status <status>", "Tracker status to report (defaults to the first trigger status)")
    .option("--skip", "Attach the skip marker")
    .action(
      withErrorHandling(async (taskId: string, options: { status?: string; skip?: boolean }, cmd: Command) => {
        const opts = globals(cmd);
        await check(await loadConfig(opts.config), taskId, { ...opts, ...options });
      }),
    );

  // ==========================================================================
  // Tasks
  // ==========================================================================

  const tasks = program.command("tasks").description("Inspect task records");

  tasks
    .command("list")
    .description("List task records, most recently updated first")
    .option("--status <status>", "Filter by task status")
    .option("--limit <n>", "Maximum number of rows", "20")
    .action(
      withErrorHandling(async (options: { status?: string; limit?: string }, cmd: Command) => {
        const opts = globals(cmd);
        await listTasks(await loadConfig(opts.config), { ...opts, ...options });
      }),
    );

  tasks
    .command("show")
    .description("Show one task record and its history")
    .argument("<taskId>", "Task key")
    .action(
      withErrorHandling(async (taskId: string, _options: object, cmd: Command) => {
        const opts = globals(cmd);
        await showTask(await loadConfig(opts.config), taskId, opts);
      }),
    );

  tasks
    .command("delete")
    .description("Delete a task record (test resets)")
    .argument("<taskId>", "Task key")
    .action(
      withErrorHandling(async (taskId: string, _options: object, cmd: Command) => {
        const opts = globals(cmd);
        await deleteTask(await loadConfig(opts.config), taskId, opts);
      }),
    );

  // ==========================================================================
  // Database
  // ==========================================================================

  const db = program.command("db").description("Database maintenance");

  db.command("import")
    .description("Replace the task database with a validated copy (the current one is backed up)")
    .argument("<file>", "SQLite file to import")
    .action(
      withErrorHandling(async (file: string, _options: object, cmd: Command) => {
        const opts = globals(cmd);
        await dbImport(await loadConfig(opts.config), file, opts);
      }),
    );

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
