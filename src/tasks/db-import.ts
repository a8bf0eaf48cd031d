import fs from "node:fs/promises";

import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";

import { StorageError, ValidationError, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import { TASK_TABLE_COLUMNS } from "./task-store.js";
import { TASK_STATUSES } from "./types.js";

export interface ImportResult {
  rows: number;
  backupPath: string | null;
}

export interface ImportOptions {
  source: string;
  target: string;
  logger: Logger;
  now?: () => number;
}

export function backupPathFor(target: string, at: number): string {
  const stamp = new Date(at).toISOString().replace(/[:.]/g, "-");
  return `${target}.backup-${stamp}`;
}

/**
 * Replaces the task database at `target` with the one at `source`.
 *
 * The source is validated first (schema, status values, integrity). An existing
 * target is copied to `<target>.backup-<timestamp>` before it is replaced.
 * The service must not be running against `target` while this runs.
 */
export async function importDatabase(options: ImportOptions): Promise<ImportResult> {
  const logger = options.logger.child({ component: "db-import" });
  const now = options.now ?? Date.now;

  if (!(await exists(options.source))) {
    throw new ValidationError(`Import file not found: ${options.source}`);
  }

  let source: BetterSqlite3.Database;
  try {
    source = new Database(options.source, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw new ValidationError(`Cannot open ${options.source} as SQLite: ${errorMessage(err)}`, { cause: err });
  }

  try {
    const rows = validateSource(source, options.source);

    let backupPath: string | null = null;
    if (await exists(options.target)) {
      backupPath = backupPathFor(options.target, now());
      const current = new Database(options.target, { fileMustExist: true });
      try {
        await current.backup(backupPath);
      } catch (err) {
        throw new StorageError(`Backup of ${options.target} failed: ${errorMessage(err)}`, { cause: err });
      } finally {
        current.close();
      }
      logger.info({ backupPath }, "existing database backed up");
      await Promise.all(
        [options.target, `${options.target}-wal`, `${options.target}-shm`].map((file) =>
          fs.rm(file, { force: true }),
        ),
      );
    }

    try {
      await source.backup(options.target);
    } catch (err) {
      throw new StorageError(`Import into ${options.target} failed: ${errorMessage(err)}`, { cause: err });
    }
    logger.info({ source: options.source, target: options.target, rows }, "database imported");
    return { rows, backupPath };
  } finally {
    source.close();
  }
}

function validateSource(db: BetterSqlite3.Database, file: string): number {
  let columns: string[];
  try {
    columns = db
      .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('task_processing')")
      .all()
      .map((column) => column.name);
  } catch (err) {
    throw new ValidationError(`${file} is not a readable SQLite database: ${errorMessage(err)}`, { cause: err });
  }
  if (columns.length === 0) {
    throw new ValidationError(`${file} has no task_processing table`);
  }
  const missing = TASK_TABLE_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new ValidationError(`${file} is missing columns: ${missing.join(", ")}`, {
      details: { missing },
    });
  }

  const integrity = db.pragma("integrity_check", { simple: true });
  if (integrity !== "ok") {
    throw new ValidationError(`${file} failed the integrity check: ${String(integrity)}`);
  }

  const placeholders = TASK_STATUSES.map(() => "?").join(", ");
  const invalid = db
    .prepare<string[], { total: number }>(
      `SELECT COUNT(*) AS total FROM task_processing WHERE task_status NOT IN (${placeholders})`,
    )
    .get(...TASK_STATUSES);
  if (invalid && invalid.total > 0) {
    throw new ValidationError(`${file} has ${invalid.total} row(s) with an unknown task_status`);
  }

  const count = db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM task_processing").get();
  return count?.total ?? 0;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
