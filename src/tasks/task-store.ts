import fs from "node:fs/promises";
import path from "node:path";

import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";

import { InvariantError, StorageError, TaskgateError, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { canTransition } from "./state-machine.js";
import {
  isAuditKind,
  isServiceStatus,
  isTaskStatus,
  type AuditKind,
  type ServiceStatus,
  type TaskAuditEntry,
  type TaskFields,
  type TaskRecord,
  type TaskStatus,
} from "./types.js";

export const TASK_TABLE_COLUMNS = [
  "task_id",
  "task_status",
  "service1_status",
  "service2_status",
  "return_count",
  "compliance_score",
  "last_status",
  "skip_detected",
  "service1_error",
  "service2_error",
  "error_message",
  "service1_done_at",
  "service2_done_at",
  "created_at",
  "updated_at",
] as const;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS task_processing (
  task_id TEXT PRIMARY KEY,
  task_status TEXT NOT NULL DEFAULT 'progressing',
  service1_status TEXT NOT NULL DEFAULT 'pending',
  service2_status TEXT NOT NULL DEFAULT 'pending',
  return_count INTEGER NOT NULL DEFAULT 0 CHECK (return_count >= 0),
  compliance_score REAL,
  last_status TEXT,
  skip_detected INTEGER NOT NULL DEFAULT 0,
  service1_error TEXT,
  service2_error TEXT,
  error_message TEXT,
  service1_done_at INTEGER,
  service2_done_at INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_task_processing_status ON task_processing(task_status);
CREATE INDEX IF NOT EXISTS idx_task_processing_updated ON task_processing(updated_at);
CREATE TABLE IF NOT EXISTS task_audit (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  task_id TEXT NOT NULL,
  at INTEGER NOT NULL,
  kind TEXT NOT NULL,
  detail TEXT
);
CREATE INDEX IF NOT EXISTS idx_task_audit_task ON task_audit(task_id, id);
`;

interface TaskRow {
  task_id: string;
  task_status: string;
  service1_status: string;
  service2_status: string;
  return_count: number;
  compliance_score: number | null;
  last_status: string | null;
  skip_detected: number;
  service1_error: string | null;
  service2_error: string | null;
  error_message: string | null;
  service1_done_at: number | null;
  service2_done_at: number | null;
  created_at: number;
  updated_at: number;
}

interface AuditRow {
  id: number;
  task_id: string;
  at: number;
  kind: string;
  detail: string | null;
}

export type TaskUpdate = TaskFields | ((current: TaskRecord | undefined) => TaskFields);

export interface ListTasksOptions {
  status?: TaskStatus;
  limit?: number;
  offset?: number;
}

export class TaskStore {
  private readonly dbPath: string;
  private readonly busyTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly locks = new KeyedMutex();
  private db: BetterSqlite3.Database | null = null;

  constructor(params: { dbPath: string; logger: Logger; busyTimeoutMs?: number; now?: () => number }) {
    this.dbPath = params.dbPath;
    this.busyTimeoutMs = params.busyTimeoutMs ?? 30_000;
    this.logger = params.logger.child({ component: "task-store" });
    this.now = params.now ?? Date.now;
  }

  get path(): string {
    return this.dbPath;
  }

  async open(): Promise<void> {
    if (this.db) return;
    try {
      if (this.dbPath !== ":memory:") {
        await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      }
      const db = new Database(this.dbPath, { timeout: this.busyTimeoutMs });
      db.pragma("journal_mode = WAL");
      db.pragma("synchronous = NORMAL");
      db.exec(SCHEMA);
      this.db = db;
    } catch (err) {
      throw new StorageError(`Cannot open task database at ${this.dbPath}: ${errorMessage(err)}`, { cause: err });
    }
    this.logger.debug({ dbPath: this.dbPath }, "task store opened");
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    this.logger.debug("task store closed");
  }

  /**
   * Runs `fn` exclusively for `taskId`. Distinct ids never wait on each other.
   */
  withTaskLock<T>(taskId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.locks.runExclusive(taskId, fn);
  }

  get(taskId: string): TaskRecord | undefined {
    return this.guard("get", (db) => {
      const row = db
        .prepare<[string], TaskRow>("SELECT * FROM task_processing WHERE task_id = ?")
        .get(taskId);
      return row ? toRecord(row) : undefined;
    });
  }

  /**
   * Atomic read-modify-write. Creates the row with defaults when absent and
   * always refreshes `updatedAt`.
   */
  upsert(taskId: string, update: TaskUpdate): TaskRecord {
    return this.guard("upsert", (db) => {
      const write = db.transaction((): TaskRecord => {
        const row = db
          .prepare<[string], TaskRow>("SELECT * FROM task_processing WHERE task_id = ?")
          .get(taskId);
        const current = row ? toRecord(row) : undefined;
        const fields = typeof update === "function" ? update(current) : update;
        const now = this.now();
        const base = current ?? defaultRecord(taskId, now);
        const next: TaskRecord = {
          ...base,
          ...fields,
          taskId,
          createdAt: base.createdAt,
          updatedAt: Math.max(now, base.updatedAt),
        };

        if (!Number.isInteger(next.returnCount) || next.returnCount < base.returnCount) {
          throw new InvariantError(
            `return_count for ${taskId} cannot change from ${base.returnCount} to ${next.returnCount}`,
          );
        }
        const from = current ? current.taskStatus : "new";
        if (from !== next.taskStatus && !canTransition(from, next.taskStatus)) {
          this.logger.warn({ taskId, from, to: next.taskStatus }, "Illegal task state transition");
        }

        db.prepare<TaskRow>(
          `INSERT INTO task_processing (${TASK_TABLE_COLUMNS.join(", ")})
           VALUES (${TASK_TABLE_COLUMNS.map((column) => `@${column}`).join(", ")})
           ON CONFLICT(task_id) DO UPDATE SET
           ${TASK_TABLE_COLUMNS.filter((column) => column !== "task_id" && column !== "created_at")
             .map((column) => `${column} = excluded.${column}`)
             .join(", ")}`,
        ).run(toRow(next));
        return next;
      });
      return write.immediate();
    });
  }

  list(options: ListTasksOptions = {}): TaskRecord[] {
    const limit = options.limit ?? 50;
    const offset = options.offset ?? 0;
    return this.guard("list", (db) => {
      const rows = options.status
        ? db
            .prepare<[string, number, number], TaskRow>(
              "SELECT * FROM task_processing WHERE task_status = ? ORDER BY updated_at DESC, task_id LIMIT ? OFFSET ?",
            )
            .all(options.status, limit, offset)
        : db
            .prepare<[number, number], TaskRow>(
              "SELECT * FROM task_processing ORDER BY updated_at DESC, task_id LIMIT ? OFFSET ?",
            )
            .all(limit, offset);
      return rows.map(toRecord);
    });
  }

  count(status?: TaskStatus): number {
    return this.guard("count", (db) => {
      const row = status
        ? db
            .prepare<[string], { total: number }>(
              "SELECT COUNT(*) AS total FROM task_processing WHERE task_status = ?",
            )
            .get(status)
        : db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM task_processing").get();
      return row?.total ?? 0;
    });
  }

  delete(taskId: string): boolean {
    return this.guard("delete", (db) => {
      const result = db.prepare<[string]>("DELETE FROM task_processing WHERE task_id = ?").run(taskId);
      if (result.changes === 0) return false;
      this.insertAudit(db, taskId, "deleted", null);
      this.logger.info({ taskId }, "task deleted");
      return true;
    });
  }

  appendAudit(taskId: string, kind: AuditKind, detail?: string): void {
    this.guard("appendAudit", (db) => {
      this.insertAudit(db, taskId, kind, detail ?? null);
    });
  }

  history(taskId: string): TaskAuditEntry[] {
    return this.guard("history", (db) =>
      db
        .prepare<[string], AuditRow>(
          "SELECT id, task_id, at, kind, detail FROM task_audit WHERE task_id = ? ORDER BY id",
        )
        .all(taskId)
        .map(toAuditEntry),
    );
  }

  /**
   * Marks tasks that have sat in `progressing` for at least `olderThanMs` as
   * `error`, failing whichever service was running. Returns the affected ids.
   */
  recoverStuck(olderThanMs: number): string[] {
    const cutoff = this.now() - olderThanMs;
    const candidates = this.guard("recoverStuck", (db) =>
      db
        .prepare<[number], { task_id: string }>(
          "SELECT task_id FROM task_processing WHERE task_status = 'progressing' AND updated_at <= ? ORDER BY task_id",
        )
        .all(cutoff)
        .map((row) => row.task_id),
    );

    const recovered: string[] = [];
    for (const taskId of candidates) {
      const current = this.get(taskId);
      if (current?.taskStatus !== "progressing") continue;
      const message = "interrupted before the pipeline finished";
      this.upsert(taskId, {
        taskStatus: "error",
        service1Status: current.service1Status === "running" ? "failed" : current.service1Status,
        service2Status: current.service2Status === "running" ? "failed" : current.service2Status,
        errorMessage: message,
      });
      this.appendAudit(taskId, "error", message);
      recovered.push(taskId);
    }
    if (recovered.length > 0) {
      this.logger.warn({ tasks: recovered, olderThanMs }, "stuck tasks marked as error");
    }
    return recovered;
  }

  /** Health probe; throws StorageError when the database is unusable. */
  ping(): void {
    this.guard("ping", (db) => {
      db.prepare<[], { ok: number }>("SELECT 1 AS ok").get();
    });
  }

  private insertAudit(db: BetterSqlite3.Database, taskId: string, kind: AuditKind, detail: string | null): void {
    db.prepare<[string, number, string, string | null]>(
      "INSERT INTO task_audit (task_id, at, kind, detail) VALUES (?, ?, ?, ?)",
    ).run(taskId, this.now(), kind, detail);
  }

  private requireDb(): BetterSqlite3.Database {
    if (!this.db) {
      throw new StorageError("Task store is not open");
    }
    return this.db;
  }

  private guard<T>(operation: string, fn: (db: BetterSqlite3.Database) => T): T {
    const db = this.requireDb();
    try {
      return fn(db);
    } catch (err) {
      if (err instanceof TaskgateError) throw err;
      throw new StorageError(`Task store ${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function defaultRecord(taskId: string, now: number): TaskRecord {
  return {
    taskId,
    taskStatus: "progressing",
    service1Status: "pending",
    service2Status: "pending",
    returnCount: 0,
    complianceScore: null,
    lastStatus: null,
    skipDetected: false,
    service1Error: null,
    service2Error: null,
    errorMessage: null,
    service1DoneAt: null,
    service2DoneAt: null,
    createdAt: now,
    updatedAt: now,
  };
}

function toRecord(row: TaskRow): TaskRecord {
  return {
    taskId: row.task_id,
    taskStatus: parseTaskStatus(row.task_status, row.task_id),
    service1Status: parseServiceStatus(row.service1_status, row.task_id),
    service2Status: parseServiceStatus(row.service2_status, row.task_id),
    returnCount: row.return_count,
    complianceScore: row.compliance_score,
    lastStatus: row.last_status,
    skipDetected: row.skip_detected !== 0,
    service1Error: row.service1_error,
    service2Error: row.service2_error,
    errorMessage: row.error_message,
    service1DoneAt: row.service1_done_at,
    service2DoneAt: row.service2_done_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toRow(record: TaskRecord): TaskRow {
  return {
    task_id: record.taskId,
    task_status: record.taskStatus,
    service1_status: record.service1Status,
    service2_status: record.service2Status,
    return_count: record.returnCount,
    compliance_score: record.complianceScore,
    last_status: record.lastStatus,
    skip_detected: record.skipDetected ? 1 : 0,
    service1_error: record.service1Error,
    service2_error: record.service2Error,
    error_message: record.errorMessage,
    service1_done_at: record.service1DoneAt,
    service2_done_at: record.service2DoneAt,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}

function toAuditEntry(row: AuditRow): TaskAuditEntry {
  if (!isAuditKind(row.kind)) {
    throw new StorageError(`Unknown audit kind '${row.kind}' for ${row.task_id}`);
  }
  return { id: row.id, taskId: row.task_id, at: row.at, kind: row.kind, detail: row.detail };
}

function parseTaskStatus(value: string, taskId: string): TaskStatus {
  if (!isTaskStatus(value)) {
    throw new StorageError(`Unknown task_status '${value}' for ${taskId}`);
  }
  return value;
}

function parseServiceStatus(value: string, taskId: string): ServiceStatus {
  if (!isServiceStatus(value)) {
    throw new StorageError(`Unknown service status '${value}' for ${taskId}`);
  }
  return value;
}
