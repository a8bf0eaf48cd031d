import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { InvariantError, StorageError } from "../../../src/errors.js";
import { TaskStore } from "../../../src/tasks/task-store.js";
import { captureLogger } from "../../helpers/logger.js";
import { makeTempDir, removeTempDir } from "../../helpers/temp.js";

describe("TaskStore", () => {
  let dir: string;
  let store: TaskStore;
  let clock: number;

  beforeEach(async () => {
    dir = await makeTempDir("store");
    clock = 1_000;
    store = new TaskStore({
      dbPath: path.join(dir, "nested", "tasks.sqlite"),
      logger: captureLogger().logger,
      now: () => clock,
    });
    await store.open();
  });

  afterEach(async () => {
    store.close();
    await removeTempDir(dir);
  });

  it("returns undefined for unknown tasks", () => {
    expect(store.get("DEV-1")).toBeUndefined();
  });

  it("creates a record with defaults on first upsert", () => {
    const record = store.upsert("DEV-1", { lastStatus: "READY TO TEST" });

    expect(record).toEqual({
      taskId: "DEV-1",
      taskStatus: "progressing",
      service1Status: "pending",
      service2Status: "pending",
      returnCount: 0,
      complianceScore: null,
      lastStatus: "READY TO TEST",
      skipDetected: false,
      service1Error: null,
      service2Error: null,
      errorMessage: null,
      service1DoneAt: null,
      service2DoneAt: null,
      createdAt: 1_000,
      updatedAt: 1_000,
    });
    expect(store.get("DEV-1")).toEqual(record);
  });

  it("refreshes updatedAt and keeps createdAt on every mutation", () => {
    store.upsert("DEV-1", {});
    clock = 5_000;
    const updated = store.upsert("DEV-1", { complianceScore: 72.5, skipDetected: true });

    expect(updated.createdAt).toBe(1_000);
    expect(updated.updatedAt).toBe(5_000);
    expect(store.get("DEV-1")?.complianceScore).toBe(72.5);
    expect(store.get("DEV-1")?.skipDetected).toBe(true);
  });

  it("passes the current record to a mutator", () => {
    store.upsert("DEV-1", { returnCount: 2 });
    const next = store.upsert("DEV-1", (current) => ({ returnCount: (current?.returnCount ?? 0) + 1 }));

    expect(next.returnCount).toBe(3);
  });

  it("rejects a decreasing return count and leaves the row unchanged", () => {
    store.upsert("DEV-1", { returnCount: 2 });

    expect(() => store.upsert("DEV-1", { returnCount: 1 })).toThrow(InvariantError);
    expect(store.get("DEV-1")?.returnCount).toBe(2);
  });

  it("warns about illegal state transitions", async () => {
    const captured = captureLogger();
    const other = new TaskStore({ dbPath: path.join(dir, "other.sqlite"), logger: captured.logger });
    await other.open();
    other.upsert("DEV-2", { taskStatus: "progressing" });
    other.upsert("DEV-2", { taskStatus: "returned" });
    other.upsert("DEV-2", { taskStatus: "completed" });
    other.close();

    const warnings = captured.lines.filter((line) => line.msg === "Illegal task state transition");
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ taskId: "DEV-2", from: "returned", to: "completed" });
  });

  it("lists by most recent update and filters by status", () => {
    store.upsert("DEV-1", { taskStatus: "progressing" });
    clock = 2_000;
    store.upsert("DEV-2", {});
    store.upsert("DEV-2", { taskStatus: "completed" });
    clock = 3_000;
    store.upsert("DEV-3", {});
    store.upsert("DEV-3", { taskStatus: "error" });

    expect(store.list().map((task) => task.taskId)).toEqual(["DEV-3", "DEV-2", "DEV-1"]);
    expect(store.list({ status: "completed" }).map((task) => task.taskId)).toEqual(["DEV-2"]);
    expect(store.list({ limit: 1, offset: 1 }).map((task) => task.taskId)).toEqual(["DEV-2"]);
    expect(store.count()).toBe(3);
    expect(store.count("error")).toBe(1);
  });

  it("deletes records and keeps the audit trail", () => {
    store.upsert("DEV-1", {});
    store.appendAudit("DEV-1", "received", "Open -> READY TO TEST");

    expect(store.delete("DEV-1")).toBe(true);
    expect(store.delete("DEV-1")).toBe(false);
    expect(store.get("DEV-1")).toBeUndefined();
    expect(store.history("DEV-1").map((entry) => entry.kind)).toEqual(["received", "deleted"]);
  });

  it("records audit entries in order", () => {
    store.appendAudit("DEV-1", "received", "a");
    store.appendAudit("DEV-1", "transition");
    store.appendAudit("DEV-9", "received", "other task");

    const history = store.history("DEV-1");
    expect(history.map((entry) => [entry.kind, entry.detail])).toEqual([
      ["received", "a"],
      ["transition", null],
    ]);
    expect(history[0]?.at).toBe(1_000);
  });

  it("persists records across reopen", async () => {
    store.upsert("DEV-1", { taskStatus: "progressing" });
    store.upsert("DEV-1", { taskStatus: "returned", complianceScore: 40 });
    store.close();

    const reopened = new TaskStore({ dbPath: store.path, logger: captureLogger().logger });
    await reopened.open();
    try {
      expect(reopened.get("DEV-1")).toMatchObject({ taskStatus: "returned", complianceScore: 40 });
    } finally {
      reopened.close();
    }
  });

  it("marks tasks stuck in progressing as error", () => {
    store.upsert("DEV-1", { taskStatus: "progressing", service1Status: "done", service2Status: "running" });
    store.upsert("DEV-2", { taskStatus: "progressing", service1Status: "running" });
    clock = 1_500;
    store.upsert("DEV-3", { taskStatus: "progressing", service1Status: "running" });
    store.upsert("DEV-4", { taskStatus: "progressing" });
    store.upsert("DEV-4", { taskStatus: "completed" });
    clock = 2_000;

    expect(store.recoverStuck(1_000)).toEqual(["DEV-1", "DEV-2"]);

    expect(store.get("DEV-1")).toMatchObject({
      taskStatus: "error",
      service1Status: "done",
      service2Status: "failed",
      errorMessage: "interrupted before the pipeline finished",
    });
    expect(store.get("DEV-2")).toMatchObject({ taskStatus: "error", service1Status: "failed", service2Status: "pending" });
    expect(store.get("DEV-3")?.taskStatus).toBe("progressing");
    expect(store.get("DEV-4")?.taskStatus).toBe("completed");
    expect(store.history("DEV-2")).toMatchObject([{ kind: "error", detail: "interrupted before the pipeline finished" }]);

    expect(store.recoverStuck(0)).toEqual(["DEV-3"]);
  });

  it("raises StorageError when used while closed", () => {
    store.close();

    expect(() => store.get("DEV-1")).toThrow(StorageError);
    expect(() => store.ping()).toThrow(StorageError);
  });

  it("serializes work per task id but not across ids", async () => {
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = store.withTaskLock("DEV-1", async () => {
      order.push("first:start");
      await firstGate;
      order.push("first:end");
    });
    const second = store.withTaskLock("DEV-1", () => {
      order.push("second");
    });
    const other = store.withTaskLock("DEV-2", () => {
      order.push("other");
    });

    await other;
    expect(order).toEqual(["first:start", "other"]);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "other", "first:end", "second"]);
  });
});
