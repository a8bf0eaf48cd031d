import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ServiceError, ServiceUnavailableError, StorageError } from "../../../src/errors.js";
import { TaskStore } from "../../../src/tasks/task-store.js";
import type { IssueTracker } from "../../../src/tracker/issue-tracker.js";
import { Notifier } from "../../../src/tracker/notifier.js";
import type { InboundEvent } from "../../../src/webhook/payload.js";
import { PipelineQueue } from "../../../src/webhook/pipeline-queue.js";
import { WebhookProcessor, type ProcessingMode } from "../../../src/webhook/processor.js";
import { FakeService, deferred } from "../../helpers/fake-services.js";
import { captureLogger, type CapturedLogger } from "../../helpers/logger.js";
import { makeTempDir, removeTempDir } from "../../helpers/temp.js";

function ready(taskId: string, overrides: Partial<InboundEvent> = {}): InboundEvent {
  return {
    taskId,
    fromStatus: "In Progress",
    toStatus: "READY TO TEST",
    kind: "trigger",
    skipMarker: false,
    source: "webhook",
    ...overrides,
  };
}

class RecordingTracker implements IssueTracker {
  readonly name = "recording";
  readonly comments: Array<{ taskId: string; body: string }> = [];
  readonly transitions: Array<{ taskId: string; status: string }> = [];
  failWith: Error | null = null;

  async addComment(taskId: string, body: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.comments.push({ taskId, body });
  }

  async transition(taskId: string, status: string): Promise<boolean> {
    if (this.failWith) throw this.failWith;
    this.transitions.push({ taskId, status });
    return true;
  }
}

describe("WebhookProcessor", () => {
  let dir: string;
  let store: TaskStore;
  let compliance: FakeService;
  let downstream: FakeService;
  let tracker: RecordingTracker;
  let log: CapturedLogger;
  let queue: PipelineQueue;

  function createProcessor(
    mode: ProcessingMode = "sync",
    serviceTimeoutMs = 1_000,
    now?: () => number,
  ): WebhookProcessor {
    queue = new PipelineQueue({ logger: log.logger, maxConcurrent: 2, minIntervalMs: 0 });
    return new WebhookProcessor({
      store,
      compliance,
      downstream,
      queue,
      logger: log.logger,
      threshold: 60,
      serviceTimeoutMs,
      mode,
      notifier: new Notifier({
        tracker,
        logger: log.logger,
        comments: true,
        autoReturn: true,
        returnStatus: "NEED CLARIFICATION/RETURN TEST",
      }),
      now,
    });
  }

  beforeEach(async () => {
    dir = await makeTempDir("processor");
    log = captureLogger();
    store = new TaskStore({ dbPath: path.join(dir, "tasks.sqlite"), logger: log.logger });
    await store.open();
    compliance = new FakeService("compliance");
    downstream = new FakeService("downstream");
    tracker = new RecordingTracker();
  });

  afterEach(async () => {
    await queue.onIdle();
    store.close();
    await removeTempDir(dir);
  });

  it("runs both services when the score passes the threshold", async () => {
    compliance.respond({ status: "success", score: 75 });
    const processor = createProcessor();

    const outcome = await processor.handle(ready("DEV-1234"));

    expect(outcome.kind).toBe("completed");
    expect(store.get("DEV-1234")).toMatchObject({
      taskStatus: "completed",
      service1Status: "done",
      service2Status: "done",
      complianceScore: 75,
      returnCount: 0,
      lastStatus: "READY TO TEST",
    });
    expect(compliance.calls).toEqual([
      { taskId: "DEV-1234", status: "READY TO TEST", returnCount: 0, stage: "service1" },
    ]);
    expect(downstream.calls).toEqual([
      { taskId: "DEV-1234", status: "READY TO TEST", returnCount: 0, stage: "service2" },
    ]);
    expect(store.history("DEV-1234").map((entry) => entry.kind)).toEqual([
      "received",
      "transition",
      "service1",
      "service2",
    ]);
  });

  it("returns the task without calling service2 when the score is below the threshold", async () => {
    compliance.respond({ status: "success", score: 45 });
    const processor = createProcessor();

    const outcome = await processor.handle(ready("DEV-9999"));

    expect(outcome).toMatchObject({ kind: "returned", score: 45, threshold: 60 });
    expect(store.get("DEV-9999")).toMatchObject({
      taskStatus: "returned",
      service1Status: "done",
      service2Status: "skipped",
      complianceScore: 45,
      returnCount: 0,
    });
    expect(downstream.calls).toHaveLength(0);
  });

  it("treats a score equal to the threshold as passing", async () => {
    compliance.respond({ status: "success", score: 60 });
    const processor = createProcessor();

    await expect(processor.handle(ready("DEV-60"))).resolves.toMatchObject({ kind: "completed" });
    expect(downstream.calls).toHaveLength(1);
  });

  it("ignores a duplicate event while the task is progressing", async () => {
    const gate = deferred<{ status: "success"; score: number }>();
    compliance.respond(() => gate.promise);
    const processor = createProcessor("async");

    const first = await processor.handle(ready("DEV-1234"));
    const second = await processor.handle(ready("DEV-1234"));

    expect(first.kind).toBe("accepted");
    expect(second).toEqual({ kind: "duplicate", taskId: "DEV-1234", taskStatus: "progressing" });
    expect(store.get("DEV-1234")?.service1Status).toBe("running");
    const duplicateLines = log.lines.filter((line) => line.msg.includes("duplicate") && line.taskId === "DEV-1234");
    expect(duplicateLines).toHaveLength(1);

    gate.resolve({ status: "success", score: 75 });
    await queue.onIdle();

    expect(compliance.calls).toHaveLength(1);
    expect(downstream.calls).toHaveLength(1);
    expect(store.get("DEV-1234")?.taskStatus).toBe("completed");
  });

  it("admits concurrent deliveries for the same task only once", async () => {
    compliance.setFallback({ status: "success", score: 90 });
    const processor = createProcessor("async");

    const outcomes = await Promise.all([
      processor.handle(ready("DEV-1")),
      processor.handle(ready("DEV-1")),
      processor.handle(ready("DEV-1")),
    ]);
    await queue.onIdle();

    expect(outcomes.map((outcome) => outcome.kind).sort()).toEqual(["accepted", "duplicate", "duplicate"]);
    expect(compliance.calls).toHaveLength(1);
  });

  it("marks the task as error when service1 is unavailable", async () => {
    compliance.respond(new ServiceUnavailableError("compliance unreachable: connect ECONNREFUSED", "service1"));
    const processor = createProcessor();

    const outcome = await processor.handle(ready("DEV-2"));

    expect(outcome).toMatchObject({ kind: "failed", stage: "service1", code: "SERVICE_UNAVAILABLE" });
    expect(store.get("DEV-2")).toMatchObject({
      taskStatus: "error",
      service1Status: "failed",
      service2Status: "pending",
      service1Error: "compliance unreachable: connect ECONNREFUSED",
      errorMessage: "compliance unreachable: connect ECONNREFUSED",
    });
    expect(downstream.calls).toHaveLength(0);
  });

  it("marks the task as error when service1 exceeds the timeout", async () => {
    compliance.respond(() => new Promise(() => {}));
    const processor = createProcessor("sync", 20);

    const outcome = await processor.handle(ready("DEV-3"));

    expect(outcome).toMatchObject({
      kind: "failed",
      code: "SERVICE_UNAVAILABLE",
      error: "compliance timed out after 20ms",
    });
    expect(store.get("DEV-3")?.service1Status).toBe("failed");
  });

  it("rejects a compliance success without a score", async () => {
    compliance.respond({ status: "success" });
    const processor = createProcessor();

    const outcome = await processor.handle(ready("DEV-4"));

    expect(outcome).toMatchObject({
      kind: "failed",
      code: "SERVICE_ERROR",
      error: "compliance returned no compliance score",
    });
  });

  it("records a service2 failure after service1 passed", async () => {
    compliance.respond({ status: "success", score: 88 });
    downstream.respond(new ServiceError("downstream responded 500", "service2"));
    const processor = createProcessor();

    const outcome = await processor.handle(ready("DEV-5"));

    expect(outcome).toMatchObject({ kind: "failed", stage: "service2", code: "SERVICE_ERROR" });
    expect(store.get("DEV-5")).toMatchObject({
      taskStatus: "error",
      service1Status: "done",
      service2Status: "failed",
      complianceScore: 88,
      service2Error: "downstream responded 500",
    });
  });

  it("classifies unexpected adapter errors", async () => {
    compliance.respond(new Error("socket hang up"));
    const processor = createProcessor();

    const outcome = await processor.handle(ready("DEV-6"));

    expect(outcome).toMatchObject({ kind: "failed", code: "SERVICE_UNAVAILABLE", error: "service1 network: socket hang up" });
  });

  it("increments return_count when a returned task comes back, not when it is returned", async () => {
    compliance.respond({ status: "success", score: 45 }, { status: "success", score: 80 });
    const processor = createProcessor();

    await processor.handle(ready("DEV-9999"));
    expect(store.get("DEV-9999")?.returnCount).toBe(0);

    const outcome = await processor.handle(ready("DEV-9999", { fromStatus: "NEED CLARIFICATION/RETURN TEST" }));

    expect(outcome.kind).toBe("completed");
    expect(store.get("DEV-9999")).toMatchObject({
      returnCount: 1,
      taskStatus: "completed",
      complianceScore: 80,
      service2Status: "done",
    });
    expect(compliance.calls.map((call) => call.returnCount)).toEqual([0, 1]);
  });

  it("bypasses both services for a returned task carrying the skip marker", async () => {
    compliance.respond({ status: "success", score: 30 });
    const processor = createProcessor();
    await processor.handle(ready("DEV-7"));

    const outcome = await processor.handle(ready("DEV-7", { skipMarker: true }));

    expect(outcome.kind).toBe("skipped");
    expect(store.get("DEV-7")).toMatchObject({
      taskStatus: "completed",
      service1Status: "skipped",
      service2Status: "skipped",
      skipDetected: true,
      returnCount: 1,
      complianceScore: null,
    });
    expect(compliance.calls).toHaveLength(1);
    expect(downstream.calls).toHaveLength(0);
    expect(log.messages()).toContain("skip gate: services bypassed");
    expect(store.history("DEV-7").some((entry) => entry.kind === "skip")).toBe(true);
  });

  it("does not skip a first-time task even with the skip marker", async () => {
    compliance.respond({ status: "success", score: 70 });
    const processor = createProcessor();

    const outcome = await processor.handle(ready("DEV-8", { skipMarker: true }));

    expect(outcome.kind).toBe("completed");
    expect(compliance.calls).toHaveLength(1);
  });

  it("treats a redelivered event for a completed task as a duplicate", async () => {
    compliance.setFallback({ status: "success", score: 75 });
    const processor = createProcessor();
    await processor.handle(ready("DEV-1234"));

    const redelivered = await processor.handle(ready("DEV-1234"));

    expect(redelivered).toEqual({ kind: "duplicate", taskId: "DEV-1234", taskStatus: "completed" });
    expect(compliance.calls).toHaveLength(1);
  });

  it("reprocesses a completed task on a manual check", async () => {
    compliance.setFallback({ status: "success", score: 75 });
    const processor = createProcessor();
    await processor.handle(ready("DEV-1234"));

    const outcome = await processor.handle(ready("DEV-1234", { source: "manual", fromStatus: null }));

    expect(outcome.kind).toBe("completed");
    expect(compliance.calls).toHaveLength(2);
    expect(store.get("DEV-1234")?.returnCount).toBe(0);
  });

  it("restarts a failed task without touching return_count", async () => {
    compliance.respond(new ServiceUnavailableError("compliance responded 503", "service1"), {
      status: "success",
      score: 99,
    });
    const processor = createProcessor();
    await processor.handle(ready("DEV-10"));

    const outcome = await processor.handle(ready("DEV-10"));

    expect(outcome.kind).toBe("completed");
    expect(store.get("DEV-10")).toMatchObject({
      returnCount: 0,
      service1Error: null,
      errorMessage: null,
      taskStatus: "completed",
    });
  });

  it("records a terminal status without calling any service", async () => {
    const gate = deferred<{ status: "success"; score: number }>();
    compliance.respond(() => gate.promise);
    const processor = createProcessor("async");
    await processor.handle(ready("DEV-11"));

    const outcome = await processor.handle(ready("DEV-11", { kind: "terminal", toStatus: "Done" }));

    expect(outcome.kind).toBe("recorded");
    expect(store.get("DEV-11")).toMatchObject({ lastStatus: "Done", taskStatus: "progressing" });
    gate.resolve({ status: "success", score: 65 });
    await queue.onIdle();
    expect(compliance.calls).toHaveLength(1);
  });

  it("ignores a terminal status for an unknown task", async () => {
    const processor = createProcessor();

    const outcome = await processor.handle(ready("DEV-12", { kind: "terminal", toStatus: "Done" }));

    expect(outcome).toEqual({ kind: "ignored", taskId: "DEV-12", reason: "no task record for status 'Done'" });
    expect(store.get("DEV-12")).toBeUndefined();
  });

  it("comments on the issue and moves returned tasks back", async () => {
    compliance.respond({ status: "success", score: 45 });
    const processor = createProcessor();

    await processor.handle(ready("DEV-9999"));

    expect(tracker.comments).toEqual([
      {
        taskId: "DEV-9999",
        body: "Compliance score 45% is below the required 60%. The task has been returned for rework.",
      },
    ]);
    expect(tracker.transitions).toEqual([{ taskId: "DEV-9999", status: "NEED CLARIFICATION/RETURN TEST" }]);
  });

  it("keeps the task outcome when the tracker fails", async () => {
    compliance.respond({ status: "success", score: 75 });
    tracker.failWith = new Error("tracker down");
    const processor = createProcessor();

    const outcome = await processor.handle(ready("DEV-13"));

    expect(outcome.kind).toBe("completed");
    expect(store.get("DEV-13")?.taskStatus).toBe("completed");
    expect(log.lines.find((line) => line.msg === "tracker comment failed")).toMatchObject({
      taskId: "DEV-13",
      error: "tracker down",
    });
  });

  it("isolates failures between tasks", async () => {
    compliance.setFallback(async (request) => {
      if (request.taskId === "DEV-A") throw new ServiceError("compliance reported failure", "service1");
      return { status: "success", score: 80 };
    });
    const processor = createProcessor();

    const [failed, passed] = await Promise.all([processor.handle(ready("DEV-A")), processor.handle(ready("DEV-B"))]);

    expect(failed.kind).toBe("failed");
    expect(passed.kind).toBe("completed");
    expect(store.get("DEV-A")?.taskStatus).toBe("error");
    expect(store.get("DEV-B")?.taskStatus).toBe("completed");
  });

  describe("interrupted pipelines", () => {
    it("marks the task as error when the pipeline throws past the service handling", async () => {
      compliance.setFallback({ status: "success", score: 75 });
      const upsert = store.upsert.bind(store);
      const spy = vi.spyOn(store, "upsert").mockImplementation((taskId, update) => {
        if (typeof update === "object" && update.service1Status === "done") {
          throw new StorageError("disk I/O error");
        }
        return upsert(taskId, update);
      });
      const processor = createProcessor();

      await expect(processor.handle(ready("DEV-20"))).rejects.toBeInstanceOf(StorageError);

      expect(store.get("DEV-20")).toMatchObject({
        taskStatus: "error",
        service1Status: "failed",
        service2Status: "pending",
        service1Error: "pipeline aborted: disk I/O error",
        errorMessage: "pipeline aborted: disk I/O error",
      });
      expect(store.history("DEV-20").at(-1)).toMatchObject({
        kind: "error",
        detail: "service1 pipeline aborted: disk I/O error",
      });
      expect(log.messages()).toContain("pipeline aborted; task marked as error");

      spy.mockRestore();
      await expect(processor.handle(ready("DEV-20"))).resolves.toMatchObject({ kind: "completed" });
      expect(store.get("DEV-20")?.taskStatus).toBe("completed");
    });

    it("recovers a task left progressing when the store went away mid-run", async () => {
      compliance.respond(async () => {
        store.close();
        return { status: "success", score: 75 };
      });
      compliance.setFallback({ status: "success", score: 75 });
      const processor = createProcessor();

      await expect(processor.handle(ready("DEV-21"))).rejects.toBeInstanceOf(StorageError);
      expect(log.messages()).toContain("could not record pipeline abort");

      await store.open();
      expect(store.get("DEV-21")).toMatchObject({ taskStatus: "progressing", service1Status: "running" });
      await expect(processor.handle(ready("DEV-21"))).resolves.toEqual({
        kind: "duplicate",
        taskId: "DEV-21",
        taskStatus: "progressing",
      });

      expect(store.recoverStuck(0)).toEqual(["DEV-21"]);
      expect(store.get("DEV-21")).toMatchObject({ taskStatus: "error", service1Status: "failed" });

      await expect(processor.handle(ready("DEV-21"))).resolves.toMatchObject({ kind: "completed" });
      expect(compliance.calls).toHaveLength(2);
    });

    it("takes over a progressing task idle for longer than the stale window", async () => {
      let clock = Date.now();
      compliance.respond(async () => {
        store.close();
        return { status: "success", score: 75 };
      });
      compliance.setFallback({ status: "success", score: 75 });
      const processor = createProcessor("sync", 1_000, () => clock);

      await expect(processor.handle(ready("DEV-22"))).rejects.toBeInstanceOf(StorageError);
      await store.open();

      clock += 5_000;
      const outcome = await processor.handle(ready("DEV-22", { source: "manual", fromStatus: null }));

      expect(outcome.kind).toBe("completed");
      expect(store.get("DEV-22")).toMatchObject({ taskStatus: "completed", returnCount: 0 });
      expect(log.lines.find((line) => line.msg === "stale in-flight task taken over")).toMatchObject({
        taskId: "DEV-22",
        staleAfterMs: 2_000,
      });
    });

    it("never takes over a task whose pipeline is still queued or running here", async () => {
      let clock = Date.now();
      const gate = deferred<{ status: "success"; score: number }>();
      compliance.respond(() => gate.promise);
      const processor = createProcessor("async", 1_000, () => clock);

      await processor.handle(ready("DEV-23"));
      clock += 60_000;
      const second = await processor.handle(ready("DEV-23", { source: "manual", fromStatus: null }));

      expect(second).toEqual({ kind: "duplicate", taskId: "DEV-23", taskStatus: "progressing" });
      gate.resolve({ status: "success", score: 70 });
      await queue.onIdle();
      expect(compliance.calls).toHaveLength(1);
      expect(store.get("DEV-23")?.taskStatus).toBe("completed");
    });
  });
});
