import { describe, expect, it } from "vitest";

import type { TaskRecord } from "../../../src/tasks/types.js";
import type { IssueTracker } from "../../../src/tracker/issue-tracker.js";
import { Notifier, formatComment } from "../../../src/tracker/notifier.js";
import { captureLogger } from "../../helpers/logger.js";

function record(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    taskId: "DEV-1",
    taskStatus: "completed",
    service1Status: "done",
    service2Status: "done",
    returnCount: 0,
    complianceScore: 75,
    lastStatus: "READY TO TEST",
    skipDetected: false,
    service1Error: null,
    service2Error: null,
    errorMessage: null,
    service1DoneAt: null,
    service2DoneAt: null,
    createdAt: 1,
    updatedAt: 2,
    ...overrides,
  };
}

class StubTracker implements IssueTracker {
  readonly name = "stub";
  comments: string[] = [];
  transitions: string[] = [];

  async addComment(_taskId: string, body: string): Promise<void> {
    this.comments.push(body);
  }

  async transition(_taskId: string, status: string): Promise<boolean> {
    this.transitions.push(status);
    return true;
  }
}

describe("formatComment", () => {
  it("describes each reportable outcome", () => {
    expect(formatComment({ kind: "completed", taskId: "DEV-1", record: record(), score: 75 })).toBe(
      "Automated check passed with a compliance score of 75%. Follow-up service completed.",
    );
    expect(formatComment({ kind: "returned", taskId: "DEV-1", record: record(), score: 42.25, threshold: 60 })).toBe(
      "Compliance score 42.3% is below the required 60%. The task has been returned for rework.",
    );
    expect(formatComment({ kind: "skipped", taskId: "DEV-1", record: record({ returnCount: 2 }) })).toBe(
      "Skip code detected after 2 return(s). Automated checks were bypassed.",
    );
    expect(
      formatComment({
        kind: "failed",
        taskId: "DEV-1",
        record: record(),
        stage: "service2",
        code: "SERVICE_ERROR",
        error: "downstream responded 500",
      }),
    ).toBe("Automated check failed at service2 (SERVICE_ERROR): downstream responded 500");
  });

  it("stays silent for admission-only outcomes", () => {
    expect(formatComment({ kind: "duplicate", taskId: "DEV-1", taskStatus: "progressing" })).toBeNull();
    expect(formatComment({ kind: "ignored", reason: "no status change" })).toBeNull();
    expect(formatComment({ kind: "accepted", taskId: "DEV-1", record: record() })).toBeNull();
  });
});

describe("Notifier", () => {
  const returned = { kind: "returned", taskId: "DEV-9", record: record(), score: 45, threshold: 60 } as const;

  it("skips comments when they are disabled", async () => {
    const tracker = new StubTracker();
    const notifier = new Notifier({
      tracker,
      logger: captureLogger().logger,
      comments: false,
      autoReturn: true,
      returnStatus: "Rework",
    });

    await notifier.notify(returned);

    expect(tracker.comments).toEqual([]);
    expect(tracker.transitions).toEqual(["Rework"]);
  });

  it("does not transition without autoReturn", async () => {
    const tracker = new StubTracker();
    const notifier = new Notifier({
      tracker,
      logger: captureLogger().logger,
      comments: true,
      autoReturn: false,
      returnStatus: "Rework",
    });

    await notifier.notify(returned);

    expect(tracker.comments).toHaveLength(1);
    expect(tracker.transitions).toEqual([]);
  });

  it("logs a failed transition instead of throwing", async () => {
    const log = captureLogger();
    const tracker = new StubTracker();
    tracker.transition = async () => {
      throw new Error("409 conflict");
    };
    const notifier = new Notifier({ tracker, logger: log.logger, comments: false, autoReturn: true, returnStatus: "Rework" });

    await expect(notifier.notify(returned)).resolves.toBeUndefined();
    expect(log.lines.find((line) => line.msg === "tracker transition failed")).toMatchObject({
      component: "notifier",
      taskId: "DEV-9",
      error: "409 conflict",
    });
  });
});
