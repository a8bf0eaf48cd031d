import {
  InvariantError,
  StorageError,
  TaskgateError,
  errorMessage,
  type ServiceStage,
} from "../errors.js";
import type { Logger } from "../log.js";
import { classifyServiceFailure } from "../monitor/error-classifier.js";
import { invokeCompliance, invokeService } from "../services/invoke.js";
import type { ServiceAdapter } from "../services/types.js";
import { canStartService2, resetServiceFields } from "../tasks/state-machine.js";
import type { TaskStore } from "../tasks/task-store.js";
import type { TaskRecord } from "../tasks/types.js";
import type { Notifier } from "../tracker/notifier.js";
import type { PipelineOutcome, ProcessOutcome } from "./outcome.js";
import { matchesStatus, type InboundEvent } from "./payload.js";
import type { PipelineQueue } from "./pipeline-queue.js";
import { shouldSkip } from "./skip-gate.js";

export type ProcessingMode = "async" | "sync";

export interface WebhookProcessorOptions {
  store: TaskStore;
  compliance: ServiceAdapter;
  downstream: ServiceAdapter;
  queue: PipelineQueue;
  logger: Logger;
  threshold: number;
  serviceTimeoutMs: number;
  mode: ProcessingMode;
  /**
   * Idle time after which a `progressing` task with no local pipeline is
   * treated as abandoned and may be re-admitted. Defaults to twice the
   * service timeout.
   */
  staleAfterMs?: number;
  notifier?: Notifier;
  now?: () => number;
}

type Admission =
  | { kind: "run"; record: TaskRecord }
  | Exclude<ProcessOutcome, PipelineOutcome | { kind: "accepted" }>;

/**
 * Drives a task through admission (dedup, re-entry, skip gate) and the
 * two-stage service pipeline.
 *
 * Admission runs under the per-task lock and leaves the record durably
 * `progressing`; that status is what rejects duplicates while the pipeline
 * runs outside the lock.
 */
export class WebhookProcessor {
  private readonly store: TaskStore;
  private readonly compliance: ServiceAdapter;
  private readonly downstream: ServiceAdapter;
  private readonly queue: PipelineQueue;
  private readonly logger: Logger;
  private readonly threshold: number;
  private readonly serviceTimeoutMs: number;
  private readonly mode: ProcessingMode;
  private readonly staleAfterMs: number;
  private readonly notifier?: Notifier;
  private readonly now: () => number;

  constructor(options: WebhookProcessorOptions) {
    this.store = options.store;
    this.compliance = options.compliance;
    this.downstream = options.downstream;
    this.queue = options.queue;
    this.logger = options.logger.child({ component: "processor" });
    this.threshold = options.threshold;
    this.serviceTimeoutMs = options.serviceTimeoutMs;
    this.mode = options.mode;
    this.staleAfterMs = options.staleAfterMs ?? options.serviceTimeoutMs * 2;
    this.notifier = options.notifier;
    this.now = options.now ?? Date.now;
  }

  /**
   * Handles one inbound event. In async mode the returned outcome is
   * `accepted` once the task is durably progressing; `wait` forces the
   * pipeline result instead.
   *
   * @throws StorageError when the task record cannot be read or written
   */
  async handle(event: InboundEvent, options: { wait?: boolean } = {}): Promise<ProcessOutcome> {
    const wait = options.wait ?? this.mode === "sync";
    const admission = await this.store.withTaskLock(event.taskId, () => this.admit(event));

    if (admission.kind !== "run") {
      if (admission.kind === "skipped") {
        await this.notify(admission);
      }
      return admission;
    }

    const pipeline = this.queue.enqueue(event.taskId, () => this.runGuarded(event, admission.record));
    if (wait) {
      return pipeline;
    }
    pipeline.catch((err: unknown) => {
      this.logger.error({ taskId: event.taskId, error: errorMessage(err) }, "pipeline aborted");
    });
    return { kind: "accepted", taskId: event.taskId, record: admission.record };
  }

  private admit(event: InboundEvent): Admission {
    const { taskId } = event;
    const existing = this.store.get(taskId);
    const log = this.logger.child({ taskId });
    this.store.appendAudit(taskId, "received", `${event.fromStatus ?? "?"} -> ${event.toStatus} (${event.source})`);

    if (event.kind === "terminal") {
      if (!existing) {
        return { kind: "ignored", taskId, reason: `no task record for status '${event.toStatus}'` };
      }
      const record = this.store.upsert(taskId, { lastStatus: event.toStatus });
      this.store.appendAudit(taskId, "recorded", event.toStatus);
      log.info({ status: event.toStatus, taskStatus: record.taskStatus }, "terminal status recorded");
      return { kind: "recorded", taskId, record };
    }

    if (existing?.taskStatus === "progressing") {
      const idleMs = this.now() - existing.updatedAt;
      if (this.queue.has(taskId) || idleMs < this.staleAfterMs) {
        this.store.appendAudit(taskId, "duplicate", "task already progressing");
        log.info({ status: event.toStatus }, "duplicate event ignored: task already progressing");
        return { kind: "duplicate", taskId, taskStatus: existing.taskStatus };
      }
      log.warn({ idleMs, staleAfterMs: this.staleAfterMs }, "stale in-flight task taken over");
    }
    if (
      existing?.taskStatus === "completed" &&
      event.source === "webhook" &&
      existing.lastStatus !== null &&
      matchesStatus(existing.lastStatus, [event.toStatus])
    ) {
      this.store.appendAudit(taskId, "duplicate", `already completed for '${event.toStatus}'`);
      log.info({ status: event.toStatus }, "duplicate event ignored: already completed for this status");
      return { kind: "duplicate", taskId, taskStatus: existing.taskStatus };
    }

    const returnCount = existing?.taskStatus === "returned" ? existing.returnCount + 1 : existing?.returnCount ?? 0;
    let record = this.store.upsert(taskId, {
      ...resetServiceFields(),
      taskStatus: "progressing",
      returnCount,
      lastStatus: event.toStatus,
    });
    this.store.appendAudit(
      taskId,
      "transition",
      `${existing?.taskStatus ?? "new"} -> progressing (return_count ${record.returnCount})`,
    );
    log.info(
      { from: existing?.taskStatus ?? "new", returnCount: record.returnCount, status: event.toStatus },
      existing ? "task re-entered" : "task created",
    );

    if (shouldSkip(record, event)) {
      record = this.store.upsert(taskId, {
        taskStatus: "completed",
        service1Status: "skipped",
        service2Status: "skipped",
        skipDetected: true,
      });
      this.store.appendAudit(taskId, "skip", `skip marker after ${record.returnCount} return(s)`);
      log.warn({ returnCount: record.returnCount }, "skip gate: services bypassed");
      return { kind: "skipped", taskId, record };
    }

    return { kind: "run", record };
  }

  /**
   * Runs the pipeline and, when it throws past the per-stage handling, leaves
   * the task in `error` instead of `progressing` before rethrowing.
   */
  private async runGuarded(event: InboundEvent, admitted: TaskRecord): Promise<PipelineOutcome> {
    try {
      return await this.runPipeline(event, admitted);
    } catch (err) {
      this.recordAbort(event.taskId, err);
      throw err;
    }
  }

  private recordAbort(taskId: string, err: unknown): void {
    const message = `pipeline aborted: ${errorMessage(err)}`;
    try {
      const current = this.store.get(taskId);
      if (current?.taskStatus !== "progressing") return;
      const stage: ServiceStage = current?.service2Status === "running" ? "service2" : "service1";
      this.store.upsert(
        taskId,
        stage === "service1"
          ? { service1Status: "failed", service1Error: message, errorMessage: message, taskStatus: "error" }
          : { service2Status: "failed", service2Error: message, errorMessage: message, taskStatus: "error" },
      );
      this.store.appendAudit(taskId, "error", `${stage} ${message}`);
      this.logger.warn({ taskId, stage, error: errorMessage(err) }, "pipeline aborted; task marked as error");
    } catch (writeErr) {
      this.logger.error(
        { taskId, error: errorMessage(err), writeError: errorMessage(writeErr) },
        "could not record pipeline abort",
      );
    }
  }

  private async runPipeline(event: InboundEvent, admitted: TaskRecord): Promise<PipelineOutcome> {
    const { taskId } = event;
    const log = this.logger.child({ taskId });

    this.store.upsert(taskId, { service1Status: "running" });
    log.info({ service: this.compliance.name }, "service1 started");

    let score: number;
    try {
      const result = await invokeCompliance(
        this.compliance,
        { taskId, status: event.toStatus, returnCount: admitted.returnCount, stage: "service1" },
        this.serviceTimeoutMs,
      );
      score = result.score;
    } catch (err) {
      return this.fail(taskId, "service1", err);
    }

    if (score < this.threshold) {
      const record = this.store.upsert(taskId, {
        service1Status: "done",
        service1DoneAt: this.now(),
        complianceScore: score,
        service2Status: "skipped",
        taskStatus: "returned",
      });
      this.store.appendAudit(taskId, "service1", `score ${score}`);
      this.store.appendAudit(taskId, "returned", `score ${score} below threshold ${this.threshold}`);
      log.warn({ score, threshold: this.threshold }, "task returned: score below threshold");
      const outcome: PipelineOutcome = { kind: "returned", taskId, record, score, threshold: this.threshold };
      await this.notify(outcome);
      return outcome;
    }

    const passed = this.store.upsert(taskId, {
      service1Status: "done",
      service1DoneAt: this.now(),
      complianceScore: score,
    });
    this.store.appendAudit(taskId, "service1", `score ${score}`);
    log.info({ score, threshold: this.threshold }, "service1 done");

    if (!canStartService2(passed, this.threshold)) {
      throw new InvariantError(`service2 cannot start for ${taskId} in state ${passed.service1Status}`);
    }
    this.store.upsert(taskId, { service2Status: "running" });
    log.info({ service: this.downstream.name }, "service2 started");

    try {
      await invokeService(
        this.downstream,
        { taskId, status: event.toStatus, returnCount: admitted.returnCount, stage: "service2" },
        this.serviceTimeoutMs,
      );
    } catch (err) {
      return this.fail(taskId, "service2", err);
    }

    const record = this.store.upsert(taskId, {
      service2Status: "done",
      service2DoneAt: this.now(),
      taskStatus: "completed",
    });
    this.store.appendAudit(taskId, "service2", "done");
    log.info("task completed");
    const outcome: PipelineOutcome = { kind: "completed", taskId, record, score };
    await this.notify(outcome);
    return outcome;
  }

  private async fail(taskId: string, stage: ServiceStage, err: unknown): Promise<PipelineOutcome> {
    if (err instanceof StorageError) throw err;
    const failure = err instanceof TaskgateError ? err : classifyServiceFailure(err, stage);
    const message = failure.message;
    const record = this.store.upsert(
      taskId,
      stage === "service1"
        ? { service1Status: "failed", service1Error: message, errorMessage: message, taskStatus: "error" }
        : { service2Status: "failed", service2Error: message, errorMessage: message, taskStatus: "error" },
    );
    this.store.appendAudit(taskId, "error", `${stage} ${failure.code}: ${message}`);
    this.logger.error({ taskId, stage, code: failure.code, error: message }, `${stage} failed`);
    const outcome: PipelineOutcome = { kind: "failed", taskId, record, stage, code: failure.code, error: message };
    await this.notify(outcome);
    return outcome;
  }

  private async notify(outcome: ProcessOutcome): Promise<void> {
    if (!this.notifier) return;
    await this.notifier.notify(outcome);
  }
}
