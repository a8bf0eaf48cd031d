import type { ErrorCode, ServiceStage } from "../errors.js";
import type { TaskRecord, TaskStatus } from "../tasks/types.js";

export type PipelineOutcome =
  | { kind: "completed"; taskId: string; record: TaskRecord; score: number }
  | { kind: "returned"; taskId: string; record: TaskRecord; score: number; threshold: number }
  | { kind: "failed"; taskId: string; record: TaskRecord; stage: ServiceStage; code: ErrorCode; error: string };

export type ProcessOutcome =
  | PipelineOutcome
  | { kind: "ignored"; taskId?: string; reason: string }
  | { kind: "duplicate"; taskId: string; taskStatus: TaskStatus }
  | { kind: "recorded"; taskId: string; record: TaskRecord }
  | { kind: "skipped"; taskId: string; record: TaskRecord }
  | { kind: "accepted"; taskId: string; record: TaskRecord };
