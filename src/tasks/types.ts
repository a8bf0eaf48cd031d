export type TaskStatus = "progressing" | "completed" | "returned" | "error";

export type ServiceStatus = "pending" | "running" | "done" | "failed" | "skipped";

export const TASK_STATUSES: readonly TaskStatus[] = ["progressing", "completed", "returned", "error"];

export const SERVICE_STATUSES: readonly ServiceStatus[] = ["pending", "running", "done", "failed", "skipped"];

export interface TaskRecord {
  taskId: string;
  taskStatus: TaskStatus;
  service1Status: ServiceStatus;
  service2Status: ServiceStatus;
  returnCount: number;
  /** Percentage reported by the compliance service. */
  complianceScore: number | null;
  /** Tracker status carried by the most recent accepted event. */
  lastStatus: string | null;
  skipDetected: boolean;
  service1Error: string | null;
  service2Error: string | null;
  errorMessage: string | null;
  service1DoneAt: number | null;
  service2DoneAt: number | null;
  createdAt: number;
  updatedAt: number;
}

export type TaskFields = Partial<Omit<TaskRecord, "taskId" | "createdAt" | "updatedAt">>;

export type AuditKind =
  | "received"
  | "duplicate"
  | "recorded"
  | "transition"
  | "skip"
  | "service1"
  | "service2"
  | "returned"
  | "error"
  | "deleted";

export const AUDIT_KINDS: readonly AuditKind[] = [
  "received",
  "duplicate",
  "recorded",
  "transition",
  "skip",
  "service1",
  "service2",
  "returned",
  "error",
  "deleted",
];

export interface TaskAuditEntry {
  id: number;
  taskId: string;
  at: number;
  kind: AuditKind;
  detail: string | null;
}

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

export function isServiceStatus(value: string): value is ServiceStatus {
  return SERVICE_STATUSES.some((status) => status === value);
}

export function isAuditKind(value: string): value is AuditKind {
  return AUDIT_KINDS.some((kind) => kind === value);
}
