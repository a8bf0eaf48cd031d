import type { TaskRecord, TaskStatus } from "./types.js";

export type TaskState = TaskStatus | "new";

const LEGAL_TRANSITIONS: Record<TaskState, TaskStatus[]> = {
  new: ["progressing"],
  progressing: ["completed", "returned", "error"],
  completed: ["progressing"],
  returned: ["progressing"],
  error: ["progressing"],
};

export function canTransition(from: TaskState, to: TaskStatus): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

/** Service2 may only start once Service1 is done with a passing score. */
export function canStartService2(
  record: Pick<TaskRecord, "service1Status" | "complianceScore">,
  threshold: number,
): boolean {
  return (
    record.service1Status === "done" &&
    record.complianceScore !== null &&
    record.complianceScore >= threshold
  );
}

export function resetServiceFields(): Pick<
  TaskRecord,
  | "service1Status"
  | "service2Status"
  | "complianceScore"
  | "skipDetected"
  | "service1Error"
  | "service2Error"
  | "errorMessage"
  | "service1DoneAt"
  | "service2DoneAt"
> {
  return {
    service1Status: "pending",
    service2Status: "pending",
    complianceScore: null,
    skipDetected: false,
    service1Error: null,
    service2Error: null,
    errorMessage: null,
    service1DoneAt: null,
    service2DoneAt: null,
  };
}
