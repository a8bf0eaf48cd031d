import type { TaskgateConfig } from "../../../config.js";
import { ValidationError } from "../../../errors.js";
import { isTaskStatus } from "../../../tasks/types.js";
import { OutputFormatter } from "../../output-formatter.js";
import type { CommandOptions } from "../types.js";
import { withTaskStore } from "./open-store.js";

export interface ListTasksOptions extends CommandOptions {
  status?: string;
  limit?: string;
}

export async function listTasks(cfg: TaskgateConfig, options: ListTasksOptions = {}): Promise<void> {
  const out = options.out ?? new OutputFormatter({ quiet: options.quiet });
  const status = options.status?.trim().toLowerCase();
  if (status !== undefined && !isTaskStatus(status)) {
    throw new ValidationError(`Unknown status '${options.status}'`, {
      suggestion: "Use one of: progressing, completed, returned, error",
    });
  }
  const limit = options.limit === undefined ? 20 : Number.parseInt(options.limit, 10);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`--limit must be a positive integer, got '${options.limit}'`);
  }

  const { tasks, total } = await withTaskStore(cfg, (store) => ({
    tasks: store.list({ status, limit }),
    total: store.count(status),
  }));

  if (options.json) {
    out.json({ tasks, total });
    return;
  }
  if (tasks.length === 0) {
    out.info(status ? `No ${status} tasks` : "No tasks recorded yet");
    return;
  }
  out.table(
    tasks.map((task) => ({
      id: task.taskId,
      status: task.taskStatus,
      s1: task.service1Status,
      s2: task.service2Status,
      score: task.complianceScore ?? "-",
      returns: task.returnCount,
      updated: out.formatTime(task.updatedAt),
    })),
    [
      { key: "id", header: "TASK" },
      { key: "status", header: "STATUS" },
      { key: "s1", header: "SERVICE1" },
      { key: "s2", header: "SERVICE2" },
      { key: "score", header: "SCORE", align: "right" },
      { key: "returns", header: "RETURNS", align: "right" },
      { key: "updated", header: "UPDATED" },
    ],
  );
  out.info(`${tasks.length} of ${total} task(s)`);
}
