import type { TaskgateConfig } from "../../../config.js";
import { ValidationError } from "../../../errors.js";
import { OutputFormatter } from "../../output-formatter.js";
import type { CommandOptions } from "../types.js";
import { withTaskStore } from "./open-store.js";

export async function showTask(cfg: TaskgateConfig, taskId: string, options: CommandOptions = {}): Promise<void> {
  const out = options.out ?? new OutputFormatter({ quiet: options.quiet });
  const { task, history } = await withTaskStore(cfg, (store) => ({
    task: store.get(taskId),
    history: store.history(taskId),
  }));
  if (!task) {
    throw new ValidationError(`Task ${taskId} not found`);
  }

  if (options.json) {
    out.json({ task, history });
    return;
  }

  out.header(task.taskId);
  out.keyValue("Status", task.taskStatus);
  out.keyValue("Service1", task.service1Status);
  out.keyValue("Service2", task.service2Status);
  out.keyValue("Compliance score", task.complianceScore);
  out.keyValue("Return count", task.returnCount);
  out.keyValue("Last tracker status", task.lastStatus);
  out.keyValue("Skip detected", task.skipDetected);
  if (task.errorMessage) out.keyValue("Error", task.errorMessage);
  out.keyValue("Created", out.formatTime(task.createdAt));
  out.keyValue("Updated", out.formatTime(task.updatedAt));

  if (history.length > 0) {
    out.section("History");
    out.table(
      history.map((entry) => ({ at: out.formatTime(entry.at), kind: entry.kind, detail: entry.detail ?? "" })),
      [
        { key: "at", header: "AT" },
        { key: "kind", header: "KIND" },
        { key: "detail", header: "DETAIL" },
      ],
    );
  }
}
