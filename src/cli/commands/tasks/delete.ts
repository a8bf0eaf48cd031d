import type { TaskgateConfig } from "../../../config.js";
import { ValidationError } from "../../../errors.js";
import { OutputFormatter } from "../../output-formatter.js";
import type { CommandOptions } from "../types.js";
import { withTaskStore } from "./open-store.js";

export async function deleteTask(cfg: TaskgateConfig, taskId: string, options: CommandOptions = {}): Promise<void> {
  const out = options.out ?? new OutputFormatter({ quiet: options.quiet });
  const result = await withTaskStore(cfg, (store) => {
    if (store.get(taskId)?.taskStatus === "progressing") return "progressing";
    return store.delete(taskId) ? "deleted" : "missing";
  });
  if (result === "progressing") {
    throw new ValidationError(`Task ${taskId} is progressing and cannot be deleted`, {
      suggestion: "Wait for its pipeline to finish. Tasks interrupted by a crash are marked as error on the next start.",
    });
  }
  if (result === "missing") {
    throw new ValidationError(`Task ${taskId} not found`);
  }
  if (options.json) {
    out.json({ taskId, deleted: true });
    return;
  }
  out.success(`Deleted ${taskId}`);
}
