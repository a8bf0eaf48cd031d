import type { TaskgateConfig } from "../../../config.js";
import { RuntimeError } from "../../../errors.js";
import { stopService } from "../../../gateway/process-control.js";
import { OutputFormatter } from "../../output-formatter.js";
import type { CommandOptions } from "../types.js";

export async function stop(cfg: TaskgateConfig, options: CommandOptions = {}): Promise<void> {
  const out = options.out ?? new OutputFormatter({ quiet: options.quiet });
  const stopped = await stopService(cfg);
  if (!stopped) {
    throw new RuntimeError("taskgate is not running or did not stop in time");
  }
  out.success("taskgate stopped");
}
