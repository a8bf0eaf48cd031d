/**
 * Runtime Status Command - PID check plus the running instance's /health
 */

import type { TaskgateConfig } from "../../../config.js";
import { RuntimeError } from "../../../errors.js";
import { findRunningPid } from "../../../gateway/process-control.js";
import { OutputFormatter } from "../../output-formatter.js";
import { requestService, serviceBaseUrl } from "../../service-client.js";
import type { CommandOptions } from "../types.js";

interface StatusInfo {
  running: boolean;
  pid: number | null;
  url: string;
  config: string;
  database: string;
  health: unknown;
}

export async function status(cfg: TaskgateConfig, options: CommandOptions = {}): Promise<void> {
  const out = options.out ?? new OutputFormatter({ quiet: options.quiet });
  const pid = await findRunningPid(cfg);

  let health: unknown = null;
  let healthy = false;
  if (pid !== null) {
    try {
      const res = await requestService(cfg, "GET", "/health", { timeoutMs: 2_000 });
      health = res.body;
      healthy = res.status === 200;
    } catch (err) {
      if (!(err instanceof RuntimeError)) throw err;
      health = { error: err.message };
    }
  }

  const info: StatusInfo = {
    running: pid !== null,
    pid,
    url: serviceBaseUrl(cfg),
    config: cfg.resolved.configPath,
    database: cfg.resolved.databasePath,
    health,
  };

  if (options.json) {
    out.json(info);
    return;
  }

  out.header("taskgate status");
  out.status("Service", pid === null ? "stopped" : healthy ? "running" : "error");
  out.keyValue("PID", pid);
  out.keyValue("URL", info.url);
  out.keyValue("Config", info.config);
  out.keyValue("Database", info.database);
  if (pid !== null && !healthy) {
    out.warn("Health check failed; see the service log");
  }
}
