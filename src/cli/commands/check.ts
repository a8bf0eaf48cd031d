/**
 * Check Command - run a task through the pipeline on the running service
 */

import type { TaskgateConfig } from "../../config.js";
import { RuntimeError } from "../../errors.js";
import { OutputFormatter } from "../output-formatter.js";
import { requestService } from "../service-client.js";
import type { CommandOptions } from "./types.js";

export interface CheckOptions extends CommandOptions {
  status?: string;
  skip?: boolean;
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return Object.entries(body).find(([name]) => name === key)?.[1];
}

export async function check(cfg: TaskgateConfig, taskId: string, options: CheckOptions = {}): Promise<void> {
  const out = options.out ?? new OutputFormatter({ quiet: options.quiet });
  const res = await requestService(cfg, "POST", `/manual/check/${encodeURIComponent(taskId)}`, {
    body: { status: options.status, skip: options.skip },
    timeoutMs: cfg.services.timeoutMs * 2 + 5_000,
  });

  if (options.json) {
    out.json(res.body);
  }
  const outcome = String(field(res.body, "outcome") ?? "unknown");
  if (res.status >= 400) {
    const message = String(field(res.body, "error") ?? `HTTP ${res.status}`);
    throw new RuntimeError(`Check of ${taskId} ${outcome === "failed" ? "failed" : "was rejected"}: ${message}`);
  }
  if (!options.json) {
    out.success(`${taskId}: ${outcome}`);
  }
}
