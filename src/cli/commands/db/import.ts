import path from "node:path";

import type { TaskgateConfig } from "../../../config.js";
import { RuntimeError } from "../../../errors.js";
import { findRunningPid } from "../../../gateway/process-control.js";
import { createLogger } from "../../../log.js";
import { importDatabase } from "../../../tasks/db-import.js";
import { OutputFormatter } from "../../output-formatter.js";
import type { CommandOptions } from "../types.js";

export async function dbImport(cfg: TaskgateConfig, file: string, options: CommandOptions = {}): Promise<void> {
  const out = options.out ?? new OutputFormatter({ quiet: options.quiet });
  const pid = await findRunningPid(cfg);
  if (pid !== null) {
    throw new RuntimeError(`taskgate is running (PID: ${pid}); stop it before importing`, {
      suggestion: "Run 'taskgate stop' first",
    });
  }

  const logger = createLogger(cfg.logging.level, cfg.resolved.logFilePath, cfg.resolved.logFileLevel, {
    console: false,
  });
  const result = await importDatabase({
    source: path.resolve(file),
    target: cfg.resolved.databasePath,
    logger,
  });

  if (options.json) {
    out.json(result);
    return;
  }
  out.success(`Imported ${result.rows} task(s) into ${cfg.resolved.databasePath}`);
  if (result.backupPath) {
    out.info(`Previous database saved as ${result.backupPath}`);
  }
}
