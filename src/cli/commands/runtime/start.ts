/**
 * Runtime Start Command - run the webhook service in the foreground
 */

import type { TaskgateConfig } from "../../../config.js";
import { RuntimeError, errorMessage } from "../../../errors.js";
import { ensureStateDir, findRunningPid, removePidFile, writePidFile } from "../../../gateway/process-control.js";
import { createLoggerWithCleanup } from "../../../log.js";
import { createTaskgate } from "../../../runtime/app.js";
import { OutputFormatter } from "../../output-formatter.js";
import type { CommandOptions } from "../types.js";

export async function start(cfg: TaskgateConfig, options: CommandOptions = {}): Promise<void> {
  const out = options.out ?? new OutputFormatter({ quiet: options.quiet });

  await ensureStateDir(cfg);
  const existingPid = await findRunningPid(cfg);
  if (existingPid !== null) {
    throw new RuntimeError(`taskgate is already running (PID: ${existingPid})`, {
      suggestion: "Use 'taskgate stop' to stop it first.",
    });
  }

  const { logger, close: closeLogger } = createLoggerWithCleanup(
    cfg.logging.level,
    cfg.resolved.logFilePath,
    cfg.resolved.logFileLevel,
  );
  const app = createTaskgate(cfg, logger);

  out.info("Starting taskgate...");
  await app.start();
  await writePidFile(cfg);
  out.success(`Listening on http://${cfg.server.host}:${app.server.port} (mode: ${cfg.processing.mode})`);
  out.info(`Database: ${cfg.resolved.databasePath}`);

  await new Promise<void>((resolve) => {
    let stopping = false;
    const shutdown = async (signal: NodeJS.Signals) => {
      if (stopping) return;
      stopping = true;
      out.info(`\nShutting down (${signal})...`);

      // force exit if cleanup hangs
      const timeout = setTimeout(() => {
        console.error("Shutdown timed out, forcing exit...");
        process.exit(1);
      }, 5000);
      timeout.unref();

      try {
        await app.stop();
      } catch (err) {
        out.error(`Error during shutdown: ${errorMessage(err)}`);
        process.exitCode = 1;
      } finally {
        await removePidFile(cfg);
        logger.info({ signal }, "taskgate stopped");
        await closeLogger();
        clearTimeout(timeout);
        resolve();
      }
    };

    process.once("SIGINT", (signal) => void shutdown(signal));
    process.once("SIGTERM", (signal) => void shutdown(signal));
  });
}
