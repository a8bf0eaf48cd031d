import type { TaskgateConfig } from "../../../config.js";
import { createLogger } from "../../../log.js";
import { TaskStore } from "../../../tasks/task-store.js";

/** Opens the task database for a one-off CLI command and closes it afterwards. */
export async function withTaskStore<T>(cfg: TaskgateConfig, fn: (store: TaskStore) => Promise<T> | T): Promise<T> {
  const logger = createLogger(cfg.logging.level, undefined, undefined, { console: false });
  const store = new TaskStore({
    dbPath: cfg.resolved.databasePath,
    busyTimeoutMs: cfg.database.busyTimeoutMs,
    logger,
  });
  await store.open();
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}
