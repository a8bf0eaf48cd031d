/**
 * PID file handling for the long-running service.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { TaskgateConfig } from "../config.js";

export async function ensureStateDir(cfg: TaskgateConfig): Promise<string> {
  await fs.mkdir(cfg.resolved.stateDir, { recursive: true });
  return cfg.resolved.stateDir;
}

export async function readPidFile(cfg: TaskgateConfig): Promise<number | null> {
  let content: string;
  try {
    content = await fs.readFile(cfg.resolved.pidFilePath, "utf-8");
  } catch {
    return null;
  }
  const pid = Number.parseInt(content.trim(), 10);
  return Number.isNaN(pid) ? null : pid;
}

export async function writePidFile(cfg: TaskgateConfig, pid: number = process.pid): Promise<void> {
  await fs.mkdir(path.dirname(cfg.resolved.pidFilePath), { recursive: true });
  await fs.writeFile(cfg.resolved.pidFilePath, String(pid), "utf-8");
}

export async function removePidFile(cfg: TaskgateConfig): Promise<void> {
  await fs.rm(cfg.resolved.pidFilePath, { force: true });
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means the process exists but belongs to someone else
    return err instanceof Error && "code" in err && err.code === "EPERM";
  }
}

/** PID of a live service instance, clearing a stale PID file on the way. */
export async function findRunningPid(cfg: TaskgateConfig): Promise<number | null> {
  const pid = await readPidFile(cfg);
  if (pid === null) return null;
  if (isProcessAlive(pid)) return pid;
  await removePidFile(cfg);
  return null;
}

/**
 * Sends SIGTERM to the running service and waits for it to exit.
 * Resolves false when nothing was running.
 */
export async function stopService(cfg: TaskgateConfig, maxWaitMs = 10_000): Promise<boolean> {
  const pid = await findRunningPid(cfg);
  if (pid === null) return false;

  process.kill(pid, "SIGTERM");

  const checkInterval = 250;
  for (let waited = 0; waited < maxWaitMs; waited += checkInterval) {
    if (!isProcessAlive(pid)) {
      await removePidFile(cfg);
      return true;
    }
    await new Promise((resolve) => setTimeout(resolve, checkInterval));
  }
  return false;
}
