import fs from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { parseConfig, type TaskgateConfig } from "../../../src/config.js";
import {
  findRunningPid,
  isProcessAlive,
  readPidFile,
  removePidFile,
  stopService,
  writePidFile,
} from "../../../src/gateway/process-control.js";
import { makeTempDir, removeTempDir } from "../../helpers/temp.js";

const DEAD_PID = 999_999_999;

describe("process control", () => {
  let dir: string;
  let cfg: TaskgateConfig;

  beforeEach(async () => {
    dir = await makeTempDir("pid");
    cfg = parseConfig({}, path.join(dir, "taskgate.config.json"), {});
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("writes, reads and removes the PID file", async () => {
    expect(await readPidFile(cfg)).toBeNull();

    await writePidFile(cfg, 4321);
    expect(await fs.readFile(path.join(dir, ".taskgate", "taskgate.pid"), "utf-8")).toBe("4321");
    expect(await readPidFile(cfg)).toBe(4321);

    await removePidFile(cfg);
    expect(await readPidFile(cfg)).toBeNull();
  });

  it("ignores a PID file without a number", async () => {
    await fs.mkdir(cfg.resolved.stateDir, { recursive: true });
    await fs.writeFile(cfg.resolved.pidFilePath, "not-a-pid");

    expect(await readPidFile(cfg)).toBeNull();
  });

  it("tells live processes from dead ones", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
    expect(isProcessAlive(DEAD_PID)).toBe(false);
  });

  it("finds the running instance", async () => {
    await writePidFile(cfg);
    expect(await findRunningPid(cfg)).toBe(process.pid);
  });

  it("clears a stale PID file", async () => {
    await writePidFile(cfg, DEAD_PID);

    expect(await findRunningPid(cfg)).toBeNull();
    expect(await readPidFile(cfg)).toBeNull();
  });

  it("reports that nothing was stopped when no service runs", async () => {
    await expect(stopService(cfg)).resolves.toBe(false);
  });
});
