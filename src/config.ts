import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";

const DEFAULT_CONFIG_PATH = "taskgate.config.json";

const LevelSchema = z.enum(["trace", "debug", "info", "warn", "error"]);

const ServerSchema = z
  .object({
    host: z.string().min(1).default("127.0.0.1"),
    port: z.number().int().min(0).max(65_535).default(8000),
  })
  .default({});

const DatabaseSchema = z
  .object({
    path: z.string().optional(),
    busyTimeoutMs: z.number().int().positive().default(30_000),
  })
  .default({});

const PipelineSchema = z
  .object({
    threshold: z.number().min(0).max(100).default(60),
    triggerStatuses: z.array(z.string().min(1)).min(1).default(["READY TO TEST"]),
    terminalStatuses: z.array(z.string().min(1)).default(["DONE", "CLOSED"]),
    skipCode: z.string().min(1).default("AI_SKIP"),
  })
  .default({});

const ProcessingSchema = z
  .object({
    mode: z.enum(["async", "sync"]).default("async"),
    maxConcurrent: z.number().int().positive().default(1),
    minIntervalMs: z.number().int().min(0).default(0),
    staleAfterMs: z.number().int().positive().optional(),
  })
  .default({});

const ServiceEndpointSchema = z.object({
  url: z.string().url(),
  token: z.string().optional(),
});

const ServicesSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(120_000),
    compliance: ServiceEndpointSchema.optional(),
    downstream: ServiceEndpointSchema.optional(),
  })
  .default({});

const TrackerSchema = z
  .object({
    enabled: z.boolean().default(false),
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().default(30_000),
    comments: z.boolean().default(true),
    autoReturn: z.boolean().default(false),
    returnStatus: z.string().min(1).default("NEED CLARIFICATION/RETURN TEST"),
  })
  .refine((value) => !value.enabled || Boolean(value.baseUrl?.trim()), {
    message: "tracker.baseUrl is required when tracker.enabled is true",
  })
  .default({});

const LoggingSchema = z
  .object({
    level: LevelSchema.default("info"),
    filePath: z.string().optional(),
    fileLevel: LevelSchema.optional(),
  })
  .default({});

const ConfigSchema = z.object({
  stateDir: z.string().default(".taskgate"),
  server: ServerSchema,
  database: DatabaseSchema,
  pipeline: PipelineSchema,
  processing: ProcessingSchema,
  services: ServicesSchema,
  tracker: TrackerSchema,
  logging: LoggingSchema,
});

export type TaskgateConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    configPath: string;
    baseDir: string;
    stateDir: string;
    databasePath: string;
    pidFilePath: string;
    logFilePath: string;
    logFileLevel: string;
    serviceToken?: string;
    jira: {
      email?: string;
      apiToken?: string;
    };
  };
};

export type Env = Record<string, string | undefined>;

/**
 * Loads and validates the config file. A missing default file yields an
 * all-defaults config; a missing explicit file is an error.
 */
export async function loadConfig(explicitPath?: string, env: Env = process.env): Promise<TaskgateConfig> {
  const configPath = resolveConfigPath(explicitPath, env);
  const explicit = Boolean(explicitPath?.trim() || env.TASKGATE_CONFIG?.trim());
  let raw: string | undefined;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (explicit || !isNotFound(err)) {
      throw new ConfigError(`Cannot read config file: ${configPath}`, {
        cause: err,
        suggestion: "Pass an existing file with --config or set TASKGATE_CONFIG",
      });
    }
  }
  let parsed: unknown = {};
  if (raw !== undefined) {
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`Config file is not valid JSON: ${configPath}`, { cause: err });
    }
  }
  return parseConfig(parsed, configPath, env);
}

export function parseConfig(input: unknown, configPath: string, env: Env = process.env): TaskgateConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid config in ${configPath}: ${issues.join("; ")}`, {
      details: { issues },
    });
  }
  return resolveConfig(result.data, path.resolve(configPath), env);
}

export function resolveConfigPath(explicitPath?: string, env: Env = process.env): string {
  const envPath = env.TASKGATE_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return resolveUserPath(pathToUse, process.cwd());
}

function resolveConfig(base: z.infer<typeof ConfigSchema>, configPath: string, env: Env): TaskgateConfig {
  const baseDir = path.dirname(configPath);
  const stateDir = resolveUserPath(base.stateDir, baseDir);
  const databasePath = resolveUserPath(
    base.database.path?.trim() || path.join(stateDir, "taskgate.sqlite"),
    baseDir,
  );
  const logFilePath = resolveUserPath(
    base.logging.filePath?.trim() || path.join(stateDir, "taskgate.log"),
    baseDir,
  );
  const logFileLevel = base.logging.fileLevel ?? base.logging.level;

  return {
    ...base,
    resolved: {
      configPath,
      baseDir,
      stateDir,
      databasePath,
      pidFilePath: path.join(stateDir, "taskgate.pid"),
      logFilePath,
      logFileLevel,
      serviceToken: env.TASKGATE_SERVICE_TOKEN?.trim() || undefined,
      jira: {
        email: env.JIRA_EMAIL?.trim() || undefined,
        apiToken: env.JIRA_API_TOKEN?.trim() || undefined,
      },
    },
  };
}

function resolveUserPath(value: string, baseDir: string): string {
  const trimmed = value.trim();
  if (trimmed === "~") return os.homedir();
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return path.resolve(baseDir, trimmed);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
