/**
 * HTTP surface: the tracker webhook, the manual re-check trigger, health and
 * read-only task inspection.
 */

import { createServer, type Server } from "node:http";

import express, { type NextFunction, type Request, type Response } from "express";
import { z } from "zod";

import { StorageError, TaskgateError, ValidationError, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import type { TaskStore } from "../tasks/task-store.js";
import { isTaskStatus } from "../tasks/types.js";
import type { ProcessOutcome } from "../webhook/outcome.js";
import { manualEvent, parseWebhook, type StatusRules } from "../webhook/payload.js";
import type { PipelineQueue } from "../webhook/pipeline-queue.js";
import type { ProcessingMode, WebhookProcessor } from "../webhook/processor.js";

export interface ServerConfig {
  port: number;
  host: string;
}

export interface PublicSettings {
  threshold: number;
  triggerStatuses: string[];
  terminalStatuses: string[];
  skipCode: string;
  processingMode: ProcessingMode;
  maxConcurrent: number;
  minIntervalMs: number;
  serviceTimeoutMs: number;
  tracker: { enabled: boolean; autoReturn: boolean; returnStatus: string };
}

export interface WebhookServerOptions {
  config: ServerConfig;
  logger: Logger;
  store: TaskStore;
  processor: WebhookProcessor;
  queue: PipelineQueue;
  rules: StatusRules;
  settings: PublicSettings;
  version: string;
}

const ManualCheckSchema = z
  .object({
    status: z.string().trim().min(1).optional(),
    skip: z.boolean().optional(),
    comment: z.string().optional(),
  })
  .default({});

const ENDPOINTS = [
  "POST /webhook/jira",
  "POST /manual/check/:taskId",
  "GET /health",
  "GET /settings",
  "GET /api/tasks",
  "GET /api/tasks/:taskId",
  "GET /api/tasks/:taskId/history",
  "DELETE /api/tasks/:taskId",
];

type AsyncHandler = (req: Request, res: Response) => Promise<void> | void;

// Express 4 does not forward rejected handler promises to error middleware.
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

function httpStatusFor(outcome: ProcessOutcome): number {
  return outcome.kind === "failed" ? 502 : 200;
}

function serializeOutcome(outcome: ProcessOutcome): Record<string, unknown> {
  switch (outcome.kind) {
    case "ignored":
      return { ok: true, outcome: outcome.kind, taskId: outcome.taskId, reason: outcome.reason };
    case "duplicate":
      return { ok: true, outcome: outcome.kind, taskId: outcome.taskId, taskStatus: outcome.taskStatus };
    case "failed":
      return {
        ok: false,
        outcome: outcome.kind,
        taskId: outcome.taskId,
        stage: outcome.stage,
        code: outcome.code,
        error: outcome.error,
        task: outcome.record,
      };
    default:
      return { ok: true, outcome: outcome.kind, taskId: outcome.taskId, task: outcome.record };
  }
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function queryInt(value: unknown, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(queryString(value) ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;
  return Math.min(Math.max(parsed, min), max);
}

export class WebhookServer {
  private httpServer: Server | null = null;
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private readonly store: TaskStore;
  private readonly processor: WebhookProcessor;
  private readonly queue: PipelineQueue;
  private readonly rules: StatusRules;
  private readonly settings: PublicSettings;
  private readonly version: string;
  private startTime = 0;

  constructor(options: WebhookServerOptions) {
    this.config = options.config;
    this.logger = options.logger.child({ component: "http" });
    this.store = options.store;
    this.processor = options.processor;
    this.queue = options.queue;
    this.rules = options.rules;
    this.settings = options.settings;
    this.version = options.version;
  }

  /** Bound port once started (differs from the configured one when that is 0). */
  get port(): number {
    const address = this.httpServer?.address();
    return address && typeof address === "object" ? address.port : this.config.port;
  }

  createApp(): express.Application {
    const app = express();
    app.disable("x-powered-by");
    app.use(express.json({ limit: "1mb" }));

    app.get("/", (_req, res) => {
      res.json({ ok: true, service: "taskgate", version: this.version, endpoints: ENDPOINTS });
    });

    app.post(
      "/webhook/jira",
      route(async (req, res) => {
        const parsed = parseWebhook(req.body, this.rules);
        if (!parsed.ok) {
          this.logger.debug({ taskId: parsed.taskId, reason: parsed.reason }, "webhook ignored");
          res.json({ ok: true, outcome: "ignored", taskId: parsed.taskId, reason: parsed.reason });
          return;
        }
        const outcome = await this.processor.handle(parsed.event);
        res.status(httpStatusFor(outcome)).json(serializeOutcome(outcome));
      }),
    );

    app.post(
      "/manual/check/:taskId",
      route(async (req, res) => {
        const body = ManualCheckSchema.safeParse(req.body ?? {});
        if (!body.success) {
          throw new ValidationError(`Invalid manual check body: ${body.error.issues[0]?.message ?? "unknown"}`);
        }
        const event = manualEvent(req.params.taskId, this.rules, body.data);
        this.logger.info({ taskId: event.taskId }, "manual check requested");
        const outcome = await this.processor.handle(event, { wait: true });
        res.status(httpStatusFor(outcome)).json(serializeOutcome(outcome));
      }),
    );

    app.get("/health", (_req, res) => {
      const base = {
        timestamp: new Date().toISOString(),
        uptimeMs: this.startTime ? Date.now() - this.startTime : 0,
        version: this.version,
        queue: { active: this.queue.getActiveCount(), queued: this.queue.getQueueDepth() },
      };
      try {
        this.store.ping();
        res.json({ ok: true, status: "healthy", database: "ok", ...base });
      } catch (err) {
        this.logger.error({ error: errorMessage(err) }, "health check failed");
        res.status(503).json({ ok: false, status: "unhealthy", database: "unreachable", error: errorMessage(err), ...base });
      }
    });

    app.get("/settings", (_req, res) => {
      res.json({ ok: true, settings: this.settings });
    });

    app.get("/api/tasks", (req, res) => {
      const status = queryString(req.query.status);
      if (status !== undefined && !isTaskStatus(status)) {
        throw new ValidationError(`Unknown task status '${status}'`);
      }
      const limit = queryInt(req.query.limit, 50, 1, 500);
      const offset = queryInt(req.query.offset, 0, 0, Number.MAX_SAFE_INTEGER);
      const tasks = this.store.list({ status, limit, offset });
      res.json({ ok: true, tasks, total: this.store.count(status), limit, offset });
    });

    app.get("/api/tasks/:taskId", (req, res) => {
      const task = this.store.get(req.params.taskId);
      if (!task) {
        res.status(404).json({ ok: false, error: "Task not found" });
        return;
      }
      res.json({ ok: true, task });
    });

    app.get("/api/tasks/:taskId/history", (req, res) => {
      res.json({ ok: true, taskId: req.params.taskId, history: this.store.history(req.params.taskId) });
    });

    app.delete(
      "/api/tasks/:taskId",
      route(async (req, res) => {
        const { taskId } = req.params;
        const result = await this.store.withTaskLock(taskId, () => {
          if (this.store.get(taskId)?.taskStatus === "progressing") return "progressing";
          return this.store.delete(taskId) ? "deleted" : "missing";
        });
        if (result === "progressing") {
          res.status(409).json({ ok: false, error: "Task is progressing; retry once its pipeline finishes" });
          return;
        }
        if (result === "missing") {
          res.status(404).json({ ok: false, error: "Task not found" });
          return;
        }
        res.json({ ok: true, taskId, deleted: true });
      }),
    );

    app.use((_req: Request, res: Response) => {
      res.status(404).json({ ok: false, error: "Not found" });
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const status = this.statusForError(err);
      const code = err instanceof TaskgateError ? err.code : status === 400 ? "VALIDATION_ERROR" : "INTERNAL_ERROR";
      const log = status >= 500 ? this.logger.error.bind(this.logger) : this.logger.warn.bind(this.logger);
      log({ method: req.method, path: req.path, code, error: errorMessage(err) }, "request failed");
      res.status(status).json({ ok: false, code, error: errorMessage(err) });
    });

    return app;
  }

  async start(): Promise<void> {
    if (this.httpServer) {
      this.logger.warn("Server already running");
      return;
    }
    this.startTime = Date.now();
    const server = createServer(this.createApp());
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.httpServer = server;
    this.logger.info({ host: this.config.host, port: this.port }, "HTTP server started");
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    });
    this.logger.info("HTTP server stopped");
  }

  private statusForError(err: unknown): number {
    if (err instanceof ValidationError) return 400;
    if (err instanceof StorageError) return 500;
    // body-parser marks malformed JSON with a 4xx status
    if (err instanceof SyntaxError && "status" in err && err.status === 400) return 400;
    return 500;
  }
}
