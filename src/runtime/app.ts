import type { TaskgateConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { WebhookServer, type PublicSettings } from "../gateway/server.js";
import type { Logger } from "../log.js";
import { HttpServiceAdapter, type FetchLike } from "../services/http-service.js";
import type { ServiceAdapter } from "../services/types.js";
import { TaskStore } from "../tasks/task-store.js";
import { NullIssueTracker, type IssueTracker } from "../tracker/issue-tracker.js";
import { JiraIssueTracker } from "../tracker/jira-tracker.js";
import { Notifier } from "../tracker/notifier.js";
import type { StatusRules } from "../webhook/payload.js";
import { PipelineQueue } from "../webhook/pipeline-queue.js";
import { WebhookProcessor } from "../webhook/processor.js";

export const VERSION = "0.1.0";

export interface TaskgateOverrides {
  compliance?: ServiceAdapter;
  downstream?: ServiceAdapter;
  tracker?: IssueTracker;
  fetchImpl?: FetchLike;
  now?: () => number;
}

export interface TaskgateApp {
  store: TaskStore;
  queue: PipelineQueue;
  processor: WebhookProcessor;
  server: WebhookServer;
  start(): Promise<void>;
  /** Stops accepting requests, lets queued pipelines finish, closes the store. */
  stop(): Promise<void>;
}

function statusRules(cfg: TaskgateConfig): StatusRules {
  return {
    triggerStatuses: cfg.pipeline.triggerStatuses,
    terminalStatuses: cfg.pipeline.terminalStatuses,
    skipCode: cfg.pipeline.skipCode,
  };
}

function publicSettings(cfg: TaskgateConfig): PublicSettings {
  return {
    threshold: cfg.pipeline.threshold,
    triggerStatuses: cfg.pipeline.triggerStatuses,
    terminalStatuses: cfg.pipeline.terminalStatuses,
    skipCode: cfg.pipeline.skipCode,
    processingMode: cfg.processing.mode,
    maxConcurrent: cfg.processing.maxConcurrent,
    minIntervalMs: cfg.processing.minIntervalMs,
    serviceTimeoutMs: cfg.services.timeoutMs,
    tracker: {
      enabled: cfg.tracker.enabled,
      autoReturn: cfg.tracker.autoReturn,
      returnStatus: cfg.tracker.returnStatus,
    },
  };
}

function serviceAdapter(
  cfg: TaskgateConfig,
  key: "compliance" | "downstream",
  fetchImpl: FetchLike | undefined,
): ServiceAdapter {
  const endpoint = cfg.services[key];
  if (!endpoint) {
    throw new ConfigError(`services.${key}.url is not configured`, {
      suggestion: `Add a "services": { "${key}": { "url": "..." } } entry to ${cfg.resolved.configPath}`,
    });
  }
  return new HttpServiceAdapter({
    name: key,
    url: endpoint.url,
    stage: key === "compliance" ? "service1" : "service2",
    token: endpoint.token ?? cfg.resolved.serviceToken,
    fetchImpl,
  });
}

function issueTracker(cfg: TaskgateConfig, logger: Logger, fetchImpl: FetchLike | undefined): IssueTracker {
  if (!cfg.tracker.enabled || !cfg.tracker.baseUrl) return new NullIssueTracker();
  const { email, apiToken } = cfg.resolved.jira;
  if (!email || !apiToken) {
    throw new ConfigError("tracker.enabled requires JIRA_EMAIL and JIRA_API_TOKEN", {
      suggestion: "Set both variables in the environment or in a .env file",
    });
  }
  return new JiraIssueTracker({
    baseUrl: cfg.tracker.baseUrl,
    email,
    apiToken,
    logger,
    timeoutMs: cfg.tracker.timeoutMs,
    fetchImpl,
  });
}

/**
 * Wires store, pipeline and HTTP server from config. Nothing is opened or
 * bound until `start()`.
 */
export function createTaskgate(cfg: TaskgateConfig, logger: Logger, overrides: TaskgateOverrides = {}): TaskgateApp {
  const store = new TaskStore({
    dbPath: cfg.resolved.databasePath,
    busyTimeoutMs: cfg.database.busyTimeoutMs,
    logger,
    now: overrides.now,
  });
  const queue = new PipelineQueue({
    logger,
    maxConcurrent: cfg.processing.maxConcurrent,
    minIntervalMs: cfg.processing.minIntervalMs,
  });
  const notifier = new Notifier({
    tracker: overrides.tracker ?? issueTracker(cfg, logger, overrides.fetchImpl),
    logger,
    comments: cfg.tracker.comments,
    autoReturn: cfg.tracker.autoReturn,
    returnStatus: cfg.tracker.returnStatus,
  });
  const processor = new WebhookProcessor({
    store,
    compliance: overrides.compliance ?? serviceAdapter(cfg, "compliance", overrides.fetchImpl),
    downstream: overrides.downstream ?? serviceAdapter(cfg, "downstream", overrides.fetchImpl),
    queue,
    logger,
    threshold: cfg.pipeline.threshold,
    serviceTimeoutMs: cfg.services.timeoutMs,
    mode: cfg.processing.mode,
    staleAfterMs: cfg.processing.staleAfterMs,
    notifier,
    now: overrides.now,
  });
  const server = new WebhookServer({
    config: { host: cfg.server.host, port: cfg.server.port },
    logger,
    store,
    processor,
    queue,
    rules: statusRules(cfg),
    settings: publicSettings(cfg),
    version: VERSION,
  });

  return {
    store,
    queue,
    processor,
    server,
    async start() {
      await store.open();
      try {
        // Nothing is in flight before the server binds; leftovers are from a previous run.
        store.recoverStuck(0);
        await server.start();
      } catch (err) {
        store.close();
        throw err;
      }
    },
    async stop() {
      await server.stop();
      await queue.onIdle();
      store.close();
    },
  };
}
