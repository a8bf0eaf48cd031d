import { z } from "zod";

import { ValidationError } from "../errors.js";
import { detectSkipMarker } from "./skip-gate.js";

export const ISSUE_UPDATED_EVENT = "jira:issue_updated";

export type EventKind = "trigger" | "terminal";

export interface InboundEvent {
  taskId: string;
  fromStatus: string | null;
  toStatus: string;
  kind: EventKind;
  skipMarker: boolean;
  source: "webhook" | "manual";
}

export type ParseResult =
  | { ok: true; event: InboundEvent }
  | { ok: false; reason: string; taskId?: string };

export interface StatusRules {
  triggerStatuses: readonly string[];
  terminalStatuses: readonly string[];
  skipCode: string;
}

const WebhookBodySchema = z
  .object({
    webhookEvent: z.string().optional(),
    issue: z
      .object({
        key: z.string().trim().min(1).optional(),
      })
      .passthrough()
      .optional(),
    changelog: z
      .object({
        items: z.array(z.record(z.unknown())).default([]),
      })
      .passthrough()
      .optional(),
    comment: z
      .object({
        body: z.string().optional(),
      })
      .passthrough()
      .optional(),
    skip: z.boolean().optional(),
  })
  .passthrough();

export function normalizeStatus(status: string): string {
  return status.trim().replace(/\s+/g, " ").toUpperCase();
}

export function matchesStatus(status: string, candidates: readonly string[]): boolean {
  const normalized = normalizeStatus(status);
  return candidates.some((candidate) => normalizeStatus(candidate) === normalized);
}

/**
 * Turns a tracker webhook body into an event for the state machine, or a
 * reason why the delivery is ignored. Throws ValidationError for bodies that
 * are not webhook payloads at all.
 */
export function parseWebhook(body: unknown, rules: StatusRules): ParseResult {
  const parsed = WebhookBodySchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new ValidationError(`Malformed webhook payload${where}: ${issue?.message ?? "invalid body"}`);
  }
  const payload = parsed.data;
  const eventName = payload.webhookEvent ?? "unknown";
  const taskId = payload.issue?.key;

  if (eventName !== ISSUE_UPDATED_EVENT) {
    return { ok: false, reason: `event '${eventName}' is not handled`, taskId };
  }
  if (!taskId) {
    throw new ValidationError("Webhook payload has no issue key");
  }

  const statusItem = payload.changelog?.items.find(
    (item) => readString(item, "field")?.toLowerCase() === "status",
  );
  const toStatus = statusItem ? readString(statusItem, "toString") : undefined;
  if (!statusItem || !toStatus?.trim()) {
    return { ok: false, reason: "no status change", taskId };
  }

  let kind: EventKind;
  if (matchesStatus(toStatus, rules.triggerStatuses)) {
    kind = "trigger";
  } else if (matchesStatus(toStatus, rules.terminalStatuses)) {
    kind = "terminal";
  } else {
    return { ok: false, reason: `status '${toStatus}' is not a trigger status`, taskId };
  }

  return {
    ok: true,
    event: {
      taskId,
      fromStatus: readString(statusItem, "fromString") ?? null,
      toStatus: toStatus.trim(),
      kind,
      skipMarker: detectSkipMarker({ skip: payload.skip, commentBody: payload.comment?.body }, rules.skipCode),
      source: "webhook",
    },
  };
}

/** Synthetic ready event used by the manual re-check endpoint. */
export function manualEvent(
  taskId: string,
  rules: StatusRules,
  options: { status?: string; skip?: boolean; comment?: string } = {},
): InboundEvent {
  const trimmed = taskId.trim();
  if (!trimmed) {
    throw new ValidationError("Task id must not be empty");
  }
  const status = options.status?.trim() || rules.triggerStatuses[0];
  if (!status || !matchesStatus(status, rules.triggerStatuses)) {
    throw new ValidationError(`Status '${status ?? ""}' is not a trigger status`);
  }
  return {
    taskId: trimmed,
    fromStatus: null,
    toStatus: status,
    kind: "trigger",
    skipMarker: detectSkipMarker({ skip: options.skip, commentBody: options.comment }, rules.skipCode),
    source: "manual",
  };
}

// Changelog items carry a `toString` key, so read own properties only.
function readString(item: Record<string, unknown>, key: string): string | undefined {
  if (!Object.hasOwn(item, key)) return undefined;
  const value = item[key];
  return typeof value === "string" ? value : undefined;
}
