import { z } from "zod";

import { TrackerError, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import type { FetchLike } from "../services/http-service.js";
import type { IssueTracker } from "./issue-tracker.js";

const TransitionsSchema = z.object({
  transitions: z
    .array(
      z
        .object({
          id: z.string(),
          name: z.string().optional(),
          to: z.object({ name: z.string().optional() }).passthrough().optional(),
        })
        .passthrough(),
    )
    .default([]),
});

/**
 * JIRA REST v2 client limited to what the notifier needs: comments and
 * workflow transitions.
 */
export class JiraIssueTracker implements IssueTracker {
  readonly name = "jira";
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(params: {
    baseUrl: string;
    email: string;
    apiToken: string;
    logger: Logger;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
  }) {
    this.baseUrl = params.baseUrl.replace(/\/+$/, "");
    this.authHeader = `Basic ${Buffer.from(`${params.email}:${params.apiToken}`).toString("base64")}`;
    this.timeoutMs = params.timeoutMs ?? 30_000;
    this.fetchImpl = params.fetchImpl ?? fetch;
    this.logger = params.logger.child({ component: "jira" });
  }

  async addComment(taskId: string, body: string): Promise<void> {
    await this.request("POST", `/rest/api/2/issue/${encodeURIComponent(taskId)}/comment`, { body });
    this.logger.debug({ taskId }, "comment added");
  }

  async transition(taskId: string, status: string): Promise<boolean> {
    const path = `/rest/api/2/issue/${encodeURIComponent(taskId)}/transitions`;
    const raw = await this.request("GET", path);
    const parsed = TransitionsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TrackerError(`Unexpected transitions response for ${taskId}`);
    }
    const wanted = status.trim().toLowerCase();
    const match = parsed.data.transitions.find(
      (t) => t.to?.name?.trim().toLowerCase() === wanted || t.name?.trim().toLowerCase() === wanted,
    );
    if (!match) {
      this.logger.warn(
        { taskId, status, available: parsed.data.transitions.map((t) => t.to?.name ?? t.name) },
        "no matching transition",
      );
      return false;
    }
    await this.request("POST", path, { transition: { id: match.id } });
    this.logger.info({ taskId, status }, "issue transitioned");
    return true;
  }

  /**
   * One JSON round trip. The deadline covers the response body as well as
   * the headers.
   */
  private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timedOut = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => {
        reject(new TrackerError(`${method} ${path} timed out after ${this.timeoutMs}ms`));
      });
    });
    // Delivered through `bounded`; this only keeps a late abort from going unhandled.
    timedOut.catch(() => undefined);
    const bounded = <T>(work: Promise<T>): Promise<T> => Promise.race([work, timedOut]);
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await bounded(
          this.fetchImpl(`${this.baseUrl}${path}`, {
            method,
            headers: {
              authorization: this.authHeader,
              accept: "application/json",
              ...(body === undefined ? {} : { "content-type": "application/json" }),
            },
            body: body === undefined ? undefined : JSON.stringify(body),
            signal: controller.signal,
          }),
        );
      } catch (err) {
        if (err instanceof TrackerError) throw err;
        throw new TrackerError(`${method} ${path} failed: ${errorMessage(err)}`, { cause: err });
      }

      if (!response.ok) {
        const text = await bounded(response.text().catch(() => ""));
        throw new TrackerError(`${method} ${path} responded ${response.status}${text ? `: ${text.slice(0, 200)}` : ""}`, {
          status: response.status,
        });
      }
      if (response.status === 204) return undefined;
      const text = await bounded(response.text());
      if (!text) return undefined;
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch (err) {
        throw new TrackerError(`${method} ${path} returned invalid JSON`, { cause: err });
      }
    } finally {
      clearTimeout(timer);
    }
  }
}
