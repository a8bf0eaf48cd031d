import type { TaskgateConfig } from "../config.js";
import { RuntimeError, errorMessage } from "../errors.js";

export interface ServiceResponse {
  status: number;
  body: unknown;
}

export function serviceBaseUrl(cfg: TaskgateConfig): string {
  const host = cfg.server.host === "0.0.0.0" || cfg.server.host === "::" ? "127.0.0.1" : cfg.server.host;
  return `http://${host.includes(":") ? `[${host}]` : host}:${cfg.server.port}`;
}

/**
 * Calls the running service's HTTP API.
 *
 * @throws RuntimeError when the service cannot be reached
 */
export async function requestService(
  cfg: TaskgateConfig,
  method: "GET" | "POST",
  path: string,
  options: { body?: unknown; timeoutMs?: number } = {},
): Promise<ServiceResponse> {
  const url = `${serviceBaseUrl(cfg)}${path}`;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs ?? 5_000);
  try {
    const res = await fetch(url, {
      method,
      headers: options.body === undefined ? undefined : { "content-type": "application/json" },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: controller.signal,
    });
    const text = await res.text();
    let body: unknown = text;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }
    return { status: res.status, body };
  } catch (err) {
    throw new RuntimeError(`Cannot reach taskgate at ${url}: ${errorMessage(err)}`, {
      cause: err,
      suggestion: "Start the service with 'taskgate start'",
    });
  } finally {
    clearTimeout(timer);
  }
}
