/**
 * Classifies service call failures by message so the pipeline can tell a
 * transient outage from a real failure.
 */

import { ServiceError, ServiceUnavailableError, errorMessage, type ServiceStage } from "../errors.js";

export type FailureCategory =
  | "timeout"
  | "rate_limit"
  | "network"
  | "server"
  | "auth"
  | "validation"
  | "unknown";

export interface ClassificationResult {
  category: FailureCategory;
  /** Transient: the service may succeed on a later attempt. */
  transient: boolean;
}

const ERROR_PATTERNS: Array<{
  category: FailureCategory;
  patterns: RegExp[];
  transient: boolean;
}> = [
  {
    category: "timeout",
    patterns: [/timeout/i, /timed out/i, /deadline exceeded/i, /ETIMEDOUT/, /ECONNABORTED/, /AbortError/, /\b504\b/, /\b408\b/],
    transient: true,
  },
  {
    category: "rate_limit",
    patterns: [/rate.?limit/i, /too many requests/i, /\b429\b/, /quota exceeded/i, /throttl/i],
    transient: true,
  },
  {
    category: "network",
    patterns: [/ECONNREFUSED/, /ECONNRESET/, /ENOTFOUND/, /EAI_AGAIN/, /socket hang up/i, /fetch failed/i, /network/i],
    transient: true,
  },
  {
    category: "server",
    patterns: [/\b502\b/, /\b503\b/, /bad gateway/i, /service unavailable/i, /overloaded/i],
    transient: true,
  },
  {
    category: "auth",
    patterns: [/unauthorized/i, /forbidden/i, /\b401\b/, /\b403\b/],
    transient: false,
  },
  {
    category: "validation",
    patterns: [/validation/i, /invalid/i, /malformed/i, /\b400\b/, /\b422\b/],
    transient: false,
  },
];

export function classifyError(error: unknown): ClassificationResult {
  const text = describe(error);
  for (const entry of ERROR_PATTERNS) {
    if (entry.patterns.some((regex) => regex.test(text))) {
      return { category: entry.category, transient: entry.transient };
    }
  }
  return { category: "unknown", transient: false };
}

/**
 * Maps any thrown value from a service call onto the two service failure
 * types. Already-typed failures pass through unchanged.
 */
export function classifyServiceFailure(
  error: unknown,
  stage: ServiceStage,
): ServiceUnavailableError | ServiceError {
  if (error instanceof ServiceUnavailableError || error instanceof ServiceError) {
    return error;
  }
  const { category, transient } = classifyError(error);
  const message = `${stage} ${category === "unknown" ? "failed" : category}: ${errorMessage(error)}`;
  return transient
    ? new ServiceUnavailableError(message, stage, { cause: error, details: { category } })
    : new ServiceError(message, stage, { cause: error, details: { category } });
}

// fetch() wraps the socket error in `cause`, so include it in the text.
function describe(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const parts = [error.name, error.message];
  const cause = error.cause;
  if (cause instanceof Error) {
    parts.push(cause.name, cause.message);
    if ("code" in cause && typeof cause.code === "string") parts.push(cause.code);
  }
  return parts.join(" ");
}
