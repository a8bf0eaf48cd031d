import { ServiceError, ServiceUnavailableError } from "../errors.js";
import { classifyServiceFailure } from "../monitor/error-classifier.js";
import type { ServiceAdapter, ServiceRequest, ServiceResult } from "./types.js";

/**
 * Calls `adapter` with a deadline. The adapter gets an AbortSignal that fires
 * at the deadline; the call is also abandoned there if the adapter ignores it.
 *
 * @throws ServiceUnavailableError when unreachable or past the deadline
 * @throws ServiceError when the service answers with a failure
 */
export async function invokeService(
  adapter: ServiceAdapter,
  request: ServiceRequest,
  timeoutMs: number,
): Promise<ServiceResult> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new ServiceUnavailableError(`${adapter.name} timed out after ${timeoutMs}ms`, request.stage, {
          details: { category: "timeout" },
        }),
      );
    }, timeoutMs);
  });

  let result: ServiceResult;
  try {
    result = await Promise.race([adapter.invoke(request, { signal: controller.signal }), deadline]);
  } catch (err) {
    throw classifyServiceFailure(err, request.stage);
  } finally {
    clearTimeout(timer);
  }

  if (result.status === "failure") {
    throw new ServiceError(`${adapter.name} reported failure${result.detail ? `: ${result.detail}` : ""}`, request.stage);
  }
  return result;
}

/** Compliance stage: a success must carry a numeric score. */
export async function invokeCompliance(
  adapter: ServiceAdapter,
  request: ServiceRequest,
  timeoutMs: number,
): Promise<{ score: number; detail?: string }> {
  const result = await invokeService(adapter, request, timeoutMs);
  if (typeof result.score !== "number" || !Number.isFinite(result.score)) {
    throw new ServiceError(`${adapter.name} returned no compliance score`, request.stage);
  }
  return { score: result.score, detail: result.detail };
}
