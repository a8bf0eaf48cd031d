import { z } from "zod";

import { ServiceError, ServiceUnavailableError, errorMessage, type ServiceStage } from "../errors.js";
import type { ServiceAdapter, ServiceRequest, ServiceResult } from "./types.js";

const UNAVAILABLE_STATUSES = new Set([429, 502, 503, 504]);

const ResponseSchema = z.object({
  status: z.enum(["success", "failure"]),
  score: z.number().finite().optional(),
  detail: z.string().optional(),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Service adapter speaking JSON over HTTP: POSTs the request and expects
 * `{ status, score?, detail? }` back.
 */
export class HttpServiceAdapter implements ServiceAdapter {
  readonly name: string;
  private readonly url: string;
  private readonly token?: string;
  private readonly stage: ServiceStage;
  private readonly fetchImpl: FetchLike;

  constructor(params: { name: string; url: string; stage: ServiceStage; token?: string; fetchImpl?: FetchLike }) {
    this.name = params.name;
    this.url = params.url;
    this.stage = params.stage;
    this.token = params.token;
    this.fetchImpl = params.fetchImpl ?? fetch;
  }

  async invoke(request: ServiceRequest, options: { signal: AbortSignal }): Promise<ServiceResult> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
      accept: "application/json",
    };
    if (this.token) {
      headers.authorization = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers,
        body: JSON.stringify(request),
        signal: options.signal,
      });
    } catch (err) {
      throw new ServiceUnavailableError(`${this.name} unreachable: ${errorMessage(err)}`, this.stage, {
        cause: err,
      });
    }

    if (UNAVAILABLE_STATUSES.has(response.status)) {
      throw new ServiceUnavailableError(`${this.name} responded ${response.status}`, this.stage, {
        details: { httpStatus: response.status },
      });
    }
    if (!response.ok) {
      throw new ServiceError(`${this.name} responded ${response.status}`, this.stage, {
        details: { httpStatus: response.status },
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ServiceError(`${this.name} returned invalid JSON`, this.stage, { cause: err });
    }
    const parsed = ResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ServiceError(
        `${this.name} returned a malformed response: ${issue ? `${issue.path.join(".") || "body"} ${issue.message}` : "unknown shape"}`,
        this.stage,
      );
    }
    return parsed.data;
  }
}
