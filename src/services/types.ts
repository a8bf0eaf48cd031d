import type { ServiceStage } from "../errors.js";

export type { ServiceStage };

export interface ServiceRequest {
  taskId: string;
  /** Tracker status that triggered the run. */
  status: string;
  returnCount: number;
  stage: ServiceStage;
}

export interface ServiceResult {
  status: "success" | "failure";
  /** Compliance percentage; required from the compliance stage. */
  score?: number;
  detail?: string;
}

export interface ServiceAdapter {
  readonly name: string;
  invoke(request: ServiceRequest, options: { signal: AbortSignal }): Promise<ServiceResult>;
}
