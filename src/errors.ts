/**
 * Error taxonomy shared by the HTTP surface, the pipeline and the CLI.
 *
 * Duplicate deliveries and scores below the threshold are outcomes, not errors;
 * see `ProcessOutcome` in webhook/processor.ts.
 */

export type ErrorCode =
  | "TASKGATE_ERROR"
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "RUNTIME_ERROR"
  | "STORAGE_ERROR"
  | "INVARIANT_ERROR"
  | "SERVICE_UNAVAILABLE"
  | "SERVICE_ERROR"
  | "TRACKER_ERROR";

export type ServiceStage = "service1" | "service2";

export interface TaskgateErrorOptions {
  code?: ErrorCode;
  details?: Record<string, unknown>;
  suggestion?: string;
  cause?: unknown;
}

export class TaskgateError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  readonly suggestion?: string;

  constructor(message: string, options: TaskgateErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "TaskgateError";
    this.code = options.code ?? "TASKGATE_ERROR";
    this.details = options.details;
    this.suggestion = options.suggestion;
  }
}

export class ConfigError extends TaskgateError {
  constructor(message: string, options: Omit<TaskgateErrorOptions, "code"> = {}) {
    super(message, { ...options, code: "CONFIG_ERROR" });
    this.name = "ConfigError";
  }
}

/** Bad input: malformed webhook payloads, CLI arguments, import files. */
export class ValidationError extends TaskgateError {
  constructor(message: string, options: Omit<TaskgateErrorOptions, "code"> = {}) {
    super(message, { ...options, code: "VALIDATION_ERROR" });
    this.name = "ValidationError";
  }
}

/** Service process not running or not answering. */
export class RuntimeError extends TaskgateError {
  constructor(message: string, options: Omit<TaskgateErrorOptions, "code"> = {}) {
    super(message, { ...options, code: "RUNTIME_ERROR" });
    this.name = "RuntimeError";
  }
}

export class StorageError extends TaskgateError {
  constructor(message: string, options: Omit<TaskgateErrorOptions, "code"> = {}) {
    super(message, { ...options, code: "STORAGE_ERROR" });
    this.name = "StorageError";
  }
}

/** A write would break a task record invariant (e.g. lowering return_count). */
export class InvariantError extends TaskgateError {
  constructor(message: string, options: Omit<TaskgateErrorOptions, "code"> = {}) {
    super(message, { ...options, code: "INVARIANT_ERROR" });
    this.name = "InvariantError";
  }
}

export class ServiceUnavailableError extends TaskgateError {
  readonly stage: ServiceStage;

  constructor(message: string, stage: ServiceStage, options: Omit<TaskgateErrorOptions, "code"> = {}) {
    super(message, { ...options, code: "SERVICE_UNAVAILABLE" });
    this.name = "ServiceUnavailableError";
    this.stage = stage;
  }
}

export class ServiceError extends TaskgateError {
  readonly stage: ServiceStage;

  constructor(message: string, stage: ServiceStage, options: Omit<TaskgateErrorOptions, "code"> = {}) {
    super(message, { ...options, code: "SERVICE_ERROR" });
    this.name = "ServiceError";
    this.stage = stage;
  }
}

export class TrackerError extends TaskgateError {
  readonly status?: number;

  constructor(message: string, options: Omit<TaskgateErrorOptions, "code"> & { status?: number } = {}) {
    super(message, { ...options, code: "TRACKER_ERROR" });
    this.name = "TrackerError";
    this.status = options.status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
