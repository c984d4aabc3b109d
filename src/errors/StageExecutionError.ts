import { AppError } from "./AppError";

export type StageFailureReason =
  | "capability_error"
  | "timeout"
  | "schema_mismatch"
  | "low_confidence"
  | "circuit_open";

const NON_RETRYABLE_REASONS: ReadonlySet<StageFailureReason> = new Set([
  "schema_mismatch",
  "low_confidence",
  "circuit_open",
]);

export class StageExecutionError extends AppError {
  public readonly stage: string;
  public readonly reason: StageFailureReason;
  public readonly retryable: boolean;
  public readonly detail?: unknown;

  constructor(params: {
    stage: string;
    reason: StageFailureReason;
    message: string;
    detail?: unknown;
    retryable?: boolean;
  }) {
    super("stage_execution_failed", params.message, 500, {
      stage: params.stage,
      reason: params.reason,
      detail: params.detail,
    });
    this.name = "StageExecutionError";
    this.stage = params.stage;
    this.reason = params.reason;
    this.detail = params.detail;
    this.retryable = params.retryable ?? !NON_RETRYABLE_REASONS.has(params.reason);
  }
}

/**
 * Wraps any failure thrown by a backing capability so the orchestrator can
 * record a uniform failure on the application.
 */
export function toStageExecutionError(stage: string, err: unknown): StageExecutionError {
  if (err instanceof StageExecutionError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  const reason: StageFailureReason = /timeout/i.test(message) ? "timeout" : "capability_error";
  return new StageExecutionError({
    stage,
    reason,
    message,
    detail: err instanceof Error ? { name: err.name } : undefined,
  });
}

export function isRetryableStageError(err: unknown): boolean {
  if (err instanceof StageExecutionError) {
    return err.retryable;
  }
  return !(err instanceof AppError);
}
