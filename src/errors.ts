export type ErrorCode =
  // graph
  | "DUPLICATE_TASK"
  | "UNKNOWN_DEPENDENCY"
  | "SELF_DEPENDENCY"
  | "CYCLE"
  | "UNKNOWN_STAGE_KIND"
  | "INVALID_INPUT_REF"
  | "UNKNOWN_SINK"
  | "EMPTY_GRAPH"
  | "INVALID_TASK"
  // stage execution
  | "CALL_FAILED"
  | "VALIDATION_FAILED"
  | "FALLBACK_FAILED"
  // runs
  | "RUN_NOT_FOUND"
  | "DUPLICATE_RESULT"
  | "DUPLICATE_RUN"
  | "INVALID_TRANSITION"
  | "DUPLICATE_REGISTRATION"
  // config / files
  | "INVALID_CONFIG"
  | "INVALID_PIPELINE";

/** Base class for every error the engine raises on purpose. */
export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

/** Structural problem with the task graph. Fatal: the run aborts before any task starts. */
export class GraphError extends PipelineError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "GraphError";
  }
}

export type CallErrorReason = "timeout" | "transport" | "capability" | "unavailable" | "aborted";

/** A capability invocation that did not produce a payload. Retried. */
export class CallError extends PipelineError {
  readonly reason: CallErrorReason;

  constructor(reason: CallErrorReason, message: string, options?: { cause?: unknown }) {
    super("CALL_FAILED", message, options);
    this.name = "CallError";
    this.reason = reason;
  }
}

/** A payload that does not satisfy its task's ValidationPolicy. Retried, then falls back. */
export class ValidationError extends PipelineError {
  readonly issues: string[];

  constructor(code: ErrorCode, message: string, issues: string[] = []) {
    super(code, message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/** No policy-compliant fallback could be produced. Fatal for the run. */
export class FallbackSynthesisError extends PipelineError {
  readonly taskId: string;

  constructor(taskId: string, message: string, options?: { cause?: unknown }) {
    super("FALLBACK_FAILED", message, options);
    this.name = "FallbackSynthesisError";
    this.taskId = taskId;
  }
}

export class RunNotFoundError extends PipelineError {
  readonly runId: string;

  constructor(runId: string) {
    super("RUN_NOT_FOUND", `No recorded log entries for run "${runId}"`);
    this.name = "RunNotFoundError";
    this.runId = runId;
  }
}

export class TransitionError extends PipelineError {
  readonly from: string;
  readonly to: string;

  constructor(taskId: string, from: string, to: string) {
    super("INVALID_TRANSITION", `Task "${taskId}": transition ${from} → ${to} is not allowed`);
    this.name = "TransitionError";
    this.from = from;
    this.to = to;
  }
}

export class ConfigError extends PipelineError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
