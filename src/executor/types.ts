import type { StageResult } from "../run/types.js";
import type { StageError } from "./retry-controller.js";

export type ExecutionCallbacks = {
  onTaskStart?: (taskId: string) => void;
  /** Called after every attempt; `error` is set when the attempt was rejected. */
  onTaskAttempt?: (taskId: string, attempt: number, error?: StageError) => void;
  onTaskEnd?: (taskId: string, result: StageResult) => void;
};

export type ExecutionOptions = ExecutionCallbacks & {
  maxConcurrency?: number;
  /** Cancels the run: pending tasks are aborted, in-flight calls receive the abort. */
  signal?: AbortSignal;
};

/** Write-ahead sink for finalized stages. */
export interface RunRecorder {
  append(runId: string, result: StageResult): unknown;
}
