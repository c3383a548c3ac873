import type { JsonObject, JsonValue } from "../utils/stable-json.js";

export type StageStatus = "success" | "fallback_used" | "failed";

/** Where an accepted payload came from. `none` only for failed stages. */
export type Provenance = "capability" | "fallback" | "none";

export type StageResult = Readonly<{
  taskId: string;
  kind: string;
  status: StageStatus;
  provenance: Provenance;
  payload: JsonValue | null;
  attempts: number;
  /** Messages of the attempts that did not produce an accepted payload. */
  errors: readonly string[];
  startedAt: number;
  finishedAt: number;
  durationMs: number;
}>;

export type TaskState =
  | "pending"
  | "running"
  | "succeeded"
  | "fallback_applied"
  | "failed"
  | "recorded"
  | "aborted";

export type RunStatus = "active" | "complete" | "aborted";

/** One entry per sink task. */
export type TerminalOutput = Record<string, JsonValue>;

export type TaskReport = {
  taskId: string;
  kind: string;
  state: TaskState;
  status?: StageStatus;
  provenance?: Provenance;
  attempts?: number;
  durationMs?: number;
  errors?: readonly string[];
};

export type RunReport = {
  runId: string;
  pipeline: string;
  status: RunStatus;
  error?: string;
  inputs: JsonObject;
  startedAt: number;
  finishedAt?: number;
  /** Canonical order. */
  tasks: TaskReport[];
  terminalOutput: TerminalOutput;
};
