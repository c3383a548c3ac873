import { PipelineError, TransitionError } from "../errors.js";
import type { TaskGraph, TaskSpec } from "../graph/types.js";
import { stableStringify, type JsonObject, type JsonValue } from "../utils/stable-json.js";
import type { RunReport, RunStatus, StageResult, TaskState, TerminalOutput } from "./types.js";

// Valid transitions map: from → [possible targets]
const VALID_TRANSITIONS: Record<TaskState, TaskState[]> = {
  pending: ["running", "aborted"],
  running: ["succeeded", "fallback_applied", "failed", "aborted"],
  succeeded: ["recorded"],
  fallback_applied: ["recorded"],
  failed: ["recorded"],
  recorded: [],
  aborted: [],
};

export function canTransition(from: TaskState, to: TaskState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export type RunInit = {
  runId: string;
  pipeline: string;
  inputs: JsonObject;
  graph: TaskGraph;
  startedAt?: number;
};

/**
 * The state of one pipeline run. The result map is the only shared mutable
 * state between concurrent branches; each task id is written exactly once.
 */
export class Run {
  readonly runId: string;
  readonly pipeline: string;
  readonly inputs: JsonObject;
  readonly graph: TaskGraph;
  readonly startedAt: number;

  private _status: RunStatus = "active";
  private _error?: string;
  private _finishedAt?: number;
  private states = new Map<string, TaskState>();
  private results = new Map<string, StageResult>();

  constructor(init: RunInit) {
    this.runId = init.runId;
    this.pipeline = init.pipeline;
    this.inputs = init.inputs;
    this.graph = init.graph;
    this.startedAt = init.startedAt ?? Date.now();
    for (const id of init.graph.order) this.states.set(id, "pending");
  }

  get status(): RunStatus {
    return this._status;
  }

  get error(): string | undefined {
    return this._error;
  }

  get finishedAt(): number | undefined {
    return this._finishedAt;
  }

  state(taskId: string): TaskState {
    const state = this.states.get(taskId);
    if (!state) throw new PipelineError("INVALID_TRANSITION", `Unknown task "${taskId}" in run ${this.runId}`);
    return state;
  }

  transition(taskId: string, to: TaskState): void {
    const from = this.state(taskId);
    if (!canTransition(from, to)) throw new TransitionError(taskId, from, to);
    this.states.set(taskId, to);
  }

  setResult(result: StageResult): void {
    if (this.results.has(result.taskId)) {
      throw new PipelineError("DUPLICATE_RESULT", `Task "${result.taskId}" already has a result in run ${this.runId}`);
    }
    this.results.set(result.taskId, Object.freeze({ ...result, errors: Object.freeze([...result.errors]) }));
  }

  result(taskId: string): StageResult | undefined {
    return this.results.get(taskId);
  }

  allResults(): ReadonlyMap<string, StageResult> {
    return this.results;
  }

  /** True once every dependency of `task` has been recorded. */
  isReady(task: TaskSpec): boolean {
    return task.dependsOn.every((dep) => this.states.get(dep) === "recorded");
  }

  /** Accepted payloads of the task's dependencies. */
  upstreamPayloads(task: TaskSpec): Map<string, JsonValue> {
    const upstream = new Map<string, JsonValue>();
    for (const dep of task.dependsOn) {
      upstream.set(dep, this.results.get(dep)?.payload ?? null);
    }
    return upstream;
  }

  pendingTasks(): string[] {
    return this.graph.order.filter((id) => this.states.get(id) === "pending");
  }

  complete(): void {
    this.finish("complete");
  }

  abort(reason: string): void {
    if (this._status !== "active") return;
    this._error = reason;
    for (const id of this.pendingTasks()) this.transition(id, "aborted");
    this.finish("aborted");
  }

  private finish(status: RunStatus): void {
    if (this._status !== "active") return;
    this._status = status;
    this._finishedAt = Date.now();
  }

  terminalOutput(): TerminalOutput {
    return buildTerminalOutput(this.graph.sinks, this.results);
  }

  report(): RunReport {
    return {
      runId: this.runId,
      pipeline: this.pipeline,
      status: this._status,
      error: this._error,
      inputs: this.inputs,
      startedAt: this.startedAt,
      finishedAt: this._finishedAt,
      tasks: this.graph.order.map((id) => {
        const task = this.graph.byId.get(id);
        const result = this.results.get(id);
        return {
          taskId: id,
          kind: task?.kind ?? result?.kind ?? "unknown",
          state: this.state(id),
          status: result?.status,
          provenance: result?.provenance,
          attempts: result?.attempts,
          durationMs: result?.durationMs,
          errors: result?.errors,
        };
      }),
      terminalOutput: this.terminalOutput(),
    };
  }
}

/** Sink payloads keyed by task id. Sinks without a successful or fallback result are left out. */
export function buildTerminalOutput(
  sinks: readonly string[],
  results: ReadonlyMap<string, StageResult>,
): TerminalOutput {
  const out: TerminalOutput = {};
  for (const id of sinks) {
    const result = results.get(id);
    if (result && result.status !== "failed" && result.payload !== null) out[id] = result.payload;
  }
  return out;
}

/** Canonical bytes of a terminal output; identical for a run and its replay. */
export function serializeTerminalOutput(output: TerminalOutput): string {
  return stableStringify(output);
}
