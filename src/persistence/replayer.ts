import { RunNotFoundError } from "../errors.js";
import { buildTerminalOutput, serializeTerminalOutput } from "../run/run.js";
import type { RunReport, StageResult, TerminalOutput } from "../run/types.js";
import type { RunLogRecord } from "../schemas.js";
import type { RunStore } from "./store.js";

export type ReplayResult = {
  report: RunReport;
  results: ReadonlyMap<string, StageResult>;
  terminalOutput: TerminalOutput;
  /** Canonical bytes; equal to what the original run produced. */
  serialized: string;
};

/**
 * Rebuilds a run purely from its log. Capabilities and the validator are never
 * consulted: every payload is taken as recorded.
 */
export class Replayer {
  private store: RunStore;

  constructor(store: RunStore) {
    this.store = store;
  }

  replay(runId: string): ReplayResult {
    const records = this.store.readLog(runId);
    const header = this.store.getRun(runId);
    if (records.length === 0 || !header) throw new RunNotFoundError(runId);

    const results = new Map<string, StageResult>();
    for (const record of records) results.set(record.taskId, toStageResult(record));

    const terminalOutput = buildTerminalOutput(header.sinks, results);
    const report: RunReport = {
      runId,
      pipeline: header.pipeline,
      status: header.status,
      error: header.error,
      inputs: header.inputs,
      startedAt: header.startedAt,
      finishedAt: header.finishedAt,
      tasks: header.tasks.map(({ id, kind }) => {
        const result = results.get(id);
        return {
          taskId: id,
          kind,
          state: result ? "recorded" : "aborted",
          status: result?.status,
          provenance: result?.provenance,
          attempts: result?.attempts,
          durationMs: result?.durationMs,
          errors: result?.errors,
        };
      }),
      terminalOutput,
    };

    return { report, results, terminalOutput, serialized: serializeTerminalOutput(terminalOutput) };
  }
}

function toStageResult(record: RunLogRecord): StageResult {
  return Object.freeze({
    taskId: record.taskId,
    kind: record.kind,
    status: record.status,
    provenance: record.provenance,
    payload: record.payload,
    attempts: record.attempts,
    errors: Object.freeze([...record.errors]),
    startedAt: record.startedAt,
    finishedAt: record.finishedAt,
    durationMs: record.durationMs,
  });
}
