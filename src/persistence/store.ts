import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { PipelineError } from "../errors.js";
import type { StageResult, RunStatus } from "../run/types.js";
import {
  JsonObjectSchema,
  RUN_LOG_FORMAT_VERSION,
  RunLogRecordSchema,
  RunTaskRefSchema,
  parseOrThrow,
  type RunLogRecord,
  type RunTaskRef,
} from "../schemas.js";
import type { JsonObject } from "../utils/stable-json.js";

export type RunHeader = {
  runId: string;
  pipeline: string;
  status: RunStatus;
  inputs: JsonObject;
  /** Canonical order. Empty when the graph never built. */
  tasks: RunTaskRef[];
  sinks: string[];
  error?: string;
  startedAt: number;
  finishedAt?: number;
};

export type RunSummary = {
  runId: string;
  pipeline: string;
  status: RunStatus;
  startedAt: number;
  finishedAt?: number;
  recorded: number;
  fallbacks: number;
};

/**
 * Durable run log. `runs` holds one header per run; `run_log` is append-only,
 * one row per finalized task, ordered by `seq`. better-sqlite3 is synchronous,
 * so appends from concurrent branches are serialized in completion order.
 */
export class RunStore {
  private db: Database.Database;

  /** `path` may be ":memory:". */
  constructor(path: string) {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        pipeline    TEXT NOT NULL,
        status      TEXT NOT NULL DEFAULT 'active',
        inputs      TEXT NOT NULL DEFAULT '{}',
        tasks       TEXT NOT NULL DEFAULT '[]',
        sinks       TEXT NOT NULL DEFAULT '[]',
        error       TEXT,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);

      CREATE TABLE IF NOT EXISTS run_log (
        seq         INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id      TEXT NOT NULL,
        task_id     TEXT NOT NULL,
        record      TEXT NOT NULL,
        recorded_at INTEGER NOT NULL,
        UNIQUE (run_id, task_id)
      );
      CREATE INDEX IF NOT EXISTS idx_run_log_run ON run_log(run_id, seq);
    `);
  }

  beginRun(header: RunHeader): void {
    if (this.getRun(header.runId)) {
      throw new PipelineError("DUPLICATE_RUN", `Run "${header.runId}" already exists`);
    }
    this.db.prepare(`
      INSERT INTO runs (run_id, pipeline, status, inputs, tasks, sinks, error, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      header.runId,
      header.pipeline,
      header.status,
      JSON.stringify(header.inputs),
      JSON.stringify(header.tasks),
      JSON.stringify(header.sinks),
      header.error ?? null,
      header.startedAt,
      header.finishedAt ?? null,
    );
  }

  finishRun(runId: string, status: RunStatus, finishedAt: number, error?: string): void {
    this.db
      .prepare("UPDATE runs SET status = ?, finished_at = ?, error = ? WHERE run_id = ?")
      .run(status, finishedAt, error ?? null, runId);
  }

  /** Append one finalized stage. A task id can be appended once per run. */
  append(runId: string, result: StageResult): RunLogRecord {
    const record: RunLogRecord = {
      v: RUN_LOG_FORMAT_VERSION,
      runId,
      taskId: result.taskId,
      kind: result.kind,
      status: result.status,
      provenance: result.provenance,
      payload: result.payload,
      attempts: result.attempts,
      errors: [...result.errors],
      startedAt: result.startedAt,
      finishedAt: result.finishedAt,
      durationMs: result.durationMs,
    };
    const exists = this.db.prepare("SELECT 1 FROM run_log WHERE run_id = ? AND task_id = ?").get(runId, result.taskId);
    if (exists) {
      throw new PipelineError("DUPLICATE_RESULT", `Task "${result.taskId}" is already recorded for run ${runId}`);
    }
    this.db
      .prepare("INSERT INTO run_log (run_id, task_id, record, recorded_at) VALUES (?, ?, ?, ?)")
      .run(runId, result.taskId, JSON.stringify(record), Date.now());
    return record;
  }

  getRun(runId: string): RunHeader | undefined {
    const row = this.db.prepare("SELECT * FROM runs WHERE run_id = ?").get(runId) as RunRow | undefined;
    return row ? rowToHeader(row) : undefined;
  }

  /** Every record of a run in append order. */
  readLog(runId: string): RunLogRecord[] {
    const rows = this.db
      .prepare("SELECT record FROM run_log WHERE run_id = ? ORDER BY seq ASC")
      .all(runId) as Array<{ record: string }>;
    return rows.map((r) => parseOrThrow(RunLogRecordSchema, JSON.parse(r.record), `run log record of ${runId}`));
  }

  listRuns(limit = 50): RunSummary[] {
    const rows = this.db.prepare(`
      SELECT r.*,
        (SELECT COUNT(*) FROM run_log l WHERE l.run_id = r.run_id) AS recorded,
        (SELECT COUNT(*) FROM run_log l WHERE l.run_id = r.run_id
           AND json_extract(l.record, '$.provenance') = 'fallback') AS fallbacks
      FROM runs r ORDER BY r.started_at DESC, r.rowid DESC LIMIT ?
    `).all(limit) as Array<RunRow & { recorded: number; fallbacks: number }>;
    return rows.map((row) => ({
      runId: row.run_id,
      pipeline: row.pipeline,
      status: toRunStatus(row.status),
      startedAt: row.started_at,
      finishedAt: row.finished_at ?? undefined,
      recorded: row.recorded,
      fallbacks: row.fallbacks,
    }));
  }

  close(): void {
    this.db.close();
  }
}

type RunRow = {
  run_id: string;
  pipeline: string;
  status: string;
  inputs: string;
  tasks: string;
  sinks: string;
  error: string | null;
  started_at: number;
  finished_at: number | null;
};

function toRunStatus(value: string): RunStatus {
  return value === "complete" || value === "aborted" ? value : "active";
}

function rowToHeader(row: RunRow): RunHeader {
  return {
    runId: row.run_id,
    pipeline: row.pipeline,
    status: toRunStatus(row.status),
    inputs: parseOrThrow(JsonObjectSchema, JSON.parse(row.inputs), "run inputs"),
    tasks: parseOrThrow(RunTaskRefSchema.array(), JSON.parse(row.tasks), "run task list"),
    sinks: parseOrThrow(RunTaskRefSchema.shape.id.array(), JSON.parse(row.sinks), "run sinks"),
    error: row.error ?? undefined,
    startedAt: row.started_at,
    finishedAt: row.finished_at ?? undefined,
  };
}
