import { randomUUID } from "node:crypto";
import type { Capability } from "./capabilities/capability.js";
import { CapabilityRegistry } from "./capabilities/registry.js";
import type { StageCatalog } from "./catalog.js";
import { resolveConfig, type StagelineConfig } from "./config.js";
import { GraphError } from "./errors.js";
import { Executor } from "./executor/executor.js";
import { RetryController } from "./executor/retry-controller.js";
import type { ExecutionCallbacks } from "./executor/types.js";
import { FallbackSynthesizer } from "./fallback/synthesizer.js";
import { buildTaskGraph } from "./graph/task-graph.js";
import type { TaskDescriptor, TaskGraph } from "./graph/types.js";
import { Replayer, type ReplayResult } from "./persistence/replayer.js";
import type { RunStore } from "./persistence/store.js";
import { Run } from "./run/run.js";
import type { RunReport } from "./run/types.js";
import { log } from "./utils/logger.js";
import type { JsonObject } from "./utils/stable-json.js";

export type PipelineSpec = {
  name: string;
  description?: string;
  tasks: TaskDescriptor[];
  sinks?: string[];
  defaults?: { timeoutMs?: number; maxAttempts?: number };
};

export type PipelineOptions = {
  catalog: StageCatalog;
  store: RunStore;
  config?: StagelineConfig;
  capabilities?: Capability[];
};

export type RunOptions = ExecutionCallbacks & {
  /** Fresh UUID when omitted. */
  runId?: string;
  inputs?: JsonObject;
  signal?: AbortSignal;
  maxConcurrency?: number;
};

/**
 * A declared pipeline bound to its stage catalog, capabilities and run log.
 * Each call to `run` builds the graph afresh and records a new run.
 */
export class Pipeline {
  readonly spec: PipelineSpec;
  readonly config: StagelineConfig;
  readonly catalog: StageCatalog;
  readonly capabilities = new CapabilityRegistry();
  private store: RunStore;

  constructor(spec: PipelineSpec, opts: PipelineOptions) {
    this.spec = spec;
    this.config = opts.config ?? resolveConfig();
    this.catalog = opts.catalog;
    this.store = opts.store;
    for (const capability of opts.capabilities ?? []) this.capabilities.add(capability);
  }

  addCapability(capability: Capability): void {
    this.capabilities.add(capability);
  }

  /** Build and validate the task graph without running it. */
  build(): TaskGraph {
    return buildTaskGraph(this.spec.tasks, this.catalog, {
      defaults: {
        timeoutMs: this.spec.defaults?.timeoutMs ?? this.config.timeouts.taskDefault,
        maxAttempts: this.spec.defaults?.maxAttempts ?? this.config.retry.maxAttempts,
      },
      sinks: this.spec.sinks,
    });
  }

  async run(opts: RunOptions = {}): Promise<RunReport> {
    const runId = opts.runId ?? randomUUID();
    const inputs = opts.inputs ?? {};
    const startedAt = Date.now();

    let graph: TaskGraph;
    try {
      graph = this.build();
    } catch (err) {
      if (!(err instanceof GraphError)) throw err;
      log.error(`Run ${runId} aborted: invalid task graph`, { code: err.code, error: err.message });
      const finishedAt = Date.now();
      this.store.beginRun({
        runId,
        pipeline: this.spec.name,
        status: "aborted",
        inputs,
        tasks: [],
        sinks: [],
        error: err.message,
        startedAt,
        finishedAt,
      });
      return {
        runId,
        pipeline: this.spec.name,
        status: "aborted",
        error: err.message,
        inputs,
        startedAt,
        finishedAt,
        tasks: [],
        terminalOutput: {},
      };
    }

    this.store.beginRun({
      runId,
      pipeline: this.spec.name,
      status: "active",
      inputs,
      tasks: graph.order.map((id) => ({ id, kind: graph.byId.get(id)?.kind ?? "unknown" })),
      sinks: [...graph.sinks],
      startedAt,
    });
    log.info(`Run ${runId} started`, { pipeline: this.spec.name, tasks: graph.order.length });

    const run = new Run({ runId, pipeline: this.spec.name, inputs, graph, startedAt });
    const executor = new Executor({
      capabilities: this.capabilities,
      retry: new RetryController(this.config.retry),
      synthesizer: new FallbackSynthesizer(this.catalog),
      recorder: this.store,
    });

    try {
      await executor.execute(run, {
        maxConcurrency: opts.maxConcurrency ?? this.config.limits.maxConcurrency,
        signal: opts.signal,
        onTaskStart: opts.onTaskStart,
        onTaskAttempt: opts.onTaskAttempt,
        onTaskEnd: opts.onTaskEnd,
      });
    } finally {
      if (run.status === "active") run.abort("Executor stopped unexpectedly");
      this.store.finishRun(runId, run.status, run.finishedAt ?? Date.now(), run.error);
    }

    const report = run.report();
    log.info(`Run ${runId} ${report.status}`, {
      fallbacks: report.tasks.filter((t) => t.provenance === "fallback").length,
      durationMs: (report.finishedAt ?? Date.now()) - report.startedAt,
    });
    return report;
  }

  /** Reconstruct a recorded run of any pipeline sharing this store. */
  replay(runId: string): ReplayResult {
    return new Replayer(this.store).replay(runId);
  }
}
