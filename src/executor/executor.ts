import type { CapabilityRegistry } from "../capabilities/registry.js";
import { CallError, FallbackSynthesisError, errorMessage } from "../errors.js";
import type { FallbackSynthesizer } from "../fallback/synthesizer.js";
import { projectInputs } from "../graph/input-mapping.js";
import type { TaskSpec } from "../graph/types.js";
import type { Run } from "../run/run.js";
import type { StageResult } from "../run/types.js";
import { log } from "../utils/logger.js";
import type { JsonObject } from "../utils/stable-json.js";
import { validate } from "../validation/validator.js";
import type { AttemptOutcome, RetryController } from "./retry-controller.js";
import type { ExecutionOptions, RunRecorder } from "./types.js";

const DEFAULT_MAX_CONCURRENCY = 8;

export type ExecutorDeps = {
  capabilities: CapabilityRegistry;
  retry: RetryController;
  synthesizer: FallbackSynthesizer;
  recorder: RunRecorder;
};

/**
 * Walks a run's task graph. A task starts as soon as every dependency is
 * recorded; independent branches run concurrently up to `maxConcurrency`.
 */
export class Executor {
  private deps: ExecutorDeps;

  constructor(deps: ExecutorDeps) {
    this.deps = deps;
  }

  async execute(run: Run, opts: ExecutionOptions = {}): Promise<void> {
    const maxConcurrency = opts.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    const inFlight = new Map<string, Promise<void>>();
    let fatal: unknown;

    const schedule = (): void => {
      if (fatal !== undefined || opts.signal?.aborted) return;
      for (const id of run.graph.order) {
        if (inFlight.size >= maxConcurrency) return;
        const task = run.graph.byId.get(id);
        if (!task || inFlight.has(id) || run.state(id) !== "pending" || !run.isReady(task)) continue;
        const promise = this.runTask(task, run, opts)
          .catch((err: unknown) => {
            fatal ??= err;
          })
          .finally(() => {
            inFlight.delete(id);
          });
        inFlight.set(id, promise);
      }
    };

    schedule();
    while (inFlight.size > 0) {
      await Promise.race(inFlight.values());
      schedule();
    }

    if (fatal !== undefined) {
      log.error(`Run ${run.runId} aborted`, { error: errorMessage(fatal) });
      run.abort(errorMessage(fatal));
    } else if (opts.signal?.aborted) {
      log.warn(`Run ${run.runId} cancelled`, { pending: run.pendingTasks() });
      run.abort("cancelled");
    } else if (run.pendingTasks().length > 0) {
      run.abort(`Tasks never became ready: ${run.pendingTasks().join(", ")}`);
    } else {
      run.complete();
    }
  }

  /** RunTask: project inputs, call with retries, fall back, record. */
  private async runTask(task: TaskSpec, run: Run, opts: ExecutionOptions): Promise<void> {
    run.transition(task.id, "running");
    opts.onTaskStart?.(task.id);
    const startedAt = Date.now();

    const upstream = run.upstreamPayloads(task);
    const input = projectInputs(task, upstream, run.inputs);

    const outcome = await this.deps.retry.run(
      task,
      (attempt) => this.attempt(task, run, input, attempt, opts.signal),
      {
        signal: opts.signal,
        onAttempt: (attempt, error) => opts.onTaskAttempt?.(task.id, attempt, error),
      },
    );

    if (outcome.kind === "aborted") {
      run.transition(task.id, "aborted");
      log.warn(`Task "${task.id}" aborted`, { attempts: outcome.attempts });
      return;
    }

    const base = { taskId: task.id, kind: task.kind, attempts: outcome.attempts, errors: outcome.errors, startedAt };

    if (outcome.kind === "success") {
      run.transition(task.id, "succeeded");
      this.record(run, { ...base, status: "success", provenance: "capability", payload: outcome.output.payload }, opts);
      return;
    }

    log.warn(`Task "${task.id}" exhausted ${outcome.attempts} attempt(s); applying fallback`, {
      lastError: outcome.lastError?.message,
    });
    try {
      const output = this.deps.synthesizer.synthesize(task, { input, upstream, runInput: run.inputs });
      run.transition(task.id, "fallback_applied");
      this.record(run, { ...base, status: "fallback_used", provenance: "fallback", payload: output.payload }, opts);
    } catch (err) {
      if (!(err instanceof FallbackSynthesisError)) throw err;
      run.transition(task.id, "failed");
      this.record(run, { ...base, status: "failed", provenance: "none", payload: null, errors: [...base.errors, err.message] }, opts);
      throw err;
    }
  }

  /** Write-ahead: the log append happens before dependents can see the result. */
  private record(
    run: Run,
    partial: Omit<StageResult, "finishedAt" | "durationMs">,
    opts: ExecutionOptions,
  ): void {
    const finishedAt = Date.now();
    const result: StageResult = { ...partial, finishedAt, durationMs: finishedAt - partial.startedAt };
    this.deps.recorder.append(run.runId, result);
    run.setResult(result);
    run.transition(result.taskId, "recorded");
    log.info(`Task "${result.taskId}" recorded`, {
      status: result.status,
      provenance: result.provenance,
      attempts: result.attempts,
    });
    opts.onTaskEnd?.(result.taskId, result);
  }

  /** One bounded capability call followed by validation. */
  private async attempt(
    task: TaskSpec,
    run: Run,
    input: JsonObject,
    attempt: number,
    runSignal?: AbortSignal,
  ): Promise<AttemptOutcome> {
    const capability = this.deps.capabilities.forKind(task.kind);
    if (!capability) {
      return { ok: false, error: new CallError("unavailable", `No capability registered for stage kind "${task.kind}"`) };
    }

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new CallError("timeout", `Task "${task.id}" timed out after ${task.timeoutMs}ms`)),
      task.timeoutMs,
    );
    const onRunAbort = () => controller.abort(new CallError("aborted", `Run ${run.runId} was cancelled`));
    if (runSignal?.aborted) onRunAbort();
    else runSignal?.addEventListener("abort", onRunAbort, { once: true });

    try {
      log.debug(`Invoking "${capability.name}" for task "${task.id}"`, { attempt });
      const raw = await Promise.race([
        capability.invoke(
          { runId: run.runId, taskId: task.id, kind: task.kind, input, metadata: task.metadata, attempt },
          { signal: controller.signal, timeoutMs: task.timeoutMs },
        ),
        rejectOnAbort(controller.signal),
      ]);
      const verdict = validate(raw, task.policy);
      return verdict.ok ? { ok: true, output: verdict.output } : { ok: false, error: verdict.error };
    } catch (err) {
      return { ok: false, error: toCallError(err, controller.signal) };
    } finally {
      clearTimeout(timer);
      runSignal?.removeEventListener("abort", onRunAbort);
    }
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) reject(signal.reason);
    else signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

function toCallError(err: unknown, signal: AbortSignal): CallError {
  if (signal.aborted && signal.reason instanceof CallError) return signal.reason;
  if (err instanceof CallError) return err;
  return new CallError("capability", errorMessage(err), { cause: err });
}
