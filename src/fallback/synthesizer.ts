import { FallbackSynthesisError, errorMessage } from "../errors.js";
import type { TaskSpec } from "../graph/types.js";
import { deepFreeze, type JsonObject, type JsonValue } from "../utils/stable-json.js";
import { validate, type ValidatedOutput } from "../validation/validator.js";

/**
 * Everything a fallback may depend on. The run id is deliberately absent:
 * two runs with the same upstream outputs must synthesize the same payload.
 */
export type FallbackContext = Readonly<{
  taskId: string;
  kind: string;
  /** The task's projected input. */
  input: Readonly<JsonObject>;
  /** Accepted payloads of the task's dependencies, by task id. */
  upstream: Readonly<Record<string, JsonValue>>;
  runInput: Readonly<JsonObject>;
  metadata: Readonly<JsonObject>;
}>;

/** Deterministic: no randomness, no clock, no I/O. */
export type FallbackFn = (ctx: FallbackContext) => unknown;

export type FallbackResolver = {
  fallback(kind: string): FallbackFn | undefined;
};

export type FallbackInputs = {
  input: JsonObject;
  upstream: ReadonlyMap<string, JsonValue>;
  runInput: JsonObject;
};

export class FallbackSynthesizer {
  private resolver: FallbackResolver;

  constructor(resolver: FallbackResolver) {
    this.resolver = resolver;
  }

  /**
   * Manufacture a payload that satisfies the task's policy, or throw
   * FallbackSynthesisError when none can be produced.
   */
  synthesize(task: TaskSpec, inputs: FallbackInputs): ValidatedOutput {
    const fn = this.resolver.fallback(task.kind);
    if (!fn) {
      throw new FallbackSynthesisError(task.id, `No fallback registered for stage kind "${task.kind}"`);
    }

    const ctx: FallbackContext = deepFreeze(
      structuredClone({
        taskId: task.id,
        kind: task.kind,
        input: inputs.input,
        upstream: Object.fromEntries(inputs.upstream),
        runInput: inputs.runInput,
        metadata: task.metadata,
      }),
    );

    let candidate: unknown;
    try {
      candidate = fn(ctx);
    } catch (err) {
      throw new FallbackSynthesisError(task.id, `Fallback for task "${task.id}" threw: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const verdict = validate(candidate, task.policy);
    if (!verdict.ok) {
      throw new FallbackSynthesisError(
        task.id,
        `Fallback for task "${task.id}" does not satisfy its policy: ${verdict.error.issues.join("; ")}`,
        { cause: verdict.error },
      );
    }
    return verdict.output;
  }
}
