import { CallError, type ValidationError } from "../errors.js";
import type { TaskSpec } from "../graph/types.js";
import { log } from "../utils/logger.js";
import { backoffDelay, sleep, type BackoffOptions } from "../utils/retry.js";
import type { ValidatedOutput } from "../validation/validator.js";

export type StageError = CallError | ValidationError;

export type AttemptOutcome =
  | { ok: true; output: ValidatedOutput }
  | { ok: false; error: StageError };

/** Every attempt failed. Not an error: the caller synthesizes a fallback. */
export type RetryExhausted = {
  kind: "exhausted";
  attempts: number;
  errors: string[];
  lastError?: StageError;
};

export type RetryOutcome =
  | { kind: "success"; output: ValidatedOutput; attempts: number; errors: string[] }
  | RetryExhausted
  | { kind: "aborted"; attempts: number; errors: string[] };

export type RetryHooks = {
  signal?: AbortSignal;
  onAttempt?: (attempt: number, error?: StageError) => void;
};

/**
 * Bounded re-invocation of a stage. Each attempt calls the capability afresh;
 * delays grow exponentially between attempts and are cut short by cancellation.
 */
export class RetryController {
  private backoff: BackoffOptions;

  constructor(backoff: BackoffOptions) {
    this.backoff = backoff;
  }

  /** Delay scheduled after the given failed attempt. */
  delayAfter(attempt: number): number {
    return backoffDelay(attempt, this.backoff);
  }

  async run(
    task: TaskSpec,
    attemptFn: (attempt: number) => Promise<AttemptOutcome>,
    hooks: RetryHooks = {},
  ): Promise<RetryOutcome> {
    const { signal, onAttempt } = hooks;
    const errors: string[] = [];
    let lastError: StageError | undefined;

    for (let attempt = 1; attempt <= task.maxAttempts; attempt++) {
      if (signal?.aborted) return { kind: "aborted", attempts: attempt - 1, errors };

      const outcome = await attemptFn(attempt);
      if (outcome.ok) {
        onAttempt?.(attempt);
        return { kind: "success", output: outcome.output, attempts: attempt, errors };
      }
      if (signal?.aborted) return { kind: "aborted", attempts: attempt, errors };

      lastError = outcome.error;
      errors.push(outcome.error.message);
      onAttempt?.(attempt, outcome.error);
      log.debug(`Task "${task.id}" attempt ${attempt}/${task.maxAttempts} failed`, { error: outcome.error.message });

      // Nothing was invoked, so invoking "again" cannot help.
      if (outcome.error instanceof CallError && outcome.error.reason === "unavailable") break;

      if (attempt < task.maxAttempts) await sleep(this.delayAfter(attempt), signal);
    }

    return { kind: "exhausted", attempts: errors.length, errors, lastError };
  }
}
