import { describe, expect, it } from "vitest";
import { FallbackSynthesisError } from "../src/errors.js";
import { FallbackSynthesizer, type FallbackContext, type FallbackFn } from "../src/fallback/synthesizer.js";
import type { TaskSpec } from "../src/graph/types.js";
import type { JsonValue } from "../src/utils/stable-json.js";
import { itemPolicy } from "./helpers.js";

const task: TaskSpec = {
  id: "t",
  kind: "merge",
  dependsOn: ["a"],
  policy: itemPolicy,
  timeoutMs: 50,
  maxAttempts: 1,
  metadata: { role: "analyst" },
};

const inputs = {
  input: { a: { value: "alpha" } },
  upstream: new Map<string, JsonValue>([["a", { value: "alpha" }]]),
  runInput: { date: "2026-01-02" },
};

function synthesizerWith(fn: FallbackFn | undefined): FallbackSynthesizer {
  return new FallbackSynthesizer({ fallback: () => fn });
}

function errorOf(fn: () => unknown): FallbackSynthesisError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FallbackSynthesisError) return err;
    throw err;
  }
  throw new Error("expected FallbackSynthesisError");
}

describe("FallbackSynthesizer", () => {
  const derive: FallbackFn = (ctx) => {
    const upstream = ctx.upstream.a;
    const value = upstream && typeof upstream === "object" && !Array.isArray(upstream) ? upstream.value : null;
    return { value: `derived from ${String(value)}` };
  };

  it("derives a policy-compliant payload from upstream outputs", () => {
    const output = synthesizerWith(derive).synthesize(task, inputs);
    expect(output).toEqual({ policy: "item", payload: { value: "derived from alpha" } });
  });

  it("is deterministic for identical inputs", () => {
    const synthesizer = synthesizerWith(derive);
    const first = synthesizer.synthesize(task, inputs);
    const second = synthesizer.synthesize(task, inputs);
    expect(second).toEqual(first);
  });

  it("hands the fallback a frozen context without a run id", () => {
    const seen: FallbackContext[] = [];
    synthesizerWith((ctx) => {
      seen.push(ctx);
      return { value: "x" };
    }).synthesize(task, inputs);

    expect(seen).toHaveLength(1);
    const [ctx] = seen;
    expect(Object.isFrozen(ctx)).toBe(true);
    expect(Object.isFrozen(ctx?.upstream)).toBe(true);
    expect(Object.isFrozen(ctx?.runInput)).toBe(true);
    expect(Object.keys(ctx ?? {})).not.toContain("runId");
    expect(ctx?.metadata).toEqual({ role: "analyst" });
  });

  it("fails when no fallback is registered", () => {
    expect(errorOf(() => synthesizerWith(undefined).synthesize(task, inputs)).message).toBe(
      'No fallback registered for stage kind "merge"',
    );
  });

  it("fails when the fallback throws", () => {
    const err = errorOf(() =>
      synthesizerWith(() => {
        throw new Error("boom");
      }).synthesize(task, inputs),
    );
    expect(err.message).toBe('Fallback for task "t" threw: boom');
    expect(err.taskId).toBe("t");
    expect(err.code).toBe("FALLBACK_FAILED");
  });

  it("fails when the fallback violates the policy", () => {
    const err = errorOf(() => synthesizerWith(() => ({ value: "" })).synthesize(task, inputs));
    expect(err.message).toBe('Fallback for task "t" does not satisfy its policy: value: required field is empty');
  });

  it("holds fallbacks to the placeholder rules too", () => {
    const err = errorOf(() => synthesizerWith(() => ({ value: "Company A" })).synthesize(task, inputs));
    expect(err.message).toContain('value: placeholder value "Company A"');
  });
});
