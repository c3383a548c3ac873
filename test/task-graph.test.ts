import { describe, expect, it } from "vitest";
import { GraphError } from "../src/errors.js";
import { buildTaskGraph } from "../src/graph/task-graph.js";
import type { TaskDescriptor } from "../src/graph/types.js";
import { DIAMOND, itemCatalog } from "./helpers.js";

const opts = { defaults: { timeoutMs: 1000, maxAttempts: 3 } };

function build(descriptors: TaskDescriptor[], sinks?: string[]) {
  return buildTaskGraph(descriptors, itemCatalog(), { ...opts, sinks });
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof GraphError) return err.code;
    throw err;
  }
  return undefined;
}

describe("buildTaskGraph", () => {
  it("orders a diamond topologically", () => {
    const graph = build(DIAMOND);
    expect(graph.order).toEqual(["a", "b", "c", "d"]);
    expect(graph.sinks).toEqual(["d"]);
    expect(graph.dependents.get("a")).toEqual(["b", "c"]);
  });

  it("breaks ties by declaration order", () => {
    const graph = build([
      { id: "c", kind: "merge", dependsOn: ["a", "b"] },
      { id: "b", kind: "source" },
      { id: "a", kind: "source" },
    ]);
    expect(graph.order).toEqual(["b", "a", "c"]);
  });

  it("produces the same order on every build", () => {
    const orders = Array.from({ length: 5 }, () => build(DIAMOND).order.join(","));
    expect(new Set(orders).size).toBe(1);
  });

  it("defaults sinks to tasks nothing depends on, in declaration order", () => {
    const graph = build([
      { id: "root", kind: "source" },
      { id: "left", kind: "transform", dependsOn: ["root"] },
      { id: "right", kind: "transform", dependsOn: ["root"] },
    ]);
    expect(graph.sinks).toEqual(["left", "right"]);
  });

  it("uses designated sinks", () => {
    expect(build(DIAMOND, ["b", "d", "b"]).sinks).toEqual(["b", "d"]);
  });

  it("applies defaults and per-task overrides", () => {
    const graph = build([
      { id: "a", kind: "source" },
      { id: "b", kind: "transform", dependsOn: ["a"], timeoutMs: 20, maxAttempts: 5 },
    ]);
    expect(graph.byId.get("a")).toMatchObject({ timeoutMs: 1000, maxAttempts: 3 });
    expect(graph.byId.get("b")).toMatchObject({ timeoutMs: 20, maxAttempts: 5 });
  });

  it("freezes task specs and their metadata", () => {
    const graph = build([{ id: "a", kind: "source", metadata: { persona: { role: "analyst" } } }]);
    const task = graph.byId.get("a");
    expect(Object.isFrozen(task)).toBe(true);
    expect(Object.isFrozen(task?.metadata.persona)).toBe(true);
    expect(Object.isFrozen(graph.order)).toBe(true);
  });

  it("rejects an empty task list", () => {
    expect(codeOf(() => build([]))).toBe("EMPTY_GRAPH");
  });

  it("rejects duplicate ids", () => {
    expect(codeOf(() => build([{ id: "a", kind: "source" }, { id: "a", kind: "source" }]))).toBe("DUPLICATE_TASK");
  });

  it("rejects unknown dependencies", () => {
    expect(codeOf(() => build([{ id: "a", kind: "source", dependsOn: ["ghost"] }]))).toBe("UNKNOWN_DEPENDENCY");
  });

  it("rejects self dependencies", () => {
    expect(codeOf(() => build([{ id: "a", kind: "source", dependsOn: ["a"] }]))).toBe("SELF_DEPENDENCY");
  });

  it("rejects cycles and names the path", () => {
    const descriptors: TaskDescriptor[] = [
      { id: "x", kind: "source", dependsOn: ["y"] },
      { id: "y", kind: "source", dependsOn: ["x"] },
    ];
    expect(() => build(descriptors)).toThrow("Task graph contains a cycle: x → y → x");
  });

  it("rejects unknown stage kinds", () => {
    expect(codeOf(() => build([{ id: "a", kind: "mystery" }]))).toBe("UNKNOWN_STAGE_KIND");
  });

  it("rejects input refs to tasks that are not dependencies", () => {
    const descriptors: TaskDescriptor[] = [
      { id: "a", kind: "source" },
      { id: "b", kind: "source" },
      { id: "c", kind: "merge", dependsOn: ["a"], inputs: { x: "b.value" } },
    ];
    expect(codeOf(() => build(descriptors))).toBe("INVALID_INPUT_REF");
  });

  it("accepts run input refs without a dependency", () => {
    const graph = build([{ id: "a", kind: "source", inputs: { date: "$input.date" } }]);
    expect(graph.order).toEqual(["a"]);
  });

  it("rejects unknown designated sinks", () => {
    expect(codeOf(() => build(DIAMOND, ["z"]))).toBe("UNKNOWN_SINK");
  });

  it("rejects tasks without a single attempt", () => {
    expect(codeOf(() => build([{ id: "a", kind: "source", maxAttempts: 0 }]))).toBe("INVALID_TASK");
    expect(codeOf(() => build([{ id: "a", kind: "source", timeoutMs: -1 }]))).toBe("INVALID_TASK");
  });

  it("rejects timeouts longer than a timer can wait", () => {
    expect(codeOf(() => build([{ id: "a", kind: "source", timeoutMs: 3_000_000_000 }]))).toBe("INVALID_TASK");
    expect(() => build([{ id: "a", kind: "source", timeoutMs: 3_000_000_000 }])).toThrow(
      'Task "a" has invalid timeout 3000000000',
    );
    const huge = { defaults: { timeoutMs: 2_147_483_648, maxAttempts: 3 } };
    expect(codeOf(() => buildTaskGraph([{ id: "a", kind: "source" }], itemCatalog(), huge))).toBe("INVALID_TASK");
    expect(build([{ id: "a", kind: "source", timeoutMs: 2_147_483_647 }]).byId.get("a")?.timeoutMs).toBe(2_147_483_647);
  });

  it("rejects task ids that input refs cannot address", () => {
    expect(codeOf(() => build([{ id: "$input", kind: "source" }]))).toBe("INVALID_TASK");
    expect(codeOf(() => build([{ id: "a.b", kind: "source" }]))).toBe("INVALID_TASK");
    expect(() => build([{ id: "$input", kind: "source" }])).toThrow(
      'Task id "$input" is reserved or contains "." and cannot be referenced',
    );
  });
});
