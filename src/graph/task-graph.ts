import { GraphError } from "../errors.js";
import { MAX_TIMER_MS } from "../utils/retry.js";
import { deepFreeze } from "../utils/stable-json.js";
import { RUN_INPUT_REF, parseInputRef } from "./input-mapping.js";
import type { BuildOptions, PolicyResolver, TaskDescriptor, TaskGraph, TaskSpec } from "./types.js";

/**
 * Turn declarative descriptors into a validated, frozen task graph. Throws
 * GraphError on the first structural problem; never returns a partial graph.
 */
export function buildTaskGraph(
  descriptors: readonly TaskDescriptor[],
  catalog: PolicyResolver,
  opts: BuildOptions,
): TaskGraph {
  if (descriptors.length === 0) {
    throw new GraphError("EMPTY_GRAPH", "Pipeline declares no tasks");
  }

  const tasks = descriptors.map((d) => toTaskSpec(d, catalog, opts));
  validateTasks(tasks);

  const byId = new Map(tasks.map((t) => [t.id, t]));
  const dependents = dependentsOf(tasks);
  const order = topologicalOrder(tasks);
  const sinks = resolveSinks(tasks, dependents, opts.sinks);

  return Object.freeze({
    tasks: Object.freeze(tasks),
    byId,
    order: Object.freeze(order),
    sinks: Object.freeze(sinks),
    dependents,
  });
}

function toTaskSpec(d: TaskDescriptor, catalog: PolicyResolver, opts: BuildOptions): TaskSpec {
  if (!d.id || !d.id.trim()) {
    throw new GraphError("INVALID_TASK", "Task id must be a non-empty string");
  }
  if (d.id === RUN_INPUT_REF || d.id.includes(".")) {
    throw new GraphError("INVALID_TASK", `Task id "${d.id}" is reserved or contains "." and cannot be referenced`);
  }
  const policy = catalog.policy(d.kind);
  if (!policy) {
    throw new GraphError("UNKNOWN_STAGE_KIND", `Task "${d.id}" uses unknown stage kind "${d.kind}"`);
  }
  const timeoutMs = d.timeoutMs ?? opts.defaults.timeoutMs;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMER_MS) {
    throw new GraphError("INVALID_TASK", `Task "${d.id}" has invalid timeout ${timeoutMs}`);
  }
  const maxAttempts = d.maxAttempts ?? opts.defaults.maxAttempts;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new GraphError("INVALID_TASK", `Task "${d.id}" must allow at least one attempt (got ${maxAttempts})`);
  }

  // The policy is shared between tasks of a kind and holds a zod schema; it is not ours to freeze.
  return Object.freeze({
    id: d.id,
    kind: d.kind,
    dependsOn: Object.freeze([...(d.dependsOn ?? [])]),
    inputs: d.inputs ? Object.freeze({ ...d.inputs }) : undefined,
    policy,
    timeoutMs,
    maxAttempts,
    description: d.description,
    metadata: deepFreeze(structuredClone(d.metadata ?? {})),
  });
}

/** Check ids, dependencies and input references, then reject cycles. */
function validateTasks(tasks: readonly TaskSpec[]): void {
  const ids = new Set<string>();
  for (const task of tasks) {
    if (ids.has(task.id)) {
      throw new GraphError("DUPLICATE_TASK", `Task id "${task.id}" is declared more than once`);
    }
    ids.add(task.id);
  }

  for (const task of tasks) {
    for (const dep of task.dependsOn) {
      if (dep === task.id) {
        throw new GraphError("SELF_DEPENDENCY", `Task "${task.id}" depends on itself`);
      }
      if (!ids.has(dep)) {
        throw new GraphError("UNKNOWN_DEPENDENCY", `Task "${task.id}" depends on unknown task "${dep}"`);
      }
    }
    for (const [name, ref] of Object.entries(task.inputs ?? {})) {
      const parsed = parseInputRef(ref);
      if (parsed.source === "task" && !task.dependsOn.includes(parsed.taskId)) {
        throw new GraphError(
          "INVALID_INPUT_REF",
          `Task "${task.id}" input "${name}" references "${parsed.taskId}", which is not one of its dependencies`,
        );
      }
    }
  }

  const cycle = findCycle(tasks);
  if (cycle) {
    throw new GraphError("CYCLE", `Task graph contains a cycle: ${cycle.join(" → ")}`);
  }
}

function dependentsOf(tasks: readonly TaskSpec[]): Map<string, string[]> {
  const dependents = new Map<string, string[]>(tasks.map((t) => [t.id, []]));
  for (const task of tasks) {
    for (const dep of task.dependsOn) {
      dependents.get(dep)?.push(task.id);
    }
  }
  return dependents;
}

/** Detect a cycle using DFS with coloring; returns the cycle path if one exists. */
function findCycle(tasks: readonly TaskSpec[]): string[] | undefined {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>(tasks.map((t) => [t.id, WHITE]));
  const dependents = dependentsOf(tasks);
  const stack: string[] = [];

  function dfs(id: string): string[] | undefined {
    color.set(id, GRAY);
    stack.push(id);
    for (const next of dependents.get(id) ?? []) {
      const c = color.get(next);
      if (c === GRAY) return [...stack.slice(stack.indexOf(next)), next]; // back edge
      if (c === WHITE) {
        const found = dfs(next);
        if (found) return found;
      }
    }
    stack.pop();
    color.set(id, BLACK);
    return undefined;
  }

  for (const task of tasks) {
    if (color.get(task.id) === WHITE) {
      const found = dfs(task.id);
      if (found) return found;
    }
  }
  return undefined;
}

/**
 * Kahn's algorithm; among ready tasks the earliest-declared goes first, so the
 * same declarations always produce the same order.
 */
export function topologicalOrder(tasks: readonly TaskSpec[]): string[] {
  const remaining = new Map(tasks.map((t) => [t.id, t.dependsOn.length]));
  const dependents = dependentsOf(tasks);
  const order: string[] = [];

  while (order.length < tasks.length) {
    const next = tasks.find((t) => remaining.get(t.id) === 0);
    if (!next) {
      throw new GraphError("CYCLE", "Task graph contains a cycle");
    }
    remaining.delete(next.id);
    order.push(next.id);
    for (const child of dependents.get(next.id) ?? []) {
      const count = remaining.get(child);
      if (count !== undefined) remaining.set(child, count - 1);
    }
  }
  return order;
}

function resolveSinks(
  tasks: readonly TaskSpec[],
  dependents: ReadonlyMap<string, readonly string[]>,
  designated?: readonly string[],
): string[] {
  if (designated && designated.length > 0) {
    const ids = new Set(tasks.map((t) => t.id));
    for (const id of designated) {
      if (!ids.has(id)) throw new GraphError("UNKNOWN_SINK", `Designated sink "${id}" is not a task`);
    }
    return [...new Set(designated)];
  }
  return tasks.filter((t) => (dependents.get(t.id) ?? []).length === 0).map((t) => t.id);
}
