import { getPath } from "../utils/json-path.js";
import { isJsonObject, toJsonValue, type JsonObject, type JsonValue } from "../utils/stable-json.js";
import type { TaskSpec } from "./types.js";

export const RUN_INPUT_REF = "$input";

export type ParsedInputRef =
  | { source: "input"; path: string }
  | { source: "task"; taskId: string; path: string };

export function parseInputRef(ref: string): ParsedInputRef {
  const dot = ref.indexOf(".");
  const head = dot === -1 ? ref : ref.slice(0, dot);
  const path = dot === -1 ? "" : ref.slice(dot + 1);
  if (head === RUN_INPUT_REF) return { source: "input", path };
  return { source: "task", taskId: head, path };
}

/**
 * Build a task's input from its dependencies' accepted payloads. With no
 * explicit mapping the task sees every dependency by id plus `$input`.
 * Unresolvable paths project to null.
 */
export function projectInputs(
  task: TaskSpec,
  upstream: ReadonlyMap<string, JsonValue>,
  runInput: JsonObject,
): JsonObject {
  if (!task.inputs) {
    const all: JsonObject = { [RUN_INPUT_REF]: runInput };
    for (const dep of task.dependsOn) all[dep] = upstream.get(dep) ?? null;
    return toJsonObject(all);
  }

  const out: JsonObject = {};
  for (const [name, ref] of Object.entries(task.inputs)) {
    const parsed = parseInputRef(ref);
    const root = parsed.source === "input" ? runInput : (upstream.get(parsed.taskId) ?? null);
    const value = getPath(root, parsed.path);
    out[name] = value === undefined ? null : toJsonValue(value);
  }
  return toJsonObject(out);
}

// Copy so that a stage can never mutate another stage's accepted payload.
function toJsonObject(value: JsonObject): JsonObject {
  const copy = toJsonValue(value);
  return isJsonObject(copy) ? copy : {};
}
