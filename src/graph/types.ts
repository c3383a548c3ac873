import type { JsonObject } from "../utils/stable-json.js";
import type { ValidationPolicy } from "../validation/policy.js";

/**
 * Input mapping: `{ name: ref }` where ref is `"<taskId>"`, `"<taskId>.<path>"`,
 * `"$input"` or `"$input.<path>"`.
 */
export type InputMapping = Readonly<Record<string, string>>;

/** Declarative (JSON) form of a task, as written in a pipeline file. */
export type TaskDescriptor = {
  id: string;
  kind: string;
  dependsOn?: string[];
  inputs?: Record<string, string>;
  timeoutMs?: number;
  maxAttempts?: number;
  description?: string;
  /** Persona / instruction data for the capability. Never interpreted by the engine. */
  metadata?: JsonObject;
};

export type TaskSpec = Readonly<{
  id: string;
  kind: string;
  dependsOn: readonly string[];
  inputs?: InputMapping;
  policy: ValidationPolicy;
  timeoutMs: number;
  maxAttempts: number;
  description?: string;
  metadata: Readonly<JsonObject>;
}>;

export type TaskGraph = Readonly<{
  /** Declaration order. */
  tasks: readonly TaskSpec[];
  byId: ReadonlyMap<string, TaskSpec>;
  /** Canonical execution order: topological, ties broken by declaration order. */
  order: readonly string[];
  /** Tasks whose outputs make up the terminal output. */
  sinks: readonly string[];
  dependents: ReadonlyMap<string, readonly string[]>;
}>;

export type PolicyResolver = {
  policy(kind: string): ValidationPolicy | undefined;
};

export type BuildOptions = {
  defaults: { timeoutMs: number; maxAttempts: number };
  /** Designated terminal set. Default: every task nothing depends on. */
  sinks?: readonly string[];
};
