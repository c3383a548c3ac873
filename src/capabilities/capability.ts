import type { JsonObject } from "../utils/stable-json.js";

export type CapabilityRequest = {
  runId: string;
  taskId: string;
  kind: string;
  input: JsonObject;
  /** Persona / instruction data from the task descriptor, passed through untouched. */
  metadata: Readonly<JsonObject>;
  /** 1-based attempt number. */
  attempt: number;
};

export type InvokeContext = {
  /** Aborted when the attempt times out or the run is cancelled. */
  signal: AbortSignal;
  timeoutMs: number;
};

/**
 * An external generative or data-retrieval function. Returns the raw result
 * (text or already-structured data); throws when the capability reports an
 * error. The engine treats it as non-deterministic.
 */
export interface Capability {
  name: string;
  type: "function" | "http" | string;
  description?: string;
  /** Stage kinds this capability serves. `"*"` serves every kind. */
  kinds: readonly string[];

  invoke(request: CapabilityRequest, ctx: InvokeContext): Promise<unknown>;
}
