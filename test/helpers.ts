import { z } from "zod";
import type { CapabilityFunction } from "../src/capabilities/function-capability.js";
import { FunctionCapability } from "../src/capabilities/function-capability.js";
import type { InvokeContext } from "../src/capabilities/capability.js";
import { StageCatalog } from "../src/catalog.js";
import { resolveConfig, type StagelineConfig } from "../src/config.js";
import type { TaskDescriptor } from "../src/graph/types.js";
import { definePolicy } from "../src/validation/policy.js";

export const ItemSchema = z.object({ value: z.string() });

export const itemPolicy = definePolicy({ name: "item", schema: ItemSchema, requiredFields: ["value"] });

/** Every kind shares the `{ value }` contract; fallbacks answer `fallback:<taskId>`. */
export function itemCatalog(kinds: string[] = ["source", "transform", "merge"]): StageCatalog {
  return new StageCatalog(
    kinds.map((kind) => ({
      kind,
      policy: itemPolicy,
      fallback: (ctx) => ({ value: `fallback:${ctx.taskId}` }),
    })),
  );
}

export const DIAMOND: TaskDescriptor[] = [
  { id: "a", kind: "source" },
  { id: "b", kind: "transform", dependsOn: ["a"] },
  { id: "c", kind: "transform", dependsOn: ["a"] },
  { id: "d", kind: "merge", dependsOn: ["b", "c"] },
];

export function testConfig(): StagelineConfig {
  return resolveConfig({
    timeouts: { taskDefault: 50 },
    retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 4 },
    store: { dbPath: ":memory:" },
  });
}

/** Never settles on its own; rejects once the attempt is aborted. */
export function hang(ctx: InvokeContext): Promise<never> {
  return new Promise((_, reject) => {
    ctx.signal.addEventListener("abort", () => reject(ctx.signal.reason), { once: true });
  });
}

/**
 * Wildcard capability answering `{ value: "ok:<taskId>" }` unless a handler
 * is given for the task. Every invocation's task id is pushed to `calls`.
 */
export function scripted(handlers: Record<string, CapabilityFunction> = {}, calls: string[] = []): FunctionCapability {
  return new FunctionCapability({
    name: "scripted",
    kinds: ["*"],
    fn: async (request, ctx) => {
      calls.push(request.taskId);
      const handler = handlers[request.taskId];
      return handler ? handler(request, ctx) : { value: `ok:${request.taskId}` };
    },
  });
}
