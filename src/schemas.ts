import { z } from "zod";
import { ValidationError } from "./errors.js";
import { MAX_TIMER_MS } from "./utils/retry.js";
import type { JsonObject, JsonValue } from "./utils/stable-json.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

const inputRef = z.string().regex(/^[^.\s]+(\.[^.\s]+)*$/, "must be a dot path like task.field or $input.field");

// --- Pipeline definition files ---

const timeoutMs = z.number().int().positive().max(MAX_TIMER_MS);

export const TaskDescriptorSchema = z.object({
  id: z.string().min(1),
  kind: z.string().min(1),
  dependsOn: z.array(z.string().min(1)).optional(),
  inputs: z.record(inputRef).optional(),
  timeoutMs: timeoutMs.optional(),
  maxAttempts: z.number().int().positive().optional(),
  description: z.string().optional(),
  metadata: JsonObjectSchema.optional(),
});

export const CapabilityEndpointSchema = z.object({
  url: z.string().url(),
  headers: z.record(z.string()).optional(),
});

export const PipelineDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  sinks: z.array(z.string().min(1)).optional(),
  defaults: z
    .object({
      timeoutMs: timeoutMs.optional(),
      maxAttempts: z.number().int().positive().optional(),
    })
    .optional(),
  tasks: z.array(TaskDescriptorSchema),
  capabilities: z.record(CapabilityEndpointSchema).optional(),
});

export type PipelineDefinition = z.infer<typeof PipelineDefinitionSchema>;
export type CapabilityEndpoint = z.infer<typeof CapabilityEndpointSchema>;

// --- Run log ---

export const RUN_LOG_FORMAT_VERSION = 1;

/** Unknown fields are dropped on read, so newer writers stay readable. */
export const RunLogRecordSchema = z.object({
  v: z.number().int().positive(),
  runId: z.string(),
  taskId: z.string(),
  kind: z.string(),
  status: z.enum(["success", "fallback_used", "failed"]),
  provenance: z.enum(["capability", "fallback", "none"]),
  payload: JsonValueSchema,
  attempts: z.number().int().nonnegative(),
  errors: z.array(z.string()).default([]),
  startedAt: z.number(),
  finishedAt: z.number(),
  durationMs: z.number(),
});

export type RunLogRecord = z.infer<typeof RunLogRecordSchema>;

export const RunTaskRefSchema = z.object({ id: z.string(), kind: z.string() });
export type RunTaskRef = z.infer<typeof RunTaskRefSchema>;

/** Parse data against a schema, throwing a ValidationError with every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${what}: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
