import { readFileSync } from "node:fs";
import { HttpCapability } from "../capabilities/http-capability.js";
import { ConfigError, errorMessage } from "../errors.js";
import { PipelineDefinitionSchema, type PipelineDefinition } from "../schemas.js";

/** Read and validate a pipeline definition file. */
export function loadPipelineFile(path: string): PipelineDefinition {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError("INVALID_PIPELINE", `Cannot read pipeline file ${path}: ${errorMessage(err)}`);
  }
  return parsePipelineDefinition(data, path);
}

export function parsePipelineDefinition(data: unknown, source = "pipeline definition"): PipelineDefinition {
  const result = PipelineDefinitionSchema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError("INVALID_PIPELINE", `Invalid ${source}: ${msg}`);
  }
  return result.data;
}

/** One HttpCapability per stage kind declared under `capabilities`. */
export function httpCapabilitiesFor(def: PipelineDefinition): HttpCapability[] {
  return Object.entries(def.capabilities ?? {}).map(
    ([kind, endpoint]) =>
      new HttpCapability({ name: `http:${kind}`, url: endpoint.url, kinds: [kind], headers: endpoint.headers }),
  );
}
