import { PipelineError } from "./errors.js";
import type { FallbackFn, FallbackResolver } from "./fallback/synthesizer.js";
import type { PolicyResolver } from "./graph/types.js";
import type { ValidationPolicy } from "./validation/policy.js";

export type StageKindDefinition = {
  kind: string;
  description?: string;
  policy: ValidationPolicy;
  fallback: FallbackFn;
};

/**
 * Stage kinds known to a pipeline: the output contract of each kind and the
 * deterministic fallback that satisfies it.
 */
export class StageCatalog implements PolicyResolver, FallbackResolver {
  private kinds = new Map<string, StageKindDefinition>();

  constructor(definitions: StageKindDefinition[] = []) {
    for (const def of definitions) this.register(def);
  }

  register(def: StageKindDefinition): this {
    if (this.kinds.has(def.kind)) {
      throw new PipelineError("DUPLICATE_REGISTRATION", `Stage kind "${def.kind}" already registered`);
    }
    this.kinds.set(def.kind, def);
    return this;
  }

  get(kind: string): StageKindDefinition | undefined {
    return this.kinds.get(kind);
  }

  has(kind: string): boolean {
    return this.kinds.has(kind);
  }

  names(): string[] {
    return [...this.kinds.keys()];
  }

  policy(kind: string): ValidationPolicy | undefined {
    return this.kinds.get(kind)?.policy;
  }

  fallback(kind: string): FallbackFn | undefined {
    return this.kinds.get(kind)?.fallback;
  }
}
