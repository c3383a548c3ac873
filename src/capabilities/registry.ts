import { PipelineError } from "../errors.js";
import type { Capability } from "./capability.js";

/** Run-scoped mapping from stage kinds to the capabilities that serve them. */
export class CapabilityRegistry {
  private capabilities = new Map<string, Capability>();

  add(capability: Capability): void {
    if (this.capabilities.has(capability.name)) {
      throw new PipelineError("DUPLICATE_REGISTRATION", `Capability "${capability.name}" already registered`);
    }
    this.capabilities.set(capability.name, capability);
  }

  remove(name: string): boolean {
    return this.capabilities.delete(name);
  }

  get(name: string): Capability | undefined {
    return this.capabilities.get(name);
  }

  list(): Capability[] {
    return [...this.capabilities.values()];
  }

  names(): string[] {
    return [...this.capabilities.keys()];
  }

  /**
   * The capability for a stage kind: the first registered one that names the
   * kind explicitly, else the first wildcard one.
   */
  forKind(kind: string): Capability | undefined {
    const list = this.list();
    return list.find((c) => c.kinds.includes(kind)) ?? list.find((c) => c.kinds.includes("*"));
  }
}
