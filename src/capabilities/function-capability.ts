import type { Capability, CapabilityRequest, InvokeContext } from "./capability.js";

export type CapabilityFunction = (request: CapabilityRequest, ctx: InvokeContext) => Promise<unknown>;

export type FunctionCapabilityOptions = {
  name: string;
  kinds: readonly string[];
  fn: CapabilityFunction;
  description?: string;
};

/** Adapts an in-process async function to the capability interface. */
export class FunctionCapability implements Capability {
  readonly name: string;
  readonly type = "function" as const;
  readonly description?: string;
  readonly kinds: readonly string[];

  private fn: CapabilityFunction;

  constructor(opts: FunctionCapabilityOptions) {
    this.name = opts.name;
    this.kinds = [...opts.kinds];
    this.fn = opts.fn;
    this.description = opts.description;
  }

  invoke(request: CapabilityRequest, ctx: InvokeContext): Promise<unknown> {
    return this.fn(request, ctx);
  }
}
