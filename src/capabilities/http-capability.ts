import { CallError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import type { Capability, CapabilityRequest, InvokeContext } from "./capability.js";

export type HttpCapabilityOptions = {
  name: string;
  url: string;
  kinds: readonly string[];
  headers?: Record<string, string>;
};

/**
 * Calls a remote capability: POSTs the request as JSON and returns the
 * response body as raw text for the validator.
 */
export class HttpCapability implements Capability {
  readonly name: string;
  readonly type = "http" as const;
  readonly kinds: readonly string[];

  private url: string;
  private headers: Record<string, string>;

  constructor(opts: HttpCapabilityOptions) {
    this.name = opts.name;
    this.url = opts.url;
    this.kinds = [...opts.kinds];
    this.headers = opts.headers ?? {};
  }

  async invoke(request: CapabilityRequest, ctx: InvokeContext): Promise<string> {
    log.debug(`[${this.name}] POST ${this.url}`, { taskId: request.taskId, attempt: request.attempt });

    let res: Response;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify(request),
        signal: ctx.signal,
      });
    } catch (err) {
      if (ctx.signal.aborted) throw new CallError("aborted", `Request to ${this.url} was aborted`, { cause: err });
      throw new CallError("transport", `Request to ${this.url} failed: ${errorMessage(err)}`, { cause: err });
    }

    const body = await res.text();
    if (!res.ok) {
      throw new CallError("transport", `HTTP ${res.status}: ${body.slice(0, 200)}`);
    }
    return body;
  }
}
