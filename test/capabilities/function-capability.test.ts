import { describe, expect, it } from "vitest";
import type { CapabilityRequest } from "../../src/capabilities/capability.js";
import { FunctionCapability } from "../../src/capabilities/function-capability.js";

const request: CapabilityRequest = {
  runId: "r1",
  taskId: "t",
  kind: "thesis",
  input: { ticker: "MSFT" },
  metadata: { role: "writer" },
  attempt: 1,
};

describe("FunctionCapability", () => {
  it("has correct type, name and kinds", () => {
    const capability = new FunctionCapability({ name: "fn", kinds: ["thesis"], fn: async () => "ok" });
    expect(capability.name).toBe("fn");
    expect(capability.type).toBe("function");
    expect(capability.kinds).toEqual(["thesis"]);
  });

  it("passes the request and context to the function", async () => {
    const controller = new AbortController();
    const capability = new FunctionCapability({
      name: "fn",
      kinds: ["*"],
      fn: async (req, ctx) => ({ echo: req.input, attempt: req.attempt, timeoutMs: ctx.timeoutMs }),
    });
    await expect(capability.invoke(request, { signal: controller.signal, timeoutMs: 25 })).resolves.toEqual({
      echo: { ticker: "MSFT" },
      attempt: 1,
      timeoutMs: 25,
    });
  });

  it("propagates rejections", async () => {
    const capability = new FunctionCapability({
      name: "fn",
      kinds: ["*"],
      fn: async () => {
        throw new Error("no data");
      },
    });
    await expect(capability.invoke(request, { signal: new AbortController().signal, timeoutMs: 25 })).rejects.toThrow(
      "no data",
    );
  });
});
