import { describe, expect, it } from "vitest";
import type { CapabilityRequest } from "../../src/capabilities/capability.js";
import { CallError } from "../../src/errors.js";
import { MarketDataSchema } from "../../src/pipelines/stock-analysis.js";
import { createSyntheticCapability } from "../../src/pipelines/synthetic-capability.js";
import { parseRawPayload } from "../../src/validation/validator.js";

const ctx = { signal: new AbortController().signal, timeoutMs: 1000 };

function request(kind: string, input: CapabilityRequest["input"]): CapabilityRequest {
  return { runId: "r1", taskId: "t", kind, input, metadata: {}, attempt: 1 };
}

const universe = [{ ticker: "MSFT", companyName: "Microsoft Corporation", sector: "Information Technology" }];

describe("createSyntheticCapability", () => {
  it("answers with fenced JSON that is the same on every call", async () => {
    const capability = createSyntheticCapability();
    const first = await capability.invoke(request("market-data", { universe }), ctx);
    const second = await capability.invoke(request("market-data", { universe }), ctx);

    expect(first).toBe(second);
    expect(typeof first === "string" && first.startsWith("```json\n")).toBe(true);
    const parsed = parseRawPayload(first);
    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      const { stocks } = MarketDataSchema.parse(parsed.value);
      expect(stocks.map((s) => s.ticker)).toEqual(["MSFT"]);
    }
  });

  it("fails every call for the listed kinds", async () => {
    const capability = createSyntheticCapability({ failKinds: ["sentiment"] });
    await expect(capability.invoke(request("sentiment", {}), ctx)).rejects.toThrow(CallError);
    await expect(capability.invoke(request("sentiment", {}), ctx)).rejects.toThrow(
      'Synthetic failure for stage kind "sentiment"',
    );
  });

  it("rejects kinds it does not know", async () => {
    await expect(createSyntheticCapability().invoke(request("weather", {}), ctx)).rejects.toThrow(
      'Synthetic capability does not serve stage kind "weather"',
    );
  });
});
