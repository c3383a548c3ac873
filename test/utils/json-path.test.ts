import { describe, expect, it } from "vitest";
import { collectPath, getPath, stringLeaves } from "../../src/utils/json-path.js";

const data = { items: [{ name: "a", tags: ["x"] }, { name: "b" }], meta: { count: 2 } };

describe("getPath", () => {
  it("follows object keys and array indices", () => {
    expect(getPath(data, "items.1.name")).toBe("b");
    expect(getPath(data, "meta")).toEqual({ count: 2 });
    expect(getPath(data, "")).toBe(data);
  });

  it("yields undefined for missing segments", () => {
    expect(getPath(data, "items.5.name")).toBeUndefined();
    expect(getPath(data, "meta.count.deeper")).toBeUndefined();
    expect(getPath(data, "toString")).toBeUndefined();
  });
});

describe("collectPath", () => {
  it("expands wildcards", () => {
    expect(collectPath(data, "items.*.name")).toEqual([
      { path: "items.0.name", value: "a" },
      { path: "items.1.name", value: "b" },
    ]);
  });

  it("reports missing leaves under a wildcard", () => {
    expect(collectPath(data, "items.*.tags")).toEqual([
      { path: "items.0.tags", value: ["x"] },
      { path: "items.1.tags", value: undefined },
    ]);
  });
});

describe("stringLeaves", () => {
  it("lists every string with its path", () => {
    expect(stringLeaves(data)).toEqual([
      { path: "items.0.name", value: "a" },
      { path: "items.0.tags.0", value: "x" },
      { path: "items.1.name", value: "b" },
    ]);
  });
});
