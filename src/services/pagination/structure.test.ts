import { describe, it, expect } from "vitest";
import { describeStructure, summarizeStructure, typeName } from "./structure";

const service = {
  name: "svc",
  ports: [80, 443],
  meta: { owner: { team: "infra" } },
};

describe("summarizeStructure", () => {
  it("lists the keys of an object without values", () => {
    expect(summarizeStructure(service)).toEqual({
      kind: "object",
      keys: ["name", "ports", "meta"],
    });
  });

  it("counts the items of a list", () => {
    expect(summarizeStructure([1, 2, 3])).toEqual({ kind: "array", length: 3 });
  });

  it.each([
    ["text", "string"],
    [1.5, "number"],
    [true, "boolean"],
    [null, "null"],
  ])("reports the type of scalar %j", (value, type) => {
    expect(summarizeStructure(value)).toEqual({ kind: "scalar", type });
  });
});

describe("typeName", () => {
  it("names lists and objects", () => {
    expect(typeName([])).toBe("list");
    expect(typeName({})).toBe("object");
  });
});

describe("describeStructure", () => {
  it("shows values up to depth 1 and types below", () => {
    expect(describeStructure(service)).toEqual({
      name: "svc",
      ports: { __summary__: "<list with 2 items>", first_item_sample: "number" },
      meta: { owner: { team: "string" } },
    });
  });

  it("summarizes lists beyond the maximum depth", () => {
    expect(describeStructure({ a: { b: [1, 2] } }, { maxDepth: 0 })).toEqual({
      a: { b: "<list with 2 items>" },
    });
  });

  it("shows the full key tree with type names in fullKeys mode", () => {
    expect(describeStructure(service, { fullKeys: true })).toEqual({
      name: "string",
      ports: ["number"],
      meta: { owner: { team: "string" } },
    });
  });

  it("uses the first item of a list of objects in fullKeys mode", () => {
    expect(describeStructure([{ id: 1, tags: ["a"] }], { fullKeys: true })).toEqual([
      { id: "number", tags: ["string"] },
    ]);
  });

  it("keeps empty lists", () => {
    expect(describeStructure({ items: [] })).toEqual({ items: [] });
  });

  it("truncates long primitive values", () => {
    expect(describeStructure("x".repeat(150))).toBe(`${"x".repeat(97)}...`);
    expect(describeStructure("y".repeat(100))).toBe("y".repeat(100));
  });
});
