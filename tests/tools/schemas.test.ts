import { describe, it, expect } from "vitest";
import {
  ImportanceParam,
  KeywordsParam,
  MemoryIdParam,
  PaginationParams,
  StoreMemorySchema,
} from "../../src/tools/schemas.js";

describe("KeywordsParam Zod schema", () => {
  it("accepts empty lists and blank keywords (the service short-circuits them)", () => {
    expect(KeywordsParam.parse([])).toEqual([]);
    expect(KeywordsParam.parse(["", "  "])).toEqual(["", "  "]);
  });

  it("puts no bound on the number or length of keywords", () => {
    const many = Array.from({ length: 80 }, (_, i) => `term${i}`);
    expect(KeywordsParam.parse(many)).toHaveLength(80);
    expect(KeywordsParam.parse(["k".repeat(500)])).toEqual(["k".repeat(500)]);
  });

  it("rejects non-string keywords", () => {
    expect(() => KeywordsParam.parse([1, 2])).toThrow();
  });
});

describe("ImportanceParam Zod schema", () => {
  it("accepts 1 through 10", () => {
    for (const v of [1, 5, 10]) {
      expect(ImportanceParam.parse(v)).toBe(v);
    }
  });

  it("rejects values outside 1-10 and non-integers", () => {
    expect(() => ImportanceParam.parse(0)).toThrow();
    expect(() => ImportanceParam.parse(11)).toThrow();
    expect(() => ImportanceParam.parse(2.5)).toThrow();
  });

  it("accepts undefined (optional field)", () => {
    expect(ImportanceParam.parse(undefined)).toBeUndefined();
  });
});

describe("PaginationParams", () => {
  it("lets large limits through for the service to clamp", () => {
    expect(PaginationParams.limit.parse(500)).toBe(500);
  });

  it("rejects negative values", () => {
    expect(() => PaginationParams.limit.parse(-1)).toThrow();
    expect(() => PaginationParams.offset.parse(-1)).toThrow();
  });
});

describe("MemoryIdParam Zod schema", () => {
  it("rejects non-integer ids", () => {
    expect(() => MemoryIdParam.parse(1.5)).toThrow();
    expect(() => MemoryIdParam.parse("7")).toThrow();
  });
});

describe("StoreMemorySchema", () => {
  it("requires non-empty content", () => {
    expect(() => StoreMemorySchema.parse({ content: "" })).toThrow();
  });

  it("accepts content with optional category and importance", () => {
    expect(StoreMemorySchema.parse({ content: "x", category: "work", importance: 3 })).toEqual({
      content: "x",
      category: "work",
      importance: 3,
    });
  });
});
