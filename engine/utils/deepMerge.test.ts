import { describe, it, expect } from "vitest";
import { deepMerge, isPlain } from "./deepMerge";

describe("deepMerge", () => {
  it("merges nested objects key by key", () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: 1 }, { a: { c: 3 } })).toEqual({ a: { b: 1, c: 3 }, d: 1 });
  });

  it("replaces arrays whole", () => {
    expect(deepMerge({ xs: [1, 2] }, { xs: [3] })).toEqual({ xs: [3] });
    expect(deepMerge([1, 2], [3])).toEqual([3]);
  });

  it("lets an explicit null replace a value", () => {
    expect(deepMerge({ rule: { seed: "s" } }, { rule: { seed: null } })).toEqual({ rule: { seed: null } });
  });

  it("keeps the base for undefined overrides and never mutates inputs", () => {
    const base = { a: { b: [1] } };
    const out = deepMerge(base, undefined);
    expect(out).toEqual(base);
    expect(out).not.toBe(base);

    const override = { a: { c: 2 } };
    deepMerge(base, override);
    expect(base).toEqual({ a: { b: [1] } });
    expect(override).toEqual({ a: { c: 2 } });
  });

  it("isPlain accepts only plain objects", () => {
    expect(isPlain({})).toBe(true);
    expect(isPlain([])).toBe(false);
    expect(isPlain(null)).toBe(false);
    expect(isPlain(new Date())).toBe(false);
  });
});
