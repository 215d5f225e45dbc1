/* engine/kernel/validation.test.ts */
import { describe, it, expect } from "vitest";
import { validatePersistedStateOrThrow, validateStimulusBankOrThrow } from "./validation";
import { ConfigError, CorruptStateError } from "@/engine/errors";
import { makeState, testBank } from "@/engine/testing/fixtures";

describe("persisted state validation", () => {
  it("accepts a generated record unchanged", () => {
    const state = makeState("p1");
    const raw: unknown = JSON.parse(JSON.stringify(state));
    expect(validatePersistedStateOrThrow(raw, "p1")).toEqual(state);
  });

  it("fails when a required field is missing", () => {
    const { seed: _seed, ...rest } = makeState("p1");
    expect(() => validatePersistedStateOrThrow(rest, "p1")).toThrow(CorruptStateError);
  });

  it("fails when the record belongs to someone else", () => {
    expect(() => validatePersistedStateOrThrow(makeState("p2"), "p1")).toThrow(/belongs to participant 'p2'/);
  });

  it("fails on a newer record version", () => {
    expect(() => validatePersistedStateOrThrow({ ...makeState("p1"), version: 99 }, "p1")).toThrow(/newer than supported/);
  });

  it("fails when the permutation is not a bijection", () => {
    const state = { ...makeState("p1"), permutation: [0, 0, 1, 2, 3, 4, 5, 6] };
    expect(() => validatePersistedStateOrThrow(state, "p1")).toThrow(/permutation invalid/);
  });

  it("fails when an assignment reuses a stimulus or misses a slot", () => {
    const base = makeState("p1");
    const reused = { ...base, object_assignment: { ...base.object_assignment, training: { ...base.object_assignment.training, "1": base.object_assignment.training["0"] } } };
    expect(() => validatePersistedStateOrThrow(reused, "p1")).toThrow(/maps two slots to one stimulus/);

    const { "7": _last, ...short } = base.object_assignment.structure_learning;
    const missing = { ...base, object_assignment: { ...base.object_assignment, structure_learning: short } };
    expect(() => validatePersistedStateOrThrow(missing, "p1")).toThrow(/does not cover slots 0..7/);
  });
});

describe("stimulus bank validation", () => {
  it("accepts three string pools", () => {
    const bank = testBank();
    expect(validateStimulusBankOrThrow(bank, "inline")).toBe(bank);
  });

  it("rejects a bank without an applied pool", () => {
    const bad = { pools: { training: ["a"], structure_learning: ["b"] } };
    expect(() => validateStimulusBankOrThrow(bad, "inline")).toThrow(ConfigError);
  });
});
