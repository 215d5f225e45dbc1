import { describe, it, expect } from "vitest";
import {
  validatePermutation, invertPermutation, ordinal, ruleGenerator, seqPosToSlot, sequenceLength, slotToSeqPos
} from "./rules";
import { InsufficientStimuliError, RuleConstraintError } from "@/engine/errors";
import { poolOf, testBank } from "@/engine/testing/fixtures";

const BOTH = { noFixedPoints: true, interleaveSequences: true };
const NONE = { noFixedPoints: false, interleaveSequences: false };

describe("slot geometry", () => {
  it("splits slots into equal true sequences", () => {
    expect(sequenceLength(8, 2)).toBe(4);
    expect(() => sequenceLength(7, 2)).toThrow(RuleConstraintError);
    expect(slotToSeqPos(5, 4)).toEqual({ sequence: 1, position: 1 });
    expect(seqPosToSlot(1, 1, 4)).toBe(5);
  });

  it("formats ordinals", () => {
    expect([1, 2, 3, 4, 11, 12, 13, 21, 22, 111].map(ordinal)).toEqual(
      ["1st", "2nd", "3rd", "4th", "11th", "12th", "13th", "21st", "22nd", "111th"]
    );
  });
});

describe("validatePermutation", () => {
  it("accepts an interleaved derangement", () => {
    expect(validatePermutation([2, 0, 3, 1], 4, BOTH, 2)).toEqual([]);
  });

  it("reports duplicates, fixed points and broken alternation", () => {
    expect(validatePermutation([0, 0, 1, 2], 4, NONE, 2)).toContain("position 0 used twice");
    expect(validatePermutation([0, 1], 2, { noFixedPoints: true, interleaveSequences: false }, 1)).toEqual([
      "slot 0 is a fixed point",
      "slot 1 is a fixed point",
    ]);
    expect(validatePermutation([1, 0, 3, 2], 4, { noFixedPoints: false, interleaveSequences: true }, 2)).toEqual([
      "true sequences do not alternate across scrambled positions",
    ]);
  });

  it("inverts to scrambled position → slot", () => {
    expect(invertPermutation([2, 0, 3, 1])).toEqual([1, 3, 0, 2]);
  });
});

describe("ruleGenerator.permutation", () => {
  const opts = { mode: "per_participant" as const, sequenceCount: 2, constraints: BOTH, canonicalPermutation: null };

  it("always yields constrained bijections (1200 draws over several sizes)", () => {
    for (const n of [2, 4, 6, 8, 10, 12]) {
      for (let i = 0; i < 200; i++) {
        const perm = ruleGenerator.permutation(n, `participant:${i}`, opts);
        expect(validatePermutation(perm, n, BOTH, 2)).toEqual([]);
      }
    }
  });

  it("handles odd sizes without interleaving", () => {
    const constraints = { noFixedPoints: true, interleaveSequences: false };
    for (const n of [3, 5, 7]) {
      for (let i = 0; i < 100; i++) {
        const perm = ruleGenerator.permutation(n, `odd:${i}`, { ...opts, sequenceCount: 1, constraints });
        expect(validatePermutation(perm, n, constraints, 1)).toEqual([]);
      }
    }
  });

  it("is deterministic per seed", () => {
    expect(ruleGenerator.permutation(8, "participant:7", opts)).toEqual(ruleGenerator.permutation(8, "participant:7", opts));
  });

  it("shares one permutation across participants in canonical mode", () => {
    const canonical = { ...opts, mode: "canonical" as const };
    expect(ruleGenerator.permutation(8, "participant:1", canonical)).toEqual(ruleGenerator.permutation(8, "participant:2", canonical));
  });

  it("uses a configured canonical permutation verbatim, after checking it", () => {
    const fixed = [2, 0, 3, 1];
    const got = ruleGenerator.permutation(4, "participant:1", { ...opts, mode: "canonical", canonicalPermutation: fixed });
    expect(got).toEqual(fixed);
    expect(got).not.toBe(fixed);
    expect(() => ruleGenerator.permutation(4, "participant:1", { ...opts, mode: "canonical", canonicalPermutation: [0, 1, 2, 3] }))
      .toThrow(/canonical permutation rejected/);
  });

  it("rejects impossible constraints", () => {
    expect(() => ruleGenerator.permutation(6, "s", { ...opts, sequenceCount: 3 })).toThrow(/interleaving needs exactly 2/);
    expect(() => ruleGenerator.permutation(1, "s", { ...opts, sequenceCount: 1, constraints: { noFixedPoints: true, interleaveSequences: false } }))
      .toThrow(RuleConstraintError);
  });
});

describe("ruleGenerator.generate", () => {
  const opts = { mode: "per_participant" as const, sequenceCount: 2, constraints: BOTH, canonicalPermutation: null };

  it("assigns every slot a distinct stimulus from each phase pool", () => {
    const { assignment } = ruleGenerator.generate(8, "participant:1", { ...opts, bank: testBank() });
    for (const phase of ["training", "structure_learning", "applied_learning"] as const) {
      const values = Object.values(assignment[phase]);
      expect(Object.keys(assignment[phase]).sort()).toEqual(["0", "1", "2", "3", "4", "5", "6", "7"]);
      expect(new Set(values).size).toBe(8);
    }
    expect(Object.values(assignment.training).every(s => s.startsWith("train-"))).toBe(true);
  });

  it("keeps the applied pool novel", () => {
    const training = poolOf("train", 8);
    const bank = { pools: { training, structure_learning: poolOf("struct", 8), applied_learning: [...training, ...poolOf("novel", 8)] } };
    const { assignment } = ruleGenerator.generate(8, "participant:1", { ...opts, bank });
    expect(Object.values(assignment.applied_learning).every(s => s.startsWith("novel-"))).toBe(true);
  });

  it("fails when a pool is too small", () => {
    const bank = { pools: { training: poolOf("train", 5), structure_learning: poolOf("struct", 8), applied_learning: poolOf("novel", 8) } };
    expect(() => ruleGenerator.generate(8, "participant:1", { ...opts, bank })).toThrow(InsufficientStimuliError);

    const overlap = { pools: { training: poolOf("train", 8), structure_learning: poolOf("struct", 8), applied_learning: poolOf("train", 8) } };
    try {
      ruleGenerator.generate(8, "participant:1", { ...opts, bank: overlap, participantId: "17" });
      expect.unreachable();
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(InsufficientStimuliError);
      if (e instanceof InsufficientStimuliError) {
        expect(e.available).toBe(0);
        expect(e.phase).toBe("applied_learning");
        expect(e.context()).toEqual({ code: "INSUFFICIENT_STIMULI", participant_id: "17", phase: "applied_learning" });
      }
    }
  });
});
