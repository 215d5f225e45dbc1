import { describe, it, expect } from "vitest";
import type { TrialOutcome } from "@/types/experiment";
import { evaluateCriterion } from "./criterion_policy";

function outcome(correct: boolean | null, i = 0): TrialOutcome {
  return {
    trialIndex: i, block: 0, kind: correct === null ? "exposure" : "membership",
    expected: correct === null ? null : "1", response: null, correct,
    reactionTimeMs: null, timestamp: "2026-01-01T00:00:00.000Z",
  };
}

describe("criterion policy", () => {
  const trailing = { kind: "trailing_accuracy" as const, window: 4, threshold: 0.75 };

  it("waits for a full window of answered trials", () => {
    const outcomes = [outcome(true), outcome(null), outcome(true), outcome(true)];
    expect(evaluateCriterion(trailing, { outcomes, blocksRun: 1, levels: null })).toEqual({
      met: false, detail: { answered: 3, accuracy: null },
    });
  });

  it("looks only at the last window of answered trials", () => {
    const outcomes = [outcome(false), outcome(false), outcome(true), outcome(null), outcome(false), outcome(true), outcome(true)];
    // last four answered: true, false, true, true
    expect(evaluateCriterion(trailing, { outcomes, blocksRun: 2, levels: null })).toEqual({
      met: true, detail: { answered: 6, accuracy: 0.75 },
    });
    expect(evaluateCriterion({ ...trailing, threshold: 0.8 }, { outcomes, blocksRun: 2, levels: null }).met).toBe(false);
  });

  it("requires every slot at the mastery level", () => {
    const mastery = { kind: "mastery" as const, level: 2 };
    expect(evaluateCriterion(mastery, { outcomes: [], blocksRun: 3, levels: { "0": 2, "1": 1 } })).toEqual({
      met: false, detail: { lowestLevel: 1 },
    });
    expect(evaluateCriterion(mastery, { outcomes: [], blocksRun: 3, levels: { "0": 2, "1": 3 } }).met).toBe(true);
    expect(evaluateCriterion(mastery, { outcomes: [], blocksRun: 3, levels: null }).met).toBe(false);
  });

  it("counts blocks for fixed_blocks", () => {
    const fixed = { kind: "fixed_blocks" as const, blocks: 3 };
    expect(evaluateCriterion(fixed, { outcomes: [], blocksRun: 2, levels: null }).met).toBe(false);
    expect(evaluateCriterion(fixed, { outcomes: [], blocksRun: 3, levels: null }).met).toBe(true);
  });
});
