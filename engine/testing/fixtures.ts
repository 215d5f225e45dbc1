// engine/testing/fixtures.ts: shared builders for tests
import type { PersistedState, PhaseResult, StimulusBank } from "@/types/experiment";
import { PERSISTED_STATE_VERSION } from "@/types/experiment";
import type { ExperimentConfig } from "@/types/records";
import { parseConfigOrThrow } from "@/lib/config";
import { deepMerge } from "@/engine/utils/deepMerge";
import { ruleGenerator } from "@/engine/services/rules";
import { deriveSeed } from "@/engine/utils/rng";

// Short, untimed phases so whole runs finish instantly under a scripted presentation
const BASE = {
  dataDir: "/tmp/scramble-tests-unused",
  stimuliFile: "/tmp/scramble-tests-unused/stimuli.json",
  store: { backend: "memory" },
  rule: {
    mode: "per_participant",
    numObjects: 8,
    sequenceCount: 2,
    constraints: { noFixedPoints: true, interleaveSequences: true },
    canonicalPermutation: null,
    seed: null,
  },
  phases: {
    training: {
      maxBlocks: 6,
      criterion: { kind: "trailing_accuracy", window: 4, threshold: 1 },
      objectMs: 0,
      isiMs: 0,
      choiceTimeoutMs: null,
    },
    structure_learning: {
      runs: 2,
      exposureRepeats: 2,
      probesPerRun: 10,
      foilSameSequenceProbability: 0.5,
      objectMs: 0,
      isiMs: 0,
      probeAloneMs: 0,
      choiceTimeoutMs: null,
    },
    applied_learning: {
      runs: 1,
      exposureRepeats: 1,
      probesPerRun: 8,
      foilSameSequenceProbability: 0.33,
      objectMs: 0,
      isiMs: 0,
      probeAloneMs: 0,
      choiceTimeoutMs: 5000,
      restMs: 1000,
      queryTimeoutMs: null,
    },
  },
  allowSkipPrerequisites: false,
  logLevel: "silent",
};

export function testConfig(patch: Record<string, unknown> = {}): ExperimentConfig {
  return parseConfigOrThrow(deepMerge(BASE, patch));
}

export function poolOf(prefix: string, n: number): string[] {
  return Array.from({ length: n }, (_, i) => `${prefix}-${i}`);
}

export function testBank(n = 8): StimulusBank {
  return { pools: { training: poolOf("train", n), structure_learning: poolOf("struct", n), applied_learning: poolOf("novel", n) } };
}

export function makeState(participantId = "p1", config: ExperimentConfig = testConfig(), bank: StimulusBank = testBank()): PersistedState {
  const { rule } = config;
  const seed = deriveSeed(rule.seed ?? "participant", participantId);
  const generated = ruleGenerator.generate(rule.numObjects, seed, {
    mode: rule.mode,
    sequenceCount: rule.sequenceCount,
    constraints: rule.constraints,
    canonicalPermutation: rule.canonicalPermutation,
    bank,
  });
  return {
    participant_id: participantId,
    version: PERSISTED_STATE_VERSION,
    mode: rule.mode,
    num_objects: rule.numObjects,
    sequence_count: rule.sequenceCount,
    seed,
    permutation: generated.permutation,
    object_assignment: generated.assignment,
    created_at: "2026-01-01T00:00:00.000Z",
  };
}

export function phaseResult(patch: Partial<PhaseResult> = {}): PhaseResult {
  return {
    participantId: "p1",
    phase: "training",
    runId: "run-1",
    status: "criterion_met",
    criterionMet: true,
    userAborted: false,
    blocksRun: 2,
    outcomes: [],
    accuracy: 1,
    meanReactionTimeMs: 500,
    startedAt: "2026-01-01T00:00:00.000Z",
    finishedAt: "2026-01-01T00:05:00.000Z",
    error: null,
    ...patch,
  };
}
