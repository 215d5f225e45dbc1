import type { LearningLevels, PersistedState, PhaseBlock, PhaseDriver, StimulusRef, TrialOutcome } from "@/types/experiment";
import { buildTrainingBlock, initialLevels } from "@/engine/kernel/sequencer";
import { ordinal, sequenceLength, slotToSeqPos } from "@/engine/services/rules";

/* -------- Learning levels -------- */

/** Slots a block quizzed: the focus and, when an order quiz ran, its partner. */
function quizzedSlots(block: PhaseBlock): number[] {
  const slots = block.focusSlot === null ? [] : [block.focusSlot];
  for (const t of block.trials) {
    if (t.kind !== "order") continue;
    for (const ref of [t.left, t.right]) if (!slots.includes(ref.slot)) slots.push(ref.slot);
  }
  return slots;
}

/**
 * All quizzes right: the focus moves up a level. Any miss: every quizzed slot moves
 * down one, but a slot that has reached level 1 never drops back to unseen.
 */
export function updateLevels(levels: LearningLevels, block: PhaseBlock, outcomes: TrialOutcome[]): LearningLevels {
  const next = { ...levels };
  const scored = outcomes.filter(o => o.correct !== null);
  if (block.focusSlot === null || scored.length === 0) return next;

  if (scored.every(o => o.correct === true)) {
    const key = String(block.focusSlot);
    next[key] = (next[key] ?? 0) + 1;
    return next;
  }
  for (const slot of quizzedSlots(block)) {
    const key = String(slot);
    const level = next[key] ?? 0;
    if (level > 1) next[key] = level - 1;
  }
  return next;
}

/* -------- Feedback -------- */

/** Where a slot is shown in the scrambled order and where it belongs in the true one. */
export function ruleReminder(state: PersistedState, slot: number): string {
  const len = sequenceLength(state.num_objects, state.sequence_count);
  const shown = slotToSeqPos(state.permutation[slot], len);
  const truth = slotToSeqPos(slot, len);
  return `The ${ordinal(shown.position + 1)} picture of the ${ordinal(shown.sequence + 1)} scrambled sequence`
    + ` becomes the ${ordinal(truth.position + 1)} picture of the ${ordinal(truth.sequence + 1)} true sequence.`;
}

function reminderLine(state: PersistedState, ref: StimulusRef): string {
  return `${ref.stimulus.toUpperCase()}: ${ruleReminder(state, ref.slot)}`;
}

/* -------- Driver -------- */

export const TrainingDriver: PhaseDriver<LearningLevels> = {
  id: "phase.training.v1",
  phase: "training",
  version: "1.0.0",
  capabilities: { adaptive: true, restAndQueries: false, feedback: true },

  instructions({ state }) {
    const len = sequenceLength(state.num_objects, state.sequence_count);
    return [
      `You will see ${state.num_objects} objects in a scrambled order.`,
      `They really form ${state.sequence_count} sequences of ${len} objects each.`,
      "Each round shows the scrambled order, then the true order, then asks a question or two.",
      "Answer with the number of the sequence an object belongs to, or with left/right.",
    ];
  },

  criterion({ config }) {
    return config.phases.training.criterion;
  },

  maxBlocks({ config }) {
    return config.phases.training.maxBlocks;
  },

  initState({ state }) {
    return initialLevels(state.num_objects);
  },

  nextBlock({ state, config }, levels, block) {
    return buildTrainingBlock(state, config, block, levels);
  },

  afterBlock(_ctx, levels, block, outcomes) {
    return updateLevels(levels, block, outcomes);
  },

  learningLevels(levels) {
    return levels;
  },

  feedback({ state }, trial, outcome) {
    if (outcome.correct === null) return null;
    if (outcome.correct) return ["Correct!"];
    switch (trial.kind) {
      case "membership":
        return ["Incorrect. Remember:", reminderLine(state, trial.target)];
      case "order":
        return ["Incorrect. Remember:", reminderLine(state, trial.left), reminderLine(state, trial.right)];
      default:
        return ["Incorrect."];
    }
  },
};
