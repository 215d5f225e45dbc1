import type { PhaseDriver } from "@/types/experiment";
import { buildQuizBlock } from "@/engine/kernel/sequencer";

/* Fixed number of runs; each run is exposure of every scrambled sequence followed by order probes. */
export const StructureLearningDriver: PhaseDriver<null> = {
  id: "phase.structure_learning.v1",
  phase: "structure_learning",
  version: "1.0.0",
  capabilities: { adaptive: false, restAndQueries: false },

  instructions({ config }) {
    const cfg = config.phases.structure_learning;
    const lines = [
      "New objects follow the same scrambling rule you just learned.",
      `Each scrambled sequence is shown ${cfg.exposureRepeats} times in a row.`,
      "Then one object appears with two others: pick the one asked for with the left or right key.",
    ];
    if (cfg.runs > 1) lines.push("On each repeat the pictures are reshuffled; the rule stays the same.");
    return lines;
  },

  criterion() {
    return null;
  },

  maxBlocks({ config }) {
    return config.phases.structure_learning.runs;
  },

  initState() {
    return null;
  },

  nextBlock({ state, config }, _s, block) {
    return buildQuizBlock(state, "structure_learning", config.phases.structure_learning, block);
  },

  afterBlock() {
    return null;
  },
};
