import type { PhaseDriver } from "@/types/experiment";
import { buildQuizBlock, buildRestAndQueries } from "@/engine/kernel/sequencer";

export const AppliedLearningDriver: PhaseDriver<null> = {
  id: "phase.applied_learning.v1",
  phase: "applied_learning",
  version: "1.0.0",
  capabilities: { adaptive: false, restAndQueries: true },

  instructions({ config }) {
    const cfg = config.phases.applied_learning;
    const lines = [
      "These objects are new, but they are scrambled by the same rule.",
      "Watch each scrambled sequence, then choose left or right when asked.",
    ];
    if (cfg.runs > 1) lines.push("On each repeat the pictures are reshuffled; the rule stays the same.");
    if (cfg.choiceTimeoutMs !== null) lines.push(`You have ${Math.round(cfg.choiceTimeoutMs / 1000)} seconds for each choice.`);
    lines.push("Afterwards there is a rest, followed by one question about each object.");
    return lines;
  },

  criterion() {
    return null;
  },

  maxBlocks({ config }) {
    return config.phases.applied_learning.runs;
  },

  initState() {
    return null;
  },

  nextBlock({ state, config }, _s, block) {
    return buildQuizBlock(state, "applied_learning", config.phases.applied_learning, block);
  },

  afterBlock() {
    return null;
  },

  restAndQueries({ state, config }) {
    return buildRestAndQueries(state, config);
  },
};
