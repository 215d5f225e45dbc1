import type { CriterionPolicy, LearningLevels, TrialOutcome } from "@/types/experiment";

export type CriterionEvaluation = {
  met: boolean;
  /** what the decision was based on, for the transition log */
  detail: Record<string, number | null>;
};

export interface CriterionInput {
  outcomes: TrialOutcome[];
  blocksRun: number;
  levels: LearningLevels | null;
}

export function evaluateCriterion(policy: CriterionPolicy, input: CriterionInput): CriterionEvaluation {
  switch (policy.kind) {
    case "trailing_accuracy": {
      const scored = input.outcomes.filter(o => o.correct !== null);
      // window must be full before the threshold can count
      if (scored.length < policy.window) return { met: false, detail: { answered: scored.length, accuracy: null } };
      const tail = scored.slice(-policy.window);
      const accuracy = tail.filter(o => o.correct === true).length / policy.window;
      return { met: accuracy >= policy.threshold, detail: { answered: scored.length, accuracy } };
    }
    case "mastery": {
      if (!input.levels) return { met: false, detail: { lowestLevel: null } };
      const values = Object.values(input.levels);
      const lowest = values.length ? Math.min(...values) : 0;
      return { met: values.length > 0 && lowest >= policy.level, detail: { lowestLevel: lowest } };
    }
    case "fixed_blocks":
      return { met: input.blocksRun >= policy.blocks, detail: { blocksRun: input.blocksRun } };
  }
}
