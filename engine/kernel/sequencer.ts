/* engine/kernel/sequencer.ts */
import type {
  ExposureTrial, LearningLevels, MembershipTrial, OrderQuestion, OrderTrial, PersistedState, PhaseBlock,
  PhaseName, QueryTrial, RestAndQueries, RngFn, StimulusRef, Trial
} from "@/types/experiment";
import type { ExperimentConfig, QuizConfig } from "@/types/records";
import { InsufficientStimuliError, RuleConstraintError } from "@/engine/errors";
import { invertPermutation, seqPosToSlot, sequenceLength, slotToSeqPos } from "@/engine/services/rules";
import { chance, deriveSeed, pick, randomInt, seededRng, shuffle } from "@/engine/utils/rng";

/** Everything a block needs to know about the stored rule, for one phase's stimuli. */
export interface RuleView {
  phase: PhaseName;
  numObjects: number;
  sequenceCount: number;
  seqLen: number;
  /** indexed by slot */
  refs: StimulusRef[];
  /** indexed by scrambled position */
  scrambled: StimulusRef[];
}

export function ruleView(state: PersistedState, phase: PhaseName): RuleView {
  const n = state.num_objects;
  const assignment = state.object_assignment[phase];
  const refs: StimulusRef[] = [];
  for (let slot = 0; slot < n; slot++) {
    const stimulus = assignment[String(slot)];
    if (stimulus !== undefined) refs.push({ slot, stimulus });
  }
  const distinct = new Set(refs.map(r => r.stimulus)).size;
  if (refs.length < n || distinct < n) {
    throw new InsufficientStimuliError(n, Math.min(refs.length, distinct), { phase, participantId: state.participant_id });
  }
  const scrambled = invertPermutation(state.permutation).map(slot => refs[slot]);
  return { phase, numObjects: n, sequenceCount: state.sequence_count, seqLen: sequenceLength(n, state.sequence_count), refs, scrambled };
}

/**
 * The rule view for one run of a quiz phase. Runs after the first reshuffle which picture
 * sits in which slot; the stimuli and the rule stay the same.
 */
export function runView(state: PersistedState, phase: PhaseName, run: number): RuleView {
  const view = ruleView(state, phase);
  if (run === 0) return view;
  const pictures = shuffle(seededRng(deriveSeed(state.seed, phase, "run", run)), view.refs.map(r => r.stimulus));
  const refs = view.refs.map(r => ({ slot: r.slot, stimulus: pictures[r.slot] }));
  const scrambled = invertPermutation(state.permutation).map(slot => refs[slot]);
  return { ...view, refs, scrambled };
}

function blockRng(state: PersistedState, phase: PhaseName, block: number | string): RngFn {
  return seededRng(deriveSeed(state.seed, phase, "block", block));
}

function range(from: number, to: number): number[] {
  return Array.from({ length: Math.max(0, to - from) }, (_, i) => from + i);
}

/* ---------------- Shared trial builders ---------------- */

function exposure(view: RuleView, block: number, index: number, order: ExposureTrial["order"], sequence: number | null, objectMs: number, isiMs: number): ExposureTrial {
  const source = order === "scrambled" ? view.scrambled : view.refs;
  const stimuli = sequence === null ? source.slice() : source.slice(sequence * view.seqLen, (sequence + 1) * view.seqLen);
  return {
    kind: "exposure", phase: view.phase, block, index, order, sequence, stimuli, objectMs, isiMs,
    expected: null, timeLimitMs: null,
  };
}

function orderTrial(
  view: RuleView, block: number, index: number, rng: RngFn,
  args: { question: OrderQuestion; probe: StimulusRef | null; correct: StimulusRef; foil: StimulusRef; sequence: number; probeAloneMs: number; timeLimitMs: number | null }
): OrderTrial {
  const correctOnLeft = chance(rng, 0.5);
  const left = correctOnLeft ? args.correct : args.foil;
  const right = correctOnLeft ? args.foil : args.correct;
  return {
    kind: "order", phase: view.phase, block, index,
    question: args.question, probe: args.probe, left, right, sequence: args.sequence,
    stimuli: args.probe ? [args.probe, left, right] : [left, right],
    probeAloneMs: args.probeAloneMs,
    expected: correctOnLeft ? "left" : "right",
    timeLimitMs: args.timeLimitMs,
  };
}

/* ---------------- Training ---------------- */

export function initialLevels(numObjects: number): LearningLevels {
  return Object.fromEntries(range(0, numObjects).map(slot => [String(slot), 0]));
}

function levelOf(levels: LearningLevels, slot: number): number {
  return levels[String(slot)] ?? 0;
}

/**
 * One demonstration-and-quiz cycle focused on a slot from the least-learned tier:
 * full scrambled order, full true order, "which sequence?" on the focus, and
 * "which comes later?" against an already-seen slot of the same true sequence.
 */
export function buildTrainingBlock(state: PersistedState, config: ExperimentConfig, block: number, levels: LearningLevels): PhaseBlock {
  const view = ruleView(state, "training");
  const cfg = config.phases.training;
  const rng = blockRng(state, "training", block);

  const slots = range(0, view.numObjects);
  const lowest = Math.min(...slots.map(s => levelOf(levels, s)));
  const focus = pick(rng, slots.filter(s => levelOf(levels, s) === lowest));
  const { sequence } = slotToSeqPos(focus, view.seqLen);

  const trials: Trial[] = [
    exposure(view, block, 0, "scrambled", null, cfg.objectMs, cfg.isiMs),
    exposure(view, block, 1, "true", null, cfg.objectMs, cfg.isiMs),
  ];
  const membership: MembershipTrial = {
    kind: "membership", phase: "training", block, index: 2,
    target: view.refs[focus], stimuli: [view.refs[focus]],
    expected: String(sequence + 1), timeLimitMs: cfg.choiceTimeoutMs,
  };
  trials.push(membership);

  const partners = slots.filter(s => s !== focus && levelOf(levels, s) > 0 && slotToSeqPos(s, view.seqLen).sequence === sequence);
  if (partners.length > 0) {
    const partner = pick(rng, partners);
    const [earlier, later] = focus < partner ? [focus, partner] : [partner, focus];
    trials.push(orderTrial(view, block, 3, rng, {
      question: "later", probe: null, correct: view.refs[later], foil: view.refs[earlier],
      sequence, probeAloneMs: 0, timeLimitMs: cfg.choiceTimeoutMs,
    }));
  }
  return { phase: "training", block, trials, focusSlot: focus };
}

/* ---------------- Structure / applied learning ---------------- */

/**
 * Probe targets for every run of a phase. Each run uses every slot floor(k/n) times, and
 * its k mod n leftover probes go to the slots the phase has probed least so far, so
 * counts stay within one of each other both per run and across the phase.
 * A run is drawn from the runs before it only, so extending `runs` never changes earlier runs.
 */
export function planProbeTargets(rng: RngFn, n: number, perRun: number, runs: number): number[][] {
  const totals = new Array<number>(n).fill(0);
  const plan: number[][] = [];
  for (let run = 0; run < runs; run++) {
    // Array.prototype.sort is stable: ties keep their shuffled order
    const leastUsed = shuffle(rng, range(0, n)).sort((a, b) => totals[a] - totals[b]);
    const segments = [shuffle(rng, leastUsed.slice(0, perRun % n))];
    for (let pass = 0; pass < Math.floor(perRun / n); pass++) segments.push(shuffle(rng, range(0, n)));

    const targets: number[] = [];
    for (const seg of segments) {
      if (seg.length > 1 && targets.length > 0 && seg[0] === targets[targets.length - 1]) {
        const j = 1 + randomInt(rng, seg.length - 1);
        [seg[0], seg[j]] = [seg[j], seg[0]];
      }
      targets.push(...seg);
    }
    for (const t of targets) totals[t] += 1;
    plan.push(targets);
  }
  return plan;
}

function probeTrial(view: RuleView, cfg: QuizConfig, block: number, index: number, target: number, rng: RngFn): OrderTrial {
  const { sequence, position } = slotToSeqPos(target, view.seqLen);
  const L = view.seqLen;
  const otherSequences = range(0, view.sequenceCount).filter(s => s !== sequence);
  const fromOtherSequence = () => view.refs[seqPosToSlot(pick(rng, otherSequences), randomInt(rng, L), L)];

  if (position < L - 1) {
    const correct = view.refs[seqPosToSlot(sequence, pick(rng, range(position + 1, L)), L)];
    // first positions have nothing earlier, so their foil always comes from another sequence
    const sameSequenceFoil = position > 0 && chance(rng, cfg.foilSameSequenceProbability);
    const foil = sameSequenceFoil
      ? view.refs[seqPosToSlot(sequence, pick(rng, range(0, position)), L)]
      : fromOtherSequence();
    return orderTrial(view, block, index, rng, {
      question: "later", probe: view.refs[target], correct, foil, sequence,
      probeAloneMs: cfg.probeAloneMs, timeLimitMs: cfg.choiceTimeoutMs,
    });
  }

  const correct = view.refs[seqPosToSlot(sequence, pick(rng, range(0, position)), L)];
  return orderTrial(view, block, index, rng, {
    question: "earlier", probe: view.refs[target], correct, foil: fromOtherSequence(), sequence,
    probeAloneMs: cfg.probeAloneMs, timeLimitMs: cfg.choiceTimeoutMs,
  });
}

/**
 * One run: each scrambled sequence shown `exposureRepeats` times in a row, then
 * `probesPerRun` order probes, with the run's share of the phase-wide target plan.
 */
export function buildQuizBlock(state: PersistedState, phase: "structure_learning" | "applied_learning", cfg: QuizConfig, block: number): PhaseBlock {
  const view = runView(state, phase, block);
  if (cfg.probesPerRun > 0 && (view.sequenceCount < 2 || view.seqLen < 2)) {
    throw new RuleConstraintError(`order probes need at least 2 true sequences of length 2 or more`, { phase, participantId: state.participant_id });
  }
  const rng = blockRng(state, phase, block);
  const trials: Trial[] = [];

  for (let seq = 0; seq < view.sequenceCount; seq++) {
    for (let rep = 0; rep < cfg.exposureRepeats; rep++) {
      trials.push(exposure(view, block, trials.length, "scrambled", seq, cfg.objectMs, cfg.isiMs));
    }
  }
  const plan = planProbeTargets(blockRng(state, phase, "targets"), view.numObjects, cfg.probesPerRun, Math.max(cfg.runs, block + 1));
  for (const target of plan[block]) {
    trials.push(probeTrial(view, cfg, block, trials.length, target, rng));
  }
  return { phase, block, trials, focusSlot: null };
}

/* ---------------- Applied learning: rest and queries ---------------- */

/**
 * Rest carries no stimuli; afterwards every novel object is queried exactly once, in random order.
 * Queries use the pictures of the last run, the mapping seen right before the rest.
 */
export function buildRestAndQueries(state: PersistedState, config: ExperimentConfig): RestAndQueries {
  const cfg = config.phases.applied_learning;
  const view = runView(state, "applied_learning", Math.max(0, cfg.runs - 1));
  const block = cfg.runs;
  const order = shuffle(blockRng(state, "applied_learning", "queries"), range(0, view.numObjects));
  const queries = order.map((slot, index): QueryTrial => {
    const { sequence, position } = slotToSeqPos(slot, view.seqLen);
    return {
      kind: "query", phase: "applied_learning", block, index,
      target: view.refs[slot], stimuli: [view.refs[slot]],
      expected: `${sequence + 1}-${position + 1}`,
      timeLimitMs: cfg.queryTimeoutMs,
    };
  });
  return { rest: { kind: "rest", durationMs: cfg.restMs, stimuli: [] }, queries };
}

/** Dispatch by phase; `levels` only matters for training. */
export function buildBlock(
  phase: PhaseName, state: PersistedState, config: ExperimentConfig, block: number,
  context: { levels?: LearningLevels } = {}
): PhaseBlock {
  switch (phase) {
    case "training":
      return buildTrainingBlock(state, config, block, context.levels ?? initialLevels(state.num_objects));
    case "structure_learning":
      return buildQuizBlock(state, phase, config.phases.structure_learning, block);
    case "applied_learning":
      return buildQuizBlock(state, phase, config.phases.applied_learning, block);
  }
}
