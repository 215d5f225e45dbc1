/* engine/services/rules.ts */
import type {
  ObjectAssignment, Permutation, PhaseName, RngFn, RuleMode, ScrambleConstraints, StimulusBank
} from "@/types/experiment";
import { InsufficientStimuliError, RuleConstraintError } from "@/engine/errors";
import { deriveSeed, randomInt, sample, seededRng, shuffle } from "@/engine/utils/rng";

const MAX_ATTEMPTS = 1000;
const CANONICAL_SEED = "canonical";

/* ---------------- Slot geometry ---------------- */

export function sequenceLength(numObjects: number, sequenceCount: number): number {
  if (!Number.isInteger(numObjects) || numObjects < 1) throw new RuleConstraintError(`numObjects must be a positive integer, got ${numObjects}`);
  if (!Number.isInteger(sequenceCount) || sequenceCount < 1 || numObjects % sequenceCount !== 0) {
    throw new RuleConstraintError(`${numObjects} objects cannot be split into ${sequenceCount} equal sequences`);
  }
  return numObjects / sequenceCount;
}

export function slotToSeqPos(slot: number, seqLen: number): { sequence: number; position: number } {
  return { sequence: Math.floor(slot / seqLen), position: slot % seqLen };
}

export function seqPosToSlot(sequence: number, position: number, seqLen: number): number {
  return sequence * seqLen + position;
}

/** 1 → "1st", 12 → "12th", 22 → "22nd" */
export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 10 && mod100 <= 20) return `${n}th`;
  const last = n % 10;
  const suffix = last === 1 ? "st" : last === 2 ? "nd" : last === 3 ? "rd" : "th";
  return `${n}${suffix}`;
}

/* ---------------- Permutations ---------------- */

/** Returns the list of violations; empty means the permutation is acceptable. */
export function validatePermutation(
  perm: readonly number[],
  numObjects: number,
  constraints: ScrambleConstraints,
  sequenceCount: number
): string[] {
  const problems: string[] = [];
  if (perm.length !== numObjects) problems.push(`length ${perm.length} != ${numObjects}`);
  const seen = new Set<number>();
  perm.forEach((p, slot) => {
    if (!Number.isInteger(p) || p < 0 || p >= numObjects) problems.push(`slot ${slot} maps outside 0..${numObjects - 1}`);
    else if (seen.has(p)) problems.push(`position ${p} used twice`);
    seen.add(p);
    if (constraints.noFixedPoints && p === slot) problems.push(`slot ${slot} is a fixed point`);
  });
  if (constraints.interleaveSequences && problems.length === 0) {
    const seqLen = numObjects / sequenceCount;
    const parities = new Set(perm.slice(0, seqLen).map(p => p % 2));
    const rest = new Set(perm.slice(seqLen).map(p => p % 2));
    if (parities.size !== 1 || rest.size !== 1 || [...parities][0] === [...rest][0]) {
      problems.push("true sequences do not alternate across scrambled positions");
    }
  }
  return problems;
}

/** scrambled position → slot */
export function invertPermutation(perm: Permutation): number[] {
  const inv = new Array<number>(perm.length);
  perm.forEach((pos, slot) => { inv[pos] = slot; });
  return inv;
}

function assertConstraintsSatisfiable(numObjects: number, sequenceCount: number, constraints: ScrambleConstraints) {
  sequenceLength(numObjects, sequenceCount);
  if (constraints.noFixedPoints && numObjects < 2) {
    throw new RuleConstraintError("a permutation without fixed points needs at least 2 objects");
  }
  if (constraints.interleaveSequences && sequenceCount !== 2) {
    throw new RuleConstraintError(`interleaving needs exactly 2 true sequences, got ${sequenceCount}`);
  }
}

function drawCandidate(rng: RngFn, numObjects: number, constraints: ScrambleConstraints): Permutation {
  const slots = Array.from({ length: numObjects }, (_, i) => i);
  if (!constraints.interleaveSequences) return shuffle(rng, slots);

  const half = numObjects / 2;
  const evens = slots.filter(p => p % 2 === 0);
  const odds = slots.filter(p => p % 2 === 1);
  const firstOnEven = randomInt(rng, 2) === 0;
  const first = shuffle(rng, firstOnEven ? evens : odds);
  const second = shuffle(rng, firstOnEven ? odds : evens);
  return [...first.slice(0, half), ...second.slice(0, half)];
}

function generatePermutation(rng: RngFn, numObjects: number, sequenceCount: number, constraints: ScrambleConstraints): Permutation {
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const candidate = drawCandidate(rng, numObjects, constraints);
    if (validatePermutation(candidate, numObjects, constraints, sequenceCount).length === 0) return candidate;
  }
  throw new RuleConstraintError(`no permutation of ${numObjects} objects satisfied the constraints after ${MAX_ATTEMPTS} attempts`);
}

/* ---------------- Object assignment ---------------- */

function assignFromPool(rng: RngFn, pool: readonly string[], numObjects: number, phase: PhaseName, participantId?: string): ObjectAssignment {
  const unique = Array.from(new Set(pool));
  if (unique.length < numObjects) throw new InsufficientStimuliError(numObjects, unique.length, { phase, participantId });
  const picked = sample(rng, unique, numObjects);
  return Object.fromEntries(picked.map((stimulus, slot) => [String(slot), stimulus]));
}

/* ---------------- Generator ---------------- */

export interface GenerateOptions {
  mode: RuleMode;
  sequenceCount: number;
  constraints: ScrambleConstraints;
  canonicalPermutation: number[] | null;
  bank: StimulusBank;
  /** carried into errors raised while assigning stimuli */
  participantId?: string;
}

export interface GeneratedRule {
  permutation: Permutation;
  assignment: Record<PhaseName, ObjectAssignment>;
}

export interface RuleGenerator {
  generate(numObjects: number, seedSource: string, opts: GenerateOptions): GeneratedRule;
  permutation(numObjects: number, seedSource: string, opts: Omit<GenerateOptions, "bank" | "participantId">): Permutation;
}

export const ruleGenerator: RuleGenerator = {
  permutation(numObjects, seedSource, opts) {
    assertConstraintsSatisfiable(numObjects, opts.sequenceCount, opts.constraints);
    if (opts.mode === "canonical" && opts.canonicalPermutation) {
      const problems = validatePermutation(opts.canonicalPermutation, numObjects, opts.constraints, opts.sequenceCount);
      if (problems.length) throw new RuleConstraintError(`canonical permutation rejected: ${problems.join("; ")}`);
      return opts.canonicalPermutation.slice();
    }
    const base = opts.mode === "canonical" ? CANONICAL_SEED : seedSource;
    return generatePermutation(seededRng(deriveSeed(base, "permutation")), numObjects, opts.sequenceCount, opts.constraints);
  },

  generate(numObjects, seedSource, opts) {
    const permutation = ruleGenerator.permutation(numObjects, seedSource, opts);
    const assign = (phase: PhaseName, pool: readonly string[]) =>
      assignFromPool(seededRng(deriveSeed(seedSource, "assignment", phase)), pool, numObjects, phase, opts.participantId);

    const training = assign("training", opts.bank.pools.training);
    const structure = assign("structure_learning", opts.bank.pools.structure_learning);
    // the novel pool excludes everything the earlier phases can show
    const seen = new Set([...Object.values(training), ...Object.values(structure)]);
    const applied = assign("applied_learning", opts.bank.pools.applied_learning.filter(s => !seen.has(s)));

    return {
      permutation,
      assignment: { training, structure_learning: structure, applied_learning: applied },
    };
  },
};
