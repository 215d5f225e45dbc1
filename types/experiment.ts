/* types/experiment.ts: central shared types */
import type { ExperimentConfig } from "@/types/records";

/* ---------------- Phases ---------------- */
export const PHASES = ["training", "structure_learning", "applied_learning"] as const;
export type PhaseName = (typeof PHASES)[number];

export type SessionSelector = PhaseName | "session1" | "session2" | "all";

/* ---------------- Rule state ---------------- */
export type RuleMode = "per_participant" | "canonical";

/** permutation[slot] = scrambled position */
export type Permutation = number[];

/** slot index (as JSON key) → stimulus identifier */
export type ObjectAssignment = Record<string, string>;

export interface ScrambleConstraints {
  noFixedPoints: boolean;
  interleaveSequences: boolean;
}

export interface PersistedState {
  participant_id: string;
  version: number;
  mode: RuleMode;
  num_objects: number;
  sequence_count: number;
  seed: string;
  permutation: Permutation;
  object_assignment: Record<PhaseName, ObjectAssignment>;
  created_at: string;
}

export const PERSISTED_STATE_VERSION = 1;

/* ---------------- Stimuli ---------------- */
export interface StimulusRef {
  slot: number;
  stimulus: string;
}

export interface StimulusBank {
  pools: Record<PhaseName, string[]>;
}

/* ---------------- Trials ---------------- */
export type SequenceOrder = "scrambled" | "true";
export type OrderQuestion = "later" | "earlier";
export type ChoiceSide = "left" | "right";

interface TrialBase {
  phase: PhaseName;
  block: number;
  index: number;
  stimuli: StimulusRef[];
  /** null when no response is expected */
  expected: string | null;
  /** null = untimed */
  timeLimitMs: number | null;
}

export interface ExposureTrial extends TrialBase {
  kind: "exposure";
  order: SequenceOrder;
  /** scrambled sequence shown (0-based), or null for the whole list in `order` */
  sequence: number | null;
  objectMs: number;
  isiMs: number;
  expected: null;
}

export interface MembershipTrial extends TrialBase {
  kind: "membership";
  target: StimulusRef;
  expected: string;
}

export interface OrderTrial extends TrialBase {
  kind: "order";
  question: OrderQuestion;
  /** training pair quizzes have no probe: "which of these comes later?" */
  probe: StimulusRef | null;
  left: StimulusRef;
  right: StimulusRef;
  /** true sequence (0-based) the question refers to */
  sequence: number;
  probeAloneMs: number;
  expected: ChoiceSide;
}

export interface QueryTrial extends TrialBase {
  kind: "query";
  target: StimulusRef;
  expected: string;
}

export type Trial = ExposureTrial | MembershipTrial | OrderTrial | QueryTrial;
export type TrialKind = Trial["kind"];

export interface RestInterval {
  kind: "rest";
  durationMs: number;
  stimuli: [];
}

export interface PhaseBlock {
  phase: PhaseName;
  block: number;
  trials: Trial[];
  /** slot the block concentrates on (training only) */
  focusSlot: number | null;
}

/* ---------------- Presentation ---------------- */
export type ResponseOrTimeout =
  | { kind: "response"; key: string; reactionTimeMs: number }
  | { kind: "timeout" };

export interface Presentation {
  showInstructions(lines: string[]): Promise<void>;
  presentStimulusSequence(trial: Trial): Promise<ResponseOrTimeout>;
  /** shown after an answered trial, before the next one starts */
  showFeedback(lines: string[]): Promise<void>;
  presentRestInterval(durationMs: number): Promise<void>;
  abortRequested(): boolean;
}

/* ---------------- Outcomes ---------------- */
export interface TrialOutcome {
  trialIndex: number;
  block: number;
  kind: TrialKind;
  expected: string | null;
  response: string | null;
  /** null for trials without an expected response */
  correct: boolean | null;
  reactionTimeMs: number | null;
  timestamp: string;
}

export type PhaseStatus =
  | "criterion_met"
  | "criterion_not_met"
  | "completed"
  | "user_aborted"
  | "presentation_error";

export interface PhaseResult {
  participantId: string;
  phase: PhaseName;
  runId: string;
  status: PhaseStatus;
  /** null when the phase has no criterion */
  criterionMet: boolean | null;
  userAborted: boolean;
  blocksRun: number;
  outcomes: TrialOutcome[];
  accuracy: number | null;
  meanReactionTimeMs: number | null;
  startedAt: string;
  finishedAt: string;
  error: string | null;
}

export const COMPLETED_STATUSES: readonly PhaseStatus[] = ["criterion_met", "criterion_not_met", "completed"];

/* ---------------- Controller states ---------------- */
export type ControllerState =
  | "INSTRUCTIONS"
  | "RUNNING_TRIALS"
  | "CRITERION_CHECK"
  | "REST"
  | "QUERY_TRIALS"
  | "COMPLETE";

/* ---------------- Criterion ---------------- */
export type CriterionPolicy =
  | { kind: "trailing_accuracy"; window: number; threshold: number }
  | { kind: "mastery"; level: number }
  | { kind: "fixed_blocks"; blocks: number };

export type LearningLevels = Record<string, number>;

/* ---------------- Phase drivers ---------------- */
export interface DriverContext {
  state: PersistedState;
  config: ExperimentConfig;
}

/** What a phase adds after its trial blocks: a stimulus-free rest, then one query per object. */
export interface RestAndQueries {
  rest: RestInterval;
  queries: QueryTrial[];
}

export interface DriverCapabilities {
  // Block plan adapts to per-slot learning levels
  adaptive?: boolean;
  // Phase ends with a rest interval and query trials
  restAndQueries?: boolean;
  // Answered trials get right/wrong feedback
  feedback?: boolean;
}

export interface PhaseDriver<TState = unknown> {
  id: string;
  phase: PhaseName;
  version: string;
  capabilities?: DriverCapabilities;

  instructions(ctx: DriverContext): string[];
  /** null: the phase simply runs `maxBlocks` blocks */
  criterion(ctx: DriverContext): CriterionPolicy | null;
  maxBlocks(ctx: DriverContext): number;

  initState(ctx: DriverContext): TState;
  nextBlock(ctx: DriverContext, driverState: TState, block: number): PhaseBlock;
  afterBlock(ctx: DriverContext, driverState: TState, block: PhaseBlock, outcomes: TrialOutcome[]): TState;
  learningLevels?(driverState: TState): LearningLevels;

  restAndQueries?(ctx: DriverContext): RestAndQueries;
  /** Lines to show once a trial is scored; null shows nothing. */
  feedback?(ctx: DriverContext, trial: Trial, outcome: TrialOutcome): string[] | null;
}

/* ---------------- Logging ---------------- */
export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFn = (lvl: LogLevel, msg: string, extra?: Record<string, unknown>) => void;

/* ---------------- Random ---------------- */
export type RngFn = () => number;
