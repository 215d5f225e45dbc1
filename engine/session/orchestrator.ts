// engine/session/orchestrator.ts
import "@/engine/drivers";
import type {
  DriverContext, LogFn, PersistedState, PhaseDriver, PhaseName, PhaseResult, PhaseStatus, Presentation,
  SessionSelector, StimulusBank
} from "@/types/experiment";
import { COMPLETED_STATUSES, PERSISTED_STATE_VERSION, PHASES } from "@/types/experiment";
import { ParticipantIdSchema, SessionSelectorSchema, type ExperimentConfig } from "@/types/records";
import { ConfigError, PrerequisiteNotCompletedError } from "@/engine/errors";
import { resolveDriver } from "@/engine/registry";
import { ruleGenerator } from "@/engine/services/rules";
import { deriveSeed } from "@/engine/utils/rng";
import { PhaseController } from "@/engine/kernel/phaseController";
import type { PermutationStore } from "./store";
import { hasCompleted, type ResultsLog } from "./resultsLog";

export interface OrchestratorDeps {
  config: ExperimentConfig;
  store: PermutationStore;
  results: ResultsLog;
  presentation: Presentation;
  /** only consulted when a participant's rule is created */
  loadBank: () => Promise<StimulusBank>;
  log?: LogFn;
  signal?: AbortSignal;
  resolve?: (phase: PhaseName) => PhaseDriver;
  now?: () => Date;
}

export interface RunOptions {
  skipPrerequisites?: boolean;
}

export interface SessionReport {
  participantId: string;
  selector: SessionSelector;
  created: boolean;
  phases: PhaseResult[];
  /** a phase ended aborted or with a presentation error, so later phases did not run */
  stoppedEarly: boolean;
}

export interface PhaseProgress {
  completed: boolean;
  runs: number;
  lastStatus: PhaseStatus | null;
}

export interface ParticipantDescription {
  participantId: string;
  state: PersistedState | null;
  phases: Record<PhaseName, PhaseProgress>;
}

const SESSIONS: Record<"session1" | "session2", PhaseName[]> = {
  session1: ["training", "structure_learning"],
  session2: ["applied_learning"],
};

/** Phases a selector stands for, always in experiment order. */
export function expandSelector(selector: SessionSelector): PhaseName[] {
  if (selector === "all") return PHASES.slice();
  if (selector === "session1" || selector === "session2") return SESSIONS[selector].slice();
  return [selector];
}

export function parseParticipantId(raw: string | number): string {
  const parsed = ParticipantIdSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(`Invalid participant id '${String(raw)}'`, parsed.error.issues.map(i => i.message));
  return parsed.data;
}

export function parseSelector(raw: string): SessionSelector {
  const parsed = SessionSelectorSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Unknown session selector '${raw}'`, [`expected one of: ${[...PHASES, "session1", "session2", "all"].join(", ")}`]);
  }
  return parsed.data;
}

export class SessionOrchestrator {
  private readonly log: LogFn;
  private readonly now: () => Date;
  private readonly resolve: (phase: PhaseName) => PhaseDriver;

  constructor(private readonly deps: OrchestratorDeps) {
    this.log = deps.log ?? (() => {});
    this.now = deps.now ?? (() => new Date());
    this.resolve = deps.resolve ?? (phase => resolveDriver({ phase }));
  }

  /** Seed every random stream for this participant derives from. */
  seedFor(participantId: string): string {
    return deriveSeed(this.deps.config.rule.seed ?? "participant", participantId);
  }

  async createState(participantId: string): Promise<PersistedState> {
    const { rule } = this.deps.config;
    const seed = this.seedFor(participantId);
    const generated = ruleGenerator.generate(rule.numObjects, seed, {
      mode: rule.mode,
      sequenceCount: rule.sequenceCount,
      constraints: rule.constraints,
      canonicalPermutation: rule.canonicalPermutation,
      bank: await this.deps.loadBank(),
      participantId,
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
      created_at: this.now().toISOString(),
    };
  }

  /** Load, or generate and persist exactly once. */
  async loadOrCreate(participantId: string): Promise<{ state: PersistedState; created: boolean }> {
    const { store } = this.deps;
    const existing = await store.load(participantId);
    if (existing) return { state: existing, created: false };
    const fresh = await this.createState(participantId);
    return store.loadOrCreate(participantId, () => fresh);
  }

  /** Every earlier phase must be completed on record, or be run earlier in this same invocation. */
  private async checkPrerequisites(participantId: string, planned: PhaseName[]) {
    for (const phase of planned) {
      const idx = PHASES.indexOf(phase);
      for (const earlier of PHASES.slice(0, idx)) {
        if (planned.indexOf(earlier) > -1 && planned.indexOf(earlier) < planned.indexOf(phase)) continue;
        if (await hasCompleted(this.deps.results, participantId, earlier)) continue;
        throw new PrerequisiteNotCompletedError(participantId, phase, earlier);
      }
    }
  }

  async run(rawParticipantId: string | number, rawSelector: string, opts: RunOptions = {}): Promise<SessionReport> {
    const { config } = this.deps;

    // 1) Resolve inputs
    const participantId = parseParticipantId(rawParticipantId);
    const selector = parseSelector(rawSelector);
    const planned = expandSelector(selector);

    // 2) Prerequisites, before anything is created
    const skip = opts.skipPrerequisites === true || config.allowSkipPrerequisites;
    if (skip) this.log("warn", "prerequisite check disabled", { participantId, selector });
    else await this.checkPrerequisites(participantId, planned);

    // 3) Load or create the rule
    const { state, created } = await this.loadOrCreate(participantId);
    this.log("info", created ? "created participant rule" : "loaded participant rule", {
      participantId, mode: state.mode, numObjects: state.num_objects,
    });
    if (state.num_objects !== config.rule.numObjects || state.sequence_count !== config.rule.sequenceCount) {
      this.log("warn", "persisted rule differs from configured geometry; using persisted values", {
        participantId, persisted: { numObjects: state.num_objects, sequenceCount: state.sequence_count },
        configured: { numObjects: config.rule.numObjects, sequenceCount: config.rule.sequenceCount },
      });
    }

    // 4) Phases in order
    const ctx: DriverContext = { state, config };
    const phases: PhaseResult[] = [];
    let stoppedEarly = false;
    for (const phase of planned) {
      const controller = new PhaseController(this.resolve(phase), ctx, {
        presentation: this.deps.presentation,
        results: this.deps.results,
        log: this.log,
        signal: this.deps.signal,
        now: this.now,
      });
      const result = await controller.run();
      phases.push(result);
      if (!COMPLETED_STATUSES.includes(result.status)) {
        stoppedEarly = planned.indexOf(phase) < planned.length - 1;
        break;
      }
    }

    return { participantId, selector, created, phases, stoppedEarly };
  }

  async describe(rawParticipantId: string | number): Promise<ParticipantDescription> {
    const participantId = parseParticipantId(rawParticipantId);
    const progress = async (phase: PhaseName): Promise<PhaseProgress> => {
      const rows = await this.deps.results.summaries(participantId, phase);
      const last = rows.length ? rows[rows.length - 1] : null;
      return {
        completed: rows.some(r => COMPLETED_STATUSES.includes(r.status)),
        runs: rows.length,
        lastStatus: last ? last.status : null,
      };
    };
    return {
      participantId,
      state: await this.deps.store.load(participantId),
      phases: {
        training: await progress("training"),
        structure_learning: await progress("structure_learning"),
        applied_learning: await progress("applied_learning"),
      },
    };
  }
}
