/* engine/kernel/phaseController.ts */
import { randomUUID } from "crypto";
import type {
  ControllerState, DriverContext, LogFn, PhaseDriver, PhaseResult, PhaseStatus, Presentation,
  ResponseOrTimeout, RestAndQueries, Trial, TrialOutcome
} from "@/types/experiment";
import { PresentationError } from "@/engine/errors";
import type { ResultsLog } from "@/engine/session/resultsLog";
import { evaluateCriterion } from "./criterion_policy";

export interface PhaseControllerOptions {
  presentation: Presentation;
  results: ResultsLog;
  log?: LogFn;
  signal?: AbortSignal;
  now?: () => Date;
  runId?: string;
}

const normalizeKey = (k: string) => k.trim().toLowerCase();

/** Turn one presentation result into an outcome. Exposure trials are never scored. */
export function scoreTrial(trial: Trial, response: ResponseOrTimeout, trialIndex: number, timestamp: string): TrialOutcome {
  const key = response.kind === "response" ? normalizeKey(response.key) : null;
  return {
    trialIndex,
    block: trial.block,
    kind: trial.kind,
    expected: trial.expected,
    response: key,
    correct: trial.expected === null ? null : key === trial.expected,
    reactionTimeMs: response.kind === "response" ? response.reactionTimeMs : null,
    timestamp,
  };
}

export function summarize(outcomes: TrialOutcome[]): { accuracy: number | null; meanReactionTimeMs: number | null } {
  const scored = outcomes.filter(o => o.correct !== null);
  const timed = scored.filter(o => o.reactionTimeMs !== null);
  let rtSum = 0;
  for (const o of timed) rtSum += o.reactionTimeMs ?? 0;
  return {
    accuracy: scored.length ? scored.filter(o => o.correct === true).length / scored.length : null,
    meanReactionTimeMs: timed.length ? rtSum / timed.length : null,
  };
}

/**
 * One run of one phase:
 * INSTRUCTIONS → RUNNING_TRIALS ⇄ CRITERION_CHECK → [REST → QUERY_TRIALS] → COMPLETE.
 * Abort is honoured before every state and every trial; COMPLETE is terminal.
 */
export class PhaseController<TState = unknown> {
  private _state: ControllerState = "INSTRUCTIONS";
  private readonly outcomes: TrialOutcome[] = [];
  private blocksRun = 0;
  private readonly log: LogFn;
  private readonly now: () => Date;
  readonly runId: string;

  constructor(
    private readonly driver: PhaseDriver<TState>,
    private readonly ctx: DriverContext,
    private readonly opts: PhaseControllerOptions
  ) {
    this.log = opts.log ?? (() => {});
    this.now = opts.now ?? (() => new Date());
    this.runId = opts.runId ?? randomUUID();
  }

  get state(): ControllerState {
    return this._state;
  }

  private get participantId() {
    return this.ctx.state.participant_id;
  }

  private transition(to: ControllerState, extra: Record<string, unknown> = {}) {
    this.log("debug", "phase transition", {
      participantId: this.participantId, phase: this.driver.phase, runId: this.runId, from: this._state, to, ...extra,
    });
    this._state = to;
  }

  private abortRequested(): boolean {
    return this.opts.signal?.aborted === true || this.opts.presentation.abortRequested();
  }

  /** Presents trials in order; false when an abort cut the list short. */
  private async runTrials(trials: Trial[]): Promise<boolean> {
    for (const trial of trials) {
      if (this.abortRequested()) return false;
      const response = await this.opts.presentation.presentStimulusSequence(trial);
      // a trial interrupted by the abort is not recorded
      if (this.abortRequested()) return false;
      const outcome = scoreTrial(trial, response, this.outcomes.length, this.now().toISOString());
      this.outcomes.push(outcome);
      await this.opts.results.appendTrial(this.participantId, this.driver.phase, this.runId, outcome);
      const feedback = this.driver.feedback ? this.driver.feedback(this.ctx, trial, outcome) : null;
      if (feedback) await this.opts.presentation.showFeedback(feedback);
    }
    return true;
  }

  async run(): Promise<PhaseResult> {
    const { driver, ctx } = this;
    const startedAt = this.now().toISOString();
    const policy = driver.criterion(ctx);
    const maxBlocks = driver.maxBlocks(ctx);
    const tail: RestAndQueries | null = driver.restAndQueries ? driver.restAndQueries(ctx) : null;
    const afterBlocks: ControllerState = tail ? "REST" : "COMPLETE";

    let driverState = driver.initState(ctx);
    let criterionMet: boolean | null = null;
    let status: PhaseStatus | null = null;
    let error: string | null = null;

    this.log("info", "phase started", { participantId: this.participantId, phase: driver.phase, runId: this.runId, driverId: driver.id });

    try {
      while (this._state !== "COMPLETE") {
        if (this.abortRequested()) {
          status = "user_aborted";
          this.transition("COMPLETE", { reason: "abort" });
          break;
        }

        switch (this._state) {
          case "INSTRUCTIONS":
            await this.opts.presentation.showInstructions(driver.instructions(ctx));
            this.transition("RUNNING_TRIALS");
            break;

          case "RUNNING_TRIALS": {
            const block = driver.nextBlock(ctx, driverState, this.blocksRun);
            const start = this.outcomes.length;
            if (!(await this.runTrials(block.trials))) break;
            this.blocksRun += 1;
            driverState = driver.afterBlock(ctx, driverState, block, this.outcomes.slice(start));
            this.transition("CRITERION_CHECK", { block: block.block, focusSlot: block.focusSlot });
            break;
          }

          case "CRITERION_CHECK": {
            if (policy) {
              const levels = driver.learningLevels ? driver.learningLevels(driverState) : null;
              const ev = evaluateCriterion(policy, { outcomes: this.outcomes, blocksRun: this.blocksRun, levels });
              this.log("debug", "criterion evaluated", { phase: driver.phase, policy: policy.kind, met: ev.met, ...ev.detail });
              if (ev.met) {
                criterionMet = true;
                this.transition(afterBlocks, { criterion: "met" });
                break;
              }
            }
            if (this.blocksRun < maxBlocks) {
              this.transition("RUNNING_TRIALS");
              break;
            }
            if (policy) criterionMet = false;
            this.transition(afterBlocks, { blocksRun: this.blocksRun });
            break;
          }

          case "REST":
            await this.opts.presentation.presentRestInterval(tail ? tail.rest.durationMs : 0);
            this.transition("QUERY_TRIALS");
            break;

          case "QUERY_TRIALS":
            if (!(await this.runTrials(tail ? tail.queries : []))) break;
            this.transition("COMPLETE");
            break;
        }
      }
    } catch (e: unknown) {
      if (!(e instanceof PresentationError)) throw e;
      status = "presentation_error";
      error = e.message;
      this.log("error", "presentation failed", { participantId: this.participantId, phase: driver.phase, error: e.message });
      this.transition("COMPLETE", { reason: "presentation_error" });
    }

    if (status === null) status = criterionMet === null ? "completed" : criterionMet ? "criterion_met" : "criterion_not_met";

    const result: PhaseResult = {
      participantId: this.participantId,
      phase: driver.phase,
      runId: this.runId,
      status,
      criterionMet,
      userAborted: status === "user_aborted",
      blocksRun: this.blocksRun,
      outcomes: this.outcomes.slice(),
      ...summarize(this.outcomes),
      startedAt,
      finishedAt: this.now().toISOString(),
      error,
    };
    await this.opts.results.appendSummary(result);
    this.log("info", "phase finished", {
      participantId: result.participantId, phase: result.phase, status: result.status,
      blocksRun: result.blocksRun, trials: result.outcomes.length, accuracy: result.accuracy,
    });
    return result;
  }
}
