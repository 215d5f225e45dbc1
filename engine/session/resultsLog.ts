// engine/session/resultsLog.ts
import fs from "fs/promises";
import path from "path";
import type { LogFn, PhaseName, PhaseResult, TrialOutcome } from "@/types/experiment";
import { COMPLETED_STATUSES } from "@/types/experiment";
import { ResultsLineSchema, type PhaseSummaryLine, type ResultsLine, type TrialLine } from "@/types/records";

/** Append-only record of what happened in each phase run. */
export interface ResultsLog {
  appendTrial(participantId: string, phase: PhaseName, runId: string, outcome: TrialOutcome): Promise<void>;
  appendSummary(result: PhaseResult): Promise<void>;
  summaries(participantId: string, phase: PhaseName): Promise<PhaseSummaryLine[]>;
}

export function toTrialLine(participantId: string, phase: PhaseName, runId: string, o: TrialOutcome): TrialLine {
  return {
    type: "trial",
    participant_id: participantId,
    phase,
    run_id: runId,
    trial_index: o.trialIndex,
    block: o.block,
    kind: o.kind,
    expected: o.expected,
    response: o.response,
    correct: o.correct,
    reaction_time: o.reactionTimeMs,
    timestamp: o.timestamp,
  };
}

export function toSummaryLine(r: PhaseResult): PhaseSummaryLine {
  return {
    type: "phase_summary",
    participant_id: r.participantId,
    phase: r.phase,
    run_id: r.runId,
    status: r.status,
    criterion_met: r.criterionMet,
    user_aborted: r.userAborted,
    blocks_run: r.blocksRun,
    trials: r.outcomes.length,
    accuracy: r.accuracy,
    mean_reaction_time: r.meanReactionTimeMs,
    started_at: r.startedAt,
    finished_at: r.finishedAt,
    error: r.error,
  };
}

/** A phase counts as done once any run of it reached a non-aborted terminal status. */
export async function hasCompleted(log: ResultsLog, participantId: string, phase: PhaseName): Promise<boolean> {
  const rows = await log.summaries(participantId, phase);
  return rows.some(r => COMPLETED_STATUSES.includes(r.status));
}

// -------- In-memory backend --------
export class MemoryResultsLog implements ResultsLog {
  readonly lines: ResultsLine[] = [];

  async appendTrial(participantId: string, phase: PhaseName, runId: string, outcome: TrialOutcome) {
    this.lines.push(toTrialLine(participantId, phase, runId, outcome));
  }
  async appendSummary(result: PhaseResult) {
    this.lines.push(toSummaryLine(result));
  }
  async summaries(participantId: string, phase: PhaseName) {
    return this.lines.filter((l): l is PhaseSummaryLine => l.type === "phase_summary" && l.participant_id === participantId && l.phase === phase);
  }
}

// -------- JSON Lines backend: <dataDir>/results/participant_<id>/<phase>.jsonl --------
export class JsonlResultsLog implements ResultsLog {
  readonly dir: string;
  private log: LogFn;

  constructor(dataDir: string, log: LogFn) {
    this.dir = path.join(dataDir, "results");
    this.log = log;
  }

  fileFor(participantId: string, phase: PhaseName): string {
    return path.join(this.dir, `participant_${participantId}`, `${phase}.jsonl`);
  }

  private async append(participantId: string, phase: PhaseName, line: ResultsLine) {
    const file = this.fileFor(participantId, phase);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.appendFile(file, JSON.stringify(line) + "\n", "utf8");
  }

  async appendTrial(participantId: string, phase: PhaseName, runId: string, outcome: TrialOutcome) {
    await this.append(participantId, phase, toTrialLine(participantId, phase, runId, outcome));
  }

  async appendSummary(result: PhaseResult) {
    await this.append(result.participantId, result.phase, toSummaryLine(result));
  }

  async readLines(participantId: string, phase: PhaseName): Promise<ResultsLine[]> {
    const file = this.fileFor(participantId, phase);
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (e: unknown) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
      throw e;
    }
    const out: ResultsLine[] = [];
    text.split("\n").forEach((raw, i) => {
      if (!raw.trim()) return;
      let json: unknown;
      try { json = JSON.parse(raw); } catch { json = undefined; }
      const parsed = ResultsLineSchema.safeParse(json);
      if (parsed.success) out.push(parsed.data);
      else this.log("warn", "Skipping malformed results line", { file, line: i + 1 });
    });
    return out;
  }

  async summaries(participantId: string, phase: PhaseName) {
    const lines = await this.readLines(participantId, phase);
    return lines.filter((l): l is PhaseSummaryLine => l.type === "phase_summary");
  }
}
