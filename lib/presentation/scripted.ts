// lib/presentation/scripted.ts
import type { Presentation, ResponseOrTimeout, Trial } from "@/types/experiment";
import { PresentationError } from "@/engine/errors";

export type Responder = (trial: Trial, n: number) => ResponseOrTimeout;

export type PresentationEvent =
  | { type: "instructions"; lines: string[] }
  | { type: "trial"; trial: Trial; response: ResponseOrTimeout }
  | { type: "feedback"; lines: string[] }
  | { type: "rest"; durationMs: number };

/** Presses the expected key after `reactionTimeMs`; exposure trials just run out. */
export function answerCorrectly(reactionTimeMs = 500): Responder {
  return trial => trial.expected === null
    ? { kind: "timeout" }
    : { kind: "response", key: trial.expected, reactionTimeMs };
}

/** A key that is always wrong for the trial. */
export function wrongKey(trial: Trial): string {
  switch (trial.kind) {
    case "order":
      return trial.expected === "left" ? "right" : "left";
    case "membership":
      return trial.expected === "1" ? "2" : "1";
    case "query":
      return "0-0";
    case "exposure":
      return "space";
  }
}

export function answerWrongly(reactionTimeMs = 500): Responder {
  return trial => trial.expected === null
    ? { kind: "timeout" }
    : { kind: "response", key: wrongKey(trial), reactionTimeMs };
}

export interface ScriptedPresentationOptions {
  respond?: Responder;
  /** the user asks to quit while this trial (0-based, counted across the run) is showing */
  abortOnTrial?: number;
  /** the display fails while this trial is showing */
  failOnTrial?: number;
}

/** In-process stand-in for a display and keyboard: answers from a script and records what it was asked to show. */
export class ScriptedPresentation implements Presentation {
  readonly events: PresentationEvent[] = [];
  private presented = 0;
  private aborted = false;
  private readonly respond: Responder;

  constructor(private readonly opts: ScriptedPresentationOptions = {}) {
    this.respond = opts.respond ?? answerCorrectly();
  }

  get trialsPresented(): number {
    return this.presented;
  }

  async showInstructions(lines: string[]) {
    this.events.push({ type: "instructions", lines: lines.slice() });
  }

  async presentStimulusSequence(trial: Trial): Promise<ResponseOrTimeout> {
    const n = this.presented++;
    if (this.opts.failOnTrial === n) throw new PresentationError(`display failed on trial ${n}`, { phase: trial.phase });
    if (this.opts.abortOnTrial === n) this.aborted = true;
    const response = this.aborted ? { kind: "timeout" as const } : this.respond(trial, n);
    this.events.push({ type: "trial", trial, response });
    return response;
  }

  async showFeedback(lines: string[]) {
    this.events.push({ type: "feedback", lines: lines.slice() });
  }

  async presentRestInterval(durationMs: number) {
    this.events.push({ type: "rest", durationMs });
  }

  abortRequested() {
    return this.aborted;
  }
}
