// lib/presentation/terminal.ts
import * as readline from "readline/promises";
import { setTimeout as sleep } from "timers/promises";
import { performance } from "perf_hooks";
import type { Presentation, ResponseOrTimeout, Trial } from "@/types/experiment";
import { PresentationError } from "@/engine/errors";
import { ordinal } from "@/engine/services/rules";

const SIDE_KEYS: Record<string, "left" | "right"> = { l: "left", left: "left", r: "right", right: "right" };

function prompt(trial: Trial): string {
  switch (trial.kind) {
    case "membership":
      return `Which true sequence does ${trial.target.stimulus.toUpperCase()} belong to? `;
    case "order": {
      const options = `[l] ${trial.left.stimulus}   [r] ${trial.right.stimulus}`;
      if (!trial.probe) return `Which comes later in the ${ordinal(trial.sequence + 1)} true sequence?  ${options}  `;
      return `Which comes ${trial.question} than ${trial.probe.stimulus.toUpperCase()} in its true sequence?  ${options}  `;
    }
    case "query":
      return `Sequence and position of ${trial.target.stimulus.toUpperCase()} (e.g. 1-3)? `;
    case "exposure":
      return "";
  }
}

function isAbortError(e: unknown): boolean {
  return e instanceof Error && e.name === "AbortError";
}

/** Line-based presentation on a TTY: stimuli are printed one at a time, answers typed and confirmed with Enter. */
export class TerminalPresentation implements Presentation {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private aborted = false;
  private pending: AbortController | null = null;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.output = output;
    this.rl = readline.createInterface({ input, output, terminal: true });
    this.rl.on("SIGINT", () => {
      this.aborted = true;
      this.pending?.abort();
    });
  }

  private write(line: string) {
    this.output.write(line + "\n");
  }

  /** Sleeps; Ctrl-C cuts the wait short. */
  private async wait(ms: number) {
    if (this.aborted) return;
    const ac = new AbortController();
    this.pending = ac;
    try {
      await sleep(ms, undefined, { signal: ac.signal });
    } catch (e: unknown) {
      if (!isAbortError(e)) throw e;
    } finally {
      this.pending = null;
    }
  }

  /** Drops keys typed while no question was open (rest, exposures). */
  private discardTypeahead() {
    this.rl.write(null, { ctrl: true, name: "e" });
    this.rl.write(null, { ctrl: true, name: "u" });
  }

  private async ask(question: string, timeLimitMs: number | null): Promise<ResponseOrTimeout> {
    this.discardTypeahead();
    const ac = new AbortController();
    this.pending = ac;
    const timer = timeLimitMs === null ? null : setTimeout(() => ac.abort(), timeLimitMs);
    const t0 = performance.now();
    try {
      const answer = await this.rl.question(question, { signal: ac.signal });
      return { kind: "response", key: answer.trim().toLowerCase(), reactionTimeMs: Math.round(performance.now() - t0) };
    } catch (e: unknown) {
      if (isAbortError(e)) {
        this.write("");
        return { kind: "timeout" };
      }
      throw new PresentationError(`terminal input failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    } finally {
      if (timer) clearTimeout(timer);
      this.pending = null;
    }
  }

  async showInstructions(lines: string[]) {
    this.write("");
    for (const line of lines) this.write(line);
    const r = await this.ask("Press Enter to begin. ", null);
    if (r.kind === "timeout" && !this.aborted) throw new PresentationError("instructions were not acknowledged");
  }

  async presentStimulusSequence(trial: Trial): Promise<ResponseOrTimeout> {
    if (trial.kind === "exposure") {
      this.write(`-- ${trial.order} order${trial.sequence === null ? "" : `, sequence ${trial.sequence + 1}`} --`);
      for (const ref of trial.stimuli) {
        if (this.aborted) break;
        this.write(`   ${ref.stimulus}`);
        await this.wait(trial.objectMs + trial.isiMs);
      }
      return { kind: "timeout" };
    }
    if (trial.kind === "order" && trial.probe && trial.probeAloneMs > 0) {
      this.write(`   ${trial.probe.stimulus.toUpperCase()}`);
      await this.wait(trial.probeAloneMs);
    }
    const r = await this.ask(prompt(trial), trial.timeLimitMs);
    if (r.kind === "response" && trial.kind === "order") {
      const side = SIDE_KEYS[r.key];
      return { ...r, key: side ?? r.key };
    }
    return r;
  }

  async showFeedback(lines: string[]) {
    for (const line of lines) this.write(`   ${line}`);
  }

  async presentRestInterval(durationMs: number) {
    this.write(`Rest for ${Math.round(durationMs / 1000)} seconds.`);
    await this.wait(durationMs);
    if (!this.aborted) this.write("Rest is over.");
  }

  abortRequested() {
    return this.aborted;
  }

  close() {
    this.rl.close();
  }
}
