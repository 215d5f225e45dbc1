// engine/errors.ts
import type { PhaseName } from "@/types/experiment";

export type ErrorCode =
  | "ALREADY_EXISTS"
  | "CORRUPT_STATE"
  | "INSUFFICIENT_STIMULI"
  | "RULE_CONSTRAINT"
  | "PREREQUISITE_NOT_COMPLETED"
  | "PRESENTATION_ERROR"
  | "CONFIG_INVALID";

export interface ErrorContext {
  participantId?: string;
  phase?: PhaseName;
  cause?: unknown;
}

/** Base for every domain failure; carries the participant/phase it happened in. */
export class ExperimentError extends Error {
  readonly code: ErrorCode;
  readonly participantId: string | null;
  readonly phase: PhaseName | null;
  readonly exitCode: number;

  constructor(code: ErrorCode, message: string, exitCode: number, ctx: ErrorContext = {}) {
    super(message, ctx.cause === undefined ? undefined : { cause: ctx.cause });
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    this.participantId = ctx.participantId ?? null;
    this.phase = ctx.phase ?? null;
  }

  /** Context block for log lines */
  context(): Record<string, unknown> {
    return { code: this.code, participant_id: this.participantId, phase: this.phase };
  }
}

export class AlreadyExistsError extends ExperimentError {
  constructor(participantId: string, detail: string) {
    super("ALREADY_EXISTS", `Participant '${participantId}' already has a different persisted rule (${detail}); refusing to overwrite`, 4, { participantId });
  }
}

export class CorruptStateError extends ExperimentError {
  constructor(participantId: string, detail: string, cause?: unknown) {
    super("CORRUPT_STATE", `Persisted state for participant '${participantId}' is unreadable: ${detail}`, 4, { participantId, cause });
  }
}

export class InsufficientStimuliError extends ExperimentError {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number, ctx: ErrorContext = {}) {
    const where = ctx.phase ? ` for phase '${ctx.phase}'` : "";
    super("INSUFFICIENT_STIMULI", `Stimulus pool${where} has ${available} usable stimuli, ${required} required`, 3, ctx);
    this.required = required;
    this.available = available;
  }
}

export class RuleConstraintError extends ExperimentError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super("RULE_CONSTRAINT", message, 1, ctx);
  }
}

export class PrerequisiteNotCompletedError extends ExperimentError {
  readonly missing: PhaseName;

  constructor(participantId: string, phase: PhaseName, missing: PhaseName) {
    super("PREREQUISITE_NOT_COMPLETED", `Cannot run '${phase}' for participant '${participantId}': '${missing}' has no completion record`, 2, { participantId, phase });
    this.missing = missing;
  }
}

export class PresentationError extends ExperimentError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super("PRESENTATION_ERROR", message, 5, ctx);
  }
}

export class ConfigError extends ExperimentError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIG_INVALID", issues.length ? `${message}: ${issues.join("; ")}` : message, 1);
    this.issues = issues;
  }
}

export function isExperimentError(e: unknown): e is ExperimentError {
  return e instanceof ExperimentError;
}
