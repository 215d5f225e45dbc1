import { z } from 'zod';
import { PHASES } from '@/types/experiment';

// --- Identifiers ---

export const ParticipantIdSchema = z
  .union([z.string().trim(), z.number().int().nonnegative()])
  .transform((v) => String(v))
  .pipe(z.string().regex(/^[A-Za-z0-9_-]{1,64}$/, 'participant id may only contain letters, digits, "_" or "-"'));

export const PhaseNameSchema = z.enum(PHASES);

const SELECTORS = [...PHASES, 'session1', 'session2', 'all'] as const;

// "applied-learning" and "Applied_Learning" both resolve to applied_learning
export const SessionSelectorSchema = z
  .string()
  .transform((s) => s.trim().toLowerCase().replace(/-/g, '_'))
  .pipe(z.enum(SELECTORS));

// --- Configuration ---

export const CriterionPolicySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('trailing_accuracy'),
    window: z.number().int().positive(),
    threshold: z.number().min(0).max(1),
  }),
  z.object({ kind: z.literal('mastery'), level: z.number().int().positive() }),
  z.object({ kind: z.literal('fixed_blocks'), blocks: z.number().int().positive() }),
]);

const nullableMs = z.number().int().positive().nullable();

export const TrainingConfigSchema = z.object({
  maxBlocks: z.number().int().positive(),
  criterion: CriterionPolicySchema,
  objectMs: z.number().int().nonnegative(),
  isiMs: z.number().int().nonnegative(),
  choiceTimeoutMs: nullableMs,
});

export const QuizConfigSchema = z.object({
  runs: z.number().int().positive(),
  exposureRepeats: z.number().int().positive(),
  probesPerRun: z.number().int().nonnegative(),
  foilSameSequenceProbability: z.number().min(0).max(1),
  objectMs: z.number().int().nonnegative(),
  isiMs: z.number().int().nonnegative(),
  probeAloneMs: z.number().int().nonnegative(),
  choiceTimeoutMs: nullableMs,
});

export const AppliedConfigSchema = QuizConfigSchema.extend({
  restMs: z.number().int().nonnegative(),
  queryTimeoutMs: nullableMs,
});

export const ExperimentConfigSchema = z.object({
  dataDir: z.string().min(1),
  stimuliFile: z.string().min(1),
  store: z.object({ backend: z.enum(['file', 'memory']) }),
  rule: z.object({
    mode: z.enum(['per_participant', 'canonical']),
    numObjects: z.number().int().min(2),
    sequenceCount: z.number().int().min(1),
    constraints: z.object({
      noFixedPoints: z.boolean(),
      interleaveSequences: z.boolean(),
    }),
    canonicalPermutation: z.array(z.number().int().nonnegative()).nullable(),
    seed: z.string().min(1).nullable(),
  }),
  phases: z.object({
    training: TrainingConfigSchema,
    structure_learning: QuizConfigSchema,
    applied_learning: AppliedConfigSchema,
  }),
  allowSkipPrerequisites: z.boolean(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

export type ExperimentConfig = z.infer<typeof ExperimentConfigSchema>;
export type TrainingConfig = z.infer<typeof TrainingConfigSchema>;
export type QuizConfig = z.infer<typeof QuizConfigSchema>;
export type AppliedConfig = z.infer<typeof AppliedConfigSchema>;

// --- Results log lines ---

const TrialKindSchema = z.enum(['exposure', 'membership', 'order', 'query']);
const PhaseStatusSchema = z.enum(['criterion_met', 'criterion_not_met', 'completed', 'user_aborted', 'presentation_error']);

export const TrialLineSchema = z.object({
  type: z.literal('trial'),
  participant_id: z.string(),
  phase: PhaseNameSchema,
  run_id: z.string(),
  trial_index: z.number().int().nonnegative(),
  block: z.number().int().nonnegative(),
  kind: TrialKindSchema,
  expected: z.string().nullable(),
  response: z.string().nullable(),
  correct: z.boolean().nullable(),
  reaction_time: z.number().nullable(),
  timestamp: z.string(),
});

export const PhaseSummaryLineSchema = z.object({
  type: z.literal('phase_summary'),
  participant_id: z.string(),
  phase: PhaseNameSchema,
  run_id: z.string(),
  status: PhaseStatusSchema,
  criterion_met: z.boolean().nullable(),
  user_aborted: z.boolean(),
  blocks_run: z.number().int().nonnegative(),
  trials: z.number().int().nonnegative(),
  accuracy: z.number().nullable(),
  mean_reaction_time: z.number().nullable(),
  started_at: z.string(),
  finished_at: z.string(),
  error: z.string().nullable(),
});

export const ResultsLineSchema = z.discriminatedUnion('type', [TrialLineSchema, PhaseSummaryLineSchema]);

export type TrialLine = z.infer<typeof TrialLineSchema>;
export type PhaseSummaryLine = z.infer<typeof PhaseSummaryLineSchema>;
export type ResultsLine = z.infer<typeof ResultsLineSchema>;

// --- CLI ---

export const RunArgsSchema = z.object({
  selector: SessionSelectorSchema,
  participantId: ParticipantIdSchema,
  configFile: z.string().min(1).optional(),
  dataDir: z.string().min(1).optional(),
  skipPrerequisites: z.boolean().default(false),
  dryRun: z.boolean().default(false),
});

export type RunArgs = z.infer<typeof RunArgsSchema>;
