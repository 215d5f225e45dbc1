/* engine/kernel/validation.ts */
import Ajv, { type ValidateFunction } from "ajv";
import type { PersistedState, StimulusBank } from "@/types/experiment";
import { PERSISTED_STATE_VERSION } from "@/types/experiment";
import { ConfigError, CorruptStateError } from "@/engine/errors";
import { validatePermutation } from "@/engine/services/rules";
import persistedStateSchema from "@/data/schemas/persisted_state.schema.json";
import stimulusBankSchema from "@/data/schemas/stimulus_bank.schema.json";

// Single Ajv instance; validators compiled once on first use
const ajv = new Ajv({ allErrors: true, strict: false });
let persistedStateValidator: ValidateFunction<PersistedState> | null = null;
let stimulusBankValidator: ValidateFunction<StimulusBank> | null = null;

function persistedStateValidate(): ValidateFunction<PersistedState> {
  if (!persistedStateValidator) persistedStateValidator = ajv.compile<PersistedState>(persistedStateSchema);
  return persistedStateValidator;
}

function stimulusBankValidate(): ValidateFunction<StimulusBank> {
  if (!stimulusBankValidator) stimulusBankValidator = ajv.compile<StimulusBank>(stimulusBankSchema);
  return stimulusBankValidator;
}

/**
 * Shape check (JSON Schema) followed by the rule invariants the schema cannot express:
 * the permutation is a bijection of the declared size and every slot has a stimulus.
 */
export function validatePersistedStateOrThrow(raw: unknown, participantId: string): PersistedState {
  const validate = persistedStateValidate();
  if (!validate(raw)) {
    throw new CorruptStateError(participantId, ajv.errorsText(validate.errors));
  }
  const state = raw;
  if (state.participant_id !== participantId) {
    throw new CorruptStateError(participantId, `record belongs to participant '${state.participant_id}'`);
  }
  if (state.version > PERSISTED_STATE_VERSION) {
    throw new CorruptStateError(participantId, `record version ${state.version} is newer than supported ${PERSISTED_STATE_VERSION}`);
  }
  const bijection = validatePermutation(state.permutation, state.num_objects, { noFixedPoints: false, interleaveSequences: false }, state.sequence_count);
  if (bijection.length) {
    throw new CorruptStateError(participantId, `permutation invalid: ${bijection.join("; ")}`);
  }
  for (const [phase, assignment] of Object.entries(state.object_assignment)) {
    const stimuli = Array.from({ length: state.num_objects }, (_, slot) => assignment[String(slot)]);
    if (stimuli.some(s => s === undefined) || Object.keys(assignment).length !== state.num_objects) {
      throw new CorruptStateError(participantId, `object assignment for '${phase}' does not cover slots 0..${state.num_objects - 1}`);
    }
    if (new Set(stimuli).size !== stimuli.length) {
      throw new CorruptStateError(participantId, `object assignment for '${phase}' maps two slots to one stimulus`);
    }
  }
  return state;
}

export function validateStimulusBankOrThrow(raw: unknown, source: string): StimulusBank {
  const validate = stimulusBankValidate();
  if (!validate(raw)) {
    throw new ConfigError(`Stimulus bank '${source}' failed validation`, [ajv.errorsText(validate.errors)]);
  }
  return raw;
}
