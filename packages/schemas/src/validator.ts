import AjvModule, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import { JournalEventSchema } from "./journal-event.schema.js";
import { ProbabilitySnapshotSchema } from "./probability-snapshot.schema.js";
import { PlayConfigInputSchema } from "./play-config.schema.js";
import type { JournalEvent, PlayConfigInput, ProbabilitySnapshot } from "./types.js";

// Both packages are CommonJS with a nested .default under ESM interop.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validateJournalEvent: ValidateFunction<JournalEvent> = ajv.compile<JournalEvent>(JournalEventSchema);
const validateSnapshot: ValidateFunction<ProbabilitySnapshot> = ajv.compile<ProbabilitySnapshot>(ProbabilitySnapshotSchema);
const validatePlayConfig: ValidateFunction<PlayConfigInput> = ajv.compile<PlayConfigInput>(PlayConfigInputSchema);

export type ValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: string[] };

function check<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) return { valid: true, value: data, errors: [] };
  const msgs = (validate.errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateJournalEventData(data: unknown): ValidationResult<JournalEvent> {
  return check(validateJournalEvent, data);
}

/** Also checks that the probability grid has the same shape as the board. */
export function validateProbabilitySnapshotData(data: unknown): ValidationResult<ProbabilitySnapshot> {
  const result = check(validateSnapshot, data);
  if (!result.valid) return result;
  const { state, probabilities } = result.value;
  const errors: string[] = [];
  const width = state[0]?.length ?? 0;
  state.forEach((row, y) => {
    if (row.length !== width) errors.push(`/state/${y}: expected ${width} columns, got ${row.length}`);
  });
  if (probabilities.length !== state.length) {
    errors.push(`/probabilities: expected ${state.length} rows, got ${probabilities.length}`);
  }
  probabilities.forEach((row, y) => {
    if (row.length !== width) errors.push(`/probabilities/${y}: expected ${width} columns, got ${row.length}`);
  });
  return errors.length > 0 ? { valid: false, errors } : result;
}

export function validatePlayConfigData(data: unknown): ValidationResult<PlayConfigInput> {
  return check(validatePlayConfig, data);
}
