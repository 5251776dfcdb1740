export * from "./types.js";
export { JournalEventSchema } from "./journal-event.schema.js";
export { ProbabilitySnapshotSchema } from "./probability-snapshot.schema.js";
export { PlayConfigInputSchema } from "./play-config.schema.js";
export {
  validateJournalEventData,
  validateProbabilitySnapshotData,
  validatePlayConfigData,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { TimeoutError, withTimeout } from "./timeout.js";
