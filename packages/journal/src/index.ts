export { Journal, JournalIntegrityError } from "./journal.js";
export type { JournalOptions, JournalListener, EmitOptions } from "./journal.js";
