export { FileJournal } from "./file-journal.js";
export type { CorruptLine, FileJournalConfig, InvalidLine, RestoreResult } from "./file-journal.js";
export type { Journal } from "./journal.js";
export { MemoryJournal } from "./memory-journal.js";
export type { MemoryJournalConfig } from "./memory-journal.js";
