/**
 * @fileoverview Assistant store - message log and structured records.
 */

export { SqliteAssistantStore, openAssistantStore } from './sqlite.js';
export type {
  MessageLog,
  MessageLogEntry,
  MessageLogRow,
  NewHabit,
  NewNote,
  NewTask,
  RecordStore,
  StoreTable,
} from './types.js';
