/**
 * Type definitions for the assistant store.
 */

export interface MessageLogEntry {
  phoneNumber: string;
  carrierId: string;
  rawMessage: string;
  /** Classifier JSON, the classifier error payload, or null when no classification ran. */
  parsedIntent: string | null;
  response: string | null;
}

export interface MessageLogRow {
  id: number;
  phoneNumber: string;
  carrierId: string;
  rawMessage: string;
  parsedIntent: string | null;
  createdAt: string;
  response: string | null;
}

/** Append-only log of every inbound text. */
export interface MessageLog {
  /**
   * Insert one row and return its id. Ids increase with every call.
   * @throws StoreUnavailableError when the write fails
   */
  append(entry: MessageLogEntry): Promise<number>;
}

export interface NewTask {
  description: string;
  dueDate?: string | null;
}

export interface NewHabit {
  name: string;
  frequency?: string | null;
}

export interface NewNote {
  note: string;
}

/** Structured records derived from classified texts. */
export interface RecordStore {
  addTask(task: NewTask): Promise<number>;
  addHabit(habit: NewHabit): Promise<number>;
  addNote(note: NewNote): Promise<number>;
}

export type StoreTable = 'messages' | 'tasks' | 'habits' | 'notes';
