/**
 * @fileoverview SQLite assistant store.
 *
 * One local database file with four tables: the append-only `messages` log
 * written for every inbound text, and the `tasks`, `habits` and `notes`
 * tables that classified texts are routed into.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { StoreUnavailableError } from '../../utils/errors.js';
import type {
  MessageLog,
  MessageLogEntry,
  MessageLogRow,
  NewHabit,
  NewNote,
  NewTask,
  RecordStore,
  StoreTable,
} from './types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    phone_number TEXT NOT NULL,
    carrier TEXT NOT NULL,
    raw_message TEXT NOT NULL,
    parsed_intent TEXT,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    response TEXT
  );

  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    description TEXT NOT NULL,
    status TEXT DEFAULT 'pending',
    due_date TIMESTAMP,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS habits (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    habit_name TEXT NOT NULL,
    frequency TEXT,
    last_logged TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    streak INTEGER DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS notes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    note TEXT NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );
`;

const TABLES: readonly StoreTable[] = ['messages', 'tasks', 'habits', 'notes'];

function openDatabase(dbPath: string): Database.Database {
  try {
    // Ensure directory exists
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const db = new Database(dbPath);
    db.exec(SCHEMA);
    return db;
  } catch (err) {
    throw new StoreUnavailableError(`Cannot open message store at ${dbPath}`, err);
  }
}

type MessageRow = {
  id: number;
  phone_number: string;
  carrier: string;
  raw_message: string;
  parsed_intent: string | null;
  created_at: string;
  response: string | null;
};

/**
 * SQLite implementation of the message log and record store.
 */
export class SqliteAssistantStore implements MessageLog, RecordStore {
  private readonly db: Database.Database;

  /**
   * @throws StoreUnavailableError when the file cannot be opened or the schema created
   */
  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
  }

  async append(entry: MessageLogEntry): Promise<number> {
    return this.insert(
      'messages',
      `INSERT INTO messages (phone_number, carrier, raw_message, parsed_intent, response)
       VALUES (?, ?, ?, ?, ?)`,
      entry.phoneNumber,
      entry.carrierId,
      entry.rawMessage,
      entry.parsedIntent,
      entry.response
    );
  }

  async addTask(task: NewTask): Promise<number> {
    return this.insert(
      'tasks',
      'INSERT INTO tasks (description, due_date) VALUES (?, ?)',
      task.description,
      task.dueDate ?? null
    );
  }

  async addHabit(habit: NewHabit): Promise<number> {
    return this.insert(
      'habits',
      'INSERT INTO habits (habit_name, frequency) VALUES (?, ?)',
      habit.name,
      habit.frequency ?? null
    );
  }

  async addNote(note: NewNote): Promise<number> {
    return this.insert('notes', 'INSERT INTO notes (note) VALUES (?)', note.note);
  }

  /** Most recent rows last. Used by tooling and tests; the relay itself only appends. */
  async listMessages(limit = 50): Promise<MessageLogRow[]> {
    const rows = this.db
      .prepare<[number], MessageRow>(
        `SELECT id, phone_number, carrier, raw_message, parsed_intent, created_at, response
         FROM messages
         ORDER BY id DESC
         LIMIT ?`
      )
      .all(limit);

    return rows.reverse().map((row) => ({
      id: row.id,
      phoneNumber: row.phone_number,
      carrierId: row.carrier,
      rawMessage: row.raw_message,
      parsedIntent: row.parsed_intent,
      createdAt: row.created_at,
      response: row.response,
    }));
  }

  countRows(table: StoreTable): number {
    if (!TABLES.includes(table)) {
      throw new Error(`Unknown table: ${table}`);
    }
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
    return row?.count ?? 0;
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }

  private insert(table: StoreTable, sql: string, ...params: Array<string | null>): number {
    try {
      const result = this.db.prepare(sql).run(...params);
      return Number(result.lastInsertRowid);
    } catch (err) {
      throw new StoreUnavailableError(`Failed to write to ${table}`, err);
    }
  }
}

/** Open the store, creating the file and schema when missing. */
export function openAssistantStore(dbPath: string): SqliteAssistantStore {
  return new SqliteAssistantStore(dbPath);
}
