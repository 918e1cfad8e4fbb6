/**
 * Unit tests for SqliteAssistantStore.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { SqliteAssistantStore, openAssistantStore } from '../../../../src/services/store/index.js';
import { StoreUnavailableError } from '../../../../src/utils/errors.js';

const TEST_DB_PATH = './data/test-assistant.db';

function removeTestDb(): void {
  if (fs.existsSync(TEST_DB_PATH)) {
    fs.unlinkSync(TEST_DB_PATH);
  }
}

describe('SqliteAssistantStore', () => {
  let store: SqliteAssistantStore;

  beforeEach(() => {
    removeTestDb();
    store = openAssistantStore(TEST_DB_PATH);
  });

  afterEach(() => {
    store.close();
    removeTestDb();
  });

  it('creates all four tables', () => {
    const db = new Database(TEST_DB_PATH, { readonly: true });
    const names = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .pluck()
      .all();
    db.close();

    expect(names).toEqual(['habits', 'messages', 'notes', 'tasks']);
  });

  it('appends message rows with increasing ids', async () => {
    const first = await store.append({
      phoneNumber: '15052897944',
      carrierId: 'tmobile',
      rawMessage: 'buy milk',
      parsedIntent: '{"category": "note", "content": "buy milk"}',
      response: 'Got it! Your message has been logged.',
    });
    const second = await store.append({
      phoneNumber: '5551234567',
      carrierId: 'verizon',
      rawMessage: 'hello',
      parsedIntent: null,
      response: null,
    });

    expect(first).toBe(1);
    expect(second).toBe(2);

    const rows = await store.listMessages();
    expect(rows.map(({ createdAt: _createdAt, ...row }) => row)).toEqual([
      {
        id: 1,
        phoneNumber: '15052897944',
        carrierId: 'tmobile',
        rawMessage: 'buy milk',
        parsedIntent: '{"category": "note", "content": "buy milk"}',
        response: 'Got it! Your message has been logged.',
      },
      {
        id: 2,
        phoneNumber: '5551234567',
        carrierId: 'verizon',
        rawMessage: 'hello',
        parsedIntent: null,
        response: null,
      },
    ]);
    expect(rows[0].createdAt).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it('lists only the most recent messages, oldest first', async () => {
    for (const body of ['one', 'two', 'three']) {
      await store.append({ phoneNumber: '1', carrierId: 'tmobile', rawMessage: body, parsedIntent: null, response: null });
    }

    const rows = await store.listMessages(2);

    expect(rows.map((r) => r.rawMessage)).toEqual(['two', 'three']);
  });

  it('writes routed records to their own tables', async () => {
    await expect(store.addTask({ description: 'Pay rent', dueDate: '2026-11-01' })).resolves.toBe(1);
    await expect(store.addTask({ description: 'Call mom' })).resolves.toBe(2);
    await expect(store.addHabit({ name: 'Walk', frequency: 'daily' })).resolves.toBe(1);
    await expect(store.addNote({ note: 'Door code 4411' })).resolves.toBe(1);

    expect(store.countRows('tasks')).toBe(2);
    expect(store.countRows('habits')).toBe(1);
    expect(store.countRows('notes')).toBe(1);
    expect(store.countRows('messages')).toBe(0);
  });

  it('keeps rows across reopen', async () => {
    await store.append({ phoneNumber: '1', carrierId: 'tmobile', rawMessage: 'persisted', parsedIntent: null, response: null });
    store.close();

    store = openAssistantStore(TEST_DB_PATH);

    expect(store.countRows('messages')).toBe(1);
    await expect(store.append({ phoneNumber: '1', carrierId: 'tmobile', rawMessage: 'next', parsedIntent: null, response: null })).resolves.toBe(2);
  });

  it('wraps write failures', async () => {
    const closed = openAssistantStore(TEST_DB_PATH);
    closed.close();

    await expect(closed.addNote({ note: 'x' })).rejects.toThrow(StoreUnavailableError);
    await expect(closed.addNote({ note: 'x' })).rejects.toThrow('Failed to write to notes');
  });
});

describe('openAssistantStore', () => {
  it('fails with StoreUnavailableError when the path is a directory', () => {
    const dir = path.join('./data', 'test-store-dir');
    fs.mkdirSync(dir, { recursive: true });
    try {
      expect(() => openAssistantStore(dir)).toThrow(StoreUnavailableError);
      expect(() => openAssistantStore(dir)).toThrow(`Cannot open message store at ${dir}`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
