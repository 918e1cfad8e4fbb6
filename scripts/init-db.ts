#!/usr/bin/env npx tsx
/**
 * Create the assistant database schema.
 *
 * Usage:
 *   npm run init-db
 *   npm run init-db -- ./data/other.db
 */

import 'dotenv/config';
import { openAssistantStore } from '../src/services/store/index.js';

const DEFAULT_PATH = process.env.NODE_ENV === 'production' ? '/app/data/assistant.db' : './data/assistant.db';

const dbPath = process.argv[2] || process.env.MESSAGE_DB_PATH || DEFAULT_PATH;

try {
  const store = openAssistantStore(dbPath);
  store.close();
  console.log(`Database initialized successfully at ${dbPath}`);
} catch (error) {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}
