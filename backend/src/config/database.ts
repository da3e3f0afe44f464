import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { env } from './env';
import { createComponentLogger } from './logger';

const logger = createComponentLogger('database');

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS chat_sessions (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS messages (
    id TEXT PRIMARY KEY,
    session_id TEXT NOT NULL,
    content TEXT NOT NULL,
    role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
    timestamp TEXT NOT NULL,
    metadata TEXT,
    FOREIGN KEY (session_id) REFERENCES chat_sessions (id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS session_memory (
    session_id TEXT PRIMARY KEY,
    context_state TEXT NOT NULL,
    history TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    FOREIGN KEY (session_id) REFERENCES chat_sessions (id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_messages_session_id ON messages (session_id);
  CREATE INDEX IF NOT EXISTS idx_messages_timestamp ON messages (timestamp);
  CREATE INDEX IF NOT EXISTS idx_sessions_updated_at ON chat_sessions (updated_at);
`;

let db: SqliteDatabase | null = null;

/**
 * Open a conversation database and create its tables.
 * `:memory:` gives a private database per call.
 */
export function openConversationDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const database = new Database(dbPath);
  if (dbPath !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }
  database.pragma('foreign_keys = ON');
  database.exec(SCHEMA);

  return database;
}

export function initializeDatabase(): SqliteDatabase {
  if (db) {
    return db;
  }

  logger.info('Opening conversation database', { path: env.CONVERSATION_DB_PATH });
  db = openConversationDatabase(env.CONVERSATION_DB_PATH);
  logger.info('Conversation database ready');

  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Conversation database closed');
  }
}

export function checkDatabaseHealth(database: SqliteDatabase): boolean {
  try {
    database.prepare('SELECT 1 AS ok').get();
    return true;
  } catch (error) {
    logger.error('Database health check failed:', error);
    return false;
  }
}
