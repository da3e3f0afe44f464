/**
 * Conversation Repository
 * SQLite persistence for chat sessions, messages and agent memory
 */

import type { SqliteDatabase } from '../config/database';
import type {
  ChatMessage,
  DatabaseStats,
  HistoryEntry,
  MessageRole,
  SessionMemoryRecord,
  SessionRecord
} from '../types/chat.types';

interface SessionRow {
  id: string;
  title: string;
  created_at: string;
  updated_at: string;
}

interface MessageRow {
  id: string;
  session_id: string;
  content: string;
  role: MessageRole;
  timestamp: string;
  metadata: string | null;
}

interface MemoryRow {
  session_id: string;
  context_state: string;
  history: string;
  updated_at: string;
}

interface CountRow {
  count: number;
}

export interface RepositoryOptions {
  now?: () => Date;
}

const toSession = (row: SessionRow): SessionRecord => ({
  id: row.id,
  title: row.title,
  createdAt: row.created_at,
  updatedAt: row.updated_at
});

const parseObject = (raw: string): Record<string, unknown> => {
  const value: unknown = JSON.parse(raw);
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
};

const isHistoryEntry = (value: unknown): value is HistoryEntry =>
  typeof value === 'object' &&
  value !== null &&
  typeof Reflect.get(value, 'agent') === 'string' &&
  typeof Reflect.get(value, 'query') === 'string' &&
  typeof Reflect.get(value, 'response') === 'string';

const parseHistory = (raw: string): HistoryEntry[] => {
  const value: unknown = JSON.parse(raw);
  return Array.isArray(value) ? value.filter(isHistoryEntry) : [];
};

const toMessage = (row: MessageRow): ChatMessage => {
  const message: ChatMessage = {
    id: row.id,
    sessionId: row.session_id,
    role: row.role,
    content: row.content,
    timestamp: row.timestamp
  };
  if (row.metadata) {
    message.metadata = parseObject(row.metadata);
  }
  return message;
};

export class ConversationRepository {
  private readonly now: () => Date;

  constructor(private readonly db: SqliteDatabase, options: RepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /** Create a session together with its empty memory row */
  createSession(id: string, title: string): SessionRecord {
    const now = this.timestamp();
    const insert = this.db.transaction(() => {
      this.db
        .prepare('INSERT INTO chat_sessions (id, title, created_at, updated_at) VALUES (?, ?, ?, ?)')
        .run(id, title, now, now);
      this.db
        .prepare('INSERT INTO session_memory (session_id, context_state, history, updated_at) VALUES (?, ?, ?, ?)')
        .run(id, '{}', '[]', now);
    });
    insert();

    return { id, title, createdAt: now, updatedAt: now };
  }

  getSession(id: string): SessionRecord | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT id, title, created_at, updated_at FROM chat_sessions WHERE id = ?')
      .get(id);
    return row ? toSession(row) : null;
  }

  touchSession(id: string): void {
    this.db.prepare('UPDATE chat_sessions SET updated_at = ? WHERE id = ?').run(this.timestamp(), id);
  }

  updateSessionTitle(id: string, title: string): boolean {
    const result = this.db
      .prepare('UPDATE chat_sessions SET title = ?, updated_at = ? WHERE id = ?')
      .run(title, this.timestamp(), id);
    return result.changes > 0;
  }

  /** Most recently updated first */
  listSessions(): SessionRecord[] {
    return this.db
      .prepare<[], SessionRow>('SELECT id, title, created_at, updated_at FROM chat_sessions ORDER BY updated_at DESC, rowid DESC')
      .all()
      .map(toSession);
  }

  deleteSession(id: string): boolean {
    const result = this.db.prepare('DELETE FROM chat_sessions WHERE id = ?').run(id);
    return result.changes > 0;
  }

  addMessage(
    id: string,
    sessionId: string,
    content: string,
    role: MessageRole,
    metadata?: Record<string, unknown>
  ): ChatMessage {
    const now = this.timestamp();
    const add = this.db.transaction(() => {
      this.db
        .prepare('INSERT INTO messages (id, session_id, content, role, timestamp, metadata) VALUES (?, ?, ?, ?, ?, ?)')
        .run(id, sessionId, content, role, now, metadata ? JSON.stringify(metadata) : null);
      this.db.prepare('UPDATE chat_sessions SET updated_at = ? WHERE id = ?').run(now, sessionId);
    });
    add();

    const message: ChatMessage = { id, sessionId, role, content, timestamp: now };
    if (metadata) {
      message.metadata = metadata;
    }
    return message;
  }

  /** Timestamp order, ties broken by insertion order */
  getMessages(sessionId: string): ChatMessage[] {
    return this.db
      .prepare<[string], MessageRow>(
        'SELECT id, session_id, content, role, timestamp, metadata FROM messages WHERE session_id = ? ORDER BY timestamp, rowid'
      )
      .all(sessionId)
      .map(toMessage);
  }

  saveSessionMemory(sessionId: string, state: Record<string, unknown>, history: HistoryEntry[]): void {
    this.db
      .prepare(
        'INSERT OR REPLACE INTO session_memory (session_id, context_state, history, updated_at) VALUES (?, ?, ?, ?)'
      )
      .run(sessionId, JSON.stringify(state), JSON.stringify(history), this.timestamp());
  }

  getSessionMemory(sessionId: string): SessionMemoryRecord | null {
    const row = this.db
      .prepare<[string], MemoryRow>(
        'SELECT session_id, context_state, history, updated_at FROM session_memory WHERE session_id = ?'
      )
      .get(sessionId);

    if (!row) {
      return null;
    }

    return {
      sessionId: row.session_id,
      state: parseObject(row.context_state),
      history: parseHistory(row.history),
      updatedAt: row.updated_at
    };
  }

  /** Delete sessions not updated within `daysOld` days; returns how many went */
  cleanupOldSessions(daysOld: number): number {
    const cutoff = new Date(this.now().getTime() - daysOld * 24 * 60 * 60 * 1000).toISOString();
    const result = this.db.prepare('DELETE FROM chat_sessions WHERE updated_at < ?').run(cutoff);
    return result.changes;
  }

  getStats(): DatabaseStats {
    const count = (table: 'chat_sessions' | 'messages' | 'session_memory'): number => {
      const row = this.db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM ${table}`).get();
      return row?.count ?? 0;
    };

    const recent = this.db
      .prepare<[], Pick<SessionRow, 'id' | 'title' | 'updated_at'>>(
        'SELECT id, title, updated_at FROM chat_sessions ORDER BY updated_at DESC, rowid DESC LIMIT 10'
      )
      .all();

    return {
      sessionCount: count('chat_sessions'),
      messageCount: count('messages'),
      memoryCount: count('session_memory'),
      recentSessions: recent.map(row => ({ id: row.id, title: row.title, updatedAt: row.updated_at }))
    };
  }
}
