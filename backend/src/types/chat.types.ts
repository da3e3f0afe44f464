/**
 * Chat domain types
 * Sessions, messages and the per-session agent memory persisted in SQLite
 */

export type MessageRole = 'user' | 'assistant';

export interface ChatMessage {
  id: string;
  sessionId: string;
  role: MessageRole;
  content: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

export interface ChatSession {
  id: string;
  title: string;
  messages: ChatMessage[];
  createdAt: string;
  updatedAt: string;
}

export interface SessionRecord {
  id: string;
  title: string;
  createdAt: string;
  updatedAt: string;
}

export interface HistoryEntry {
  agent: string;
  query: string;
  response: string;
  timestamp: string;
}

export interface SessionMemoryRecord {
  sessionId: string;
  state: Record<string, unknown>;
  history: HistoryEntry[];
  updatedAt: string;
}

export interface DatabaseStats {
  sessionCount: number;
  messageCount: number;
  memoryCount: number;
  recentSessions: Array<Pick<SessionRecord, 'id' | 'title' | 'updatedAt'>>;
}

export interface ConversationContext {
  sessionId: string;
  messageHistory: string[];
  fullConversation: Array<{ user: string; assistant: string }>;
  memoryState: Record<string, unknown>;
  memoryHistory: HistoryEntry[];
  messageCount: number;
  lastQueryResult: unknown;
  lastDbOutput: unknown;
  lastAnalyticsOutput: unknown;
}

export type ExportFormat = 'json' | 'csv' | 'txt';

export interface UploadedFile {
  fileId: string;
  filename: string;
  size: number;
  fileType: string;
  path: string;
}
