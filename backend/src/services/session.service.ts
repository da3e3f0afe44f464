/**
 * Session Service
 * Chat sessions over the conversation repository, with cached per-session agent memory
 */

import { v4 as uuidv4 } from 'uuid';
import { BaseAgentContext, parseAgentState } from '../agents/context';
import { ConversationRepository } from '../database/conversation.repository';
import { createComponentLogger } from '../config/logger';
import type {
  ChatMessage,
  ChatSession,
  ConversationContext,
  MessageRole,
  SessionRecord
} from '../types/chat.types';

const logger = createComponentLogger('session-service');

/**
 * Agent memory for one session; every mutation is written back to SQLite
 */
export class SessionMemory extends BaseAgentContext {
  constructor(
    readonly sessionId: string,
    private readonly repository: ConversationRepository
  ) {
    const record = repository.getSessionMemory(sessionId);
    super(record ? parseAgentState(record.state) : {}, record ? record.history : []);
  }

  protected persist(): void {
    const { state, history } = this.snapshot();
    this.repository.saveSessionMemory(this.sessionId, state, history);
  }
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** `Chat YYYY-MM-DD HH:mm` in local time */
export const defaultSessionTitle = (date: Date): string =>
  `Chat ${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;

export class SessionManager {
  private readonly memoryCache = new Map<string, SessionMemory>();

  constructor(
    private readonly repository: ConversationRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  createSession(title?: string, id: string = uuidv4()): ChatSession {
    const record = this.repository.createSession(id, title || defaultSessionTitle(this.now()));
    logger.info('Session created', { sessionId: id });
    return { ...record, messages: [] };
  }

  getSession(id: string): ChatSession | null {
    const record = this.repository.getSession(id);
    if (!record) {
      return null;
    }
    return { ...record, messages: this.repository.getMessages(id) };
  }

  /** A missing or unknown id yields a fresh session */
  getOrCreateSession(id?: string | null): ChatSession {
    if (id) {
      const existing = this.getSession(id);
      if (existing) {
        return existing;
      }
      logger.info('Unknown session id, starting a new session', { requestedSessionId: id });
    }
    return this.createSession();
  }

  /** Session memory, or null when the session does not exist */
  getMemory(sessionId: string): SessionMemory | null {
    const cached = this.memoryCache.get(sessionId);
    if (cached) {
      return cached;
    }
    if (!this.repository.getSession(sessionId)) {
      return null;
    }
    const memory = new SessionMemory(sessionId, this.repository);
    this.memoryCache.set(sessionId, memory);
    return memory;
  }

  addMessage(
    sessionId: string,
    content: string,
    role: MessageRole,
    metadata?: Record<string, unknown>
  ): ChatMessage {
    if (!this.repository.getSession(sessionId)) {
      throw new Error(`Session ${sessionId} not found`);
    }

    const message = this.repository.addMessage(uuidv4(), sessionId, content, role, metadata);

    if (role === 'assistant') {
      this.getMemory(sessionId)?.addToHistory('assistant', '', content);
    }

    return message;
  }

  getMessages(sessionId: string): ChatMessage[] {
    return this.repository.getMessages(sessionId);
  }

  deleteSession(sessionId: string): boolean {
    this.memoryCache.delete(sessionId);
    return this.repository.deleteSession(sessionId);
  }

  updateSessionTitle(sessionId: string, title: string): boolean {
    return this.repository.updateSessionTitle(sessionId, title);
  }

  /** Sessions without their messages, most recent first */
  listSessions(): SessionRecord[] {
    return this.repository.listSessions();
  }

  getConversationContext(sessionId: string): ConversationContext | null {
    const session = this.getSession(sessionId);
    const memory = this.getMemory(sessionId);
    if (!session || !memory) {
      return null;
    }

    const fullConversation: ConversationContext['fullConversation'] = [];
    const { messages } = session;
    for (let i = 0; i + 1 < messages.length; i += 2) {
      const [first, second] = [messages[i], messages[i + 1]];
      fullConversation.push({
        user: first.role === 'user' ? first.content : second.content,
        assistant: second.role === 'assistant' ? second.content : first.content
      });
    }

    const { state, history } = memory.snapshot();

    return {
      sessionId,
      messageHistory: messages.map(message => message.content),
      fullConversation,
      memoryState: state,
      memoryHistory: history,
      messageCount: messages.length,
      lastQueryResult: state.query_result,
      lastDbOutput: state.db_agent_output,
      lastAnalyticsOutput: state.ds_agent_output
    };
  }

  cleanupOldSessions(daysOld = 30): number {
    const deleted = this.repository.cleanupOldSessions(daysOld);
    this.memoryCache.clear();
    logger.info('Old sessions cleaned up', { daysOld, deleted });
    return deleted;
  }

  getStats() {
    return this.repository.getStats();
  }

  getSessionMemoryRecord(sessionId: string) {
    return this.repository.getSessionMemory(sessionId);
  }
}
