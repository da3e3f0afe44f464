/**
 * Tests for chat sessions and their persisted agent memory
 */

import { openConversationDatabase } from '../config/database';
import type { SqliteDatabase } from '../config/database';
import { ConversationRepository } from '../database/conversation.repository';
import { SessionManager, SessionMemory, defaultSessionTitle } from './session.service';

describe('SessionManager', () => {
  let db: SqliteDatabase;
  let repository: ConversationRepository;
  let sessions: SessionManager;
  const now = () => new Date(2024, 2, 1, 9, 5);

  beforeEach(() => {
    db = openConversationDatabase(':memory:');
    repository = new ConversationRepository(db, { now });
    sessions = new SessionManager(repository, now);
  });

  afterEach(() => {
    db.close();
  });

  it('should title new sessions with the local creation time', () => {
    expect(defaultSessionTitle(new Date(2024, 0, 7, 14, 3))).toBe('Chat 2024-01-07 14:03');
    expect(sessions.createSession().title).toBe('Chat 2024-03-01 09:05');
  });

  it('should keep an explicit title', () => {
    expect(sessions.createSession('Payroll questions').title).toBe('Payroll questions');
  });

  describe('getOrCreateSession', () => {
    it('should return the existing session with its messages', () => {
      const created = sessions.createSession('Existing', 'abc');
      sessions.addMessage(created.id, 'hello', 'user');

      const session = sessions.getOrCreateSession('abc');

      expect(session.id).toBe('abc');
      expect(session.messages.map(message => message.content)).toEqual(['hello']);
    });

    it('should start a new session for an unknown id', () => {
      const session = sessions.getOrCreateSession('does-not-exist');

      expect(session.id).not.toBe('does-not-exist');
      expect(sessions.listSessions()).toHaveLength(1);
    });

    it('should start a new session when no id is given', () => {
      expect(sessions.getOrCreateSession(null).messages).toEqual([]);
    });
  });

  describe('memory', () => {
    it('should return null for unknown sessions', () => {
      expect(sessions.getMemory('missing')).toBeNull();
    });

    it('should cache one memory per session', () => {
      const { id } = sessions.createSession();
      expect(sessions.getMemory(id)).toBe(sessions.getMemory(id));
    });

    it('should persist state written through the memory', () => {
      const { id } = sessions.createSession();
      sessions.getMemory(id)?.updateState('last_sql', 'SELECT 1');

      const reloaded = new SessionMemory(id, repository);
      expect(reloaded.getState('last_sql')).toBe('SELECT 1');
    });

    it('should record assistant replies in the memory history', () => {
      const { id } = sessions.createSession();
      sessions.addMessage(id, 'question', 'user');
      sessions.addMessage(id, 'answer', 'assistant');

      expect(sessions.getSessionMemoryRecord(id)?.history).toEqual([
        expect.objectContaining({ agent: 'assistant', query: '', response: 'answer' })
      ]);
    });
  });

  it('should refuse messages for unknown sessions', () => {
    expect(() => sessions.addMessage('missing', 'hello', 'user')).toThrow('Session missing not found');
  });

  it('should forget cached memory when a session is deleted', () => {
    const { id } = sessions.createSession();
    sessions.getMemory(id);

    expect(sessions.deleteSession(id)).toBe(true);
    expect(sessions.getMemory(id)).toBeNull();
  });

  it('should pair messages into conversation turns', () => {
    const { id } = sessions.createSession();
    sessions.addMessage(id, 'How many employees?', 'user');
    sessions.addMessage(id, 'There are 42.', 'assistant');
    sessions.addMessage(id, 'And locations?', 'user');
    sessions.getMemory(id)?.updateState('db_agent_output', 'There are 42.');

    const context = sessions.getConversationContext(id);

    expect(context).toMatchObject({
      sessionId: id,
      messageHistory: ['How many employees?', 'There are 42.', 'And locations?'],
      fullConversation: [{ user: 'How many employees?', assistant: 'There are 42.' }],
      messageCount: 3,
      lastDbOutput: 'There are 42.'
    });
    expect(sessions.getConversationContext('missing')).toBeNull();
  });
});
