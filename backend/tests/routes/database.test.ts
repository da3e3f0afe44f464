/**
 * Conversation Database Routes Integration Tests
 */

import request from 'supertest';
import { buildTestApp, route, ROUTING } from '../helpers/app';
import type { TestApp } from '../helpers/app';

describe('Database Routes', () => {
  let testApp: TestApp;
  let clock: Date;

  beforeEach(() => {
    clock = new Date('2024-03-01T10:00:00.000Z');
    testApp = buildTestApp({ now: () => clock });
    testApp.llm.on(ROUTING, route('database'));
    testApp.warehouse.rows = [{ total: 42 }];
  });

  afterEach(() => {
    testApp.close();
  });

  const chat = async (message: string): Promise<string> => {
    const response = await request(testApp.app).post('/api/chat/send').send({ message });
    return response.body.session_id;
  };

  it('should report conversation statistics', async () => {
    const sessionId = await chat('How many employees?');

    const response = await request(testApp.app).get('/api/database/stats');

    expect(response.body.success).toBe(true);
    expect(response.body.data).toEqual({
      session_count: 1,
      message_count: 2,
      memory_count: 1,
      recent_sessions: [
        {
          id: sessionId,
          title: expect.stringMatching(/^Chat 2024-03-01 \d{2}:\d{2}$/),
          updated_at: '2024-03-01T10:00:00.000Z'
        }
      ]
    });
  });

  it('should delete idle sessions', async () => {
    await chat('How many employees?');
    clock = new Date('2024-05-01T10:00:00.000Z');

    const response = await request(testApp.app).post('/api/database/cleanup').query({ days_old: 30 });

    expect(response.body.data).toEqual({ message: 'Cleaned up 1 sessions older than 30 days', deleted_count: 1 });
    expect(testApp.services.sessions.listSessions()).toEqual([]);
  });

  it('should reject a negative cleanup age', async () => {
    const response = await request(testApp.app).post('/api/database/cleanup').query({ days_old: -1 });

    expect(response.status).toBe(400);
    expect(response.body.details[0].field).toBe('days_old');
  });

  it('should dump a session with its messages and memory', async () => {
    const sessionId = await chat('How many employees?');

    const response = await request(testApp.app).get(`/api/database/session/${sessionId}/full`);
    const { data } = response.body;

    expect(data.session.id).toBe(sessionId);
    expect(data.message_count).toBe(2);
    expect(data.messages.map((message: { role: string }) => message.role)).toEqual(['user', 'assistant']);
    expect(data.memory.context_state).toMatchObject({
      last_query: 'How many employees?',
      last_response: 'Result: 42.00',
      db_agent_output: 'Result: 42.00'
    });
    expect(data.memory.history.map((entry: { agent: string }) => entry.agent)).toEqual(['database', 'assistant']);
  });

  it('should return 404 for an unknown session', async () => {
    const response = await request(testApp.app).get('/api/database/session/missing/full');

    expect(response.status).toBe(404);
    expect(response.body.error.code).toBe('SESSION_NOT_FOUND');
  });
});
