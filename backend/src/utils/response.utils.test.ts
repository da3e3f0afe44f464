/**
 * Tests for the response helpers
 */

import express from 'express';
import request from 'supertest';
import { formatSSEEvent, ok, sseResponse } from './response.utils';

const buildApp = () => {
  const app = express();
  app.use((req, _res, next) => {
    req.id = 'req-1';
    next();
  });
  app.get('/ok', (_req, res) => {
    ok(res, { total: 42 });
  });
  app.get('/stream', (_req, res) => {
    const channel = sseResponse(res);
    channel.send('complete', { message: 'done' });
    channel.close();
  });
  return app;
};

describe('ok', () => {
  it('should wrap data in the success envelope', async () => {
    const response = await request(buildApp()).get('/ok');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      success: true,
      data: { total: 42 },
      timestamp: expect.any(String),
      requestId: 'req-1'
    });
  });
});

describe('server-sent events', () => {
  it('should format one event', () => {
    expect(formatSSEEvent('progress', { step: 1 })).toBe('event: progress\ndata: {"step":1}\n\n');
  });

  it('should stream events with the request id', async () => {
    const response = await request(buildApp()).get('/stream');

    expect(response.headers['content-type']).toBe('text/event-stream');
    expect(response.headers['x-request-id']).toBe('req-1');
    expect(response.text).toBe('event: complete\ndata: {"message":"done"}\n\n');
  });
});
