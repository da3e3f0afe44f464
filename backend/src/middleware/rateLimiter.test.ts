/**
 * Tests for the in-memory rate limiter
 */

import express from 'express';
import request from 'supertest';
import { createRateLimiter, userKeyGenerator } from './rateLimiter';

describe('createRateLimiter', () => {
  const buildApp = () => {
    const app = express();
    app.use(createRateLimiter({ windowMs: 60_000, max: 2, message: 'Slow down' }));
    app.get('/ping', (_req, res) => {
      res.send('pong');
    });
    return app;
  };

  it('should allow requests up to the limit and report what remains', async () => {
    const app = buildApp();

    const first = await request(app).get('/ping');
    const second = await request(app).get('/ping');

    expect(first.headers['ratelimit-remaining']).toBe('1');
    expect(second.headers['ratelimit-remaining']).toBe('0');
    expect(second.text).toBe('pong');
  });

  it('should answer 429 once the limit is exceeded', async () => {
    const app = buildApp();
    await request(app).get('/ping');
    await request(app).get('/ping');

    const response = await request(app).get('/ping');

    expect(response.status).toBe(429);
    expect(response.body).toMatchObject({ success: false, error: 'Rate Limit Exceeded', message: 'Slow down' });
    expect(Number(response.headers['retry-after'])).toBeGreaterThan(0);
  });

  it('should count each forwarded client separately', async () => {
    const app = buildApp();
    await request(app).get('/ping').set('X-Forwarded-For', '10.0.0.1');
    await request(app).get('/ping').set('X-Forwarded-For', '10.0.0.1');

    const other = await request(app).get('/ping').set('X-Forwarded-For', '10.0.0.2');

    expect(other.status).toBe(200);
  });
});

describe('userKeyGenerator', () => {
  it('should key authenticated requests by user', async () => {
    const app = express();
    app.use((req, _res, next) => {
      req.user = { id: 'u1', email: 'u1@example.com', name: 'U1', verifiedEmail: true };
      next();
    });
    app.get('/key', (req, res) => {
      res.send(userKeyGenerator(req));
    });

    const response = await request(app).get('/key');

    expect(response.text).toBe('rate-limit:user:u1');
  });
});
