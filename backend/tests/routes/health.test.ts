/**
 * Health Routes Integration Tests
 */

import request from 'supertest';
import { buildTestApp } from '../helpers/app';
import type { TestApp } from '../helpers/app';

describe('Health Routes', () => {
  let testApp: TestApp;

  beforeEach(() => {
    testApp = buildTestApp();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    testApp.close();
  });

  it('should report basic health', async () => {
    const response = await request(testApp.app).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', timestamp: expect.any(String), uptime: expect.any(Number) });
  });

  it('should answer the liveness probe', async () => {
    const response = await request(testApp.app).get('/api/health/live');
    expect(response.text).toBe('OK');
  });

  describe('GET /api/health/ready', () => {
    it('should be ready when the conversation database answers', async () => {
      const response = await request(testApp.app).get('/api/health/ready');

      expect(response.status).toBe(200);
      expect(response.text).toBe('OK');
    });

    it('should not be ready when the database fails', async () => {
      jest.spyOn(testApp.services.database, 'prepare').mockImplementation(() => {
        throw new Error('database is locked');
      });

      const response = await request(testApp.app).get('/api/health/ready');

      expect(response.status).toBe(503);
      expect(response.text).toBe('Not Ready');
    });
  });

  describe('GET /api/health/detailed', () => {
    it('should be healthy when both stores answer', async () => {
      const response = await request(testApp.app).get('/api/health/detailed');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.services.database.status).toBe('up');
      expect(response.body.services.warehouse.status).toBe('up');
      expect(response.body.system.cpu.cores).toBeGreaterThan(0);
    });

    it('should be degraded when the warehouse is unreachable', async () => {
      jest.spyOn(testApp.warehouse, 'listDatasets').mockRejectedValue(new Error('permission denied'));

      const response = await request(testApp.app).get('/api/health/detailed');

      expect(response.status).toBe(206);
      expect(response.body.status).toBe('degraded');
      expect(response.body.services.warehouse).toEqual({ status: 'down', error: 'permission denied' });
    });
  });

  it('should describe the service at the root', async () => {
    const response = await request(testApp.app).get('/');

    expect(response.body.success).toBe(true);
    expect(response.body.data).toMatchObject({ name: 'Insight Chat Backend', status: 'running' });
    expect(response.body).toHaveProperty('requestId');
  });

  it('should answer unknown routes with 404', async () => {
    const response = await request(testApp.app).get('/api/nothing-here');

    expect(response.status).toBe(404);
    expect(response.body.error).toMatchObject({ message: 'Cannot GET /api/nothing-here', code: 'NOT_FOUND' });
  });
});
