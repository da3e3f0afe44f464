/**
 * Chart and Suggested Question Routes Integration Tests
 */

import fs from 'fs';
import path from 'path';
import request from 'supertest';
import { buildTestApp } from '../helpers/app';
import type { TestApp } from '../helpers/app';

const CHART_ID = '0b6f4b8e-3c1d-4d2a-9f51-2a7c8e6d1f00';

describe('Chart Routes', () => {
  let testApp: TestApp;

  beforeEach(() => {
    testApp = buildTestApp();
  });

  afterEach(() => {
    testApp.close();
  });

  it('should serve a rendered chart as SVG', async () => {
    const chartDir = path.join(testApp.workDir, 'charts');
    fs.mkdirSync(chartDir, { recursive: true });
    fs.writeFileSync(path.join(chartDir, `chart_${CHART_ID}.svg`), '<svg></svg>');

    const response = await request(testApp.app).get(`/api/charts/chart_${CHART_ID}.svg`);

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toContain('image/svg+xml');
    expect(response.headers['cache-control']).toBe('public, max-age=3600');
    expect(response.body.toString()).toBe('<svg></svg>');
  });

  it('should return 404 for charts that do not exist', async () => {
    const response = await request(testApp.app).get(`/api/charts/chart_${CHART_ID}.svg`);

    expect(response.status).toBe(404);
    expect(response.body.error.code).toBe('CHART_NOT_FOUND');
  });

  it('should return 404 for names outside the chart pattern', async () => {
    const response = await request(testApp.app).get('/api/charts/secrets.svg');
    expect(response.status).toBe(404);
  });
});

describe('Suggested Question Routes', () => {
  let testApp: TestApp;

  afterEach(() => {
    testApp.close();
  });

  it('should return three masked questions', async () => {
    testApp = buildTestApp();

    const response = await request(testApp.app).get('/api/suggested-questions');

    expect(response.status).toBe(200);
    expect(response.body).toHaveLength(3);
    expect(new Set(response.body).size).toBe(3);
    for (const question of response.body) {
      expect(question).not.toMatch(/Maren Holloway|Tobias Quint|location \d{3}/);
    }
  });
});
