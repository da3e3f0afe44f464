// Test environment, applied before any module reads config/env
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.JWT_SECRET = 'test-secret';
process.env.CONVERSATION_DB_PATH = ':memory:';
process.env.GOOGLE_API_KEY = '';
process.env.GOOGLE_CLIENT_ID = '';
process.env.GOOGLE_CLIENT_SECRET = '';
process.env.GOOGLE_CLOUD_PROJECT = 'test-project';
process.env.BIGQUERY_DATASET_ID = 'test_dataset';
process.env.API_RATE_LIMIT_MAX_REQUESTS = '1000';

// Mock console methods to reduce test output noise
global.console = {
  ...console,
  error: jest.fn(),
  warn: jest.fn(),
  log: jest.fn(),
  info: jest.fn(),
  debug: jest.fn()
};
