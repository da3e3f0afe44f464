export { env } from './env';
export type { Env } from './env';
export { logger, createComponentLogger, stream } from './logger';
export { initializeDatabase, closeDatabase, openConversationDatabase, checkDatabaseHealth } from './database';
export type { SqliteDatabase } from './database';
export { createChatModel, getGeminiConfig, isGeminiConfigured } from './gemini';
export { getBigQueryClient, getBigQueryConfig } from './bigquery';
