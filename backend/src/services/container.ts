/**
 * Wires the services the routes depend on
 */

import type { RequestHandler } from 'express';
import { initializeDatabase } from '../config/database';
import type { SqliteDatabase } from '../config/database';
import { env } from '../config/env';
import { ConversationRepository } from '../database/conversation.repository';
import { DatabaseAgent } from '../agents/database';
import { AnalyticsAgent } from '../agents/analytics';
import { BqmlAgent } from '../agents/bqml';
import { RootAgent } from '../agents/orchestrator';
import { AgentType } from '../types/agent.types';
import { createChatRateLimiter } from '../middleware/rateLimiter';
import type { AgentContext } from '../agents/context';
import { AuthService } from './auth.service';
import { BigQueryWarehouse } from './bigquery.service';
import type { Warehouse } from './bigquery.service';
import { ChartService } from './chart.service';
import { GeminiLanguageModel } from './llm.service';
import type { LanguageModel } from './llm.service';
import { SessionManager } from './session.service';
import { SuggestedQuestionsService } from './suggested-questions.service';
import { UploadService } from './upload.service';

export interface MessageProcessor {
  processMessage(message: string, context: AgentContext): Promise<string>;
}

export interface AppServices {
  database: SqliteDatabase;
  sessions: SessionManager;
  agent: MessageProcessor;
  warehouse: Warehouse;
  auth: AuthService;
  uploads: UploadService;
  charts: ChartService;
  suggestions: SuggestedQuestionsService;
  /** One budget for every route that reaches the model */
  chatLimiter: RequestHandler;
}

export interface ServiceOverrides {
  database?: SqliteDatabase;
  llm?: LanguageModel;
  warehouse?: Warehouse;
  auth?: AuthService;
  uploads?: UploadService;
  charts?: ChartService;
  suggestions?: SuggestedQuestionsService;
  chatLimiter?: RequestHandler;
  now?: () => Date;
}

export function createServices(overrides: ServiceOverrides = {}): AppServices {
  const database = overrides.database ?? initializeDatabase();
  const llm = overrides.llm ?? new GeminiLanguageModel(env.ROOT_AGENT_TEMPERATURE);
  const warehouse = overrides.warehouse ?? new BigQueryWarehouse();
  const charts = overrides.charts ?? new ChartService();

  const agent = new RootAgent(
    llm,
    {
      [AgentType.DATABASE]: new DatabaseAgent(llm, warehouse),
      [AgentType.ANALYTICS]: new AnalyticsAgent(llm, charts),
      [AgentType.ML]: new BqmlAgent(llm)
    },
    warehouse,
    { now: overrides.now }
  );

  return {
    database,
    sessions: new SessionManager(new ConversationRepository(database, { now: overrides.now }), overrides.now),
    agent,
    warehouse,
    auth: overrides.auth ?? new AuthService(),
    uploads: overrides.uploads ?? new UploadService(),
    charts,
    suggestions: overrides.suggestions ?? new SuggestedQuestionsService(),
    chatLimiter: overrides.chatLimiter ?? createChatRateLimiter()
  };
}
