import 'express-async-errors';
import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import cookieParser from 'cookie-parser';
import { env } from './config/env';
import { stream } from './config/logger';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { requestIdMiddleware, requestLogger } from './middleware/request-logger';
import { createAuthMiddleware } from './middleware/auth';
import { ok } from './utils/response.utils';
import type { AppServices } from './services/container';
import { createHealthRouter } from './routes/health.routes';
import { createChatRouter } from './routes/chat.routes';
import { createUploadRouter } from './routes/upload.routes';
import { createChartsRouter } from './routes/charts.routes';
import { createAuthRouter } from './routes/auth.routes';
import { createDatabaseRouter } from './routes/database.routes';
import { createTableInfoRouter } from './routes/table-info.routes';
import { createSuggestedQuestionsRouter } from './routes/suggested-questions.routes';

// Create Express application
export const createApp = (services: AppServices): Application => {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: env.NODE_ENV === 'production',
      crossOriginEmbedderPolicy: env.NODE_ENV === 'production'
    })
  );

  // CORS configuration
  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      credentials: env.CORS_CREDENTIALS,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization']
    })
  );

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));
  app.use(cookieParser());

  // Logging middleware
  app.use(morgan('combined', { stream }));

  // Request ID and logging middleware
  app.use(requestIdMiddleware);
  app.use(requestLogger);

  app.use(createAuthMiddleware(services.auth));

  // API Routes
  app.use('/api/health', createHealthRouter(services));
  app.use('/api/chat', createChatRouter(services));
  app.use('/api', createUploadRouter(services));
  app.use('/api/charts', createChartsRouter(services));
  app.use('/api/auth', createAuthRouter(services));
  app.use('/api/database', createDatabaseRouter(services));
  app.use('/api/table-info', createTableInfoRouter(services));
  app.use('/api/suggested-questions', createSuggestedQuestionsRouter(services));

  // Root endpoint
  app.get('/', (_req: Request, res: Response) => {
    ok(res, {
      name: 'Insight Chat Backend',
      version: '1.0.0',
      status: 'running',
      timestamp: new Date().toISOString()
    });
  });

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler
  app.use(errorHandler);

  return app;
};
