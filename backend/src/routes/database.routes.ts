/**
 * Conversation Database Routes
 * Statistics, cleanup and full session dumps for the SQLite conversation store
 */

import { Router, Request, Response } from 'express';
import type { AppServices } from '../services/container';
import { ApiError } from '../middleware/error-handler';
import { cleanupQuerySchema, validateQueryParams } from '../middleware/validation';
import { ok } from '../utils/response.utils';
import { createComponentLogger } from '../config/logger';
import { serializeMessage, serializeSession } from './chat.routes';
import '../types/auth.types';

const logger = createComponentLogger('database-routes');

export function createDatabaseRouter({ sessions }: Pick<AppServices, 'sessions'>): Router {
  const router = Router();

  /**
   * GET /api/database/stats
   */
  router.get('/stats', (_req: Request, res: Response) => {
    const stats = sessions.getStats();
    ok(res, {
      session_count: stats.sessionCount,
      message_count: stats.messageCount,
      memory_count: stats.memoryCount,
      recent_sessions: stats.recentSessions.map(session => ({
        id: session.id,
        title: session.title,
        updated_at: session.updatedAt
      }))
    });
  });

  /**
   * POST /api/database/cleanup?days_old=30
   */
  router.post('/cleanup', validateQueryParams(cleanupQuerySchema), (req: Request, res: Response) => {
    const { days_old: daysOld } = cleanupQuerySchema.parse(req.query);
    const deleted = sessions.cleanupOldSessions(daysOld);

    logger.info('Cleanup requested', { requestId: req.id, daysOld, deleted });

    ok(res, {
      message: `Cleaned up ${deleted} sessions older than ${daysOld} days`,
      deleted_count: deleted
    });
  });

  /**
   * GET /api/database/session/:sessionId/full
   * Session, messages and persisted agent memory
   */
  router.get('/session/:sessionId/full', (req: Request<{ sessionId: string }>, res: Response) => {
    const session = sessions.getSession(req.params.sessionId);
    if (!session) {
      throw new ApiError(404, 'Session not found', 'SESSION_NOT_FOUND');
    }

    const memory = sessions.getSessionMemoryRecord(session.id);

    ok(res, {
      session: serializeSession(session),
      messages: session.messages.map(serializeMessage),
      memory: memory
        ? { context_state: memory.state, history: memory.history, updated_at: memory.updatedAt }
        : null,
      message_count: session.messages.length
    });
  });

  return router;
}
