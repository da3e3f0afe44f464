/**
 * Suggested Questions Route
 */

import { Router, Request, Response } from 'express';
import type { AppServices } from '../services/container';

export function createSuggestedQuestionsRouter({ suggestions }: Pick<AppServices, 'suggestions'>): Router {
  const router = Router();

  /**
   * GET /api/suggested-questions
   * Three example questions with names and location codes masked
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json(suggestions.pick());
  });

  return router;
}
