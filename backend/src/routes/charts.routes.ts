/**
 * Chart Routes
 * Serves rendered chart images
 */

import { Router, Request, Response } from 'express';
import type { AppServices } from '../services/container';
import { ApiError } from '../middleware/error-handler';

export function createChartsRouter({ charts }: Pick<AppServices, 'charts'>): Router {
  const router = Router();

  /**
   * GET /api/charts/:filename
   */
  router.get('/:filename', (req: Request<{ filename: string }>, res: Response) => {
    const chartPath = charts.getChartPath(req.params.filename);
    if (!chartPath) {
      throw new ApiError(404, 'Chart not found', 'CHART_NOT_FOUND');
    }

    res.setHeader('Content-Type', 'image/svg+xml');
    res.setHeader('Cache-Control', 'public, max-age=3600');
    res.sendFile(chartPath);
  });

  return router;
}
