/**
 * Upload and Export Routes
 * File uploads analysed by the agents, uploaded file lookup and conversation export
 */

import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import type { AppServices } from '../services/container';
import { buildAnalysisPrompt } from '../services/upload.service';
import type { FileProfile } from '../services/upload.service';
import { exportConversation } from '../services/export.service';
import { InMemoryAgentContext } from '../agents/context';
import { ApiError } from '../middleware/error-handler';
import { exportQuerySchema, validateQueryParams } from '../middleware/validation';
import { createComponentLogger } from '../config/logger';
import { env } from '../config/env';
import '../types/auth.types';

const logger = createComponentLogger('upload-routes');

export function createUploadRouter({
  uploads,
  agent,
  sessions,
  chatLimiter
}: Pick<AppServices, 'uploads' | 'agent' | 'sessions' | 'chatLimiter'>): Router {
  const router = Router();
  const receiveFile = uploads.middleware();

  /**
   * Multer failures become 400s instead of generic server errors
   */
  const receive = (req: Request, res: Response, next: NextFunction) => {
    receiveFile(req, res, (error?: unknown) => {
      if (error instanceof multer.MulterError) {
        const message = error.code === 'LIMIT_FILE_SIZE' ? 'File too large' : error.message;
        return next(new ApiError(400, message, error.code));
      }
      next(error);
    });
  };

  /**
   * POST /api/upload
   */
  router.post('/upload', chatLimiter, receive, async (req: Request, res: Response) => {
    if (!req.file) {
      throw new ApiError(400, 'No file provided', 'NO_FILE');
    }

    const file = await uploads.save(req.file.originalname, req.file.buffer);
    let profile: FileProfile | null;
    try {
      profile = await uploads.profile(file);
    } catch (error) {
      await uploads.remove(file);
      throw error;
    }

    const context = new InMemoryAgentContext({
      current_dataset: file.fileId,
      query_result: profile ? profile.rows.slice(0, env.BIGQUERY_MAX_ROWS) : undefined
    });
    const analysis = await agent.processMessage(buildAnalysisPrompt(file, profile), context);

    logger.info('File uploaded and processed', {
      requestId: req.id,
      fileId: file.fileId,
      rows: profile?.rowCount
    });

    res.json({
      file_id: file.fileId,
      filename: file.filename,
      size: file.size,
      status: 'completed',
      message: 'File uploaded and processed successfully',
      analysis
    });
  });

  /**
   * GET /api/file/:fileId
   */
  router.get('/file/:fileId', (req: Request<{ fileId: string }>, res: Response) => {
    const file = uploads.getFileInfo(req.params.fileId);
    if (!file) {
      throw new ApiError(404, 'File not found', 'FILE_NOT_FOUND');
    }
    res.json({ file_id: file.fileId, filename: file.filename, size: file.size, path: file.path });
  });

  /**
   * GET /api/export/:sessionId?format=json|csv|txt
   */
  router.get(
    '/export/:sessionId',
    validateQueryParams(exportQuerySchema),
    (req: Request<{ sessionId: string }>, res: Response) => {
      const { format } = exportQuerySchema.parse(req.query);
      const { sessionId } = req.params;

      const exported = exportConversation(sessionId, sessions.getMessages(sessionId), format);

      res.setHeader('Content-Type', exported.contentType);
      res.setHeader('Content-Disposition', `attachment; filename=${exported.filename}`);
      res.send(exported.content);
    }
  );

  return router;
}
