/**
 * Chat API Routes
 * Sends messages through the root agent and manages chat sessions
 */

import { Router, Request, Response } from 'express';
import type { AppServices } from '../services/container';
import { validateSendMessage, validateRenameSession } from '../middleware/validation';
import type { SendMessageRequest, RenameSessionRequest } from '../middleware/validation';
import { ApiError } from '../middleware/error-handler';
import { sseResponse, trackResponseTime } from '../utils/response.utils';
import { createComponentLogger } from '../config/logger';
import type { ChatMessage, SessionRecord } from '../types/chat.types';
import '../types/auth.types';

const logger = createComponentLogger('chat-routes');

export const serializeMessage = (message: ChatMessage) => ({
  id: message.id,
  content: message.content,
  role: message.role,
  timestamp: message.timestamp,
  session_id: message.sessionId
});

export const serializeSession = (session: SessionRecord) => ({
  id: session.id,
  title: session.title,
  created_at: session.createdAt,
  updated_at: session.updatedAt
});

export function createChatRouter({
  sessions,
  agent,
  chatLimiter
}: Pick<AppServices, 'sessions' | 'agent' | 'chatLimiter'>): Router {
  const router = Router();

  /**
   * Store the user message, run the agents on the session memory, store the reply
   */
  const answer = async (sessionId: string, message: string) => {
    sessions.addMessage(sessionId, message, 'user');

    const memory = sessions.getMemory(sessionId);
    if (!memory) {
      throw new ApiError(404, 'Session not found', 'SESSION_NOT_FOUND');
    }

    const reply = await agent.processMessage(message, memory);
    const stored = sessions.addMessage(sessionId, reply, 'assistant');
    return { message: reply, session_id: sessionId, message_id: stored.id };
  };

  /**
   * POST /api/chat/send
   * Answer a message; `stream: true` answers with server-sent events
   */
  router.post(
    '/send',
    chatLimiter,
    validateSendMessage,
    async (req: Request<{}, {}, SendMessageRequest>, res: Response) => {
      const startTime = Date.now();
      const { message, session_id: requestedSessionId, stream } = req.body;
      const session = sessions.getOrCreateSession(requestedSessionId);

      logger.info('Processing chat message', {
        requestId: req.id,
        sessionId: session.id,
        messageLength: message.length,
        stream
      });

      if (!stream) {
        const result = await answer(session.id, message);
        logger.info('Chat message answered', {
          requestId: req.id,
          sessionId: session.id,
          duration: trackResponseTime(startTime)
        });
        return res.json(result);
      }

      const channel = sseResponse(res);
      let closed = false;
      res.on('close', () => {
        closed = true;
      });

      try {
        channel.send('connected', { session_id: session.id, request_id: req.id });
        channel.send('progress', { step: 'processing', message: 'Analyzing your question...' });

        const result = await answer(session.id, message);
        if (!closed) {
          channel.send('complete', result);
          channel.send('done', { message: 'Processing complete', request_id: req.id });
        }
      } catch (error) {
        logger.error('Streaming chat failed', {
          requestId: req.id,
          sessionId: session.id,
          error: error instanceof Error ? error.message : String(error)
        });
        if (!closed) {
          channel.send('error', {
            message: error instanceof Error ? error.message : 'Processing failed',
            request_id: req.id
          });
        }
      } finally {
        channel.close();
      }
    }
  );

  /**
   * GET /api/chat/history/:sessionId
   */
  router.get('/history/:sessionId', (req: Request<{ sessionId: string }>, res: Response) => {
    const { sessionId } = req.params;
    res.json({
      messages: sessions.getMessages(sessionId).map(serializeMessage),
      session_id: sessionId
    });
  });

  /**
   * GET /api/chat/sessions
   */
  router.get('/sessions', (_req: Request, res: Response) => {
    res.json({ sessions: sessions.listSessions().map(serializeSession) });
  });

  /**
   * DELETE /api/chat/session/:sessionId
   */
  router.delete('/session/:sessionId', (req: Request<{ sessionId: string }>, res: Response) => {
    if (!sessions.deleteSession(req.params.sessionId)) {
      throw new ApiError(404, 'Session not found', 'SESSION_NOT_FOUND');
    }
    res.json({ message: 'Session deleted successfully' });
  });

  /**
   * PATCH /api/chat/session/:sessionId
   */
  router.patch(
    '/session/:sessionId',
    validateRenameSession,
    (req: Request<{ sessionId: string }, {}, RenameSessionRequest>, res: Response) => {
      const { sessionId } = req.params;
      if (!sessions.updateSessionTitle(sessionId, req.body.title)) {
        throw new ApiError(404, 'Session not found', 'SESSION_NOT_FOUND');
      }
      res.json({ message: 'Session renamed successfully', session_id: sessionId, title: req.body.title });
    }
  );

  return router;
}
