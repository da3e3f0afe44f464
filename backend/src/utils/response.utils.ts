import { Response } from 'express';
import '../types/auth.types';

// Response status codes
export const StatusCodes = {
  OK: 200,
  CREATED: 201
} as const;

// Standard response format
interface SuccessResponse<T> {
  success: true;
  data: T;
  message?: string;
  timestamp: string;
  requestId?: string;
}

// Success response builder
export const successResponse = <T>(
  res: Response,
  data: T,
  statusCode: number = StatusCodes.OK,
  message?: string
): Response => {
  const response: SuccessResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
    requestId: res.req.id
  };

  if (message) {
    response.message = message;
  }

  return res.status(statusCode).json(response);
};

export const ok = <T>(res: Response, data: T, message?: string) => {
  return successResponse(res, data, StatusCodes.OK, message);
};

// SSE event formatter
export const formatSSEEvent = (event: string, data: unknown): string => {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
};

// SSE (Server-Sent Events) response helper
export const sseResponse = (res: Response) => {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Request-Id', res.req.id || '');
  res.flushHeaders();

  return {
    send: (event: string, data: unknown) => {
      res.write(formatSSEEvent(event, data));
    },
    close: () => {
      res.end();
    }
  };
};

// Response time tracking
export const trackResponseTime = (startTime: number): string => {
  const duration = Date.now() - startTime;
  return `${duration}ms`;
};
