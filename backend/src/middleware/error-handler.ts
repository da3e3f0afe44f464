import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../config/logger';
import { env } from '../config/env';
import '../types/auth.types';

// Custom error class for API errors
export class ApiError extends Error {
  statusCode: number;
  code: string;
  isOperational: boolean;
  details?: unknown;

  constructor(statusCode: number, message: string, code = 'ERROR', details?: unknown, isOperational = true) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

interface ErrorBody {
  success: false;
  error: {
    message: string;
    code: string;
    timestamp: string;
    requestId?: string;
    details?: unknown;
    stack?: string[];
  };
}

// Error type guards
const isApiError = (error: unknown): error is ApiError => {
  return error instanceof ApiError;
};

const isTrustedError = (error: unknown): boolean => {
  if (isApiError(error)) {
    return error.isOperational;
  }
  return false;
};

const readNumber = (error: Error, key: 'status' | 'statusCode'): number | undefined => {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'number' ? value : undefined;
};

const readCode = (error: Error): string => {
  const value: unknown = Reflect.get(error, 'code');
  return typeof value === 'string' ? value : 'ERROR';
};

// Format error response based on environment
export const formatErrorResponse = (error: Error, requestId?: string): ErrorBody => {
  const isDevelopment = env.NODE_ENV === 'development';
  const isProduction = env.NODE_ENV === 'production';

  const errorResponse: ErrorBody = {
    success: false,
    error: {
      message:
        isProduction && !isTrustedError(error)
          ? 'Internal Server Error'
          : error.message || 'Unknown error occurred',
      code: readCode(error),
      timestamp: new Date().toISOString(),
      requestId
    }
  };

  // Add details in non-production or for operational errors
  if (!isProduction || isTrustedError(error)) {
    if (isApiError(error) && error.details !== undefined) {
      errorResponse.error.details = error.details;
    } else if (error instanceof ZodError) {
      errorResponse.error.details = error.flatten().fieldErrors;
    }
  }

  // Add stack trace in development
  if (isDevelopment && error.stack) {
    errorResponse.error.stack = error.stack.split('\n');
  }

  return errorResponse;
};

const SENSITIVE_BODY_FIELDS = ['password', 'token', 'id_token', 'apiKey'];

// Log error with context
const logError = (error: Error, statusCode: number, req: Request) => {
  const body: Record<string, unknown> =
    req.body && typeof req.body === 'object' ? { ...req.body } : {};

  // Remove sensitive data from logs
  for (const field of SENSITIVE_BODY_FIELDS) {
    if (body[field]) {
      body[field] = '***';
    }
  }

  const errorContext = {
    message: error.message,
    statusCode,
    method: req.method,
    url: req.url,
    path: req.path,
    params: req.params,
    query: req.query,
    body,
    headers: {
      'user-agent': req.headers['user-agent'],
      'content-type': req.headers['content-type'],
      authorization: req.headers.authorization ? 'Bearer ***' : undefined
    },
    ip: req.ip,
    requestId: req.id,
    timestamp: new Date().toISOString()
  };

  if (isTrustedError(error)) {
    logger.warn('Operational error occurred', errorContext);
  } else {
    logger.error('Unexpected error occurred', {
      ...errorContext,
      stack: error.stack
    });
  }
};

// Resolve the HTTP status for an error
export const resolveStatusCode = (err: Error): number => {
  if (isApiError(err)) {
    return err.statusCode;
  }
  if (err instanceof ZodError || err.name === 'ValidationError') {
    return 400;
  }
  if (err.name === 'UnauthorizedError') {
    return 401;
  }
  if (err.message?.includes('ECONNREFUSED')) {
    return 503;
  }
  return readNumber(err, 'status') ?? readNumber(err, 'statusCode') ?? 500;
};

// Main error handler middleware
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = resolveStatusCode(err);
  logError(err, statusCode, req);

  if (res.headersSent) {
    res.end();
    return;
  }

  res.status(statusCode).json(formatErrorResponse(err, req.id));
};

// 404 Not Found handler
export const notFoundHandler = (req: Request, res: Response) => {
  const error = new ApiError(404, `Cannot ${req.method} ${req.path}`, 'NOT_FOUND', {
    method: req.method,
    path: req.path
  });
  res.status(404).json(formatErrorResponse(error, req.id));
};

// Uncaught exception handler
export const handleUncaughtException = () => {
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception:', {
      message: error.message,
      stack: error.stack,
      timestamp: new Date().toISOString()
    });

    // Give time to log before shutting down
    setTimeout(() => {
      process.exit(1);
    }, 1000);
  });
};

// Unhandled rejection handler
export const handleUnhandledRejection = () => {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection:', {
      reason: reason instanceof Error ? reason.message : reason,
      stack: reason instanceof Error ? reason.stack : undefined,
      timestamp: new Date().toISOString()
    });

    // Convert to exception
    throw reason;
  });
};
