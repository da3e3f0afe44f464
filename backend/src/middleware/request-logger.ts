import { Request, Response, NextFunction } from 'express';
import { performance } from 'perf_hooks';
import crypto from 'crypto';
import { logger } from '../config/logger';
import '../types/auth.types';

interface RequestMetrics {
  startTime: number;
  method: string;
  path: string;
  requestId: string;
}

// Store for tracking in-flight requests
const activeRequests = new Map<string, RequestMetrics>();

const SLOW_REQUEST_MS = 5000;
const CRITICAL_REQUEST_MS = 10000;

// Generate unique request ID
export const generateRequestId = (): string => {
  return crypto.randomBytes(16).toString('hex');
};

// Request ID middleware
export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  // Use existing ID or generate new one
  const incoming = req.headers['x-request-id'];
  const requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : generateRequestId();
  req.id = requestId;
  res.setHeader('X-Request-Id', requestId);
  next();
};

// Request logger middleware with performance tracking
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = performance.now();
  const requestId = req.id || generateRequestId();

  activeRequests.set(requestId, {
    startTime,
    method: req.method,
    path: req.path,
    requestId
  });

  logger.info('Incoming request', {
    requestId,
    method: req.method,
    url: req.url,
    path: req.path,
    headers: {
      'user-agent': req.headers['user-agent'],
      'content-type': req.headers['content-type'],
      'content-length': req.headers['content-length']
    },
    ip: req.ip
  });

  res.on('finish', () => {
    const duration = performance.now() - startTime;

    const logData = {
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration.toFixed(2)}ms`,
      durationMs: duration
    };

    // Check for slow requests
    if (duration > CRITICAL_REQUEST_MS) {
      logger.error('CRITICAL: Request exceeded 10 second threshold', logData);
    } else if (duration > SLOW_REQUEST_MS) {
      logger.warn('WARNING: Slow request detected (>5 seconds)', logData);
    } else {
      logger.info('Request completed', logData);
    }

    activeRequests.delete(requestId);
  });

  next();
};

// Periodically drop requests that never finished (aborted streams)
export const cleanupStaleRequests = (): NodeJS.Timeout => {
  const timer = setInterval(() => {
    const now = performance.now();
    const staleThreshold = 60000;

    for (const [requestId, metrics] of activeRequests.entries()) {
      if (now - metrics.startTime > staleThreshold) {
        logger.warn('Removing stale request from tracking', {
          requestId,
          method: metrics.method,
          path: metrics.path,
          age: `${((now - metrics.startTime) / 1000).toFixed(2)}s`
        });
        activeRequests.delete(requestId);
      }
    }
  }, 30000);
  timer.unref();
  return timer;
};
