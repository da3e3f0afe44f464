/**
 * Rate Limiting Middleware
 * Fixed-window limiter kept in process memory
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';
import { env } from '../config/env';
import '../types/auth.types';

/**
 * Rate limit store entry
 */
interface RateLimitEntry {
  count: number;
  resetTime: number;
}

/**
 * Rate limiter configuration
 */
export interface RateLimiterConfig {
  windowMs: number;           // Time window in milliseconds
  max: number;                // Max requests per window
  message?: string;
  keyGenerator?: (req: Request) => string;
  standardHeaders?: boolean;  // RateLimit-* headers
  legacyHeaders?: boolean;    // X-RateLimit-* headers
}

/**
 * Simple in-memory rate limit store
 */
export class MemoryStore {
  private store: Map<string, RateLimitEntry> = new Map();
  private cleanupInterval: NodeJS.Timeout;

  constructor() {
    // Clean up expired entries every minute
    this.cleanupInterval = setInterval(() => this.prune(), 60000);
    this.cleanupInterval.unref();
  }

  increment(key: string, windowMs: number): RateLimitEntry {
    const now = Date.now();
    const entry = this.store.get(key);

    if (!entry || entry.resetTime <= now) {
      const newEntry: RateLimitEntry = {
        count: 1,
        resetTime: now + windowMs
      };
      this.store.set(key, newEntry);
      return newEntry;
    }

    entry.count++;
    return entry;
  }

  prune(): void {
    const now = Date.now();
    for (const [key, entry] of this.store.entries()) {
      if (entry.resetTime <= now) {
        this.store.delete(key);
      }
    }
  }
}

/**
 * Default key generator - uses IP address
 */
function defaultKeyGenerator(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const ip = forwarded
    ? (typeof forwarded === 'string' ? forwarded.split(',')[0].trim() : forwarded[0])
    : req.ip || req.socket.remoteAddress || 'unknown';

  return `rate-limit:${ip}`;
}

/**
 * Key generator for authenticated routes
 */
export function userKeyGenerator(req: Request): string {
  if (req.user?.id) {
    return `rate-limit:user:${req.user.id}`;
  }
  return defaultKeyGenerator(req);
}

/**
 * Create rate limiter middleware
 */
export function createRateLimiter(config: RateLimiterConfig) {
  const {
    windowMs,
    max,
    message = 'Too many requests, please try again later',
    keyGenerator = defaultKeyGenerator,
    standardHeaders = true,
    legacyHeaders = false
  } = config;

  const store = new MemoryStore();

  return (req: Request, res: Response, next: NextFunction) => {
    const key = keyGenerator(req);
    const entry = store.increment(key, windowMs);

    const remaining = Math.max(0, max - entry.count);
    const resetTime = new Date(entry.resetTime);

    if (standardHeaders) {
      res.setHeader('RateLimit-Limit', max.toString());
      res.setHeader('RateLimit-Remaining', remaining.toString());
      res.setHeader('RateLimit-Reset', resetTime.toISOString());
    }

    if (legacyHeaders) {
      res.setHeader('X-RateLimit-Limit', max.toString());
      res.setHeader('X-RateLimit-Remaining', remaining.toString());
      res.setHeader('X-RateLimit-Reset', Math.ceil(entry.resetTime / 1000).toString());
    }

    if (entry.count > max) {
      logger.warn('Rate limit exceeded', {
        key,
        count: entry.count,
        max,
        resetTime: resetTime.toISOString()
      });

      const retryAfter = Math.ceil((entry.resetTime - Date.now()) / 1000);
      res.setHeader('Retry-After', retryAfter.toString());

      return res.status(429).json({
        success: false,
        error: 'Rate Limit Exceeded',
        message,
        retryAfter,
        resetTime: resetTime.toISOString()
      });
    }

    next();
  };
}

/**
 * Chat and upload requests reach the model; build this once and give the same
 * handler to both routers so they share the configured budget
 */
export const createChatRateLimiter = (config: Partial<RateLimiterConfig> = {}) => createRateLimiter({
  windowMs: env.API_RATE_LIMIT_WINDOW_MS,
  max: env.API_RATE_LIMIT_MAX_REQUESTS,
  message: 'Too many chat requests. Please wait before trying again.',
  keyGenerator: userKeyGenerator,
  ...config
});
