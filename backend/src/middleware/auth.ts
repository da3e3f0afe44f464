/**
 * Authentication Middleware
 * Attaches the user a JWT belongs to; falls back to a development user when OAuth is off
 */

import { Request, Response, NextFunction } from 'express';
import type { AuthService } from '../services/auth.service';
import { ApiError } from './error-handler';
import '../types/auth.types';

export const ACCESS_TOKEN_COOKIE = 'access_token';

const PUBLIC_PATHS = new Set([
  '/',
  '/health',
  '/api/auth/google/login',
  '/api/auth/google/callback',
  '/api/auth/logout',
  '/api/auth/status',
  '/api/auth/config',
  '/api/auth/dev-login',
  '/api/suggested-questions'
]);

const STATIC_SUFFIXES = ['.js', '.css', '.png', '.jpg', '.jpeg', '.svg', '.ico', '.woff', '.woff2'];

export function isPublicPath(path: string): boolean {
  return (
    PUBLIC_PATHS.has(path) ||
    path.startsWith('/api/health') ||
    STATIC_SUFFIXES.some(suffix => path.endsWith(suffix))
  );
}

/**
 * Bearer header first, then the cookie, then `?token=`
 */
export function extractToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (header?.startsWith('Bearer ')) {
    return header.slice('Bearer '.length).trim() || null;
  }

  const cookies: unknown = req.cookies;
  if (cookies && typeof cookies === 'object') {
    const cookie: unknown = Reflect.get(cookies, ACCESS_TOKEN_COOKIE);
    if (typeof cookie === 'string' && cookie) {
      return cookie;
    }
  }

  const query = req.query.token;
  return typeof query === 'string' && query ? query : null;
}

export function createAuthMiddleware(authService: AuthService) {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (isPublicPath(req.path)) {
      return next();
    }

    const token = extractToken(req);
    const user = token ? authService.verifyToken(token) : null;

    if (user) {
      req.user = user;
    } else if (!authService.isOAuthEnabled()) {
      req.user = authService.getMockUser();
    }

    next();
  };
}

/**
 * Reject requests that carry no authenticated user
 */
export const requireAuth = (req: Request, _res: Response, next: NextFunction) => {
  if (!req.user) {
    return next(new ApiError(401, 'Authentication required', 'UNAUTHORIZED'));
  }
  next();
};
