/**
 * Authentication Routes
 * Google OAuth login, development login and token inspection
 */

import { Router, Request, Response } from 'express';
import type { AppServices } from '../services/container';
import { ACCESS_TOKEN_COOKIE, extractToken, requireAuth } from '../middleware/auth';
import { ApiError } from '../middleware/error-handler';
import { devLoginQuerySchema, validateLogin, validateQueryParams } from '../middleware/validation';
import type { LoginRequest } from '../middleware/validation';
import { createComponentLogger } from '../config/logger';
import { env } from '../config/env';
import type { AuthUser } from '../types/auth.types';

const logger = createComponentLogger('auth-routes');

export const serializeUser = (user: AuthUser) => ({
  id: user.id,
  email: user.email,
  name: user.name,
  picture: user.picture ?? null,
  verified_email: user.verifiedEmail
});

export function createAuthRouter({ auth }: Pick<AppServices, 'auth'>): Router {
  const router = Router();

  const tokenResponse = (user: AuthUser) => ({
    access_token: auth.createToken(user),
    token_type: 'bearer',
    user: serializeUser(user)
  });

  /**
   * GET /api/auth/google/login
   */
  router.get('/google/login', (_req: Request, res: Response) => {
    if (!auth.isOAuthEnabled()) {
      return res.json({
        login_url: '/api/auth/dev-login',
        message: 'Development mode - use mock authentication'
      });
    }
    res.redirect(auth.getAuthorizationUrl());
  });

  /**
   * GET /api/auth/google/callback?code=
   */
  router.get('/google/callback', async (req: Request, res: Response) => {
    if (!auth.isOAuthEnabled()) {
      throw new ApiError(501, 'OAuth not configured', 'OAUTH_DISABLED');
    }

    const { code } = req.query;
    if (typeof code !== 'string' || !code) {
      throw new ApiError(400, 'Authorization code not found', 'MISSING_CODE');
    }

    let user: AuthUser;
    try {
      user = await auth.exchangeCode(code);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('OAuth callback failed', { error: message });
      throw new ApiError(400, `Authentication failed: ${message}`, 'OAUTH_EXCHANGE_FAILED');
    }

    logger.info('OAuth login succeeded', { userId: user.id });
    res.redirect(`${env.FRONTEND_URL}/?token=${encodeURIComponent(auth.createToken(user))}`);
  });

  /**
   * POST /api/auth/login
   * Front end sends the Google id token it obtained itself
   */
  router.post('/login', validateLogin, async (req: Request<{}, {}, LoginRequest>, res: Response) => {
    let user: AuthUser;
    try {
      user = await auth.verifyGoogleIdToken(req.body.id_token);
    } catch (error) {
      logger.warn('Id token verification failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      throw new ApiError(401, 'Authentication failed', 'INVALID_TOKEN');
    }
    res.json(tokenResponse(user));
  });

  /**
   * GET /api/auth/dev-login?user_id=
   */
  router.get('/dev-login', validateQueryParams(devLoginQuerySchema), (req: Request, res: Response) => {
    if (auth.isOAuthEnabled()) {
      throw new ApiError(501, 'Development login is disabled when OAuth is configured', 'DEV_LOGIN_DISABLED');
    }
    const { user_id: userId } = devLoginQuerySchema.parse(req.query);
    const body = tokenResponse(auth.getMockUser(userId));

    res.cookie(ACCESS_TOKEN_COOKIE, body.access_token, {
      httpOnly: true,
      sameSite: 'lax',
      maxAge: env.JWT_EXPIRATION_HOURS * 60 * 60 * 1000
    });
    res.json({ ...body, message: 'Development authentication' });
  });

  /**
   * POST /api/auth/logout
   */
  router.post('/logout', (_req: Request, res: Response) => {
    res.clearCookie(ACCESS_TOKEN_COOKIE);
    res.json({ message: 'Logged out successfully' });
  });

  /**
   * GET /api/auth/me
   */
  router.get('/me', requireAuth, (req: Request, res: Response) => {
    if (!req.user) {
      throw new ApiError(401, 'Authentication required', 'UNAUTHORIZED');
    }
    res.json(serializeUser(req.user));
  });

  /**
   * GET /api/auth/status
   * Public route, so the token is checked here
   */
  router.get('/status', (req: Request, res: Response) => {
    const token = extractToken(req);
    const user = token ? auth.verifyToken(token) : null;

    res.json({
      authenticated: user !== null,
      user: user ? serializeUser(user) : null,
      oauth_enabled: auth.isOAuthEnabled()
    });
  });

  /**
   * GET /api/auth/config
   */
  router.get('/config', (_req: Request, res: Response) => {
    res.json({
      oauth_enabled: auth.isOAuthEnabled(),
      has_client_id: Boolean(env.GOOGLE_CLIENT_ID),
      has_client_secret: Boolean(env.GOOGLE_CLIENT_SECRET),
      redirect_uri: env.GOOGLE_REDIRECT_URI
    });
  });

  return router;
}
