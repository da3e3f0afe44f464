/**
 * Auth Service
 * Google OAuth sign-in and the JWTs the API issues afterwards
 */

import { OAuth2Client } from 'google-auth-library';
import type { TokenPayload } from 'google-auth-library';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env';
import { createComponentLogger } from '../config/logger';
import { ApiError } from '../middleware/error-handler';
import type { AuthUser, TokenClaims } from '../types/auth.types';

const logger = createComponentLogger('auth-service');

const OAUTH_SCOPES = ['openid', 'email', 'profile'];
const TOKEN_ISSUER = 'insight-chat';

export interface AuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  jwtSecret: string;
  jwtExpirationHours: number;
}

const tokenClaimsSchema = z.object({
  sub: z.string(),
  email: z.string(),
  name: z.string(),
  picture: z.string().optional(),
  verified_email: z.boolean()
});

export const getAuthConfig = (): AuthConfig => ({
  clientId: env.GOOGLE_CLIENT_ID,
  clientSecret: env.GOOGLE_CLIENT_SECRET,
  redirectUri: env.GOOGLE_REDIRECT_URI,
  jwtSecret: env.JWT_SECRET,
  jwtExpirationHours: env.JWT_EXPIRATION_HOURS
});

function userFromGooglePayload(payload: TokenPayload | undefined): AuthUser {
  if (!payload?.sub || !payload.email) {
    throw new ApiError(401, 'Google token is missing user information', 'INVALID_TOKEN');
  }
  return {
    id: payload.sub,
    email: payload.email,
    name: payload.name ?? '',
    picture: payload.picture,
    verifiedEmail: payload.email_verified ?? false
  };
}

export class AuthService {
  private readonly config: AuthConfig;
  private readonly client: OAuth2Client;

  constructor(config: Partial<AuthConfig> = {}, client?: OAuth2Client) {
    this.config = { ...getAuthConfig(), ...config };
    this.client = client ?? new OAuth2Client(this.config.clientId, this.config.clientSecret, this.config.redirectUri);
  }

  isOAuthEnabled(): boolean {
    return Boolean(this.config.clientId && this.config.clientSecret);
  }

  getAuthorizationUrl(): string {
    return this.client.generateAuthUrl({
      access_type: 'offline',
      scope: OAUTH_SCOPES,
      redirect_uri: this.config.redirectUri
    });
  }

  /**
   * Trade an authorization code for the signed-in Google user
   */
  async exchangeCode(code: string): Promise<AuthUser> {
    const { tokens } = await this.client.getToken(code);
    if (!tokens.id_token) {
      throw new ApiError(400, 'Token exchange returned no id token', 'OAUTH_EXCHANGE_FAILED');
    }
    return this.verifyGoogleIdToken(tokens.id_token);
  }

  async verifyGoogleIdToken(idToken: string): Promise<AuthUser> {
    const ticket = await this.client.verifyIdToken({ idToken, audience: this.config.clientId });
    return userFromGooglePayload(ticket.getPayload());
  }

  createToken(user: AuthUser): string {
    const claims: TokenClaims = {
      sub: user.id,
      email: user.email,
      name: user.name,
      picture: user.picture,
      verified_email: user.verifiedEmail
    };
    return jwt.sign(claims, this.config.jwtSecret, {
      algorithm: 'HS256',
      expiresIn: this.config.jwtExpirationHours * 3600,
      issuer: TOKEN_ISSUER
    });
  }

  /**
   * The user a token was issued to, or null when it is expired, tampered or malformed
   */
  verifyToken(token: string): AuthUser | null {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.jwtSecret, { algorithms: ['HS256'], issuer: TOKEN_ISSUER });
    } catch (error) {
      logger.debug('Token rejected', { reason: error instanceof Error ? error.message : String(error) });
      return null;
    }

    const claims = tokenClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      return null;
    }
    return {
      id: claims.data.sub,
      email: claims.data.email,
      name: claims.data.name,
      picture: claims.data.picture,
      verifiedEmail: claims.data.verified_email
    };
  }

  getMockUser(userId = 'dev_user'): AuthUser {
    return {
      id: userId,
      email: `${userId}@example.com`,
      name: 'Development User',
      verifiedEmail: true
    };
  }
}
