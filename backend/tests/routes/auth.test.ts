/**
 * Auth Routes Integration Tests
 */

import request from 'supertest';
import { AuthService } from '../../src/services/auth.service';
import type { AuthUser } from '../../src/types/auth.types';
import { buildTestApp } from '../helpers/app';
import type { TestApp } from '../helpers/app';

const googleUser: AuthUser = {
  id: 'google-123',
  email: 'analyst@example.com',
  name: 'Test Analyst',
  picture: 'https://example.com/analyst.png',
  verifiedEmail: true
};

/**
 * Google sign-in without Google: the id token or code "good" is accepted
 */
class StubAuthService extends AuthService {
  async verifyGoogleIdToken(idToken: string): Promise<AuthUser> {
    if (idToken !== 'good') {
      throw new Error('Wrong number of segments in token');
    }
    return googleUser;
  }

  async exchangeCode(code: string): Promise<AuthUser> {
    if (code !== 'good') {
      throw new Error('invalid_grant');
    }
    return googleUser;
  }
}

const oauthService = () =>
  new StubAuthService({ clientId: 'test-client', clientSecret: 'test-client-secret', jwtSecret: 'test-secret' });

describe('Auth Routes', () => {
  let testApp: TestApp;

  afterEach(() => {
    testApp.close();
  });

  describe('with OAuth disabled', () => {
    beforeEach(() => {
      testApp = buildTestApp();
    });

    it('should point the login at development authentication', async () => {
      const response = await request(testApp.app).get('/api/auth/google/login');

      expect(response.body).toEqual({
        login_url: '/api/auth/dev-login',
        message: 'Development mode - use mock authentication'
      });
    });

    it('should issue a development token and cookie', async () => {
      const response = await request(testApp.app).get('/api/auth/dev-login').query({ user_id: 'alice' });

      expect(response.body).toMatchObject({
        token_type: 'bearer',
        message: 'Development authentication',
        user: { id: 'alice', email: 'alice@example.com', name: 'Development User', picture: null, verified_email: true }
      });
      expect(response.headers['set-cookie'][0]).toMatch(/^access_token=.+; Max-Age=86400; .*HttpOnly; SameSite=Lax$/);
      expect(testApp.services.auth.verifyToken(response.body.access_token)?.id).toBe('alice');
    });

    it('should refuse the OAuth callback', async () => {
      const response = await request(testApp.app).get('/api/auth/google/callback').query({ code: 'good' });

      expect(response.status).toBe(501);
      expect(response.body.error.code).toBe('OAUTH_DISABLED');
    });

    it('should return the development user from /me', async () => {
      const response = await request(testApp.app).get('/api/auth/me');
      expect(response.body).toMatchObject({ id: 'dev_user', email: 'dev_user@example.com' });
    });

    it('should describe the configuration', async () => {
      const response = await request(testApp.app).get('/api/auth/config');

      expect(response.body).toEqual({
        oauth_enabled: false,
        has_client_id: false,
        has_client_secret: false,
        redirect_uri: 'http://localhost:8000/api/auth/google/callback'
      });
    });
  });

  describe('with OAuth enabled', () => {
    beforeEach(() => {
      testApp = buildTestApp({ auth: oauthService() });
    });

    it('should redirect the login to Google', async () => {
      const response = await request(testApp.app).get('/api/auth/google/login');

      expect(response.status).toBe(302);
      expect(new URL(response.headers.location).host).toBe('accounts.google.com');
    });

    it('should exchange the callback code and redirect with a token', async () => {
      const response = await request(testApp.app).get('/api/auth/google/callback').query({ code: 'good' });

      expect(response.status).toBe(302);
      const location = new URL(response.headers.location);
      expect(location.origin).toBe('http://localhost:5174');
      expect(testApp.services.auth.verifyToken(location.searchParams.get('token') ?? '')).toEqual({
        id: 'google-123',
        email: 'analyst@example.com',
        name: 'Test Analyst',
        picture: 'https://example.com/analyst.png',
        verifiedEmail: true
      });
    });

    it('should reject a callback without a code', async () => {
      const response = await request(testApp.app).get('/api/auth/google/callback');

      expect(response.status).toBe(400);
      expect(response.body.error).toMatchObject({ message: 'Authorization code not found', code: 'MISSING_CODE' });
    });

    it('should report a failed code exchange', async () => {
      const response = await request(testApp.app).get('/api/auth/google/callback').query({ code: 'stale' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Authentication failed: invalid_grant');
    });

    it('should log in with a Google id token', async () => {
      const response = await request(testApp.app).post('/api/auth/login').send({ id_token: 'good' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        access_token: expect.any(String),
        token_type: 'bearer',
        user: {
          id: 'google-123',
          email: 'analyst@example.com',
          name: 'Test Analyst',
          picture: 'https://example.com/analyst.png',
          verified_email: true
        }
      });
    });

    it('should reject an invalid id token', async () => {
      const response = await request(testApp.app).post('/api/auth/login').send({ id_token: 'forged' });

      expect(response.status).toBe(401);
      expect(response.body.error).toMatchObject({ message: 'Authentication failed', code: 'INVALID_TOKEN' });
    });

    it('should refuse development login', async () => {
      const response = await request(testApp.app).get('/api/auth/dev-login');
      expect(response.status).toBe(501);
    });

    it('should require a token for /me', async () => {
      const response = await request(testApp.app).get('/api/auth/me');
      expect(response.status).toBe(401);
    });

    it('should report the token holder in the status', async () => {
      const token = testApp.services.auth.createToken(googleUser);

      const anonymous = await request(testApp.app).get('/api/auth/status');
      const signedIn = await request(testApp.app).get('/api/auth/status').set('Authorization', `Bearer ${token}`);

      expect(anonymous.body).toEqual({ authenticated: false, user: null, oauth_enabled: true });
      expect(signedIn.body).toMatchObject({ authenticated: true, user: { id: 'google-123' }, oauth_enabled: true });
    });

    it('should clear the cookie on logout', async () => {
      const response = await request(testApp.app).post('/api/auth/logout');

      expect(response.body).toEqual({ message: 'Logged out successfully' });
      expect(response.headers['set-cookie'][0]).toMatch(/^access_token=;/);
    });
  });
});
