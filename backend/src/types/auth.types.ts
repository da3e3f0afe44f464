/**
 * Authenticated user carried in JWT claims
 */
export interface AuthUser {
  id: string;
  email: string;
  name: string;
  picture?: string;
  verifiedEmail: boolean;
}

export interface TokenClaims {
  sub: string;
  email: string;
  name: string;
  picture?: string;
  verified_email: boolean;
}

// Extend Express Request type with request id and authenticated user
declare global {
  namespace Express {
    interface Request {
      id?: string;
      user?: AuthUser;
    }
  }
}
