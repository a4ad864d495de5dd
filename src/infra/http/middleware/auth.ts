import type { Request, Response, NextFunction } from 'express';
import type { UserIdentity } from '../../../domain/auth/user.js';
import type { TokenVerifier } from '../../../application/auth/tokenVerifier.js';
import { UnauthorizedError } from '../../../application/errors.js';

export interface AuthRequest extends Request {
  auth?: UserIdentity;
}

/**
 * Pull the token out of `Authorization: Bearer <token>`.
 * The scheme is case-insensitive; surrounding whitespace is dropped.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }

  const match = /^bearer\s+(.+)$/i.exec(header.trim());
  if (!match) {
    return null;
  }

  const token = match[1].trim();
  return token.length > 0 ? token : null;
}

/**
 * Request guard for protected routes. On success `req.auth` holds the caller's identity.
 */
export function authMiddleware(tokenVerifier: TokenVerifier) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    try {
      req.auth = tokenVerifier.verify(token);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Identity set by authMiddleware. Throws if the guard did not run.
 */
export function requireAuth(req: AuthRequest): UserIdentity {
  if (!req.auth) {
    throw new UnauthorizedError();
  }
  return req.auth;
}
