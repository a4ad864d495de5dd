import jwt from 'jsonwebtoken';
import type { User } from '../../domain/auth/user.js';
import type { TokenClaims } from './tokenClaims.js';

export const TOKEN_ALGORITHM = 'HS256';

export class TokenIssuer {
  constructor(
    private jwtSecret: string,
    private ttlSeconds: number
  ) {}

  /**
   * Sign a bearer token for the user. Expiry is fixed here; there is no refresh.
   */
  issue(user: User): string {
    const claims: TokenClaims = {
      userId: user.id,
      email: user.email,
      role: user.role,
    };

    return jwt.sign(claims, this.jwtSecret, {
      algorithm: TOKEN_ALGORITHM,
      expiresIn: this.ttlSeconds,
    });
  }
}
