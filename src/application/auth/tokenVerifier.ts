import jwt from 'jsonwebtoken';
import { toIdentity, type UserIdentity } from '../../domain/auth/user.js';
import type { UserRepo } from '../../infra/db/userRepo.js';
import { UnauthorizedError } from '../errors.js';
import { tokenClaimsSchema } from './tokenClaims.js';
import { TOKEN_ALGORITHM } from './tokenIssuer.js';

export class TokenVerifier {
  constructor(
    private userRepo: UserRepo,
    private jwtSecret: string
  ) {}

  /**
   * Check signature and expiry, then confirm the user still exists.
   * The identity returned reflects the stored user, not the token's claims.
   */
  verify(token: string): UserIdentity {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.jwtSecret, { algorithms: [TOKEN_ALGORITHM] });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedError('Token expired');
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new UnauthorizedError('Invalid token');
      }
      throw error;
    }

    const claims = tokenClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new UnauthorizedError('Invalid token');
    }

    const user = this.userRepo.findById(claims.data.userId);
    if (!user) {
      throw new UnauthorizedError('User not found');
    }

    return toIdentity(user);
  }
}
