import type { Role } from '../../domain/auth/user.js';

/**
 * Body returned by register and login.
 */
export interface AuthResult {
  token: string;
  user: {
    email: string;
    role: Role;
  };
}
