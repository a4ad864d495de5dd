import { Password } from '../../domain/auth/password.js';
import type { UserRepo } from '../../infra/db/userRepo.js';
import { UnauthorizedError } from '../errors.js';
import type { AuthResult } from './authResult.js';
import type { TokenIssuer } from './tokenIssuer.js';

export interface LoginCommand {
  email: string;
  password: string;
}

const INVALID_CREDENTIALS = 'Invalid email or password';

export class LoginUseCase {
  constructor(
    private userRepo: UserRepo,
    private tokenIssuer: TokenIssuer
  ) {}

  async execute(command: LoginCommand): Promise<AuthResult> {
    const user = this.userRepo.findByEmail(command.email);
    if (!user) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    return {
      token: this.tokenIssuer.issue(user),
      user: { email: user.email, role: user.role },
    };
  }
}
