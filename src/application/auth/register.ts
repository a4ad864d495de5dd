import { Password } from '../../domain/auth/password.js';
import { normalizeEmail, roleForEmail } from '../../domain/auth/user.js';
import type { UserRepo } from '../../infra/db/userRepo.js';
import { ConflictError } from '../errors.js';
import type { AuthResult } from './authResult.js';
import type { TokenIssuer } from './tokenIssuer.js';

export interface RegisterCommand {
  email: string;
  password: string;
}

export class RegisterUseCase {
  constructor(
    private userRepo: UserRepo,
    private tokenIssuer: TokenIssuer,
    private adminEmails: ReadonlySet<string>
  ) {}

  async execute(command: RegisterCommand): Promise<AuthResult> {
    const email = normalizeEmail(command.email);

    // Fast path; the UNIQUE constraint still catches a concurrent insert
    if (this.userRepo.findByEmail(email)) {
      throw new ConflictError('User with this email already exists');
    }

    const passwordHash = await Password.hash(command.password);
    const user = this.userRepo.create(email, passwordHash, roleForEmail(email, this.adminEmails));

    return {
      token: this.tokenIssuer.issue(user),
      user: { email: user.email, role: user.role },
    };
  }
}
