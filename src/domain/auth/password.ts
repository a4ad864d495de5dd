import { argon2id, hash, verify } from 'argon2';

// OWASP minimums for argon2id
const HASH_OPTIONS = {
  type: argon2id,
  memoryCost: 19 * 1024,
  timeCost: 2,
  parallelism: 1,
} as const;

/**
 * Salted slow hashing of credentials. The encoded output carries its own
 * salt and parameters, so verification needs nothing but the stored string.
 */
export class Password {
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, HASH_OPTIONS);
  }

  /**
   * False on mismatch. A hash argon2 cannot parse also counts as a mismatch,
   * so user-supplied input never makes this throw.
   */
  static async verify(plainPassword: string, encodedHash: string): Promise<boolean> {
    try {
      return await verify(encodedHash, plainPassword);
    } catch {
      return false;
    }
  }
}
