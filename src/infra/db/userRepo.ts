import type Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { isRole, normalizeEmail, type Role, type User } from '../../domain/auth/user.js';
import { ConflictError } from '../../application/errors.js';

interface UserRow {
  id: string;
  email: string;
  password_hash: string;
  role: string;
  created_at: string;
}

function toUser(row: UserRow): User {
  if (!isRole(row.role)) {
    throw new Error(`Unknown role "${row.role}" stored for user ${row.id}`);
  }

  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    createdAt: new Date(row.created_at),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'SQLITE_CONSTRAINT_UNIQUE'
  );
}

/**
 * Credential store over the `users` table.
 * Emails are normalized on the way in, so lookups are case-insensitive.
 */
export class UserRepo {
  constructor(private db: Database.Database) {}

  findByEmail(email: string): User | null {
    const row = this.db
      .prepare<[string], UserRow>(
        'SELECT id, email, password_hash, role, created_at FROM users WHERE email = ?'
      )
      .get(normalizeEmail(email));

    return row ? toUser(row) : null;
  }

  findById(id: string): User | null {
    const row = this.db
      .prepare<[string], UserRow>(
        'SELECT id, email, password_hash, role, created_at FROM users WHERE id = ?'
      )
      .get(id);

    return row ? toUser(row) : null;
  }

  /**
   * Insert a new user. The UNIQUE constraint on email is the source of truth
   * for duplicates; a violation surfaces as ConflictError.
   */
  create(email: string, passwordHash: string, role: Role): User {
    const user: User = {
      id: randomUUID(),
      email: normalizeEmail(email),
      passwordHash,
      role,
      createdAt: new Date(),
    };

    try {
      this.db
        .prepare(
          `INSERT INTO users (id, email, password_hash, role, created_at)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(user.id, user.email, user.passwordHash, user.role, user.createdAt.toISOString());
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('User with this email already exists');
      }
      throw error;
    }

    return user;
  }
}
