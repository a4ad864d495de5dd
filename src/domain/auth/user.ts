export const ROLES = ['standard', 'admin'] as const;

export type Role = (typeof ROLES)[number];

/**
 * User domain entity. Created at registration and never updated afterwards.
 */
export interface User {
  readonly id: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: Role;
  readonly createdAt: Date;
}

/**
 * What a verified token resolves to on protected routes.
 */
export interface UserIdentity {
  readonly id: string;
  readonly email: string;
  readonly role: Role;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

/**
 * Admin iff the normalized email is on the allow-list.
 */
export function roleForEmail(email: string, adminEmails: ReadonlySet<string>): Role {
  return adminEmails.has(normalizeEmail(email)) ? 'admin' : 'standard';
}

export function toIdentity(user: User): UserIdentity {
  return { id: user.id, email: user.email, role: user.role };
}
