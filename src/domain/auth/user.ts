import type { Result } from '../result.js';
import type { DuplicateEmailError } from './errors.js';

/**
 * User domain entity.
 */
export interface User {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** What a protected request knows about its caller. Never cached. */
export interface ResolvedIdentity {
  readonly id: string;
  readonly name: string;
  readonly email: string;
}

export interface NewUser {
  name: string;
  email: string;
  passwordHash: string;
}

/**
 * Credential store. Implementations must enforce email uniqueness
 * atomically (a unique constraint), so that two concurrent inserts of the
 * same email yield exactly one user and one DuplicateEmailError.
 */
export interface UserStore {
  findByEmail(email: string): Promise<User | null>;
  insert(user: NewUser): Promise<Result<User, DuplicateEmailError>>;
}

/** Emails are compared and stored trimmed and lower-cased. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function toIdentity(user: User): ResolvedIdentity {
  return { id: user.id, name: user.name, email: user.email };
}
