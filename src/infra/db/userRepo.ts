import type { Pool } from 'pg';
import { isUniqueViolation } from './pool.js';
import type { NewUser, User, UserStore } from '../../domain/auth/user.js';
import { DuplicateEmailError } from '../../domain/auth/errors.js';
import { err, ok, type Result } from '../../domain/result.js';

interface UserRow {
  id: string;
  name: string;
  email: string;
  password_hash: string;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = 'id, name, email, password_hash, created_at, updated_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class UserRepo implements UserStore {
  constructor(private readonly pool: Pool) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );

    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  /**
   * Insert a user. The users_email_key constraint is the only uniqueness
   * check, so a race between two signups is settled by Postgres.
   */
  async insert(user: NewUser): Promise<Result<User, DuplicateEmailError>> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (name, email, password_hash)
         VALUES ($1, $2, $3)
         RETURNING ${USER_COLUMNS}`,
        [user.name, user.email, user.passwordHash]
      );
      return ok(toUser(result.rows[0]));
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        return err(new DuplicateEmailError(user.email));
      }
      throw error;
    }
  }
}
