import type { PasswordHasher } from '../../domain/auth/password.js';
import { normalizeEmail, type UserStore } from '../../domain/auth/user.js';
import { err, ok, type Result } from '../../domain/result.js';
import { logger } from '../../infra/logger.js';
import { ConflictError } from '../errors.js';

export interface RegisterCommand {
  name: string;
  email: string;
  password: string;
}

export interface RegisterResult {
  userId: string;
  email: string;
}

export class RegisterUseCase {
  constructor(
    private userRepo: UserStore,
    private passwords: PasswordHasher
  ) {}

  /**
   * Create a user. No token is issued; the caller logs in separately.
   *
   * There is no "does this email exist" lookup first: the store's unique
   * constraint decides, so concurrent signups for one email cannot both win.
   */
  async execute(command: RegisterCommand): Promise<Result<RegisterResult, ConflictError>> {
    const passwordHash = await this.passwords.hash(command.password);

    const inserted = await this.userRepo.insert({
      name: command.name.trim(),
      email: normalizeEmail(command.email),
      passwordHash,
    });

    if (!inserted.ok) {
      logger.info('auth', 'Signup rejected, email taken');
      return err(new ConflictError('Email already registered'));
    }

    logger.info('auth', 'User registered', { userId: inserted.value.id });
    return ok({
      userId: inserted.value.id,
      email: inserted.value.email,
    });
  }
}
