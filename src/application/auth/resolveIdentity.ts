import type { ResolvedIdentity, UserStore } from '../../domain/auth/user.js';
import { toIdentity } from '../../domain/auth/user.js';
import { err, ok, type Result } from '../../domain/result.js';
import { logger } from '../../infra/logger.js';
import { UnauthorizedError } from '../errors.js';
import type { TokenService } from './tokenService.js';

/**
 * Turns a bearer token into the identity of a live user.
 *
 * The user is looked up on every call, so a user removed or renamed since the
 * token was issued shows up on the next request. Every failure is the same
 * UnauthorizedError.
 */
export class IdentityResolver {
  constructor(
    private readonly tokens: TokenService,
    private readonly users: UserStore
  ) {}

  async resolve(token: string): Promise<Result<ResolvedIdentity, UnauthorizedError>> {
    const validated = this.tokens.validateToken(token);
    if (!validated.ok) {
      logger.warn('auth', 'Rejected bearer token', {
        reason: validated.error.name,
        detail: validated.error.message,
      });
      return err(new UnauthorizedError());
    }

    const { subject } = validated.value;
    if (!subject) {
      logger.warn('auth', 'Rejected bearer token', { reason: 'MissingSubject' });
      return err(new UnauthorizedError());
    }

    const user = await this.users.findByEmail(subject);
    if (!user) {
      logger.warn('auth', 'Rejected bearer token', { reason: 'UnknownSubject' });
      return err(new UnauthorizedError());
    }

    return ok(toIdentity(user));
  }
}
