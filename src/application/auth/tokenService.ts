import jwt, { type JwtPayload } from 'jsonwebtoken';
import type { TokenSettings } from '../../config.js';
import { err, ok, type Result } from '../../domain/result.js';
import {
  ExpiredTokenError,
  InvalidTokenError,
  TokenSigningError,
  type TokenError,
} from '../../domain/auth/errors.js';

export interface TokenSubject {
  subject: string;
}

export interface TokenClaims {
  subject?: string;
  issuedAt?: Date;
  expiresAt: Date;
}

export type Clock = () => Date;

const toSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * Issues and checks signed, time-limited bearer tokens (JWT).
 *
 * Both operations are pure: no store access, no shared state beyond the
 * settings handed in at construction.
 */
export class TokenService {
  constructor(
    private readonly settings: TokenSettings,
    private readonly clock: Clock = () => new Date()
  ) {}

  createToken(claims: TokenSubject, ttlMinutes = this.settings.ttlMinutes): string {
    if (!claims.subject) {
      throw new TypeError('Token subject must be a non-empty string');
    }
    const lifetimeSeconds = Math.round(ttlMinutes * 60);
    if (!Number.isFinite(lifetimeSeconds) || lifetimeSeconds < 1) {
      throw new TypeError(`Token TTL must be at least one second, got ${ttlMinutes} minutes`);
    }

    const issuedAt = toSeconds(this.clock());
    try {
      return jwt.sign(
        {
          sub: claims.subject,
          iat: issuedAt,
          exp: issuedAt + lifetimeSeconds,
        },
        this.settings.secret,
        { algorithm: this.settings.algorithm }
      );
    } catch (error) {
      throw new TokenSigningError({ cause: error });
    }
  }

  validateToken(token: string): Result<TokenClaims, TokenError> {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.settings.secret, {
        algorithms: [this.settings.algorithm],
        clockTimestamp: toSeconds(this.clock()),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return err(new ExpiredTokenError(error.expiredAt));
      }
      if (error instanceof jwt.JsonWebTokenError) {
        return err(new InvalidTokenError(error.message));
      }
      return err(new InvalidTokenError());
    }

    if (typeof decoded === 'string') {
      return err(new InvalidTokenError('Token payload is not a JSON object'));
    }
    if (typeof decoded.exp !== 'number') {
      return err(new InvalidTokenError('Token has no expiry'));
    }

    return ok({
      subject: typeof decoded.sub === 'string' ? decoded.sub : undefined,
      issuedAt: typeof decoded.iat === 'number' ? new Date(decoded.iat * 1000) : undefined,
      expiresAt: new Date(decoded.exp * 1000),
    });
  }
}
