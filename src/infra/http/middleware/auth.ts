import type { Request, RequestHandler } from 'express';
import type { IdentityResolver } from '../../../application/auth/resolveIdentity.js';
import { UnauthorizedError } from '../../../application/errors.js';
import type { ResolvedIdentity } from '../../../domain/auth/user.js';
import { asyncHandler } from './asyncHandler.js';

const BEARER = /^Bearer\s+(\S+)\s*$/i;

/** Pull the token out of `Authorization: Bearer <token>`, or null. */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = BEARER.exec(header);
  return match ? match[1] : null;
}

/**
 * Require a valid bearer token. On success `req.identity` holds the caller;
 * otherwise the request ends with 401 via the error handler.
 */
export function authMiddleware(resolver: IdentityResolver): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      throw new UnauthorizedError();
    }

    const resolved = await resolver.resolve(token);
    if (!resolved.ok) {
      throw resolved.error;
    }

    req.identity = resolved.value;
    next();
  });
}

/** The caller of a route mounted behind authMiddleware. */
export function requireIdentity(req: Request): ResolvedIdentity {
  if (!req.identity) {
    throw new UnauthorizedError();
  }
  return req.identity;
}
