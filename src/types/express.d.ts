import type { ResolvedIdentity } from '../domain/auth/user.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by the bearer middleware for the lifetime of this request only. */
      identity?: ResolvedIdentity;
    }
  }
}

export {};
