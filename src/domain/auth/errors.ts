export class AuthDomainError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The hashing library failed. Not a user error. */
export class HashingError extends AuthDomainError {
  constructor(options?: { cause?: unknown }) {
    super('Failed to hash password', options);
  }
}

/** The stored hash could not be parsed or checked. Not a wrong password. */
export class VerificationError extends AuthDomainError {
  constructor(options?: { cause?: unknown }) {
    super('Failed to verify password', options);
  }
}

export class TokenSigningError extends AuthDomainError {
  constructor(options?: { cause?: unknown }) {
    super('Failed to create access token', options);
  }
}

export class ExpiredTokenError extends AuthDomainError {
  constructor(public readonly expiredAt: Date) {
    super('Token expired');
  }
}

export class InvalidTokenError extends AuthDomainError {
  constructor(reason = 'Invalid token') {
    super(reason);
  }
}

export type TokenError = ExpiredTokenError | InvalidTokenError;

export class DuplicateEmailError extends AuthDomainError {
  constructor(public readonly email: string) {
    super('Email already registered');
  }
}
