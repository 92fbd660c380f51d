import { hash, verify, argon2id } from 'argon2';
import { HashingError, VerificationError } from './errors.js';

export interface HashCost {
  memoryCost?: number;
  timeCost?: number;
  parallelism?: number;
}

const ARGON2_PHC = /^\$argon2(id|i|d)\$/;

/**
 * Password hashing using Argon2id.
 */
export class PasswordHasher {
  constructor(private readonly cost: HashCost = {}) {}

  /**
   * Hash a plain text password. Every call uses a fresh salt, so the same
   * password never hashes to the same string twice.
   */
  async hash(plainPassword: string): Promise<string> {
    try {
      return await hash(plainPassword, { ...this.cost, type: argon2id });
    } catch (error) {
      throw new HashingError({ cause: error });
    }
  }

  /**
   * Verify a plain password against a stored hash. The parameters and salt
   * come from the hash itself; argon2 compares digests in constant time.
   *
   * A stored value that is not an argon2 hash throws VerificationError
   * instead of reporting a mismatch.
   */
  async verify(plainPassword: string, storedHash: string): Promise<boolean> {
    if (!ARGON2_PHC.test(storedHash)) {
      throw new VerificationError({ cause: new Error('Stored hash is not an argon2 PHC string') });
    }

    try {
      return await verify(storedHash, plainPassword);
    } catch (error) {
      throw new VerificationError({ cause: error });
    }
  }
}
