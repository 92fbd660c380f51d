import type { PasswordHasher } from '../../domain/auth/password.js';
import { normalizeEmail, type UserStore } from '../../domain/auth/user.js';
import { err, ok, type Result } from '../../domain/result.js';
import { InvalidCredentialsError } from '../errors.js';
import type { TokenService } from './tokenService.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  accessToken: string;
  tokenType: 'bearer';
  userName: string;
}

// Verified against when the email is unknown, so both failures cost one argon2 run
const DECOY_PASSWORD = 'decoy-password-never-matches';

export class LoginUseCase {
  private decoyHash?: Promise<string>;

  constructor(
    private userRepo: UserStore,
    private passwords: PasswordHasher,
    private tokens: TokenService
  ) {}

  async execute(command: LoginCommand): Promise<Result<LoginResult, InvalidCredentialsError>> {
    // Find user
    const user = await this.userRepo.findByEmail(normalizeEmail(command.email));
    if (!user) {
      await this.passwords.verify(command.password, await this.getDecoyHash());
      return err(new InvalidCredentialsError());
    }

    // Verify password (a corrupt stored hash throws and surfaces as a 500)
    const isValid = await this.passwords.verify(command.password, user.passwordHash);
    if (!isValid) {
      return err(new InvalidCredentialsError());
    }

    const accessToken = this.tokens.createToken({ subject: user.email });

    return ok({
      accessToken,
      tokenType: 'bearer' as const,
      userName: user.name,
    });
  }

  /** Hashed once, lazily, with the same cost settings as real passwords. */
  private getDecoyHash(): Promise<string> {
    if (!this.decoyHash) {
      this.decoyHash = this.passwords.hash(DECOY_PASSWORD).catch((error: unknown) => {
        this.decoyHash = undefined;
        throw error;
      });
    }
    return this.decoyHash;
  }
}
