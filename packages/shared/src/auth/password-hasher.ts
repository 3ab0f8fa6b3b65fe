import { hash, verify, type Options } from '@node-rs/argon2';
import { type PasswordHasher } from '@murmur/domain';

export const DEFAULT_ARGON2_OPTIONS: Options = {
  memoryCost: 19456,
  timeCost: 2,
  outputLen: 32,
  parallelism: 1,
};

/** Stored hash of an account that can never log in with a password. */
export const UNUSABLE_PASSWORD_HASH = '!';

export class Argon2PasswordHasher implements PasswordHasher {
  constructor(private readonly options: Options = DEFAULT_ARGON2_OPTIONS) {}

  async hash(password: string): Promise<string> {
    return hash(password, this.options);
  }

  async verify(password: string, passwordHash: string): Promise<boolean> {
    if (passwordHash === UNUSABLE_PASSWORD_HASH) return false;
    try {
      return await verify(passwordHash, password, this.options);
    } catch {
      // Malformed hash strings are a mismatch, not a failure.
      return false;
    }
  }
}
