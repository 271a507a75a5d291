import { hash, verify } from 'argon2';

/**
 * Password hashing with Argon2id at the library's default cost.
 * The salt is generated per hash and embedded in the encoded result.
 */
export class Password {
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * Verify a plain password against a stored hash.
   * A hash that cannot be parsed counts as a mismatch.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
