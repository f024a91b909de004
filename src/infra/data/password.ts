import { argon2id, hash, verify } from 'argon2';

/**
 * Argon2id password hashing for the users table.
 */
export const Password = {
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, { type: argon2id });
  },

  /**
   * A malformed stored hash verifies as false.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  },
};
