import { argon2id, hash, verify } from 'argon2';

// Argon2id, 19 MiB, 2 passes, 1 lane
const HASH_OPTIONS = {
  type: argon2id,
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
} as const;

const ENCODED_PREFIX = '$argon2';

export class PasswordVault {
  /**
   * Salted one-way digest in PHC string form. The salt is drawn fresh on
   * every call and stored inside the result.
   */
  static async hash(plaintext: string): Promise<string> {
    return hash(plaintext, HASH_OPTIONS);
  }

  static async verify(plaintext: string, passwordHash: string): Promise<boolean> {
    if (!passwordHash.startsWith(ENCODED_PREFIX)) {
      return false;
    }
    try {
      return await verify(passwordHash, plaintext);
    } catch {
      // Corrupt parameters or salt in a stored hash count as a mismatch
      return false;
    }
  }
}
