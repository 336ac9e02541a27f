import bcrypt from "bcrypt";
import { env } from "../config/env.js";

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, hashed: string): Promise<boolean>;
}

/**
 * bcrypt with a fresh salt per call. The async API runs on the libuv
 * thread pool, so hashing never blocks request dispatch.
 */
export class CredentialHasher implements PasswordHasher {
  private readonly rounds: number;

  constructor(rounds: number = env.BCRYPT_ROUNDS) {
    this.rounds = rounds;
  }

  async hash(plaintext: string): Promise<string> {
    return bcrypt.hash(plaintext, this.rounds);
  }

  async verify(plaintext: string, hashed: string): Promise<boolean> {
    try {
      return await bcrypt.compare(plaintext, hashed);
    } catch {
      return false;
    }
  }
}

export const credentialHasher = new CredentialHasher();
