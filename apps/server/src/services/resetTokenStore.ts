import { env } from "../config/env.js";
import type { AuthRepository } from "../types/auth.js";
import { authStore } from "./authStore.js";
import { generateOpaqueToken } from "./sessionStore.js";

const RETENTION_MS = 24 * 60 * 60 * 1000;

export interface ResetTokenStoreOptions {
  ttlMs?: number;
  now?: () => Date;
}

export interface IssuedResetToken {
  token: string;
  expiresAt: Date;
}

export class ResetTokenStore {
  private readonly repository: AuthRepository;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(repository: AuthRepository, options: ResetTokenStoreOptions = {}) {
    this.repository = repository;
    this.ttlMs = options.ttlMs ?? env.RESET_TOKEN_TTL_MINUTES * 60 * 1000;
    this.now = options.now ?? (() => new Date());
  }

  get ttlMinutes(): number {
    return Math.round(this.ttlMs / 60_000);
  }

  async issue(userId: number): Promise<IssuedResetToken> {
    const createdAt = this.now();
    const token = generateOpaqueToken();
    const expiresAt = new Date(createdAt.getTime() + this.ttlMs);
    await this.repository.insertResetToken({ token, userId, expiresAt, used: false, createdAt });
    return { token, expiresAt };
  }

  /**
   * Flips `used` and stores the new hash together. Returns the owning user id,
   * or null for unknown, expired and already-used tokens alike.
   */
  async consume(token: string, newPasswordHash: string): Promise<number | null> {
    return this.repository.consumeResetToken(token, newPasswordHash, this.now());
  }

  async sweepExpired(): Promise<number> {
    return this.repository.deleteStaleResetTokens(new Date(this.now().getTime() - RETENTION_MS));
  }
}

export const resetTokenStore = new ResetTokenStore(authStore);
