import { randomBytes } from "node:crypto";
import { env } from "../config/env.js";
import type { AuthRepository, SessionRecord } from "../types/auth.js";
import { authStore } from "./authStore.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type SessionLookup =
  | { status: "active"; session: SessionRecord }
  | { status: "missing" }
  | { status: "expired"; session: SessionRecord };

export interface SessionStoreOptions {
  ttlMs?: number;
  now?: () => Date;
}

export function generateOpaqueToken(): string {
  return randomBytes(32).toString("base64url");
}

/**
 * Opaque session tokens with an absolute expiry. Expired rows are deleted
 * lazily on lookup; `sweepExpired` clears the rest in bulk.
 */
export class SessionStore {
  private readonly repository: AuthRepository;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(repository: AuthRepository, options: SessionStoreOptions = {}) {
    this.repository = repository;
    this.ttlMs = options.ttlMs ?? env.SESSION_TTL_DAYS * DAY_MS;
    this.now = options.now ?? (() => new Date());
  }

  get ttlSeconds(): number {
    return Math.floor(this.ttlMs / 1000);
  }

  async create(userId: number): Promise<SessionRecord> {
    const createdAt = this.now();
    const session: SessionRecord = {
      token: generateOpaqueToken(),
      userId,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + this.ttlMs)
    };
    await this.repository.insertSession(session);
    return session;
  }

  /** Like `fetch`, but keeps the reason a token is not usable for logging. */
  async inspect(token: string): Promise<SessionLookup> {
    const session = await this.repository.getSession(token);
    if (!session) return { status: "missing" };
    if (this.now().getTime() > session.expiresAt.getTime()) {
      await this.repository.deleteSession(token);
      return { status: "expired", session };
    }
    return { status: "active", session };
  }

  async fetch(token: string): Promise<SessionRecord | null> {
    const lookup = await this.inspect(token);
    return lookup.status === "active" ? lookup.session : null;
  }

  async revoke(token: string): Promise<void> {
    await this.repository.deleteSession(token);
  }

  async sweepExpired(): Promise<number> {
    return this.repository.deleteSessionsExpiredBefore(this.now());
  }
}

export const sessionStore = new SessionStore(authStore);
