import { env } from "../config/env.js";
import { logger as rootLogger, type Logger } from "../config/logger.js";
import type { AuthContext, AuthRepository, AuthUser, AuthUserRecord } from "../types/auth.js";
import { AuthError } from "./authErrors.js";
import { authStore } from "./authStore.js";
import { credentialHasher, type PasswordHasher } from "./credentialHasher.js";
import { buildResetEmail, resolveEmailConfig, SmtpEmailSender, type EmailSender } from "./emailSender.js";
import { ResetTokenStore, resetTokenStore } from "./resetTokenStore.js";
import { SessionStore, sessionStore } from "./sessionStore.js";

export const MIN_PASSWORD_LENGTH = 8;
export const FORGOT_PASSWORD_MESSAGE = "If the email exists, you will receive recovery instructions";
export const RESET_PASSWORD_MESSAGE = "Password updated successfully";

export interface RegisterInput {
  username: string;
  password: string;
  firstName: string;
  lastName?: string;
  email?: string;
  phone?: string;
}

export interface AuthServiceDeps {
  repository: AuthRepository;
  hasher: PasswordHasher;
  sessions: SessionStore;
  resetTokens: ResetTokenStore;
  /** Null when SMTP is not configured; reset links then go to the operator log. */
  mailer: EmailSender | null;
  logger: Logger;
  appBaseUrl: string;
  /** Minimum duration of every forgot-password request, matched or not. */
  forgotPasswordDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function toAuthUser(record: AuthUserRecord): AuthUser {
  return {
    id: record.id,
    username: record.username,
    firstName: record.firstName,
    lastName: record.lastName,
    email: record.email,
    phone: record.phone,
    zone: record.zone,
    role: record.role,
    subgroup: record.subgroup,
    isActive: record.isActive
  };
}

export function buildResetLink(appBaseUrl: string, token: string): string {
  return `${appBaseUrl.replace(/\/+$/, "")}/reset-password?token=${encodeURIComponent(token)}`;
}

export class AuthService {
  private readonly deps: AuthServiceDeps;
  private readonly log: Logger;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private dummyHash: Promise<string> | null = null;

  constructor(deps: AuthServiceDeps) {
    this.deps = deps;
    this.log = deps.logger.child({ component: "auth" });
    this.wait = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
  }

  // Compared against on unknown usernames so both login failures cost one bcrypt round.
  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.deps.hasher.hash("invalid-user-placeholder");
    }
    return this.dummyHash;
  }

  get sessionTtlSeconds(): number {
    return this.deps.sessions.ttlSeconds;
  }

  async register(input: RegisterInput): Promise<{ id: number; username: string }> {
    const username = input.username.trim();
    const existing = await this.deps.repository.findUserByUsername(username);
    if (existing) throw new AuthError("duplicate_username");

    const passwordHash = await this.deps.hasher.hash(input.password);
    const created = await this.deps.repository.insertUser({
      username,
      passwordHash,
      firstName: input.firstName.trim(),
      lastName: input.lastName?.trim() || undefined,
      email: input.email ? normalizeEmail(input.email) || undefined : undefined,
      phone: input.phone?.trim() || undefined,
      role: "agent",
      isActive: true
    });
    // A concurrent registration can win the unique constraint after our lookup.
    if (!created) throw new AuthError("duplicate_username");

    this.log.info({ userId: created.id, username }, "Identity registered");
    return { id: created.id, username: created.username };
  }

  async login(username: string, password: string): Promise<{ sessionToken: string; expiresAt: Date; user: AuthUser }> {
    const user = await this.deps.repository.findUserByUsername(username.trim());
    if (!user) {
      await this.deps.hasher.verify(password, await this.getDummyHash());
      this.log.info({ reason: "unknown_username" }, "Login rejected");
      throw new AuthError("invalid_credentials");
    }

    const matches = await this.deps.hasher.verify(password, user.passwordHash);
    if (!matches) {
      this.log.info({ userId: user.id, reason: "bad_password" }, "Login rejected");
      throw new AuthError("invalid_credentials");
    }

    if (!user.isActive) {
      this.log.info({ userId: user.id, reason: "inactive" }, "Login rejected");
      throw new AuthError("inactive_account");
    }

    const session = await this.deps.sessions.create(user.id);
    this.log.info({ userId: user.id }, "Session created");
    return { sessionToken: session.token, expiresAt: session.expiresAt, user: toAuthUser(user) };
  }

  async logout(sessionToken: string | null | undefined): Promise<void> {
    if (!sessionToken) return;
    await this.deps.sessions.revoke(sessionToken);
  }

  async authenticate(sessionToken: string | null | undefined): Promise<AuthContext> {
    if (!sessionToken) throw new AuthError("no_session");

    const lookup = await this.deps.sessions.inspect(sessionToken);
    if (lookup.status === "missing") throw new AuthError("no_session");
    if (lookup.status === "expired") {
      this.log.debug({ userId: lookup.session.userId }, "Expired session removed");
      throw new AuthError("expired_session");
    }

    const user = await this.deps.repository.findUserById(lookup.session.userId);
    if (!user) {
      this.log.warn({ userId: lookup.session.userId }, "Session references a missing identity");
      throw new AuthError("identity_not_found");
    }
    if (!user.isActive) throw new AuthError("inactive_account");

    return { user: toAuthUser(user), sessionToken };
  }

  async forgotPassword(rawEmail: string): Promise<{ success: true; message: string }> {
    const startedAt = this.now().getTime();
    const user = await this.deps.repository.findUserByEmail(normalizeEmail(rawEmail));
    if (user) {
      const issued = await this.deps.resetTokens.issue(user.id);
      const link = buildResetLink(this.deps.appBaseUrl, issued.token);
      await this.deliverResetLink(user, link, issued.expiresAt);
    }

    // Both branches take at least the configured delay.
    const remaining = this.deps.forgotPasswordDelayMs - (this.now().getTime() - startedAt);
    if (remaining > 0) await this.wait(remaining);
    return { success: true, message: FORGOT_PASSWORD_MESSAGE };
  }

  private async deliverResetLink(user: AuthUserRecord, link: string, expiresAt: Date): Promise<void> {
    const { mailer } = this.deps;
    if (mailer && user.email) {
      const message = buildResetEmail({
        firstName: user.firstName,
        username: user.username,
        link,
        ttlMinutes: this.deps.resetTokens.ttlMinutes
      });
      try {
        const result = await mailer.send(user.email, message.subject, message.text, message.html);
        if (result.ok) {
          this.log.info({ userId: user.id, messageId: result.messageId }, "Password reset email sent");
          return;
        }
        this.log.error({ userId: user.id, err: result.error }, "Password reset email failed");
      } catch (error) {
        this.log.error({ userId: user.id, err: error }, "Password reset email failed");
      }
    }

    this.log.warn(
      { userId: user.id, username: user.username, email: user.email, resetLink: link, expiresAt: expiresAt.toISOString() },
      "Password reset link (email delivery unavailable)"
    );
  }

  async resetPassword(token: string, newPassword: string): Promise<{ success: true; message: string }> {
    if (newPassword.length < MIN_PASSWORD_LENGTH) throw new AuthError("weak_password");

    const passwordHash = await this.deps.hasher.hash(newPassword);
    const userId = await this.deps.resetTokens.consume(token.trim(), passwordHash);
    if (userId === null) throw new AuthError("invalid_or_expired_reset_token");

    this.log.info({ userId }, "Password reset completed");
    return { success: true, message: RESET_PASSWORD_MESSAGE };
  }
}

function createMailer(): EmailSender | null {
  const emailConfig = resolveEmailConfig(env);
  if (!emailConfig.enabled) {
    rootLogger.warn({ reason: emailConfig.reason }, "SMTP disabled; password reset links will be written to the log");
    return null;
  }
  rootLogger.info({ host: emailConfig.smtp.host, port: emailConfig.smtp.port }, "SMTP configured");
  return new SmtpEmailSender(emailConfig.smtp);
}

export const authService = new AuthService({
  repository: authStore,
  hasher: credentialHasher,
  sessions: sessionStore,
  resetTokens: resetTokenStore,
  mailer: createMailer(),
  logger: rootLogger,
  appBaseUrl: env.APP_BASE_URL,
  forgotPasswordDelayMs: env.FORGOT_PASSWORD_DELAY_MS
});
