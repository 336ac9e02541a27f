import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import type { Env } from "../config/env.js";

export type SmtpSettings = Pick<
  Env,
  "SMTP_HOST" | "SMTP_PORT" | "SMTP_USER" | "SMTP_PASS" | "SMTP_FROM" | "SMTP_SECURE" | "SMTP_TIMEOUT_MS"
>;

export interface SmtpConfig {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
  secure: boolean;
  timeoutMs: number;
}

export type EmailConfig = { enabled: true; smtp: SmtpConfig } | { enabled: false; reason: string };

export type EmailSendResult = { ok: true; messageId?: string } | { ok: false; error: string };

export interface EmailSender {
  send(to: string, subject: string, textBody: string, htmlBody: string): Promise<EmailSendResult>;
}

const REQUIRED_SMTP_KEYS = ["SMTP_HOST", "SMTP_PORT", "SMTP_USER", "SMTP_PASS"] as const;
const PLACEHOLDER_MARKERS = ["tu-", "your-", "changeme", "example"];

export function isPlaceholderValue(value: string | undefined): boolean {
  if (!value || !value.trim()) return true;
  const lowered = value.toLowerCase();
  return PLACEHOLDER_MARKERS.some((marker) => lowered.includes(marker));
}

export function validateSmtpConfig(settings: SmtpSettings): { ok: true } | { ok: false; missing: string[] } {
  const missing = REQUIRED_SMTP_KEYS.filter((key) => isPlaceholderValue(settings[key]));
  const port = Number(settings.SMTP_PORT);
  if (!missing.includes("SMTP_PORT") && (!Number.isInteger(port) || port <= 0)) {
    missing.push("SMTP_PORT");
  }
  return missing.length === 0 ? { ok: true } : { ok: false, missing };
}

/** Resolved once at startup and handed to the auth service. */
export function resolveEmailConfig(settings: SmtpSettings): EmailConfig {
  const validation = validateSmtpConfig(settings);
  if (!validation.ok) {
    return { enabled: false, reason: `smtp_not_configured:${validation.missing.join(",")}` };
  }
  const { SMTP_HOST, SMTP_PORT, SMTP_USER, SMTP_PASS } = settings;
  if (!SMTP_HOST || !SMTP_USER || !SMTP_PASS) {
    return { enabled: false, reason: "smtp_not_configured" };
  }
  return {
    enabled: true,
    smtp: {
      host: SMTP_HOST,
      port: Number(SMTP_PORT),
      user: SMTP_USER,
      pass: SMTP_PASS,
      from: settings.SMTP_FROM?.trim() || SMTP_USER,
      secure: settings.SMTP_SECURE,
      timeoutMs: settings.SMTP_TIMEOUT_MS
    }
  };
}

export class SmtpEmailSender implements EmailSender {
  private transporter: Transporter | null = null;
  private readonly config: SmtpConfig;

  constructor(config: SmtpConfig) {
    this.config = config;
  }

  private getTransporter(): Transporter {
    if (!this.transporter) {
      this.transporter = nodemailer.createTransport({
        host: this.config.host,
        port: this.config.port,
        secure: this.config.secure,
        requireTLS: !this.config.secure,
        auth: { user: this.config.user, pass: this.config.pass },
        connectionTimeout: this.config.timeoutMs,
        greetingTimeout: this.config.timeoutMs,
        socketTimeout: this.config.timeoutMs
      });
    }
    return this.transporter;
  }

  async send(to: string, subject: string, textBody: string, htmlBody: string): Promise<EmailSendResult> {
    try {
      const info = await this.getTransporter().sendMail({
        from: this.config.from,
        to,
        subject,
        text: textBody,
        html: htmlBody
      });
      return { ok: true, messageId: typeof info.messageId === "string" ? info.messageId : undefined };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : "smtp_send_failed" };
    }
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export interface ResetEmailInput {
  firstName: string;
  username: string;
  link: string;
  ttlMinutes: number;
}

export function buildResetEmail(input: ResetEmailInput): { subject: string; text: string; html: string } {
  const subject = "Password reset - Sales Tracker";
  const text = [
    `Hello ${input.firstName},`,
    "",
    `You asked to reset the password for the user '${input.username}'.`,
    "",
    "Open the following link to choose a new password:",
    input.link,
    "",
    `This link expires in ${input.ttlMinutes} minutes.`,
    "",
    "If you did not request this change, ignore this message.",
    "",
    "---",
    "Sales Tracker"
  ].join("\n");

  const link = escapeHtml(input.link);
  const html = `<html>
<body style="font-family: Arial, sans-serif; line-height: 1.6; color: #333;">
  <h2 style="color: #4F46E5;">Password reset</h2>
  <p>Hello <strong>${escapeHtml(input.firstName)}</strong>,</p>
  <p>You asked to reset the password for the user <code>${escapeHtml(input.username)}</code>.</p>
  <p><a href="${link}" style="display: inline-block; padding: 12px 24px; background: #4F46E5; color: white; text-decoration: none; border-radius: 6px; font-weight: 600;">Reset password</a></p>
  <p style="color: #666; font-size: 14px;">Or copy this link into your browser:<br><code>${link}</code></p>
  <p style="color: #999; font-size: 12px;">This link expires in ${input.ttlMinutes} minutes.<br>If you did not request this change, ignore this message.</p>
</body>
</html>`;

  return { subject, text, html };
}
