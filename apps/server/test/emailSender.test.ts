import { test } from "node:test";
import assert from "node:assert/strict";
import {
  buildResetEmail,
  escapeHtml,
  isPlaceholderValue,
  resolveEmailConfig,
  validateSmtpConfig,
  type SmtpSettings
} from "../src/services/emailSender.js";

function settings(overrides: Partial<SmtpSettings> = {}): SmtpSettings {
  return {
    SMTP_HOST: "smtp.mail.test",
    SMTP_PORT: "587",
    SMTP_USER: "tracker@mail.test",
    SMTP_PASS: "test-secret",
    SMTP_FROM: undefined,
    SMTP_SECURE: false,
    SMTP_TIMEOUT_MS: 10000,
    ...overrides
  };
}

test("isPlaceholderValue flags empty and template values", () => {
  assert.equal(isPlaceholderValue(undefined), true);
  assert.equal(isPlaceholderValue("   "), true);
  assert.equal(isPlaceholderValue("tu-email@gmail.com"), true);
  assert.equal(isPlaceholderValue("your-app-password"), true);
  assert.equal(isPlaceholderValue("smtp.mail.test"), false);
});

test("validateSmtpConfig lists every missing or placeholder key", () => {
  assert.deepEqual(validateSmtpConfig(settings()), { ok: true });
  assert.deepEqual(validateSmtpConfig(settings({ SMTP_HOST: undefined, SMTP_PASS: "changeme" })), {
    ok: false,
    missing: ["SMTP_HOST", "SMTP_PASS"]
  });
  assert.deepEqual(validateSmtpConfig(settings({ SMTP_PORT: "smtp" })), { ok: false, missing: ["SMTP_PORT"] });
});

test("resolveEmailConfig disables email with a reason when SMTP is incomplete", () => {
  assert.deepEqual(resolveEmailConfig(settings({ SMTP_USER: undefined })), {
    enabled: false,
    reason: "smtp_not_configured:SMTP_USER"
  });
});

test("resolveEmailConfig falls back to the SMTP user as sender", () => {
  assert.deepEqual(resolveEmailConfig(settings()), {
    enabled: true,
    smtp: {
      host: "smtp.mail.test",
      port: 587,
      user: "tracker@mail.test",
      pass: "test-secret",
      from: "tracker@mail.test",
      secure: false,
      timeoutMs: 10000
    }
  });
});

test("escapeHtml encodes markup characters", () => {
  assert.equal(escapeHtml(`<b>"Tom" & 'Jerry'</b>`), "&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;");
});

test("buildResetEmail renders both parts and escapes names in HTML", () => {
  const message = buildResetEmail({
    firstName: "<Ana>",
    username: "ana_gomez",
    link: "http://tracker.test/reset-password?token=abc",
    ttlMinutes: 60
  });

  assert.equal(message.subject, "Password reset - Sales Tracker");
  assert.ok(message.text.startsWith("Hello <Ana>,\n"));
  assert.ok(message.text.includes("\nhttp://tracker.test/reset-password?token=abc\n"));
  assert.ok(message.text.includes("This link expires in 60 minutes."));
  assert.ok(message.html.includes("Hello <strong>&lt;Ana&gt;</strong>,"));
  assert.ok(message.html.includes('<a href="http://tracker.test/reset-password?token=abc"'));
});
