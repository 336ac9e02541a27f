import { Router } from "express";
import { z } from "zod";
import {
  clearedSessionCookie,
  cookieTokenFromRequest,
  handleServiceError,
  requireAuth,
  sessionCookie
} from "../middleware/auth.js";
import { authService, type AuthService } from "../services/authService.js";

const registerSchema = z.object({
  username: z.string().trim().min(3).max(64),
  password: z.string().min(1).max(256),
  firstName: z.string().trim().min(1).max(120),
  lastName: z.string().trim().max(120).optional(),
  email: z.string().trim().email().optional(),
  phone: z.string().trim().max(40).optional()
});

const loginSchema = z.object({
  username: z.string().min(1).max(64),
  password: z.string().min(1).max(256)
});

const forgotPasswordSchema = z.object({
  email: z.string().optional().default("")
});

const resetPasswordSchema = z.object({
  token: z.string().optional().default(""),
  password: z.string().optional().default("")
});

export function createAuthRouter(service: AuthService): Router {
  const router = Router();

  router.post("/api/auth/register", async (req, res) => {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    try {
      const created = await service.register(parsed.data);
      return res.status(201).json(created);
    } catch (error) {
      return handleServiceError(error, res, "registration_failed");
    }
  });

  router.post("/api/auth/login", async (req, res) => {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    try {
      const result = await service.login(parsed.data.username, parsed.data.password);
      res.setHeader("Set-Cookie", sessionCookie(result.sessionToken, service.sessionTtlSeconds));
      const { user } = result;
      return res.json({
        id: user.id,
        username: user.username,
        firstName: user.firstName,
        lastName: user.lastName ?? null,
        role: user.role,
        subgroup: user.subgroup ?? null
      });
    } catch (error) {
      return handleServiceError(error, res, "login_failed");
    }
  });

  router.post("/api/auth/logout", async (req, res) => {
    try {
      await service.logout(cookieTokenFromRequest(req));
      res.setHeader("Set-Cookie", clearedSessionCookie());
      return res.json({ success: true });
    } catch (error) {
      return handleServiceError(error, res, "logout_failed");
    }
  });

  router.get("/api/auth/me", requireAuth, (req, res) => {
    if (!req.authContext) return res.status(401).json({ error: "unauthenticated" });
    const { user } = req.authContext;
    return res.json({
      id: user.id,
      username: user.username,
      firstName: user.firstName,
      lastName: user.lastName ?? null,
      email: user.email ?? null,
      phone: user.phone ?? null,
      zone: user.zone ?? null,
      role: user.role,
      subgroup: user.subgroup ?? null,
      isActive: user.isActive
    });
  });

  router.post("/api/auth/forgot-password", async (req, res) => {
    const parsed = forgotPasswordSchema.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
    if (!parsed.data.email.trim()) return res.status(400).json({ error: "email_required" });

    try {
      return res.json(await service.forgotPassword(parsed.data.email));
    } catch (error) {
      return handleServiceError(error, res, "forgot_password_failed");
    }
  });

  router.post("/api/auth/reset-password", async (req, res) => {
    const parsed = resetPasswordSchema.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
    if (!parsed.data.token.trim() || !parsed.data.password) {
      return res.status(400).json({ error: "token_and_password_required" });
    }

    try {
      return res.json(await service.resetPassword(parsed.data.token, parsed.data.password));
    } catch (error) {
      return handleServiceError(error, res, "reset_password_failed");
    }
  });

  return router;
}

export const authRouter = createAuthRouter(authService);
